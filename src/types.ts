export type ContainerState = 'absent' | 'stopped' | 'running';

export type ShutdownState = 'idle' | 'terminating';

export interface WorkspaceConfig {
  readonly containerName: string;
  readonly imageName: string;
  readonly mountPath: string;
}

export interface ContainerProbe {
  exists: boolean;
  running: boolean;
}

export interface CreateContainerOptions {
  name: string;
  image: string;
  hostPath: string;
  containerPath: string;
  gpus: string;
  detached: boolean;
  interactiveTty: boolean;
  command: string[];
  envFile?: string;
}

export type LaunchPlan =
  | { action: 'attach' }
  | { action: 'restart' }
  | { action: 'create'; envFile?: string };

export interface CliIO {
  stdout: Pick<NodeJS.WriteStream, 'write'>;
  stderr: Pick<NodeJS.WriteStream, 'write'>;
}
