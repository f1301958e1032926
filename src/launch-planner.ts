import path from 'node:path';
import { CONTAINER_SHELL, CONTAINER_WORKSPACE_PATH } from './config';
import { ContainerRuntime } from './runtime/container-runtime';
import { CliIO, ContainerProbe, CreateContainerOptions, LaunchPlan, WorkspaceConfig } from './types';

const LOGS_DIVIDER = ' ---------- Logs ----------';

/**
 * Running wins over existing, and only the create branch looks at the env file:
 * a restarted container keeps whatever it was created with.
 */
export function planLaunch(probe: ContainerProbe, envFile: string | undefined): LaunchPlan {
  if (probe.running) {
    return { action: 'attach' };
  }

  if (probe.exists) {
    return { action: 'restart' };
  }

  return envFile === undefined ? { action: 'create' } : { action: 'create', envFile };
}

export async function findEnvFile(
  cwd: string,
  envFileName: string,
  pathExists: (candidatePath: string) => Promise<boolean>
): Promise<string | undefined> {
  const candidate = path.resolve(cwd, envFileName);
  return (await pathExists(candidate)) ? candidate : undefined;
}

export function buildCreateOptions(config: WorkspaceConfig, envFile: string | undefined): CreateContainerOptions {
  return {
    name: config.containerName,
    image: config.imageName,
    hostPath: config.mountPath,
    containerPath: CONTAINER_WORKSPACE_PATH,
    gpus: 'all',
    detached: true,
    interactiveTty: true,
    command: [CONTAINER_SHELL],
    envFile
  };
}

export async function executeLaunch(
  plan: LaunchPlan,
  config: WorkspaceConfig,
  runtime: ContainerRuntime,
  io: CliIO
): Promise<void> {
  switch (plan.action) {
    case 'attach':
      io.stdout.write(`Container ${config.containerName} is already running. Attaching...\n${LOGS_DIVIDER}\n`);
      return;
    case 'restart':
      io.stdout.write(`Found stopped container ${config.containerName}. Starting it...\n${LOGS_DIVIDER}\n`);
      await runtime.start(config.containerName);
      return;
    case 'create': {
      io.stdout.write(`Creating container ${config.containerName} from ${config.imageName} in detached mode...\n`);
      io.stdout.write(
        plan.envFile === undefined
          ? 'No env file found. Starting without extra environment variables.\n'
          : `Loading environment variables from ${plan.envFile}\n`
      );
      io.stdout.write(`${LOGS_DIVIDER}\n`);
      const containerId = await runtime.create(buildCreateOptions(config, plan.envFile));
      if (containerId.length > 0) {
        io.stdout.write(`${containerId}\n`);
      }
      return;
    }
  }
}
