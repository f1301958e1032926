import { access } from 'node:fs/promises';
import { DEFAULT_ENV_FILE, promptWorkspaceConfig, resolveDefaults } from './config';
import { executeLaunch, findEnvFile, planLaunch } from './launch-planner';
import { Prompter, ReadlinePrompter } from './prompter';
import { ContainerRuntime, toContainerState } from './runtime/container-runtime';
import { DockerRuntime } from './runtime/docker-runtime';
import { printAttachGuidance, SignalSource, waitForInterrupt } from './session-monitor';
import { ShutdownHandler, ShutdownHandlerOptions } from './shutdown-handler';
import { CliIO, ContainerState, LaunchPlan, WorkspaceConfig } from './types';

export interface UpOptions {
  preset?: Partial<WorkspaceConfig>;
  useDefaults?: boolean;
  envFile?: string;
}

export interface DownOptions {
  confirmRemoval?: boolean;
}

export interface WorkspaceSessionDependencies {
  runtime: ContainerRuntime;
  prompter: Prompter;
  io: CliIO;
  signals: SignalSource;
  env: NodeJS.ProcessEnv;
  cwd(): string;
  pathExists(candidatePath: string): Promise<boolean>;
  exit(code: number): void;
  tickMs?: number;
}

export async function pathExists(candidatePath: string): Promise<boolean> {
  try {
    await access(candidatePath);
    return true;
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }

    throw error;
  }
}

export class WorkspaceSession {
  constructor(private readonly deps: WorkspaceSessionDependencies) {}

  /**
   * Resolves the config, brings the container up and holds the session open until Ctrl+C
   * has run the shutdown sequence.
   */
  async up(options: UpOptions = {}): Promise<LaunchPlan> {
    const { runtime, io } = this.deps;

    try {
      const config = await promptWorkspaceConfig(this.deps.prompter, resolveDefaults(this.deps.env), {
        preset: options.preset,
        useDefaults: options.useDefaults
      });

      const probe = await runtime.probe(config.containerName);
      const envFile = await findEnvFile(this.deps.cwd(), options.envFile ?? DEFAULT_ENV_FILE, this.deps.pathExists);
      const plan = planLaunch(probe, envFile);

      await executeLaunch(plan, config, runtime, io);
      printAttachGuidance(config, io);

      const shutdown = this.createShutdownHandler(config);
      await waitForInterrupt(this.deps.signals, () => shutdown.terminate(), this.deps.tickMs);
      return plan;
    } finally {
      this.deps.prompter.close();
    }
  }

  async status(containerName?: string): Promise<ContainerState> {
    const name = this.resolveContainerName(containerName);
    return toContainerState(await this.deps.runtime.probe(name));
  }

  async down(containerName?: string, options: DownOptions = {}): Promise<void> {
    const config: WorkspaceConfig = {
      ...resolveDefaults(this.deps.env),
      containerName: this.resolveContainerName(containerName)
    };

    // runCli owns the exit code for `down`.
    const shutdown = this.createShutdownHandler(config, {
      confirmRemoval: options.confirmRemoval,
      exit: () => undefined
    });
    try {
      await shutdown.terminate();
    } finally {
      this.deps.prompter.close();
    }
  }

  private resolveContainerName(containerName: string | undefined): string {
    return containerName !== undefined && containerName.trim().length > 0
      ? containerName
      : resolveDefaults(this.deps.env).containerName;
  }

  private createShutdownHandler(
    config: WorkspaceConfig,
    overrides: Partial<Pick<ShutdownHandlerOptions, 'confirmRemoval' | 'exit'>> = {}
  ): ShutdownHandler {
    return new ShutdownHandler({
      config,
      runtime: this.deps.runtime,
      prompter: this.deps.prompter,
      io: this.deps.io,
      exit: overrides.exit ?? ((code) => this.deps.exit(code)),
      confirmRemoval: overrides.confirmRemoval
    });
  }
}

export function createDefaultWorkspaceSession(
  io: CliIO = { stdout: process.stdout, stderr: process.stderr }
): WorkspaceSession {
  return new WorkspaceSession({
    runtime: new DockerRuntime(),
    prompter: new ReadlinePrompter(),
    io,
    signals: process,
    env: process.env,
    cwd: () => process.cwd(),
    pathExists,
    exit: (code) => process.exit(code)
  });
}
