import { Prompter } from './prompter';
import { ContainerRuntime } from './runtime/container-runtime';
import { CliIO, ShutdownState, WorkspaceConfig } from './types';

export interface ShutdownHandlerOptions {
  config: WorkspaceConfig;
  runtime: ContainerRuntime;
  prompter: Prompter;
  io: CliIO;
  exit: (code: number) => void;
  /** Answer the removal question without asking. */
  confirmRemoval?: boolean;
}

function isAffirmative(answer: string): boolean {
  return answer === 'y' || answer === 'Y';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ShutdownHandler {
  private currentState: ShutdownState = 'idle';

  constructor(private readonly options: ShutdownHandlerOptions) {}

  get state(): ShutdownState {
    return this.currentState;
  }

  /**
   * Stops the container, offers removal, then reports exit code 0.
   * Returns false without doing anything once a shutdown has begun.
   */
  async terminate(): Promise<boolean> {
    if (this.currentState === 'terminating') {
      return false;
    }

    this.currentState = 'terminating';
    const { config, runtime, io } = this.options;
    const name = config.containerName;

    io.stdout.write(`\nStopping container ${name}...\n`);
    let stopped = true;
    try {
      await runtime.stop(name);
    } catch (error: unknown) {
      stopped = false;
      io.stderr.write(`${describeError(error)}\n`);
    }

    if (stopped && (await this.confirmRemoval(name))) {
      io.stdout.write(`Removing container ${name}...\n`);
      try {
        await runtime.remove(name);
      } catch (error: unknown) {
        io.stderr.write(`${describeError(error)}\n`);
      }
    } else {
      io.stdout.write(`Container ${name} was not removed. Remove it manually with: docker rm ${name}\n`);
    }

    this.options.exit(0);
    return true;
  }

  private async confirmRemoval(name: string): Promise<boolean> {
    if (this.options.confirmRemoval !== undefined) {
      return this.options.confirmRemoval;
    }

    const answer = await this.options.prompter.ask(`Remove container ${name}? (y/n): `);
    return isAffirmative(answer);
  }
}
