import { Command, CommanderError, Option } from 'commander';
import pkg from '../package.json';
import { DEFAULT_ENV_FILE } from './config';
import { CliError } from './errors';
import { createDefaultWorkspaceSession, DownOptions, UpOptions } from './workspace-session';
import { CliIO, ContainerState, LaunchPlan } from './types';

export interface WorkspaceSessionLike {
  up(options: UpOptions): Promise<LaunchPlan>;
  status(containerName?: string): Promise<ContainerState>;
  down(containerName?: string, options?: DownOptions): Promise<void>;
}

interface UpCommandOptions {
  name?: string;
  image?: string;
  mount?: string;
  envFile: string;
  yes?: boolean;
}

export function buildProgram(
  session: WorkspaceSessionLike,
  io: CliIO = { stdout: process.stdout, stderr: process.stderr }
): Command {
  const program = new Command();

  program
    .name('gpu-workspace')
    .description('Run a single GPU workspace container and tear it down on Ctrl+C')
    .version(pkg.version)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str)
    });

  program
    .command('up', { isDefault: true })
    .description('Create, start or reuse the workspace container, then wait for Ctrl+C')
    .option('-n, --name <name>', 'Container name (skips the prompt)')
    .option('-i, --image <image>', 'Image to create the container from (skips the prompt)')
    .option('-m, --mount <path>', 'Host directory mounted at /workspace (skips the prompt)')
    .addOption(
      new Option('-e, --env-file <path>', 'Environment file passed to a newly created container')
        .default(DEFAULT_ENV_FILE)
    )
    .option('-y, --yes', 'Use defaults for every field not given as an option')
    .action(async (options: UpCommandOptions) => {
      await session.up({
        preset: {
          containerName: options.name,
          imageName: options.image,
          mountPath: options.mount
        },
        useDefaults: options.yes === true,
        envFile: options.envFile
      });
    });

  program
    .command('status')
    .description('Print the container state: absent | stopped | running')
    .option('-n, --name <name>', 'Container name')
    .action(async (options: { name?: string }) => {
      const state = await session.status(options.name);
      io.stdout.write(`${state}\n`);
    });

  program
    .command('down')
    .description('Stop the container and offer to remove it')
    .option('-n, --name <name>', 'Container name')
    .option('--remove', 'Remove the stopped container without asking')
    .action(async (options: { name?: string; remove?: boolean }) => {
      await session.down(options.name, options.remove ? { confirmRemoval: true } : {});
    });

  return program;
}

export async function runCli(
  argv: string[] = process.argv,
  session: WorkspaceSessionLike = createDefaultWorkspaceSession(),
  io: CliIO = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  const program = buildProgram(session, io);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        return 0;
      }

      return error.exitCode;
    }

    const exitCode = error instanceof CliError ? error.exitCode : 1;
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return exitCode;
  }
}
