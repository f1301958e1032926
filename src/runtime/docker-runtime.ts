import { execFile } from 'node:child_process';
import { RuntimeCommandError } from '../errors';
import { ContainerProbe, CreateContainerOptions } from '../types';
import { ContainerRuntime } from './container-runtime';

const DOCKER_BIN = 'docker';
const NO_SUCH_CONTAINER_PATTERN = /no such (container|object)/i;

export class DockerRuntime implements ContainerRuntime {
  constructor(readonly bin: string = DOCKER_BIN) {}

  async probe(name: string): Promise<ContainerProbe> {
    let output: string;
    try {
      output = await this.execDocker(['container', 'inspect', '--format', '{{.State.Running}}', name]);
    } catch (error: unknown) {
      if (error instanceof RuntimeCommandError && NO_SUCH_CONTAINER_PATTERN.test(error.message)) {
        return { exists: false, running: false };
      }

      throw error;
    }

    return {
      exists: true,
      running: output.trim() === 'true'
    };
  }

  async create(options: CreateContainerOptions): Promise<string> {
    const output = await this.execDocker(this.buildRunArgs(options));
    return output.trim();
  }

  async start(name: string): Promise<void> {
    await this.execDocker(['start', name]);
  }

  async stop(name: string): Promise<void> {
    await this.execDocker(['stop', name]);
  }

  async remove(name: string): Promise<void> {
    await this.execDocker(['rm', name]);
  }

  buildRunArgs(options: CreateContainerOptions): string[] {
    const args = ['run', '--gpus', options.gpus];

    if (options.detached) {
      args.push('-d');
    }

    if (options.envFile !== undefined) {
      args.push('--env-file', options.envFile);
    }

    args.push('-v', `${options.hostPath}:${options.containerPath}`, '--name', options.name);

    if (options.interactiveTty) {
      args.push('-it');
    }

    return [...args, options.image, ...options.command];
  }

  private async execDocker(args: string[]): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      execFile(
        this.bin,
        args,
        { encoding: 'utf8', maxBuffer: 1024 * 1024 * 4 },
        (error, stdout, stderr) => {
          if (error) {
            const runtimeMessage = stderr.trim();
            const exitCode = typeof error.code === 'number' && error.code > 0 ? error.code : 1;
            reject(new RuntimeCommandError(runtimeMessage.length > 0 ? runtimeMessage : error.message, exitCode, args));
            return;
          }

          resolve(stdout);
        }
      );
    });
  }
}
