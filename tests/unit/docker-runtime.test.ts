import { beforeEach, describe, expect, it, vi } from 'vitest';
import { RuntimeCommandError } from '../../src/errors';
import { DockerRuntime } from '../../src/runtime/docker-runtime';

type ExecFileCallback = (error: (Error & { code?: number | string }) | null, stdout: string, stderr: string) => void;

const { execFileMock } = vi.hoisted(() => ({
  execFileMock: vi.fn()
}));

vi.mock('node:child_process', () => ({
  execFile: execFileMock
}));

function mockExecFileResult(stdout: string): void {
  execFileMock.mockImplementationOnce(
    (_command: string, _args: string[], _options: unknown, callback: ExecFileCallback) => {
      callback(null, stdout, '');
      return undefined;
    }
  );
}

function mockExecFileFailure(stderr: string, code: number | string = 1): void {
  execFileMock.mockImplementationOnce(
    (_command: string, _args: string[], _options: unknown, callback: ExecFileCallback) => {
      callback(Object.assign(new Error('Command failed: docker'), { code }), '', stderr);
      return undefined;
    }
  );
}

describe('DockerRuntime', () => {
  beforeEach(() => {
    execFileMock.mockReset();
  });

  describe('probe', () => {
    it('reports a running container', async () => {
      mockExecFileResult('true\n');

      await expect(new DockerRuntime().probe('lab-box')).resolves.toEqual({ exists: true, running: true });
      expect(execFileMock).toHaveBeenCalledWith(
        'docker',
        ['container', 'inspect', '--format', '{{.State.Running}}', 'lab-box'],
        expect.any(Object),
        expect.any(Function)
      );
    });

    it('reports a stopped container', async () => {
      mockExecFileResult('false\n');

      await expect(new DockerRuntime().probe('lab-box')).resolves.toEqual({ exists: true, running: false });
    });

    it('reports an absent container when docker cannot find it', async () => {
      mockExecFileFailure('Error response from daemon: No such container: lab-box\n');

      await expect(new DockerRuntime().probe('lab-box')).resolves.toEqual({ exists: false, running: false });
    });

    it('propagates other failures with the runtime text and exit code', async () => {
      mockExecFileFailure('Cannot connect to the Docker daemon at unix:///var/run/docker.sock.\n', 125);

      const probe = new DockerRuntime().probe('lab-box');

      await expect(probe).rejects.toBeInstanceOf(RuntimeCommandError);
      await expect(probe).rejects.toMatchObject({
        message: 'Cannot connect to the Docker daemon at unix:///var/run/docker.sock.',
        exitCode: 125
      });
    });

    it('uses the process error when the binary is missing', async () => {
      mockExecFileFailure('', 'ENOENT');

      await expect(new DockerRuntime().probe('lab-box')).rejects.toMatchObject({
        message: 'Command failed: docker',
        exitCode: 1
      });
    });
  });

  describe('buildRunArgs', () => {
    const baseOptions = {
      name: 'lab-box',
      image: 'lab-image',
      hostPath: '/srv/lab',
      containerPath: '/workspace',
      gpus: 'all',
      detached: true,
      interactiveTty: true,
      command: ['/bin/bash']
    };

    it('builds a detached GPU run with the mount binding', () => {
      expect(new DockerRuntime().buildRunArgs(baseOptions)).toEqual([
        'run',
        '--gpus',
        'all',
        '-d',
        '-v',
        '/srv/lab:/workspace',
        '--name',
        'lab-box',
        '-it',
        'lab-image',
        '/bin/bash'
      ]);
    });

    it('adds the env file when one is given', () => {
      expect(new DockerRuntime().buildRunArgs({ ...baseOptions, envFile: '/home/me/.env' })).toEqual([
        'run',
        '--gpus',
        'all',
        '-d',
        '--env-file',
        '/home/me/.env',
        '-v',
        '/srv/lab:/workspace',
        '--name',
        'lab-box',
        '-it',
        'lab-image',
        '/bin/bash'
      ]);
    });
  });

  it('returns the trimmed container id from create', async () => {
    mockExecFileResult('0123abcd\n');

    const id = await new DockerRuntime().create({
      name: 'lab-box',
      image: 'lab-image',
      hostPath: '/srv/lab',
      containerPath: '/workspace',
      gpus: 'all',
      detached: true,
      interactiveTty: true,
      command: ['/bin/bash']
    });

    expect(id).toBe('0123abcd');
    expect(execFileMock.mock.calls[0][1]).toEqual([
      'run',
      '--gpus',
      'all',
      '-d',
      '-v',
      '/srv/lab:/workspace',
      '--name',
      'lab-box',
      '-it',
      'lab-image',
      '/bin/bash'
    ]);
  });

  it('issues start, stop and rm by name', async () => {
    mockExecFileResult('lab-box\n');
    mockExecFileResult('lab-box\n');
    mockExecFileResult('lab-box\n');
    const runtime = new DockerRuntime();

    await runtime.start('lab-box');
    await runtime.stop('lab-box');
    await runtime.remove('lab-box');

    expect(execFileMock.mock.calls.map((call) => call[1])).toEqual([
      ['start', 'lab-box'],
      ['stop', 'lab-box'],
      ['rm', 'lab-box']
    ]);
  });

  it('surfaces a failed start verbatim', async () => {
    mockExecFileFailure('Error response from daemon: could not select device driver "" with capabilities: [[gpu]]\n', 1);

    await expect(new DockerRuntime().start('lab-box')).rejects.toMatchObject({
      message: 'Error response from daemon: could not select device driver "" with capabilities: [[gpu]]',
      exitCode: 1,
      args: ['start', 'lab-box']
    });
  });
});
