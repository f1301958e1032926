import { CONTAINER_SHELL } from './config';
import { CliIO, WorkspaceConfig } from './types';

const INTERRUPT_SIGNAL = 'SIGINT';
const DEFAULT_TICK_MS = 1000;

export interface SignalSource {
  on(event: typeof INTERRUPT_SIGNAL, listener: () => void): unknown;
  removeListener(event: typeof INTERRUPT_SIGNAL, listener: () => void): unknown;
}

export function printAttachGuidance(config: WorkspaceConfig, io: CliIO): void {
  io.stdout.write(
    [
      'The container is running in detached mode.',
      'To open a shell inside it, run:',
      `  docker exec -it ${config.containerName} ${CONTAINER_SHELL}`,
      '',
      'To detach from an attached session, press Ctrl+P then Ctrl+Q.',
      'Press Ctrl+C here to stop the container and end this session.',
      ''
    ].join('\n')
  );
}

/**
 * Blocks until an interrupt arrives. Every SIGINT goes to `onInterrupt`, which reports whether that
 * call actually started a shutdown; the wait ends when the first one finishes.
 */
export function waitForInterrupt(
  signals: SignalSource,
  onInterrupt: () => Promise<boolean>,
  tickMs: number = DEFAULT_TICK_MS
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const keepAlive = setInterval(() => undefined, tickMs);

    const cleanup = (): void => {
      clearInterval(keepAlive);
      signals.removeListener(INTERRUPT_SIGNAL, listener);
    };

    const listener = (): void => {
      void onInterrupt().then(
        (started) => {
          if (started) {
            cleanup();
            resolve();
          }
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
    };

    signals.on(INTERRUPT_SIGNAL, listener);
  });
}
