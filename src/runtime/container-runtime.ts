import { ContainerProbe, ContainerState, CreateContainerOptions } from '../types';

/**
 * Operations the orchestrator needs from a container runtime, addressed by container name.
 * Every method rejects with a `RuntimeCommandError` carrying the runtime's own error text.
 */
export interface ContainerRuntime {
  /** Existence and running state, both read from a single query. */
  probe(name: string): Promise<ContainerProbe>;
  /** Resolves with the new container's id. */
  create(options: CreateContainerOptions): Promise<string>;
  start(name: string): Promise<void>;
  stop(name: string): Promise<void>;
  remove(name: string): Promise<void>;
}

export function toContainerState(probe: ContainerProbe): ContainerState {
  if (probe.running) {
    return 'running';
  }

  return probe.exists ? 'stopped' : 'absent';
}
