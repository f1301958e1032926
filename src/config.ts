import { Prompter } from './prompter';
import { WorkspaceConfig } from './types';

export const DEFAULT_CONTAINER_NAME = 'ai-scientist-container';
export const DEFAULT_IMAGE_NAME = 'ai-scientist-image';
export const DEFAULT_MOUNT_PATH = '/mnt/e/docker/ai-scientist/';
export const DEFAULT_ENV_FILE = '.env';
export const CONTAINER_WORKSPACE_PATH = '/workspace';
export const CONTAINER_SHELL = '/bin/bash';

export interface ResolveConfigOptions {
  /** Values given on the command line; a set field is not prompted for. */
  preset?: Partial<WorkspaceConfig>;
  /** Skip every prompt and take the defaults for fields without a preset. */
  useDefaults?: boolean;
}

const FIELD_PROMPTS: ReadonlyArray<{ key: keyof WorkspaceConfig; label: string }> = [
  { key: 'containerName', label: 'Container name' },
  { key: 'imageName', label: 'Docker image name' },
  { key: 'mountPath', label: 'Host directory to mount' }
];

export function resolveField(raw: string | undefined, fallback: string): string {
  if (raw === undefined || raw.trim().length === 0) {
    return fallback;
  }

  return raw;
}

export function resolveDefaults(env: NodeJS.ProcessEnv = process.env): WorkspaceConfig {
  return {
    containerName: resolveField(env.GPU_WORKSPACE_CONTAINER, DEFAULT_CONTAINER_NAME),
    imageName: resolveField(env.GPU_WORKSPACE_IMAGE, DEFAULT_IMAGE_NAME),
    mountPath: resolveField(env.GPU_WORKSPACE_MOUNT, DEFAULT_MOUNT_PATH)
  };
}

export async function promptWorkspaceConfig(
  prompter: Prompter,
  defaults: WorkspaceConfig,
  options: ResolveConfigOptions = {}
): Promise<WorkspaceConfig> {
  const resolved: { -readonly [K in keyof WorkspaceConfig]: string } = { ...defaults };

  for (const { key, label } of FIELD_PROMPTS) {
    const preset = options.preset?.[key];
    if (preset !== undefined && preset.trim().length > 0) {
      resolved[key] = preset;
      continue;
    }

    if (options.useDefaults) {
      continue;
    }

    const answer = await prompter.ask(`${label} (default: ${defaults[key]}): `);
    resolved[key] = resolveField(answer, defaults[key]);
  }

  return Object.freeze(resolved);
}
