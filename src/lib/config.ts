import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { GwtError, errorMessage } from './errors';
import { MISSING_ROOT_MESSAGE, expandHome, getConfigDir } from './paths';
import { GwtConfigSchema, PartialGwtConfigSchema } from './schemas';

export type GwtConfig = z.infer<typeof GwtConfigSchema>;

type PartialGwtConfig = z.infer<typeof PartialGwtConfigSchema>;

const DEFAULT_CONFIG: Omit<GwtConfig, 'rootDir'> = {
  remote: 'origin',
  debug: false,
};

const CONFIG_FILE = 'config.json';

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getConfigDir(env), CONFIG_FILE);
}

async function readConfigFile(filePath: string): Promise<PartialGwtConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new GwtError('ConfigError', `Failed to read config from ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  try {
    return PartialGwtConfigSchema.parse(JSON.parse(content));
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new GwtError(
        'ConfigError',
        `Invalid config in ${filePath}: ${error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
      );
    }
    throw new GwtError('ConfigError', `Failed to parse config in ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return value === '1' || value.toLowerCase() === 'true';
}

function configFromEnv(env: NodeJS.ProcessEnv): PartialGwtConfig {
  const fromEnv: PartialGwtConfig = {};
  if (env.GWT_ROOT_DIR) fromEnv.rootDir = env.GWT_ROOT_DIR;
  if (env.GWT_REMOTE) fromEnv.remote = env.GWT_REMOTE;
  const debug = parseFlag(env.GWT_DEBUG);
  if (debug !== undefined) fromEnv.debug = debug;
  return fromEnv;
}

/**
 * Load configuration: defaults, then the JSON config file, then environment
 * variables. The worktree root has no default; a missing root is a ConfigError.
 */
export async function loadConfig(opts?: {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}): Promise<GwtConfig> {
  const env = opts?.env ?? process.env;
  const filePath = opts?.configPath ?? getConfigPath(env);

  const merged = {
    ...DEFAULT_CONFIG,
    ...(await readConfigFile(filePath)),
    ...configFromEnv(env),
  };

  const rootDir = merged.rootDir?.trim();
  if (!rootDir) {
    throw new GwtError('ConfigError', MISSING_ROOT_MESSAGE);
  }

  return GwtConfigSchema.parse({ ...merged, rootDir: expandHome(rootDir) });
}
