import fs from 'node:fs/promises';
import path from 'node:path';

import { coerceConfig } from './schema.js';
import type { ConfigLoadErrorKind, ConnectionConfig, LoadConfigOptions } from './types.js';

export const CONFIG_FILE_NAME = 'cec-ssh_config.json';
export const SEARCH_PATH_ENV_VAR = 'PATH';

export class ConfigLoadError extends Error {
  constructor(
    readonly kind: ConfigLoadErrorKind,
    message: string,
    readonly configPath?: string,
    readonly triedPaths: readonly string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConfigLoadError';
  }
}

async function fileExists(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}

function wrapError(err: unknown, configPath: string, message: string): ConfigLoadError {
  const error = err instanceof Error ? err : new Error(String(err));
  return new ConfigLoadError('invalid', `${message}: ${error.message}`, configPath, [], {
    cause: error,
  });
}

/** Candidate locations in search order: the working directory, then every PATH entry. */
export function searchCandidates(cwd: string, env: NodeJS.ProcessEnv): string[] {
  const searchPath = env[SEARCH_PATH_ENV_VAR] ?? '';
  const directories = searchPath.split(path.delimiter).filter((entry) => entry.length > 0);

  return [cwd, ...directories].map((directory) => path.join(directory, CONFIG_FILE_NAME));
}

export async function resolveConfigPath(options: LoadConfigOptions = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd();

  if (options.configPath !== undefined) {
    const explicitPath = path.resolve(cwd, options.configPath);
    if (!(await fileExists(explicitPath))) {
      throw new ConfigLoadError(
        'explicit-not-found',
        `Config file not found: ${options.configPath}`,
        options.configPath,
      );
    }
    return explicitPath;
  }

  const tried: string[] = [];
  for (const candidate of searchCandidates(cwd, options.env ?? process.env)) {
    tried.push(candidate);
    if (await fileExists(candidate)) {
      return candidate;
    }
  }

  throw new ConfigLoadError(
    'not-found',
    `Config file ${CONFIG_FILE_NAME} not found.`,
    undefined,
    tried,
  );
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ConnectionConfig> {
  const configPath = await resolveConfigPath(options);

  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    throw wrapError(err, configPath, `Failed to read configuration file at ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw wrapError(err, configPath, `Failed to parse JSON in configuration file at ${configPath}`);
  }

  try {
    return coerceConfig(parsed);
  } catch (err) {
    throw wrapError(err, configPath, `Configuration validation error for ${configPath}`);
  }
}
