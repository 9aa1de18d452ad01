import { ConfigError } from './errors.js';
import { LogLevel } from './logger.js';
import type { BuildFile, NamePolicy, PkgCreateConfig } from './types.js';

const BUILD_FILES: readonly BuildFile[] = ['Makefile', 'CMakeLists.txt'];
const NAME_POLICIES: readonly NamePolicy[] = ['any', 'snake_case'];

const LOG_LEVELS: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG
};

export const DEFAULT_CONFIG: PkgCreateConfig = {
  buildFile: 'Makefile',
  namePolicy: 'any'
};

export interface ResolvedConfig extends PkgCreateConfig {
  logLevel?: LogLevel;
}

function pick<T extends string>(
  variable: string,
  value: string | undefined,
  allowed: readonly T[],
  fallback: T
): T {
  if (value === undefined || value === '') return fallback;
  const match = allowed.find(candidate => candidate === value);
  if (!match) {
    throw new ConfigError(
      `INVALID CONFIG: ${variable}=${value}\n` +
      `Expected one of: ${allowed.join(', ')}`
    );
  }
  return match;
}

/**
 * Reads PKG_CREATE_BUILD_FILE, PKG_CREATE_NAME_POLICY and PKG_CREATE_LOG_LEVEL.
 * Unset variables fall back to DEFAULT_CONFIG; the logger stays silent
 * unless a level is given.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const config: ResolvedConfig = {
    buildFile: pick('PKG_CREATE_BUILD_FILE', env.PKG_CREATE_BUILD_FILE, BUILD_FILES, DEFAULT_CONFIG.buildFile),
    namePolicy: pick('PKG_CREATE_NAME_POLICY', env.PKG_CREATE_NAME_POLICY, NAME_POLICIES, DEFAULT_CONFIG.namePolicy)
  };

  const rawLevel = env.PKG_CREATE_LOG_LEVEL;
  if (rawLevel !== undefined && rawLevel !== '') {
    const logLevel = LOG_LEVELS[rawLevel.toLowerCase()];
    if (logLevel === undefined) {
      throw new ConfigError(
        `INVALID CONFIG: PKG_CREATE_LOG_LEVEL=${rawLevel}\n` +
        `Expected one of: ${Object.keys(LOG_LEVELS).join(', ')}`
      );
    }
    config.logLevel = logLevel;
  }

  return config;
}
