import { validateArgs } from './args.js';
import type { ScaffoldFileSystem } from './atomic.js';
import { resolveConfig, type ResolvedConfig } from './config.js';
import { createPackage } from './create.js';
import { ConfigError, USAGE, UsageError } from './errors.js';
import { configureLogger } from './logger.js';

export interface CliStreams {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  streams?: CliStreams;
  fileSystem?: ScaffoldFileSystem;
  skelDir?: string;
}

const consoleStreams: CliStreams = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

/**
 * Runs one `pkg-create <package_name>` invocation and returns the exit code.
 * Usage and configuration errors are reported before the filesystem is read.
 */
export async function runCli(args: readonly string[], options: RunOptions = {}): Promise<number> {
  const { out, err } = options.streams ?? consoleStreams;

  let packageName: string;
  let config: ResolvedConfig;
  try {
    packageName = validateArgs(args);
    config = resolveConfig(options.env ?? process.env);
  } catch (error) {
    if (error instanceof UsageError) {
      err(`ERR: ${error.message}`);
      err(USAGE);
      return 1;
    }
    if (error instanceof ConfigError) {
      err(`ERR: ${error.message}`);
      return 1;
    }
    throw error;
  }

  configureLogger(
    config.logLevel === undefined
      ? { silent: true }
      : { silent: false, level: config.logLevel }
  );

  const result = await createPackage(packageName, {
    cwd: options.cwd,
    config,
    fileSystem: options.fileSystem,
    skelDir: options.skelDir
  });

  if (!result.success) {
    err(`ERR: ${result.message}`);
    return 1;
  }

  out(result.message);
  for (const entry of result.createdEntries) {
    out(` + ${entry}`);
  }
  return 0;
}
