import { lstat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { validatePackageName } from './args.js';
import { runTransaction, type ScaffoldFileSystem } from './atomic.js';
import { DEFAULT_CONFIG } from './config.js';
import { AlreadyExistsError, CreationError, PkgCreateError } from './errors.js';
import { logger } from './logger.js';
import { loadReadmeTemplate, writeReadme } from './readme.js';
import { buildScaffold } from './scaffold.js';
import {
  ErrorCode,
  type PkgCreateConfig,
  type ScaffoldState,
  type TerminalState
} from './types.js';
import { exists } from './utils.js';

export interface CreateOptions {
  cwd?: string;
  config?: Partial<PkgCreateConfig>;
  fileSystem?: ScaffoldFileSystem;
  skelDir?: string;
}

export interface CreateResult {
  success: boolean;
  state: TerminalState;
  packageName: string;
  packagePath: string;
  message: string;
  createdEntries: string[];
  errorCode?: ErrorCode;
  failedStep?: string;
  rolledBack?: boolean;
  createdRoot?: boolean;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Fails with AlreadyExistsError for any entry at `packagePath`, including
 * plain files and dangling symlinks. Only ENOENT counts as absent.
 */
export async function assertPackageAbsent(packagePath: string, packageName: string): Promise<void> {
  try {
    await lstat(packagePath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return;
    throw error;
  }
  throw new AlreadyExistsError(packageName);
}

async function describeCreationFailure(
  error: CreationError,
  packageName: string,
  packagePath: string
): Promise<string> {
  if (!error.createdRoot) {
    return await exists(packagePath)
      ? `${error.message}\nNothing was created; ${packagePath} already existed and was left in place`
      : `${error.message}\nNothing was created`;
  }
  if (error.rolledBack) {
    return `${error.message}\nRolled back ${packageName}: no partial files were left behind`;
  }
  return (
    `${error.message}\n` +
    `Rollback failed: ${error.rollbackError?.message ?? 'unknown error'}\n` +
    `Action: Remove ${packagePath} manually`
  );
}

export async function createPackage(
  packageName: string,
  options: CreateOptions = {}
): Promise<CreateResult> {
  const { cwd = process.cwd() } = options;
  const config: PkgCreateConfig = {
    buildFile: options.config?.buildFile ?? DEFAULT_CONFIG.buildFile,
    namePolicy: options.config?.namePolicy ?? DEFAULT_CONFIG.namePolicy
  };
  const packagePath = resolve(cwd, packageName);

  let state: ScaffoldState = 'Idle';
  const transition = (next: ScaffoldState): void => {
    logger.debug('State transition', { from: state, to: next, package: packageName });
    state = next;
  };

  try {
    transition('Validating');
    validatePackageName(packageName, config.namePolicy);
    const template = await loadReadmeTemplate(options.skelDir);

    transition('Guarding');
    await assertPackageAbsent(packagePath, packageName);

    transition('Creating');
    const createdEntries = await runTransaction(packagePath, async (tx) => {
      await buildScaffold(tx, config);
      await writeReadme(tx, packageName, template);
      return tx.created;
    }, options.fileSystem);

    transition('Success');
    logger.info('Package created', { package: packageName, entries: createdEntries.length });

    return {
      success: true,
      state: 'Success',
      packageName,
      packagePath,
      message: `Package ${packageName} created successfully`,
      createdEntries
    };
  } catch (error) {
    if (error instanceof CreationError) {
      transition('RolledBack');
      return {
        success: false,
        state: 'RolledBack',
        packageName,
        packagePath,
        message: await describeCreationFailure(error, packageName, packagePath),
        createdEntries: [],
        errorCode: error.code,
        failedStep: error.step,
        rolledBack: error.rolledBack,
        createdRoot: error.createdRoot
      };
    }

    transition('Rejected');
    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    const errorCode = error instanceof PkgCreateError ? error.code : ErrorCode.UNKNOWN_ERROR;

    logger.error('Package rejected', { package: packageName, error: message, code: errorCode });

    return {
      success: false,
      state: 'Rejected',
      packageName,
      packagePath,
      message,
      createdEntries: [],
      errorCode
    };
  }
}
