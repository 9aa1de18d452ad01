import { join } from 'node:path';
import type { TransactionLog } from './atomic.js';
import type { PkgCreateConfig } from './types.js';

export const PACKAGE_DIRECTORIES = ['src', 'include', 'config', 'launch', 'logs'] as const;

export type PackageDirectory = typeof PACKAGE_DIRECTORIES[number];

/**
 * Creates the package root, its fixed subdirectories in order, and the
 * empty build file. Cleanup on failure belongs to the transaction.
 */
export async function buildScaffold(
  tx: TransactionLog,
  config: Pick<PkgCreateConfig, 'buildFile'>
): Promise<void> {
  await tx.mkdir(tx.root);

  for (const dir of PACKAGE_DIRECTORIES) {
    await tx.mkdir(join(tx.root, dir));
  }

  await tx.touch(join(tx.root, config.buildFile));
}
