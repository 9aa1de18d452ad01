import { promises as fs } from 'node:fs';
import { dirname, relative, sep } from 'node:path';
import { CreationError, toError } from './errors.js';
import { logger } from './logger.js';

/**
 * The filesystem calls a creation transaction is allowed to make.
 * `mkdir` must fail when the directory already exists and `writeFile`
 * must fail when the file already exists.
 */
export interface ScaffoldFileSystem {
  mkdir(path: string): Promise<void>;
  writeFile(path: string, content: string): Promise<void>;
  rm(path: string): Promise<void>;
}

export const nodeFileSystem: ScaffoldFileSystem = {
  mkdir: async (path) => {
    await fs.mkdir(path);
  },
  writeFile: (path, content) => fs.writeFile(path, content, { flag: 'wx' }),
  rm: (path) => fs.rm(path, { recursive: true, force: true })
};

interface Operation {
  type: 'mkdir' | 'write';
  path: string;
  step: string;
}

export class TransactionLog {
  private operations: Operation[] = [];
  private committed = false;

  constructor(
    public readonly root: string,
    private readonly fileSystem: ScaffoldFileSystem = nodeFileSystem
  ) {}

  /** Paths created so far, relative to the root's parent; directories end with a separator. */
  get created(): string[] {
    return this.operations.map(op => {
      const display = this.display(op.path);
      return op.type === 'mkdir' ? `${display}${sep}` : display;
    });
  }

  get ownsRoot(): boolean {
    return this.operations.some(op => op.type === 'mkdir' && op.path === this.root);
  }

  async mkdir(path: string): Promise<void> {
    const step = `create directory ${this.display(path)}`;
    await this.apply({ type: 'mkdir', path, step }, () => this.fileSystem.mkdir(path));
  }

  async write(path: string, content: string): Promise<void> {
    const step = `write ${this.display(path)}`;
    await this.apply({ type: 'write', path, step }, () => this.fileSystem.writeFile(path, content));
  }

  async touch(path: string): Promise<void> {
    await this.write(path, '');
  }

  /**
   * Removes the package root, but only when this transaction created it.
   * A root that appeared between the existence check and the first mkdir
   * belongs to someone else and is left in place.
   */
  async rollback(): Promise<boolean> {
    if (this.committed || !this.ownsRoot) return false;

    logger.warn('Rolling back package directory', { root: this.root });
    await this.fileSystem.rm(this.root);
    this.operations = [];
    return true;
  }

  commit(): void {
    this.committed = true;
    logger.info('Transaction committed', { root: this.root, operations: this.operations.length });
  }

  private display(path: string): string {
    return relative(dirname(this.root), path);
  }

  private async apply(op: Operation, fn: () => Promise<void>): Promise<void> {
    if (this.committed) {
      throw new Error(`Transaction for ${this.root} is already committed`);
    }

    try {
      await logger.operation(op.step, fn);
    } catch (error) {
      throw new CreationError(op.step, toError(error));
    }
    this.operations.push(op);
  }
}

/**
 * Runs `fn` inside a transaction rooted at `root`. Any failure rolls the
 * tree back before the CreationError is rethrown; a failed rollback is
 * recorded on the error instead of replacing it.
 */
export async function runTransaction<T>(
  root: string,
  fn: (tx: TransactionLog) => Promise<T>,
  fileSystem: ScaffoldFileSystem = nodeFileSystem
): Promise<T> {
  const tx = new TransactionLog(root, fileSystem);

  try {
    const result = await fn(tx);
    tx.commit();
    return result;
  } catch (error) {
    const failure = error instanceof CreationError
      ? error
      : new CreationError('complete package creation', toError(error));

    failure.createdRoot = tx.ownsRoot;
    logger.error('Package creation failed, rolling back', { root, step: failure.step, error: failure.cause.message });

    try {
      await tx.rollback();
      failure.rolledBack = true;
    } catch (rollbackError) {
      failure.rolledBack = false;
      failure.rollbackError = toError(rollbackError);
      logger.error('Rollback failed', { root, error: failure.rollbackError.message });
    }

    throw failure;
  }
}
