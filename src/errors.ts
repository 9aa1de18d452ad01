import { ErrorCode } from './types.js';

export const USAGE = 'Usage: pkg-create <package_name>';

export class PkgCreateError extends Error {
  constructor(message: string, public code: ErrorCode) {
    super(message);
    this.name = 'PkgCreateError';
  }
}

export class UsageError extends PkgCreateError {
  constructor(message: string) {
    super(message, ErrorCode.USAGE_ERROR);
    this.name = 'UsageError';
  }
}

export class InvalidNameError extends PkgCreateError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_PACKAGE_NAME);
    this.name = 'InvalidNameError';
  }
}

export class ConfigError extends PkgCreateError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_CONFIG);
    this.name = 'ConfigError';
  }
}

export class AlreadyExistsError extends PkgCreateError {
  constructor(public packageName: string) {
    super(`Package ${packageName} already exists`, ErrorCode.ALREADY_EXISTS);
    this.name = 'AlreadyExistsError';
  }
}

export class SkeletonMissingError extends PkgCreateError {
  constructor(path: string) {
    super(
      `PACKAGE CORRUPTED: Skeleton files missing\n` +
      `Expected: ${path}\n` +
      `Action: Reinstall pkg-create`,
      ErrorCode.SKELETON_FILES_MISSING
    );
    this.name = 'SkeletonMissingError';
  }
}

/**
 * Raised when a step inside the creation transaction fails.
 * `rolledBack` is false only when removing the partial tree failed too;
 * that failure is kept in `rollbackError`. `createdRoot` is false when the
 * package root was never created by this transaction.
 */
export class CreationError extends PkgCreateError {
  declare cause: Error;
  public rolledBack = true;
  public createdRoot = false;
  public rollbackError: Error | undefined;

  constructor(public step: string, cause: Error) {
    super(`Failed to ${step}: ${cause.message}`, ErrorCode.CREATION_FAILED);
    this.name = 'CreationError';
    this.cause = cause;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
