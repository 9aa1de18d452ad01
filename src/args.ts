import { InvalidNameError, UsageError } from './errors.js';
import type { NamePolicy } from './types.js';

const SNAKE_CASE = /^[a-z0-9_]+$/;

/**
 * Returns the single positional argument. The tool takes no flags, so any
 * argument starting with `-` is rejected as well.
 */
export function validateArgs(args: readonly string[]): string {
  if (args.length !== 1) {
    throw new UsageError(args.length === 0 ? 'Missing parameters' : 'Too many parameters');
  }

  const [name = ''] = args;
  if (name.startsWith('-')) {
    throw new UsageError(`Unknown flag: ${name}`);
  }
  if (name.length === 0) {
    throw new UsageError('Package name must not be empty');
  }

  return name;
}

export function validatePackageName(name: string, policy: NamePolicy = 'any'): string {
  if (name.length === 0) {
    throw new InvalidNameError('Invalid package name: must not be empty');
  }
  if (name.startsWith('-')) {
    throw new InvalidNameError(`Invalid package name: ${name} must not begin with '-'`);
  }
  if (name === '.' || name === '..' || /[/\\]/.test(name)) {
    throw new InvalidNameError(`Invalid package name: ${name} must be a single directory name`);
  }
  if (/[\x00-\x1F\x7F]/.test(name)) {
    throw new InvalidNameError('Invalid package name: control characters are not allowed');
  }
  if (policy === 'snake_case' && !SNAKE_CASE.test(name)) {
    throw new InvalidNameError(`Invalid package name: ${name} must be in 'snake_case'`);
  }

  return name;
}
