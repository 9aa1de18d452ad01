export { validateArgs, validatePackageName } from './args.js';
export { runTransaction, TransactionLog, nodeFileSystem, type ScaffoldFileSystem } from './atomic.js';
export { resolveConfig, DEFAULT_CONFIG, type ResolvedConfig } from './config.js';
export { createPackage, assertPackageAbsent, type CreateOptions, type CreateResult } from './create.js';
export {
  PkgCreateError,
  UsageError,
  InvalidNameError,
  ConfigError,
  AlreadyExistsError,
  SkeletonMissingError,
  CreationError
} from './errors.js';
export { renderReadme, loadReadmeTemplate, README_SECTIONS } from './readme.js';
export { buildScaffold, PACKAGE_DIRECTORIES, type PackageDirectory } from './scaffold.js';
export { runCli, type CliStreams, type RunOptions } from './run.js';
export { ErrorCode, type BuildFile, type NamePolicy, type PkgCreateConfig, type ScaffoldState, type TerminalState } from './types.js';
