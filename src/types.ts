export type BuildFile = 'Makefile' | 'CMakeLists.txt';
export type NamePolicy = 'any' | 'snake_case';

export type ScaffoldState =
  | 'Idle'
  | 'Validating'
  | 'Guarding'
  | 'Creating'
  | 'Rejected'
  | 'RolledBack'
  | 'Success';

export type TerminalState = Extract<ScaffoldState, 'Rejected' | 'RolledBack' | 'Success'>;

export enum ErrorCode {
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  USAGE_ERROR = 'USAGE_ERROR',
  INVALID_PACKAGE_NAME = 'INVALID_PACKAGE_NAME',
  INVALID_CONFIG = 'INVALID_CONFIG',
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  SKELETON_FILES_MISSING = 'SKELETON_FILES_MISSING',
  CREATION_FAILED = 'CREATION_FAILED'
}

export interface PkgCreateConfig {
  buildFile: BuildFile;
  namePolicy: NamePolicy;
}

export interface TemplateVariables {
  PACKAGE_NAME: string;
}
