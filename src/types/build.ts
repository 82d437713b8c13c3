/**
 * Type definitions for toolchain package-manager invocations.
 */

/** High-level action requested of the helper. */
export type BuildAction = 'build' | 'test' | 'install';

/** Package-manager build configuration. */
export type BuildMode = 'debug' | 'release';

export const BUILD_ACTIONS: readonly BuildAction[] = ['build', 'test', 'install'];
export const BUILD_MODES: readonly BuildMode[] = ['debug', 'release'];

/**
 * Everything needed to assemble a toolchain invocation.
 *
 * Built once per helper run and never mutated afterwards.
 */
export interface BuildConfiguration {
  readonly mode: BuildMode;
  readonly verbose: boolean;
  /** Directory containing the package manifest */
  readonly packagePath: string;
  /** Scratch directory for intermediate and output artifacts */
  readonly buildPath: string;
  /** Root of the toolchain that provides `bin/swift` */
  readonly toolchainPath: string;
  /** Destination directory for `install` */
  readonly installPath?: string;
}

export function isBuildAction(value: string): value is BuildAction {
  return BUILD_ACTIONS.some((action) => action === value);
}

export function isBuildMode(value: string): value is BuildMode {
  return BUILD_MODES.some((mode) => mode === value);
}

/**
 * Error thrown when the toolchain process cannot be started at all.
 */
export class SpawnError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'SpawnError';
  }
}

/**
 * Error thrown when the "show binary path" query does not yield a path.
 */
export class PathResolutionError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'PathResolutionError';
  }
}

/**
 * Error thrown when the install directory already exists.
 */
export class InstallDirectoryConflictError extends Error {
  constructor(public readonly installPath: string) {
    super(`Install directory already exists: ${installPath}`);
    this.name = 'InstallDirectoryConflictError';
  }
}

/**
 * Error thrown when the install directory cannot be created for a reason
 * other than it already existing.
 */
export class InstallDirectoryError extends Error {
  constructor(
    message: string,
    public readonly installPath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'InstallDirectoryError';
  }
}

/**
 * Error thrown when the built binary cannot be copied into place.
 */
export class InstallCopyError extends Error {
  constructor(
    message: string,
    public readonly sourcePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'InstallCopyError';
  }
}

/**
 * Type guard for errors that abort an install after the build succeeded.
 */
export function isInstallError(
  error: unknown
): error is
  | InstallDirectoryConflictError
  | InstallDirectoryError
  | InstallCopyError
  | PathResolutionError {
  return (
    error instanceof InstallDirectoryConflictError ||
    error instanceof InstallDirectoryError ||
    error instanceof InstallCopyError ||
    error instanceof PathResolutionError
  );
}
