/**
 * swift-backtrace build helper library.
 *
 * Entry point for build orchestrators that drive the helper in-process.
 */

export {
  buildSwiftArgs,
  invokeSwift,
  resolveBinaryPath,
  swiftDriverPath,
  renderCommand,
  exitStatus,
  BINARY_NAME,
  SHOW_BIN_PATH_FLAG,
} from './invocation.js';

export { createInstallDirectory, copyBuiltBinary } from './install.js';

export {
  loadHelperConfig,
  findConfigFile,
  isHelperConfigFile,
  resolveConfigPaths,
  ConfigError,
  CONFIG_FILE_NAME,
} from './config.js';

export {
  runHelperAction,
  resolveHelperOptions,
  HelperOptionsError,
} from '../commands/helper.js';

export { Product } from '../products/product.js';
export { SwiftBacktrace, SWIFT_BACKTRACE_DEPENDENCIES } from '../products/swift_backtrace.js';
export { runProductSession } from '../products/session.js';

export {
  SpawnError,
  PathResolutionError,
  InstallDirectoryConflictError,
  InstallDirectoryError,
  InstallCopyError,
  isBuildAction,
  isBuildMode,
} from '../types/build.js';

export type * from '../types/index.js';
