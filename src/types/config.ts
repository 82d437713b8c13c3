/**
 * Type definitions for the helper's optional configuration file.
 */

import type { BuildMode } from './build.js';

/**
 * Contents of `swift-backtrace-helper.config.json`.
 *
 * Every key is optional; command-line flags take precedence.
 */
export interface HelperConfigFile {
  /** Package directory (relative paths resolve against the config file) */
  package_path?: string;
  /** Scratch directory for the package manager */
  build_path?: string;
  /** Toolchain root providing `bin/swift` */
  toolchain?: string;
  /** Destination directory for `install` */
  install_path?: string;
  configuration?: BuildMode;
  verbose?: boolean;
}

/**
 * A configuration file after loading, with paths made absolute.
 */
export interface LoadedHelperConfig {
  /** Absolute path of the file, or null when none was found */
  path: string | null;
  values: HelperConfigFile;
}
