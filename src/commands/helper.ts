/**
 * The helper's three actions: build, test and install swift-backtrace.
 */

import type { BuildAction, BuildConfiguration } from '../types/build.js';
import { isBuildAction, isBuildMode } from '../types/build.js';
import type { HelperConfigFile } from '../types/config.js';
import { PRODUCT_NAME } from '../lib/branding.js';
import { BINARY_NAME, invokeSwift, resolveBinaryPath } from '../lib/invocation.js';
import { copyBuiltBinary, createInstallDirectory } from '../lib/install.js';

/**
 * Raw command-line options, as commander hands them over.
 */
export interface HelperCliOptions {
  verbose?: boolean;
  packagePath?: string;
  buildPath?: string;
  toolchain?: string;
  installPath?: string;
  configuration?: string;
  /** Accepted for compatibility with existing callers; not used */
  prefix?: string;
}

/**
 * Error thrown when the merged options cannot form a valid invocation.
 */
export class HelperOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HelperOptionsError';
  }
}

function required(value: string | undefined, flag: string): string {
  if (value === undefined || value === '') {
    throw new HelperOptionsError(`the following argument is required: ${flag}`);
  }
  return value;
}

/**
 * Merges command-line options over config-file values and validates them.
 */
export function resolveHelperOptions(
  action: string,
  cli: HelperCliOptions,
  file: HelperConfigFile = {}
): { action: BuildAction; configuration: BuildConfiguration } {
  if (!isBuildAction(action)) {
    throw new HelperOptionsError(`invalid action '${action}' (choose from 'build', 'test', 'install')`);
  }

  const mode = cli.configuration ?? file.configuration ?? 'release';
  if (!isBuildMode(mode)) {
    throw new HelperOptionsError(`invalid configuration '${mode}' (choose from 'debug', 'release')`);
  }

  const installPath = cli.installPath ?? file.install_path;
  if (action === 'install') {
    required(installPath, '--install-path');
  }

  return {
    action,
    configuration: {
      mode,
      verbose: cli.verbose ?? file.verbose ?? false,
      packagePath: required(cli.packagePath ?? file.package_path, '--package-path'),
      buildPath: required(cli.buildPath ?? file.build_path, '--build-path'),
      toolchainPath: required(cli.toolchain ?? file.toolchain, '--toolchain'),
      ...(installPath !== undefined ? { installPath } : {}),
    },
  };
}

/**
 * Runs one helper action and resolves to the toolchain's exit status.
 *
 * `install` builds first. If that build fails its status is returned and
 * nothing is installed.
 *
 * @throws {HelperOptionsError} If `install` is requested without an install path
 * @throws {InstallDirectoryConflictError} If the install directory already exists
 */
export async function runHelperAction(
  action: BuildAction,
  configuration: BuildConfiguration
): Promise<number> {
  switch (action) {
    case 'build':
      return invokeSwift('build', PRODUCT_NAME, configuration);
    case 'test':
      return invokeSwift('test', PRODUCT_NAME, configuration);
    case 'install': {
      const installPath = required(configuration.installPath, '--install-path');
      const status = await invokeSwift('build', PRODUCT_NAME, configuration);
      if (status !== 0) {
        return status;
      }
      await createInstallDirectory(installPath);
      const builtBinary = await resolveBinaryPath(PRODUCT_NAME, configuration);
      await copyBuiltBinary(builtBinary, installPath, BINARY_NAME);
      return 0;
    }
  }
}
