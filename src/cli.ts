import { Command, Option } from 'commander';
import { ConfigError, loadHelperConfig } from './lib/config.js';
import { CLI_NAME } from './lib/branding.js';
import { BUILD_ACTIONS, BUILD_MODES, SpawnError, isInstallError } from './types/build.js';
import { HelperOptionsError, resolveHelperOptions, runHelperAction } from './commands/helper.js';
import type { HelperCliOptions } from './commands/helper.js';

interface ProgramOptions extends HelperCliOptions {
  config?: string;
}

/**
 * Builds the helper's command-line program. The toolchain's exit status
 * becomes the process exit code.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Build, test and install swift-backtrace with the toolchain package manager')
    .addArgument(program.createArgument('<action>', 'action to run').choices(BUILD_ACTIONS))
    .option('-v, --verbose', 'ask the toolchain for verbose output')
    .option('--no-verbose', 'turn off verbose output set in the config file')
    .option('--package-path <path>', 'package directory')
    .option('--build-path <path>', 'scratch directory for build products')
    .option('--toolchain <path>', 'toolchain root providing bin/swift')
    .option('--install-path <path>', 'destination directory for install')
    .addOption(
      new Option('--configuration <mode>', 'build configuration (default: "release")').choices(BUILD_MODES)
    )
    .option('--prefix <path>', 'installation prefix (unused)')
    .option('-c, --config <path>', 'path to a configuration file')
    .action(async (action: string, options: ProgramOptions) => {
      try {
        const fileConfig = await loadHelperConfig(options.config);
        const resolved = resolveHelperOptions(action, options, fileConfig.values);
        process.exitCode = await runHelperAction(resolved.action, resolved.configuration);
      } catch (error) {
        if (error instanceof ConfigError || error instanceof HelperOptionsError) {
          console.error(`Configuration error: ${error.message}`);
          process.exitCode = 1;
          return;
        }
        if (isInstallError(error)) {
          console.error(`Install failed: ${error.message}`);
          process.exitCode = 1;
          return;
        }
        if (error instanceof SpawnError) {
          console.error(`Failed to run toolchain: ${error.message}`);
          process.exitCode = 1;
          return;
        }
        throw error;
      }
    });

  return program;
}
