/**
 * Toolchain package-manager invocation.
 *
 * Assembles `swift build` / `swift test` argument vectors and runs them
 * without a shell. All three helper actions go through `buildSwiftArgs` so
 * they agree on package path, scratch path and configuration flags.
 */

import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { join } from 'node:path';
import type { BuildAction, BuildConfiguration } from '../types/build.js';
import { PathResolutionError, SpawnError } from '../types/build.js';

/** Name of the built executable, as produced by the package. */
export const BINARY_NAME = 'swift-backtrace';

/** Extra flag that makes `swift build` print its output directory and exit. */
export const SHOW_BIN_PATH_FLAG = '--show-bin-path';

/**
 * Returns the path of the `swift` driver inside a toolchain.
 */
export function swiftDriverPath(toolchainPath: string): string {
  return join(toolchainPath, 'bin', 'swift');
}

/**
 * Builds the argument vector for a toolchain invocation.
 *
 * The first element is the driver executable. The package manager has no
 * install subcommand, so `install` runs `build`.
 *
 * @example
 * ```typescript
 * buildSwiftArgs('test', 'swift-backtrace', config)
 * // ['/opt/toolchain/bin/swift', 'test', '--package-path', ..., '--test-product', 'swift-backtrace']
 * ```
 */
export function buildSwiftArgs(
  action: BuildAction,
  product: string,
  configuration: BuildConfiguration,
  extraArgs: readonly string[] = []
): string[] {
  const args: string[] = [
    swiftDriverPath(configuration.toolchainPath),
    action === 'test' ? 'test' : 'build',
    '--package-path',
    configuration.packagePath,
    '--scratch-path',
    configuration.buildPath,
    '--configuration',
    configuration.mode,
    ...extraArgs,
  ];

  if (action === 'test') {
    args.push('--test-product', product);
  } else {
    args.push('--product', product);
  }

  if (configuration.verbose) {
    args.push('--verbose');
  }

  return args;
}

/** Joins an argument vector into the line echoed in verbose mode. */
export function renderCommand(argv: readonly string[]): string {
  return argv.join(' ');
}

/**
 * Maps a child's close event onto a shell-style exit status.
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (typeof code === 'number') {
    return code;
  }
  if (signal) {
    return 128 + (constants.signals[signal] ?? 0);
  }
  return 1;
}

function echo(configuration: BuildConfiguration, argv: readonly string[]): void {
  if (configuration.verbose) {
    console.error(`+ ${renderCommand(argv)}`);
  }
}

/**
 * Runs the toolchain with inherited stdio and resolves to its exit status.
 *
 * Non-zero statuses are returned as-is; only a failure to start the
 * process rejects.
 *
 * @throws {SpawnError} If the driver cannot be executed
 */
export async function invokeSwift(
  action: BuildAction,
  product: string,
  configuration: BuildConfiguration,
  extraArgs: readonly string[] = []
): Promise<number> {
  const [command, ...args] = buildSwiftArgs(action, product, configuration, extraArgs);
  echo(configuration, [command, ...args]);

  return new Promise<number>((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit' });

    child.once('error', (error: Error) => {
      reject(new SpawnError(`Failed to start ${command}: ${error.message}`, command, error));
    });

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve(exitStatus(code, signal));
    });
  });
}

/**
 * Asks the package manager where it puts built products and returns the
 * full path of the product's executable.
 *
 * @throws {PathResolutionError} If the query fails or prints nothing
 */
export async function resolveBinaryPath(
  product: string,
  configuration: BuildConfiguration
): Promise<string> {
  const [command, ...args] = buildSwiftArgs('build', product, configuration, [SHOW_BIN_PATH_FLAG]);
  echo(configuration, [command, ...args]);

  const binDir = await new Promise<string>((resolve, reject) => {
    const stdoutChunks: Buffer[] = [];
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'inherit'] });

    child.stdout?.on('data', (data: Buffer) => {
      stdoutChunks.push(data);
    });

    child.once('error', (error: Error) => {
      reject(
        new PathResolutionError(`Failed to start ${command}: ${error.message}`, null, error)
      );
    });

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      const status = exitStatus(code, signal);
      if (status !== 0) {
        reject(new PathResolutionError(`Binary path query exited with status ${status}`, status));
        return;
      }
      const trimmed = Buffer.concat(stdoutChunks).toString('utf-8').trim();
      if (trimmed === '') {
        reject(new PathResolutionError('Binary path query produced no output', status));
        return;
      }
      resolve(trimmed);
    });
  });

  return join(binDir, BINARY_NAME);
}
