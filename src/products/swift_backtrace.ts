/**
 * Product descriptor for swift-backtrace, built against the installed
 * toolchain and installed at `<toolchain>/libexec/swift/swift-backtrace`.
 */

import { join, resolve } from 'node:path';
import type { BuildAction, BuildConfiguration } from '../types/build.js';
import type { ProductId } from '../types/product.js';
import { runHelperAction } from '../commands/helper.js';
import { Product } from './product.js';

export const SWIFT_BACKTRACE_DEPENDENCIES: readonly ProductId[] = Object.freeze([
  'cmark',
  'llvm',
  'libcxx',
  'libicu',
  'swift',
  'libdispatch',
  'foundation',
  'xctest',
  'llbuild',
  'swiftpm',
] as const);

export class SwiftBacktrace<H> extends Product<H> {
  static readonly productName = 'swift-backtrace';
  static readonly isBuildScriptImplProduct = false;
  static readonly isBeforeBuildScriptImplProduct = false;
  static readonly dependencies = SWIFT_BACKTRACE_DEPENDENCIES;

  get name(): ProductId {
    return SwiftBacktrace.productName;
  }

  getDependencies(): readonly ProductId[] {
    return SwiftBacktrace.dependencies;
  }

  /** The package lives in the compiler checkout, next to this product's sources. */
  packagePath(): string {
    return resolve(this.sourceDir, '..', 'swift', 'tools', 'swift-backtrace');
  }

  installPath(host: H): string {
    return join(this.installToolchainPath(host), 'libexec', 'swift');
  }

  helperConfiguration(host: H): BuildConfiguration {
    return {
      mode: this.isRelease() ? 'release' : 'debug',
      verbose: this.args.verboseBuild,
      packagePath: this.packagePath(),
      buildPath: this.buildDir,
      toolchainPath: this.nativeToolchainPath(host),
      installPath: this.installPath(host),
    };
  }

  /**
   * Arguments for running the same action through the standalone helper CLI.
   */
  helperCommand(action: BuildAction, host: H): string[] {
    const configuration = this.helperConfiguration(host);
    const command = [
      action,
      '--toolchain',
      configuration.toolchainPath,
      '--configuration',
      configuration.mode,
      '--build-path',
      configuration.buildPath,
      '--package-path',
      configuration.packagePath,
      '--install-path',
      this.installPath(host),
    ];
    if (configuration.verbose) {
      command.push('--verbose');
    }
    return command;
  }

  shouldBuild(_host: H): boolean {
    return true;
  }

  build(host: H): Promise<number> {
    return runHelperAction('build', this.helperConfiguration(host));
  }

  shouldTest(_host: H): boolean {
    return this.args.testSwiftBacktrace;
  }

  test(host: H): Promise<number> {
    return runHelperAction('test', this.helperConfiguration(host));
  }

  shouldInstall(_host: H): boolean {
    return this.args.installSwiftBacktrace;
  }

  install(host: H): Promise<number> {
    return runHelperAction('install', this.helperConfiguration(host));
  }
}
