/**
 * Base class for products driven by the build orchestrator.
 */

import type { BuildSessionArgs, ProductId, ToolchainLocator } from '../types/product.js';

export interface ProductOptions<H> {
  args: BuildSessionArgs;
  /** Checkout directory of the product's sources */
  sourceDir: string;
  /** Build directory the orchestrator assigned to this product */
  buildDir: string;
  toolchains: ToolchainLocator<H>;
}

/**
 * A buildable unit. Subclasses decide whether each phase applies to a host
 * and how to carry it out; a phase resolves to a process exit status.
 */
export abstract class Product<H> {
  readonly args: BuildSessionArgs;
  readonly sourceDir: string;
  readonly buildDir: string;
  protected readonly toolchains: ToolchainLocator<H>;

  constructor(options: ProductOptions<H>) {
    this.args = options.args;
    this.sourceDir = options.sourceDir;
    this.buildDir = options.buildDir;
    this.toolchains = options.toolchains;
  }

  abstract get name(): ProductId;

  /** Upstream products that must be built before this one */
  abstract getDependencies(): readonly ProductId[];

  isRelease(): boolean {
    return this.args.release;
  }

  installToolchainPath(host: H): string {
    return this.toolchains.installToolchainPath(host);
  }

  nativeToolchainPath(host: H): string {
    return this.toolchains.nativeToolchainPath(host);
  }

  abstract shouldBuild(host: H): boolean;
  abstract build(host: H): Promise<number>;
  abstract shouldTest(host: H): boolean;
  abstract test(host: H): Promise<number>;
  abstract shouldInstall(host: H): boolean;
  abstract install(host: H): Promise<number>;
}
