/**
 * Type definitions shared by the build orchestrator and product descriptors.
 */

/**
 * Session-wide options the orchestrator passes to every product.
 */
export interface BuildSessionArgs {
  /** Build in release mode instead of debug */
  release: boolean;
  /** Ask the toolchain for verbose output */
  verboseBuild: boolean;
  /** Run the swift-backtrace test suite */
  testSwiftBacktrace: boolean;
  /** Install swift-backtrace into the built toolchain */
  installSwiftBacktrace: boolean;
}

/**
 * Orchestrator-provided path lookups for a host target.
 *
 * `H` is opaque here; only the locator knows what is inside it.
 */
export interface ToolchainLocator<H> {
  /** Root of the toolchain being assembled for `host` */
  installToolchainPath(host: H): string;
  /** Root of the already-built toolchain used to compile for `host` */
  nativeToolchainPath(host: H): string;
}

/**
 * Identifiers of products the orchestrator knows how to build.
 */
export type ProductId =
  | 'cmark'
  | 'llvm'
  | 'libcxx'
  | 'libicu'
  | 'swift'
  | 'libdispatch'
  | 'foundation'
  | 'xctest'
  | 'llbuild'
  | 'swiftpm'
  | 'swift-backtrace';

/**
 * Which phases ran in a product session, and how it ended.
 */
export interface ProductSessionResult {
  product: string;
  /** Phases in the order they ran */
  phases: Array<{ action: 'build' | 'test' | 'install'; status: number }>;
  /** Last phase's status, or 0 when nothing ran */
  status: number;
}
