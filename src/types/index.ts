/**
 * swift-backtrace build helper type definitions.
 */

export type { BuildAction, BuildMode, BuildConfiguration } from './build.js';
export type { HelperConfigFile, LoadedHelperConfig } from './config.js';
export type {
  BuildSessionArgs,
  ToolchainLocator,
  ProductId,
  ProductSessionResult,
} from './product.js';
export type { ProductOptions } from '../products/product.js';
export type { HelperCliOptions } from '../commands/helper.js';
