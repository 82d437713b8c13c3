/**
 * Runs one product through build, test and install for a host, the way the
 * orchestrator walks each product in dependency order.
 */

import type { ProductSessionResult } from '../types/product.js';
import type { Product } from './product.js';

export async function runProductSession<H>(product: Product<H>, host: H): Promise<ProductSessionResult> {
  const result: ProductSessionResult = { product: product.name, phases: [], status: 0 };

  const phases = [
    { action: 'build', applies: () => product.shouldBuild(host), run: () => product.build(host) },
    { action: 'test', applies: () => product.shouldTest(host), run: () => product.test(host) },
    { action: 'install', applies: () => product.shouldInstall(host), run: () => product.install(host) },
  ] as const;

  for (const phase of phases) {
    if (!phase.applies()) {
      continue;
    }
    const status = await phase.run();
    result.phases.push({ action: phase.action, status });
    result.status = status;
    if (status !== 0) {
      break;
    }
  }

  return result;
}
