import type { TargetClient, TargetProduct } from '../api/target-client.js';
import { errorMessage } from '../api/http.js';
import { getLogger } from '../lib/logger.js';
import type { ProductIndex, ProductLink } from '../transform/field-mapper.js';

/** SKU → target variant. The first variant seen for a SKU wins. */
export function buildProductIndex(products: TargetProduct[]): ProductIndex {
  const index = new Map<string, ProductLink>();
  for (const product of products) {
    for (const variant of product.variants) {
      const sku = variant.sku?.trim();
      if (!sku || index.has(sku)) continue;
      index.set(sku, { productId: product.id, variantId: variant.id, title: product.title });
    }
  }
  return index;
}

/**
 * Fetch the target catalog once per migration run. Orders can still be
 * created without variant links, so a failed fetch yields an empty index.
 */
export async function loadProductIndex(target: TargetClient): Promise<ProductIndex> {
  const logger = getLogger();
  try {
    const index = buildProductIndex(await target.listAllProducts());
    logger.info({ skus: index.size }, 'Built product index');
    return index;
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, 'Failed to build product index: orders will not link to variants');
    return new Map();
  }
}
