/**
 * Example 03: Typed Models
 *
 * Demonstrates:
 * - defineModel() with `as const` for inferred record types
 * - execute() for requests described as data
 * - Handling engine errors by code
 */

import { AutomapError, DataEngine, MemoryStorageBackend, defineModel } from '@automap/core';

const Product = defineModel({
  name: 'products',
  fields: [
    { name: 'sku', type: 'text', primary: true },
    { name: 'price', type: 'float' },
    { name: 'inStock', type: 'boolean', default: true },
  ],
} as const);

async function main() {
  const engine = new DataEngine(new MemoryStorageBackend(), [Product]);

  const mug = await engine.create(Product, { sku: 'MUG-1', price: 9.5 });
  console.log(mug.sku, mug.price.toFixed(2), mug.inStock);

  const response = await engine.execute({ action: 'query', model: 'products', filter: { inStock: true } });
  if (response.action === 'query') {
    console.log('In stock:', response.records.length);
  }

  try {
    await engine.create(Product, { sku: 'MUG-1', price: 12 });
  } catch (err) {
    if (err instanceof AutomapError) {
      console.log(`${err.code}: ${err.message}`);
    } else {
      throw err;
    }
  }
}

main().catch(console.error);
