import * as fs from 'fs';
import Ajv from 'ajv';
import yaml from 'js-yaml';
import { CatalogFile, Product } from './types';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });

const validateCatalogFile = ajv.compile<CatalogFile>({
  type: 'object',
  required: ['products'],
  properties: {
    products: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'price', 'description'],
        properties: {
          name: { type: 'string', minLength: 1 },
          price: { type: 'number', minimum: 0 },
          description: { type: 'string' },
        },
      },
    },
  },
});

/**
 * Read-only product table keyed by product name.
 */
export class Catalog {
  private readonly products: ReadonlyMap<string, Product>;

  constructor(products: readonly Product[]) {
    const map = new Map<string, Product>();
    for (const product of products) {
      if (map.has(product.name)) {
        throw new Error(`Duplicate product in catalog: ${product.name}`);
      }
      map.set(product.name, Object.freeze({ ...product }));
    }
    this.products = map;
  }

  get(name: string): Product | undefined {
    return this.products.get(name);
  }

  list(): Product[] {
    return Array.from(this.products.values());
  }

  get size(): number {
    return this.products.size;
  }
}

/**
 * Load the catalog from a YAML file. Fails fast: a shop with a broken
 * price list must not start.
 */
export function loadCatalog(filePath: string): Catalog {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Catalog file not found: ${filePath}`);
  }

  const parsed: unknown = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  if (!validateCatalogFile(parsed)) {
    const problems = ajv.errorsText(validateCatalogFile.errors);
    throw new Error(`Invalid catalog file ${filePath}: ${problems}`);
  }

  const catalog = new Catalog(parsed.products);
  logger.info({ file: filePath, products: catalog.size }, 'Catalog loaded');
  return catalog;
}
