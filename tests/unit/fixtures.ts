import { vi } from 'vitest';
import type { EntityDeclarationInput } from '../../src/declaration/schema.js';
import { parseDeclaration } from '../../src/declaration/schema.js';
import { scanDeclaration } from '../../src/declaration/scanner.js';
import { buildSearchSpec } from '../../src/spec/builder.js';
import type { EntitySearchSpec } from '../../src/types.js';

export function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function specOf(declaration: EntityDeclarationInput): EntitySearchSpec {
  return buildSearchSpec(scanDeclaration(parseDeclaration(declaration)));
}

export const productDeclaration: EntityDeclarationInput = {
  name: 'Product',
  namespace: 'Shop.Catalog',
  members: [
    { name: 'Brand', type: 'string', annotations: [{ kind: 'facet', displayName: 'Brand name' }] },
    { name: 'Price', type: 'decimal', annotations: [{ kind: 'facet', type: 'Range' }] },
    { name: 'InStock', type: 'boolean', annotations: [{ kind: 'facet', type: 'Boolean' }] },
    { name: 'Name', type: 'string', annotations: [{ kind: 'fullText' }] },
    { name: 'Rating', type: 'float', annotations: [{ kind: 'sortable' }] },
    { name: 'Sku', type: 'string' },
  ],
};

export interface Product {
  Brand: string | null;
  Price: number;
  InStock: boolean;
  Name: string;
  Rating: number;
}

export const products: Product[] = [
  { Brand: 'Acme', Price: 50, InStock: true, Name: 'Anvil', Rating: 4.5 },
  { Brand: 'Acme', Price: 150, InStock: false, Name: 'Rocket skates', Rating: 3.0 },
  { Brand: 'Globex', Price: 500, InStock: true, Name: 'Hammock', Rating: 4.9 },
  { Brand: 'Initech', Price: 600, InStock: true, Name: 'Stapler', Rating: 2.5 },
  { Brand: null, Price: 20, InStock: false, Name: 'Unbranded rocket', Rating: 1.0 },
];
