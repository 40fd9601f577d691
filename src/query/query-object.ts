import { SearchQuery } from './builder.js';

/**
 * Entry point for candidate-set queries.
 *
 * @example
 * searchQuery.from<Product>('Product')
 *   .where({ kind: 'in', path: 'Brand', values: ['X', 'Y'] })
 *   .orderBy('Price', true)
 *   .paginate(1, 20)
 */
export const searchQuery = {
  from<T extends object = Record<string, unknown>>(source: string): SearchQuery<T> {
    return new SearchQuery<T>({
      source,
      predicate: null,
      includes: [],
      orderBy: [],
      skip: null,
      take: null,
      inProcess: [],
    });
  },
};
