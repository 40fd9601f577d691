import { describe, it, expect } from 'vitest';
import { compilePredicate } from '../../src/compilers/predicate.js';
import { CapabilityRegistry } from '../../src/fulltext/capabilities.js';
import { FullTextStrategyDispatcher } from '../../src/fulltext/dispatcher.js';
import { searchQuery } from '../../src/query/query-object.js';
import { runInMemory } from '../../src/query/in-memory.js';
import { compileSelectQuery } from '../../src/query/compiler.js';
import { products, productDeclaration, specOf } from './fixtures.js';
import type { Product } from './fixtures.js';

const dispatcher = () => new FullTextStrategyDispatcher();

describe('compilePredicate()', () => {
  const artifact = compilePredicate(specOf(productDeclaration), dispatcher());
  const all = searchQuery.from<Product>('Product');

  it('plans facets in declaration order, then full text, then sorting', () => {
    expect(artifact.plan.map((s) => s.kind)).toEqual(['memberOf', 'bounds', 'equalTo', 'fullText', 'sortBy']);
    expect(artifact.plan[1]).toEqual({
      kind: 'bounds',
      facet: 'Price',
      path: 'Price',
      minField: 'MinPrice',
      maxField: 'MaxPrice',
      type: 'decimal',
    });
  });

  it('returns the query unchanged for a null or undefined filter', () => {
    expect(artifact.apply(all, null)).toBe(all);
    expect(artifact.apply(all, undefined)).toBe(all);
  });

  it('an empty filter leaves the candidate set unchanged', () => {
    expect(runInMemory(artifact.apply(all, {}), products)).toEqual(products);
  });

  it('ANDs facet fragments', () => {
    const q = artifact.apply(all, { Brand: ['Acme', 'Globex'], InStock: true });
    expect(runInMemory(q, products).map((p) => p.Name)).toEqual(['Anvil', 'Hammock']);
  });

  it('treats an empty Brand array as absent', () => {
    expect(runInMemory(artifact.apply(all, { Brand: [] }), products)).toHaveLength(5);
  });

  it('applies Min and Max independently', () => {
    expect(runInMemory(artifact.apply(all, { MinPrice: 500 }), products).map((p) => p.Price)).toEqual([500, 600]);
    expect(runInMemory(artifact.apply(all, { MaxPrice: 50 }), products).map((p) => p.Price)).toEqual([50, 20]);
  });

  it('an inverted range yields no rows', () => {
    expect(runInMemory(artifact.apply(all, { MinPrice: 500, MaxPrice: 100 }), products)).toEqual([]);
  });

  it('Boolean false filters for false', () => {
    const names = runInMemory(artifact.apply(all, { InStock: false }), products).map((p) => p.Name);
    expect(names).toEqual(['Rocket skates', 'Unbranded rocket']);
  });

  it('ANDs the full-text fragment with facets', () => {
    const names = runInMemory(artifact.apply(all, { searchText: 'ROCKET', Brand: ['Acme'] }), products).map((p) => p.Name);
    expect(names).toEqual(['Rocket skates']);
  });

  it('a whitespace-only term does not filter', () => {
    expect(runInMemory(artifact.apply(all, { searchText: '  ' }), products)).toHaveLength(5);
  });

  it('sorts by a sortable field and ignores unknown names', () => {
    const byRating = runInMemory(artifact.apply(all, { sortBy: 'Rating', sortDescending: true }), products);
    expect(byRating.map((p) => p.Rating)).toEqual([4.9, 4.5, 3.0, 2.5, 1.0]);
    expect(artifact.apply(all, { sortBy: 'Price' })._state.orderBy).toEqual([]);
  });

  it('ignores malformed filter values', () => {
    const q = artifact.apply(all, { Brand: 'Acme', MinPrice: { value: 1 }, InStock: 'yes' });
    expect(q.predicate).toBeNull();
  });

  it('ignores bounds that do not match the facet value type', () => {
    const q = artifact.apply(all, { MinPrice: 'cheap', MaxPrice: true });
    expect(q.predicate).toBeNull();
    expect(runInMemory(q, products)).toEqual(products);
  });

  it('keeps the well-typed bound when the other one is malformed', () => {
    const q = artifact.apply(all, { MinPrice: 'cheap', MaxPrice: 100 });
    expect(runInMemory(q, products).map((p) => p.Price)).toEqual([50, 20]);
  });
});

describe('integer ranges', () => {
  const spec = specOf({
    name: 'Item',
    members: [{ name: 'Stock', type: 'integer', annotations: [{ kind: 'facet', type: 'Range' }] }],
  });
  const artifact = compilePredicate(spec, dispatcher());

  it('accepts integers and bigints, ignores fractions and NaN', () => {
    const q = artifact.apply(searchQuery.from('Item'), { MinStock: 2.5, MaxStock: 10n });
    expect(q.predicate).toEqual({ kind: 'compare', path: 'Stock', op: 'lte', value: 10n });
    expect(artifact.apply(searchQuery.from('Item'), { MinStock: Number.NaN }).predicate).toBeNull();
  });
});

describe('date ranges', () => {
  const spec = specOf({
    name: 'Event',
    members: [{ name: 'Held', type: 'date', annotations: [{ kind: 'facet', type: 'DateRange' }] }],
  });
  const artifact = compilePredicate(spec, dispatcher());
  const events = searchQuery.from<{ Held: Date }>('Event');
  const rows = [
    { Held: new Date('2024-01-10T00:00:00.000Z') },
    { Held: new Date('2024-02-10T00:00:00.000Z') },
    { Held: new Date('2024-03-10T00:00:00.000Z') },
  ];
  const months = (filter: Record<string, unknown>) =>
    runInMemory(artifact.apply(events, filter), rows).map((r) => r.Held.getUTCMonth() + 1);

  it('plans From and To bounds of date-time type', () => {
    expect(artifact.plan[0]).toEqual({
      kind: 'bounds',
      facet: 'Held',
      path: 'Held',
      minField: 'HeldFrom',
      maxField: 'HeldTo',
      type: 'date-time',
    });
  });

  it('applies each bound independently', () => {
    expect(months({ HeldFrom: '2024-02-01T00:00:00.000Z' })).toEqual([2, 3]);
    expect(months({ HeldTo: new Date('2024-02-01T00:00:00.000Z') })).toEqual([1]);
    expect(months({ HeldFrom: '2024-02-01T00:00:00.000Z', HeldTo: '2024-02-28T00:00:00.000Z' })).toEqual([2]);
  });

  it('To before From yields no rows', () => {
    expect(months({ HeldFrom: '2024-03-01T00:00:00.000Z', HeldTo: '2024-01-01T00:00:00.000Z' })).toEqual([]);
  });

  it('parses ISO strings into dates and ignores unparseable ones', () => {
    expect(artifact.apply(events, { HeldFrom: '2024-02-01T00:00:00.000Z' }).predicate).toEqual({
      kind: 'compare',
      path: 'Held',
      op: 'gte',
      value: new Date('2024-02-01T00:00:00.000Z'),
    });
    expect(artifact.apply(events, { HeldFrom: 'soon', HeldTo: 1706745600000 }).predicate).toBeNull();
  });
});

describe('geo facets', () => {
  const spec = specOf({
    name: 'Venue',
    members: [{ name: 'Location', type: 'reference', annotations: [{ kind: 'facet', type: 'Geo' }] }],
  });
  const artifact = compilePredicate(spec, dispatcher());
  const venues = searchQuery.from('Venue');
  const oslo = { Name: 'Oslo', Location: { latitude: 59.91, longitude: 10.75 } };
  const bergen = { Name: 'Bergen', Location: { latitude: 60.39, longitude: 5.32 } };
  const nowhere = { Name: 'Nowhere', Location: null };
  const rows = [oslo, bergen, nowhere];

  it('filters by distance when latitude, longitude and radius are all present', () => {
    const q = artifact.apply(venues, { LocationLatitude: 59.91, LocationLongitude: 10.75, LocationRadiusKm: 50 });
    expect(runInMemory(q, rows)).toEqual([oslo]);
  });

  it('a wider radius reaches further', () => {
    const q = artifact.apply(venues, { LocationLatitude: 59.91, LocationLongitude: 10.75, LocationRadiusKm: 400 });
    expect(runInMemory(q, rows)).toEqual([oslo, bergen]);
  });

  it('does nothing unless all three fields are present', () => {
    expect(artifact.apply(venues, { LocationLatitude: 59.91, LocationLongitude: 10.75 }).predicate).toBeNull();
    expect(artifact.apply(venues, { LocationLatitude: 59.91, LocationRadiusKm: 50 }).predicate).toBeNull();
    expect(artifact.apply(venues, { LocationLongitude: 10.75, LocationRadiusKm: 50 }).predicate).toBeNull();
  });
});

describe('non-text categorical facets', () => {
  const spec = specOf({
    name: 'Parcel',
    members: [
      { name: 'Weight', type: 'decimal', annotations: [{ kind: 'facet' }] },
      { name: 'Shipped', type: 'date', annotations: [{ kind: 'facet' }] },
    ],
  });
  const artifact = compilePredicate(spec, dispatcher());
  const parcels = searchQuery.from('Parcel');

  it('matches decimals by their shortest number text on both providers', () => {
    const q = artifact.apply(parcels, { Weight: ['10.5'] });
    expect(runInMemory(q, [{ Weight: 10.5 }, { Weight: 10.25 }])).toEqual([{ Weight: 10.5 }]);
    expect(compileSelectQuery(q, { table: 'parcels' }).sql).toBe(
      'SELECT e.*\nFROM parcels AS e\nWHERE CAST(CAST(e.weight AS float8) AS TEXT) = ANY($1)',
    );
  });

  it('matches dates by their ISO-8601 UTC text on both providers', () => {
    const shipped = new Date('2024-01-01T00:00:00.000Z');
    const q = artifact.apply(parcels, { Shipped: ['2024-01-01T00:00:00.000Z'] });
    expect(runInMemory(q, [{ Shipped: shipped }, { Shipped: new Date('2024-01-02T00:00:00.000Z') }])).toEqual([
      { Shipped: shipped },
    ]);
    expect(compileSelectQuery(q, { table: 'parcels' }).sql.split('\n')[2]).toBe(
      `WHERE to_char(e.shipped AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"') = ANY($1)`,
    );
  });
});

describe('scenarios', () => {
  it('A: Brand in [X, Y] over [X, X, Y, Z]', () => {
    const spec = specOf({ name: 'Item', members: [{ name: 'Brand', type: 'string', annotations: [{ kind: 'facet' }] }] });
    const rows = [{ Brand: 'X' }, { Brand: 'X' }, { Brand: 'Y' }, { Brand: 'Z' }];
    const q = compilePredicate(spec, dispatcher()).apply(searchQuery.from<{ Brand: string }>('Item'), { Brand: ['X', 'Y'] });
    expect(runInMemory(q, rows).map((r) => r.Brand)).toEqual(['X', 'X', 'Y']);
  });

  it('B: Price in [100, 500] over [50, 150, 500, 600]', () => {
    const spec = specOf({
      name: 'Item',
      members: [{ name: 'Price', type: 'decimal', annotations: [{ kind: 'facet', type: 'Range' }] }],
    });
    const rows = [{ Price: 50 }, { Price: 150 }, { Price: 500 }, { Price: 600 }];
    const q = compilePredicate(spec, dispatcher()).apply(searchQuery.from<{ Price: number }>('Item'), {
      MinPrice: 100,
      MaxPrice: 500,
    });
    expect(runInMemory(q, rows).map((r) => r.Price)).toEqual([150, 500]);
  });

  it('C: StartsWith "get" over ["getting-started", "other"]', () => {
    const spec = specOf({
      name: 'Page',
      members: [{ name: 'Slug', type: 'string', annotations: [{ kind: 'fullText', behavior: 'StartsWith' }] }],
    });
    const rows = [{ Slug: 'getting-started' }, { Slug: 'other' }];
    const q = compilePredicate(spec, dispatcher()).apply(searchQuery.from<{ Slug: string }>('Page'), { searchText: 'get' });
    expect(runInMemory(q, rows).map((r) => r.Slug)).toEqual(['getting-started']);
  });
});

describe('navigation facets', () => {
  const spec = specOf({
    name: 'Order',
    members: [
      { name: 'CustomerCity', type: 'reference', annotations: [{ kind: 'facet', navigationPath: 'Customer.City' }] },
      {
        name: 'CustomerAge',
        type: 'reference',
        annotations: [{ kind: 'facet', type: 'Range', navigationPath: 'Customer.Age', valueType: 'integer' }],
      },
      {
        name: 'WarehouseCode',
        type: 'reference',
        annotations: [{ kind: 'facet', navigationPath: 'Warehouse.Code', autoInclude: false }],
      },
    ],
  });
  const artifact = compilePredicate(spec, dispatcher());

  it('lists each auto-included root once', () => {
    expect(artifact.requiredIncludes).toEqual(['Customer']);
  });

  it('includes the roots and filters through the dotted path', () => {
    const q = artifact.apply(searchQuery.from('Order'), { CustomerCity: ['Oslo'], MinCustomerAge: 30 });
    expect(q.includes).toEqual(['Customer']);
    const rows = [
      { Customer: { City: 'Oslo', Age: 41 } },
      { Customer: { City: 'Oslo', Age: 22 } },
      { Customer: { City: 'Bergen', Age: 50 } },
      { Customer: null },
    ];
    expect(runInMemory(q, rows)).toEqual([rows[0]]);
  });
});

describe('full-text strategies', () => {
  const declaration = (strategy: 'FreeText' | 'ClientSide') =>
    specOf({
      name: 'Doc',
      options: { fullTextStrategy: strategy },
      members: [{ name: 'Title', type: 'string', annotations: [{ kind: 'fullText' }] }],
    });

  it('resolves the strategy once at compile time', () => {
    const artifact = compilePredicate(declaration('FreeText'), new FullTextStrategyDispatcher(CapabilityRegistry.postgres()));
    expect(artifact.plan[0]).toEqual({
      kind: 'fullText',
      field: 'searchText',
      resolution: { mode: 'primitive', primitive: 'freetext' },
      fields: [{ path: 'Title', behavior: 'Contains', caseSensitive: false }],
    });
  });

  it('falls back to LIKE without the capability', () => {
    const artifact = compilePredicate(declaration('FreeText'), dispatcher());
    const q = artifact.apply(searchQuery.from('Doc'), { searchText: 'Red' });
    expect(q.predicate).toEqual({ kind: 'like', path: 'Title', pattern: '%red%' });
  });

  it('client-side attaches an in-process filter', () => {
    const artifact = compilePredicate(declaration('ClientSide'), dispatcher());
    const q = artifact.apply(searchQuery.from('Doc'), { searchText: 'red' });
    expect(q.predicate).toBeNull();
    expect(q._state.inProcess).toHaveLength(1);
  });
});
