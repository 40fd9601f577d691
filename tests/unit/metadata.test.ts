import { describe, it, expect } from 'vitest';
import { compileMetadata } from '../../src/compilers/metadata.js';
import { specOf } from './fixtures.js';

describe('compileMetadata()', () => {
  const spec = specOf({
    name: 'Listing',
    members: [
      { name: 'Country', type: 'string', annotations: [{ kind: 'facet', orderBy: 'Value' }] },
      {
        name: 'City',
        type: 'string',
        annotations: [{ kind: 'facet', type: 'Hierarchical', isHierarchical: true, dependsOn: 'Country', limit: 20 }],
      },
      {
        name: 'Rent',
        type: 'decimal',
        annotations: [{ kind: 'facet', type: 'Range', displayName: 'Monthly rent', rangeIntervals: '0-500,500-1000' }],
      },
      { name: 'AgentName', type: 'reference', annotations: [{ kind: 'facet', navigationPath: 'Agent.Name' }] },
    ],
  });

  it('describes each facet in declaration order', () => {
    expect(compileMetadata(spec)).toEqual([
      {
        propertyName: 'Country',
        displayName: 'Country',
        kind: 'Categorical',
        isHierarchical: false,
        orderBy: 'Value',
        limit: 0,
      },
      {
        propertyName: 'City',
        displayName: 'City',
        kind: 'Hierarchical',
        isHierarchical: true,
        orderBy: 'Count',
        limit: 20,
        dependsOn: 'Country',
      },
      {
        propertyName: 'Rent',
        displayName: 'Monthly rent',
        kind: 'Range',
        isHierarchical: false,
        orderBy: 'Count',
        limit: 0,
        rangeIntervals: '0-500,500-1000',
      },
      {
        propertyName: 'AgentName',
        displayName: 'AgentName',
        kind: 'Categorical',
        isHierarchical: false,
        orderBy: 'Count',
        limit: 0,
        navigationPath: 'Agent.Name',
      },
    ]);
  });

  it('omits optional keys that have no value', () => {
    const [country] = compileMetadata(spec) ?? [];
    expect(Object.keys(country ?? {})).toEqual(['propertyName', 'displayName', 'kind', 'isHierarchical', 'orderBy', 'limit']);
  });

  it('is frozen', () => {
    const catalog = compileMetadata(spec);
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog?.[0])).toBe(true);
  });

  it('returns null when metadata is disabled', () => {
    expect(compileMetadata(specOf({ name: 'Tag', options: { generateMetadata: false }, members: [] }))).toBeNull();
  });
});
