import { describe, it, expect, vi } from 'vitest';
import {
  escapeLikePattern,
  isBlank,
  likePatternFor,
  likeToRegExp,
  matchesText,
  quoteBooleanTerm,
} from '../../src/fulltext/patterns.js';
import { CapabilityRegistry } from '../../src/fulltext/capabilities.js';
import { describeResolution, FullTextStrategyDispatcher } from '../../src/fulltext/dispatcher.js';
import { makeLogger } from './fixtures.js';

describe('patterns', () => {
  it('escapes LIKE wildcards and the escape character', () => {
    expect(escapeLikePattern('50%_off\\')).toBe('50\\%\\_off\\\\');
  });

  it('builds one pattern per behavior', () => {
    expect(likePatternFor('Contains', 'ab')).toBe('%ab%');
    expect(likePatternFor('StartsWith', 'ab')).toBe('ab%');
    expect(likePatternFor('EndsWith', 'ab')).toBe('%ab');
    expect(likePatternFor('Exact', 'a_b')).toBe('a\\_b');
  });

  it('quotes boolean terms unless they already contain a quote', () => {
    expect(quoteBooleanTerm('red shoes')).toBe('"red shoes"');
    expect(quoteBooleanTerm('"red" shoes')).toBe('"red" shoes');
  });

  it('treats null, empty and whitespace-only terms as blank', () => {
    expect(isBlank(null)).toBe(true);
    expect(isBlank('')).toBe(true);
    expect(isBlank(' \t ')).toBe(true);
    expect(isBlank(' a ')).toBe(false);
  });

  it('translates escaped wildcards literally', () => {
    const re = likeToRegExp('%50\\%%');
    expect(re.test('save 50% now')).toBe(true);
    expect(re.test('save 500 now')).toBe(false);
  });

  it('matchesText folds case unless case-sensitive', () => {
    expect(matchesText('Getting-Started', 'StartsWith', 'get', false)).toBe(true);
    expect(matchesText('Getting-Started', 'StartsWith', 'get', true)).toBe(false);
    expect(matchesText('readme', 'EndsWith', 'ME', false)).toBe(true);
    expect(matchesText('readme', 'Exact', 'read', false)).toBe(false);
    expect(matchesText(null, 'Contains', 'a', false)).toBe(false);
  });
});

describe('CapabilityRegistry', () => {
  it('reports declared capabilities, sorted', () => {
    const registry = CapabilityRegistry.of('ilike', 'freetext');
    expect(registry.has('ilike')).toBe(true);
    expect(registry.has('boolean-contains')).toBe(false);
    expect(registry.list()).toEqual(['freetext', 'ilike']);
  });

  it('postgres() declares every primitive', () => {
    expect(CapabilityRegistry.postgres().list()).toEqual(['boolean-contains', 'freetext', 'ilike']);
  });

  it('probes once per registry', () => {
    const probe = vi.fn().mockReturnValue(['freetext']);
    const registry = new CapabilityRegistry(probe);
    registry.has('freetext');
    registry.has('ilike');
    registry.list();
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it('treats a failing probe as no capabilities and logs at debug', () => {
    const logger = makeLogger();
    const registry = new CapabilityRegistry(() => {
      throw new Error('provider not loaded');
    }, logger);
    expect(registry.has('freetext')).toBe(false);
    expect(registry.list()).toEqual([]);
    expect(logger.debug).toHaveBeenCalledTimes(1);
  });
});

describe('FullTextStrategyDispatcher', () => {
  it('resolves strategies that need no probe', () => {
    const dispatcher = new FullTextStrategyDispatcher();
    expect(dispatcher.resolve('PatternMatch')).toEqual({ mode: 'pattern-match' });
    expect(dispatcher.resolve('Like')).toEqual({ mode: 'like', fellBackFrom: null });
    expect(dispatcher.resolve('ClientSide')).toEqual({ mode: 'client-side' });
  });

  it('targets an available primitive', () => {
    const dispatcher = new FullTextStrategyDispatcher(CapabilityRegistry.postgres());
    expect(dispatcher.resolve('FreeText')).toEqual({ mode: 'primitive', primitive: 'freetext' });
    expect(dispatcher.resolve('BooleanContains')).toEqual({ mode: 'primitive', primitive: 'boolean-contains' });
    expect(dispatcher.resolve('PostgresILike')).toEqual({ mode: 'primitive', primitive: 'ilike' });
  });

  it('falls back to LIKE when the primitive is missing', () => {
    const logger = makeLogger();
    const dispatcher = new FullTextStrategyDispatcher(CapabilityRegistry.of('ilike'), logger);
    expect(dispatcher.resolve('FreeText')).toEqual({ mode: 'like', fellBackFrom: 'FreeText' });
    expect(logger.debug).toHaveBeenCalledWith(
      { strategy: 'FreeText', primitive: 'freetext' },
      'full-text primitive unavailable; using LIKE fallback',
    );
  });

  it('falls back when the probe throws', () => {
    const registry = new CapabilityRegistry(() => {
      throw new Error('boom');
    });
    const dispatcher = new FullTextStrategyDispatcher(registry);
    expect(dispatcher.resolve('BooleanContains')).toEqual({ mode: 'like', fellBackFrom: 'BooleanContains' });
  });

  it('caches each resolution', () => {
    const dispatcher = new FullTextStrategyDispatcher(CapabilityRegistry.postgres());
    expect(dispatcher.resolve('FreeText')).toBe(dispatcher.resolve('FreeText'));
  });
});

describe('describeResolution()', () => {
  it('names each mode', () => {
    expect(describeResolution({ mode: 'pattern-match' })).toBe('pattern match');
    expect(describeResolution({ mode: 'like', fellBackFrom: null })).toBe('case-insensitive LIKE');
    expect(describeResolution({ mode: 'like', fellBackFrom: 'FreeText' })).toBe(
      'case-insensitive LIKE (fallback from FreeText)',
    );
    expect(describeResolution({ mode: 'primitive', primitive: 'ilike' })).toBe('provider primitive ilike');
    expect(describeResolution({ mode: 'client-side' })).toBe(
      'CLIENT-SIDE evaluation (materialises the candidate set)',
    );
  });
});
