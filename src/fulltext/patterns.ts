import type { TextSearchBehavior } from '../types.js';

/** Escapes LIKE wildcards with backslash, the PostgreSQL default escape character. */
export function escapeLikePattern(term: string): string {
  return term.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

export function likePatternFor(behavior: TextSearchBehavior, term: string): string {
  const escaped = escapeLikePattern(term);
  switch (behavior) {
    case 'Contains':
      return `%${escaped}%`;
    case 'StartsWith':
      return `${escaped}%`;
    case 'EndsWith':
      return `%${escaped}`;
    case 'Exact':
      return escaped;
  }
}

/** Boolean-operator grammars treat a quoted term as one phrase. */
export function quoteBooleanTerm(term: string): string {
  return term.includes('"') ? term : `"${term}"`;
}

export function isBlank(term: string | null | undefined): boolean {
  return term == null || term.trim() === '';
}

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

/** Translates a backslash-escaped LIKE pattern into an anchored, case-insensitive RegExp. */
export function likeToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    if (ch === '\\' && i + 1 < pattern.length) {
      i += 1;
      source += pattern.charAt(i).replace(REGEX_SPECIAL, '\\$&');
    } else if (ch === '%') {
      source += '.*';
    } else if (ch === '_') {
      source += '.';
    } else {
      source += ch.replace(REGEX_SPECIAL, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 'is');
}

/** In-process equivalent of a `text` predicate node. Null values never match. */
export function matchesText(
  value: unknown,
  behavior: TextSearchBehavior,
  term: string,
  caseSensitive: boolean,
): boolean {
  if (value === null || value === undefined) return false;
  const haystack = caseSensitive ? String(value) : String(value).toLowerCase();
  const needle = caseSensitive ? term : term.toLowerCase();
  switch (behavior) {
    case 'Contains':
      return haystack.includes(needle);
    case 'StartsWith':
      return haystack.startsWith(needle);
    case 'EndsWith':
      return haystack.endsWith(needle);
    case 'Exact':
      return haystack === needle;
  }
}
