import type { CompiledMatcher, EventAttributes, MatcherDefinition, PatternPredicate } from '../types.js';
import { PatternSyntaxError } from './errors.js';
import { resolveAttribute } from './event.js';

type PatternPart = { kind: 'text'; value: string } | { kind: 'wildcard' };

function tokenizePattern(pattern: string): PatternPart[] {
  if (pattern.length === 0) {
    throw new PatternSyntaxError(pattern, 'pattern must not be empty');
  }

  const parts: PatternPart[] = [];
  let text = '';

  for (let index = 0; index < pattern.length; index += 1) {
    const char = pattern[index];
    if (char === '\\') {
      const next = pattern[index + 1];
      if (next === '*' || next === '\\') {
        text += next;
        index += 1;
        continue;
      }
      throw new PatternSyntaxError(
        pattern,
        typeof next === 'undefined' ? 'trailing escape character' : `unsupported escape "\\${next}"`
      );
    }

    if (char === '*') {
      if (text.length > 0) {
        parts.push({ kind: 'text', value: text });
        text = '';
      }
      // "**" behaves like "*"
      if (parts[parts.length - 1]?.kind !== 'wildcard') {
        parts.push({ kind: 'wildcard' });
      }
      continue;
    }

    text += char;
  }

  if (text.length > 0) {
    parts.push({ kind: 'text', value: text });
  }

  return parts;
}

/**
 * Splits a wildcard pattern into the literal segments between its stars.
 * `a*b*c` gives `['a', 'b', 'c']`, `*a` gives `['', 'a']`.
 */
function wildcardSegments(parts: PatternPart[]): string[] {
  const segments = [''];
  for (const part of parts) {
    if (part.kind === 'wildcard') {
      segments.push('');
    } else {
      segments[segments.length - 1] += part.value;
    }
  }
  return segments;
}

function matchSegments(segments: readonly string[], value: string): boolean {
  const first = segments[0] ?? '';
  const last = segments[segments.length - 1] ?? '';
  const end = value.length - last.length;
  if (end < first.length || !value.startsWith(first) || !value.endsWith(last)) {
    return false;
  }

  // leftmost placement of each middle segment leaves the most room for the rest
  let position = first.length;
  for (let index = 1; index < segments.length - 1; index += 1) {
    const segment = segments[index];
    const found = value.indexOf(segment, position);
    if (found < 0 || found + segment.length > end) {
      return false;
    }
    position = found + segment.length;
  }
  return true;
}

/**
 * Compiles a matcher pattern. Without an unescaped `*` the pattern is an exact,
 * case-sensitive literal; otherwise it is a glob anchored at both ends where `*`
 * spans any run of characters, dots included. Matching never backtracks, so the
 * cost is linear in the pattern segments and the value length.
 */
export function compilePattern(pattern: string): PatternPredicate {
  const parts = tokenizePattern(pattern);

  if (parts.every(part => part.kind === 'text')) {
    const literal = parts.map(part => (part.kind === 'text' ? part.value : '')).join('');
    return value => value === literal;
  }

  const segments = wildcardSegments(parts);
  return value => matchSegments(segments, value);
}

export function validatePattern(pattern: string): string | null {
  try {
    tokenizePattern(pattern);
    return null;
  } catch (error) {
    if (error instanceof PatternSyntaxError) {
      return error.message;
    }
    throw error;
  }
}

export function compileMatcher([attribute, pattern]: MatcherDefinition): CompiledMatcher {
  return { attribute, pattern, test: compilePattern(pattern) };
}

export function matchesCompiled(matcher: CompiledMatcher, event: EventAttributes): boolean {
  const value = resolveAttribute(event, matcher.attribute);
  if (typeof value === 'undefined') {
    return false;
  }
  return matcher.test(value);
}

/**
 * One-off check of a single attribute against a pattern. Unknown attributes,
 * missing values and malformed patterns all report no match.
 */
export function matches(attributeName: string, pattern: string, event: EventAttributes): boolean {
  const value = resolveAttribute(event, attributeName);
  if (typeof value === 'undefined' || validatePattern(pattern) !== null) {
    return false;
  }
  return compilePattern(pattern)(value);
}
