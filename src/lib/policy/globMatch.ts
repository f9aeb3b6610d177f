/**
 * Shell-style glob matching for policy conditions.
 *
 * `*` matches any run of characters (including none), `?` exactly one,
 * `[abc]` / `[a-z]` a character class and `[!abc]` its negation. Matching is
 * case-sensitive and anchored to the whole value.
 */

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/]/g;
const CLASS_SPECIALS = /[\\\]^[-]/g;

/** Compiled patterns kept at most; the oldest entry is evicted first. */
export const GLOB_CACHE_LIMIT = 500;

const compiled = new Map<string, RegExp>();

function remember(pattern: string, regex: RegExp): void {
  if (compiled.size >= GLOB_CACHE_LIMIT) {
    const oldest = compiled.keys().next();
    if (!oldest.done) compiled.delete(oldest.value);
  }
  compiled.set(pattern, regex);
}

function escapeLiteral(input: string): string {
  return input.replace(REGEX_SPECIALS, '\\$&');
}

function escapeClassChar(ch: string): string {
  return ch.replace(CLASS_SPECIALS, '\\$&');
}

/**
 * Translate a class body (the text between `[` and `]`) into a regex class.
 * Reversed ranges such as `z-a` are dropped.
 */
function translateClass(body: string): string {
  const negated = body.startsWith('!');
  const chars = Array.from(negated ? body.slice(1) : body);
  const parts: string[] = [];

  for (let k = 0; k < chars.length; k++) {
    const ch = chars[k]!;
    const next = chars[k + 1];
    const end = chars[k + 2];
    if (next === '-' && end !== undefined) {
      if (ch <= end) parts.push(`${escapeClassChar(ch)}-${escapeClassChar(end)}`);
      k += 2;
      continue;
    }
    parts.push(escapeClassChar(ch));
  }

  if (parts.length === 0) return negated ? '.' : '(?!)';
  return `[${negated ? '^' : ''}${parts.join('')}]`;
}

export function globToRegExp(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) return cached;

  let source = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i]!;
    i += 1;
    if (ch === '*') {
      // collapse runs of stars
      while (pattern[i] === '*') i += 1;
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      let j = i;
      if (pattern[j] === '!') j += 1;
      if (pattern[j] === ']') j += 1;
      while (j < pattern.length && pattern[j] !== ']') j += 1;
      if (j >= pattern.length) {
        source += '\\[';
      } else {
        source += translateClass(pattern.slice(i, j));
        i = j + 1;
      }
    } else {
      source += escapeLiteral(ch);
    }
  }

  // u: `?` and classes work on code points, not UTF-16 halves
  const regex = new RegExp(`^${source}$`, 'su');
  remember(pattern, regex);
  return regex;
}

/**
 * Match a value against a glob pattern.
 * An empty pattern never matches; `*` matches everything, including "".
 */
export function globMatch(pattern: string, value: string): boolean {
  if (!pattern) return false;
  if (pattern === '*') return true;
  return globToRegExp(pattern).test(value);
}

/**
 * True when `patterns` is absent (no constraint) or any pattern matches.
 */
export function listMatches(patterns: readonly string[] | undefined, value: string): boolean {
  if (patterns === undefined) return true;
  return patterns.some((pattern) => globMatch(pattern, value));
}
