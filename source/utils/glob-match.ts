/**
 * Shell-style wildcard matching for host patterns.
 *
 * Follows fnmatch(3) without flags: `*` matches any run of characters
 * (including `/` and a leading `.`), `?` matches exactly one character and
 * `[...]` is a bracket class with `!` negation and `a-z` ranges. A `]`
 * directly after the opening bracket (or after `!`) is literal, and a `[`
 * with no closing bracket matches itself. Matching is case-sensitive and
 * works on code points, so `?` consumes a whole astral character.
 */

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;
const CLASS_SPECIAL = /[\\\]\[^-]/g;

const escapeLiteral = (text: string): string => text.replace(REGEX_SPECIAL, '\\$&');
const escapeClassChar = (char: string): string => char.replace(CLASS_SPECIAL, '\\$&');

type ClassItem = { from: string; to: string };

/**
 * Parse the body of a bracket expression into single characters and ranges.
 * Reversed ranges such as `z-a` match nothing and are dropped.
 */
function parseClassItems(body: string): ClassItem[] {
  const chars = Array.from(body);
  const items: ClassItem[] = [];
  let i = 0;
  while (i < chars.length) {
    const from = chars[i] ?? '';
    const next = chars[i + 1];
    const to = chars[i + 2];
    if (next === '-' && to !== undefined) {
      if ((from.codePointAt(0) ?? 0) <= (to.codePointAt(0) ?? 0)) {
        items.push({ from, to });
      }
      i += 3;
      continue;
    }
    items.push({ from, to: from });
    i += 1;
  }
  return items;
}

function translateClass(body: string, negated: boolean): string {
  const items = parseClassItems(body);
  if (items.length === 0) {
    // An empty class never matches; its negation matches any character.
    return negated ? '.' : '(?!)';
  }
  const parts = items.map(({ from, to }) =>
    from === to ? escapeClassChar(from) : `${escapeClassChar(from)}-${escapeClassChar(to)}`,
  );
  return `[${negated ? '^' : ''}${parts.join('')}]`;
}

/**
 * Translate a glob into an anchored regular expression source.
 */
export function globToRegExpSource(glob: string): string {
  const chars = Array.from(glob);
  let out = '';
  let i = 0;

  while (i < chars.length) {
    const char = chars[i] ?? '';
    i += 1;

    if (char === '*') {
      while (chars[i] === '*') i += 1;
      out += '.*';
    } else if (char === '?') {
      out += '.';
    } else if (char === '[') {
      let j = i;
      if (chars[j] === '!') j += 1;
      if (chars[j] === ']') j += 1;
      while (j < chars.length && chars[j] !== ']') j += 1;

      if (j >= chars.length) {
        out += '\\[';
        continue;
      }

      const negated = chars[i] === '!';
      const body = chars.slice(negated ? i + 1 : i, j).join('');
      out += translateClass(body, negated);
      i = j + 1;
    } else {
      out += escapeLiteral(char);
    }
  }

  return `^${out}$`;
}

/**
 * Compile a glob into an anchored RegExp. Callers that match the same glob
 * repeatedly should keep the result.
 */
export function compileGlob(glob: string): RegExp {
  return new RegExp(globToRegExpSource(glob), 'su');
}

export function globMatch(glob: string, text: string): boolean {
  return compileGlob(glob).test(text);
}
