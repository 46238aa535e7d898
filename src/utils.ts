import type { KeyValuePair } from './types.js';

/**
 * Returns the namespace prefix of a qualified name (`"xs:string"` → `"xs"`).
 *
 * Only names with exactly one colon count as prefixed; anything else, including
 * `"a:b:c"`, yields an empty prefix.
 */
export function getNSPrefix(name: string): string {
  const parts = name.split(':');
  return parts.length === 2 ? parts[0] : '';
}

/**
 * Strips the namespace prefix of a qualified name (`"xs:string"` → `"string"`).
 * Names without exactly one colon are returned unchanged.
 */
export function trimNSPrefix(name: string): string {
  const parts = name.split(':');
  return parts.length === 2 ? parts[1] : name;
}

/**
 * Orders two strings by code point, which matches byte order of their UTF-8
 * encodings. `<` on JS strings compares UTF-16 code units and puts astral
 * characters before U+E000–U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(j) ?? 0;
    if (left !== right) return left < right ? -1 : 1;
    i += left > 0xffff ? 2 : 1;
    j += right > 0xffff ? 2 : 1;
  }
  if (i < a.length) return 1;
  return j < b.length ? -1 : 0;
}

/**
 * Puts a string mapping in emission order: value ascending, and for equal values
 * key descending, both by code point. The order does not depend on the mapping's
 * own iteration order, so repeated runs over the same schema emit identical output.
 */
export function toSortedPairs(mapping: Readonly<Record<string, string>>): KeyValuePair[] {
  const pairs = Object.entries(mapping).map(([key, value]) => ({ key, value }));
  return pairs.sort((a, b) => compareCodePoints(a.value, b.value) || compareCodePoints(b.key, a.key));
}
