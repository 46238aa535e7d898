import { trimNSPrefix } from './utils.js';

const ACRONYM_BOUNDARY = /([A-Z])([A-Z][a-z])/g;
const WORD_BOUNDARY = /([a-z0-9])([A-Z])/g;
const NON_IDENTIFIER = /[^\p{L}\p{N}_]+/u;

/**
 * Converts a schema name to snake_case.
 *
 * @example toSnakeCase('XMLHttpRequest') // 'xml_http_request'
 * @example toSnakeCase('kebab-case')     // 'kebab_case'
 */
export function toSnakeCase(input: string): string {
  return input
    .replace(ACRONYM_BOUNDARY, '$1_$2')
    .replace(WORD_BOUNDARY, '$1_$2')
    .replaceAll('-', '_')
    .toLowerCase();
}

/**
 * Uppercases the first code point and leaves the rest untouched.
 * Surrogate pairs are kept whole.
 */
export function toTitle(value: string): string {
  const first = value.codePointAt(0);
  if (first === undefined) return value;
  const head = String.fromCodePoint(first);
  return head.toUpperCase() + value.slice(head.length);
}

/** Alias of {@link toTitle}. */
export function makeFirstUpperCase(value: string): string {
  return toTitle(value);
}

/**
 * Derives a type identifier from a schema name: the namespace prefix is dropped,
 * every run of punctuation splits a word and each word is title-cased
 * (`"tns:purchase-order"` → `"PurchaseOrder"`). A leading digit gets an
 * underscore in front; an empty result becomes `"_"`.
 */
export function toIdentifier(name: string): string {
  const words = trimNSPrefix(name).split(NON_IDENTIFIER).filter((w) => w.length > 0);
  const joined = words.map(toTitle).join('');
  if (joined === '') return '_';
  return /^\p{N}/u.test(joined) ? `_${joined}` : joined;
}

/**
 * Hands out unique names within one generation run. The first request for a name
 * returns it as is; later requests append the smallest suffix from 2 up that
 * gives a name not handed out yet (`Item`, `Item2`, `Item3`). A suffixed name
 * never collides with a base name requested on its own, so `Item`, `Item2`,
 * `Item` yields `Item`, `Item2`, `Item3`.
 *
 * Each run, or each narrower scope such as a single struct, owns its own counter;
 * a fresh instance is the reset.
 */
export class FieldNameCounter {
  private readonly requests = new Map<string, number>();
  private readonly suffixes = new Map<string, number>();
  private readonly taken = new Set<string>();

  next(name: string): string {
    this.requests.set(name, this.count(name) + 1);
    let suffix = (this.suffixes.get(name) ?? 0) + 1;
    let candidate = suffix === 1 ? name : `${name}${suffix}`;
    while (this.taken.has(candidate)) {
      suffix += 1;
      candidate = `${name}${suffix}`;
    }
    this.suffixes.set(name, suffix);
    this.taken.add(candidate);
    return candidate;
  }

  /** How many times `name` has been requested so far. */
  count(name: string): number {
    return this.requests.get(name) ?? 0;
  }
}
