import { readFileSync } from 'node:fs';
import { UnsupportedLanguageError } from '../errors.js';
import { isSupportedLanguage, SUPPORTED_LANGUAGES } from '../types.js';
import type { TargetLanguage } from '../types.js';

// https://www.w3.org/TR/xmlschema-2/#datatype
const TABLE_URL = new URL('../../data/builtin-types.json', import.meta.url);

/** Built-in name → spellings in `SUPPORTED_LANGUAGES` order. Frozen, rows included. */
export type BuiltInTypeTable = Readonly<Record<string, readonly string[]>>;

function isSpellingRow(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.length === SUPPORTED_LANGUAGES.length &&
    value.every((v) => typeof v === 'string' && v.length > 0)
  );
}

/**
 * Reads and checks the built-in type table. Every row must carry exactly one
 * non-empty spelling per supported language.
 */
export function loadBuiltInTypes(source: URL | string = TABLE_URL): BuiltInTypeTable {
  const parsed: unknown = JSON.parse(readFileSync(source, 'utf-8'));
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new TypeError(`Built-in type table must be a JSON object: ${String(source)}`);
  }
  const table: Record<string, readonly string[]> = {};
  for (const [name, row] of Object.entries(parsed)) {
    if (!isSpellingRow(row)) {
      throw new TypeError(
        `Built-in type "${name}" must list ${SUPPORTED_LANGUAGES.length} spellings (${SUPPORTED_LANGUAGES.join(', ')}).`,
      );
    }
    table[name] = Object.freeze([...row]);
  }
  return Object.freeze(table);
}

/** The XSD built-in types keyed by their exact schema names, e.g. `unsignedInt`, `xml:lang`. */
export const BUILT_IN_TYPES: BuiltInTypeTable = loadBuiltInTypes();

export type BuiltInLookup = { ok: true; type: string } | { ok: false };

export function assertLanguage(lang: string): TargetLanguage {
  if (!isSupportedLanguage(lang)) {
    throw new UnsupportedLanguageError(lang);
  }
  return lang;
}

/**
 * Looks up the spelling of an XSD built-in type in a target language.
 *
 * A miss (`ok: false`) only means the name is not a built-in; callers fall back
 * to resolving it against the schema. An unsupported language throws
 * `UnsupportedLanguageError`.
 */
export function getBuiltInType(name: string, lang: string): BuiltInLookup {
  const column = SUPPORTED_LANGUAGES.indexOf(assertLanguage(lang));
  if (!Object.hasOwn(BUILT_IN_TYPES, name)) return { ok: false };
  return { ok: true, type: BUILT_IN_TYPES[name][column] };
}
