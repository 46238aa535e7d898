/**
 * Target languages in the column order of `data/builtin-types.json`.
 * Adding a language means adding a column to every row of that table.
 */
export const SUPPORTED_LANGUAGES = ['Go', 'TypeScript', 'C', 'Java', 'Rust'] as const;

export type TargetLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export function isSupportedLanguage(value: string): value is TargetLanguage {
  return (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

/** A key/value entry of a mapping once it has been put in emission order. */
export interface KeyValuePair {
  key: string;
  value: string;
}
