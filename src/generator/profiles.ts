import type { TargetLanguage } from '../types.js';

const GENERATED_NOTICE = '// Code generated by xsd-typegen. DO NOT EDIT.';

export interface LanguageProfile {
  /** Extension of the generated file, dot included. */
  extension: string;
  /** Everything above the first declaration. */
  header(packageName: string, imports: readonly string[]): string;
}

export const LANGUAGE_PROFILES: Record<TargetLanguage, LanguageProfile> = {
  Go: {
    extension: '.go',
    header: (packageName, imports) => {
      const lines = [GENERATED_NOTICE, '', `package ${packageName}`];
      if (imports.length > 0) {
        lines.push('', 'import (', ...imports.map((i) => `\t"${i}"`), ')');
      }
      return lines.join('\n');
    },
  },
  TypeScript: {
    extension: '.ts',
    header: () => GENERATED_NOTICE,
  },
  C: {
    extension: '.h',
    header: () => GENERATED_NOTICE,
  },
  Java: {
    extension: '.java',
    header: (packageName) => [GENERATED_NOTICE, '', `package ${packageName};`].join('\n'),
  },
  Rust: {
    extension: '.rs',
    header: () => [GENERATED_NOTICE, '', 'use serde::{Deserialize, Serialize};'].join('\n'),
  },
};
