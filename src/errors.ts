import { SUPPORTED_LANGUAGES } from './types.js';

/**
 * Thrown when the XSD file cannot be read or parsed.
 */
export class XsdParseError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'XsdParseError';
    Object.setPrototypeOf(this, XsdParseError.prototype);
  }
}

/**
 * Thrown when a spelling is requested for a language outside the supported set.
 * This is a configuration bug and aborts the whole generation run.
 */
export class UnsupportedLanguageError extends Error {
  public readonly language: string;

  constructor(language: string) {
    super(
      `Unsupported target language "${language}". Expected one of: ${SUPPORTED_LANGUAGES.join(', ')}.`,
    );
    this.name = 'UnsupportedLanguageError';
    this.language = language;
    Object.setPrototypeOf(this, UnsupportedLanguageError.prototype);
  }
}

/**
 * A per-node failure reported by a language hook.
 */
export interface GenerationFailure {
  /** Name of the hook that reported the failure, e.g. `GoComplexType`. */
  hook: string;
  /** Schema-local name of the node being rendered. */
  node: string;
  error: Error;
}

/**
 * Thrown when one or more language hooks report a failure and the run does not
 * continue past errors.
 */
export class GenerationError extends Error {
  public readonly failures: GenerationFailure[];

  constructor(failures: GenerationFailure[]) {
    const summary = failures.map((f) => `  [${f.hook} ${f.node}] ${f.error.message}`).join('\n');
    super(`Code generation failed with ${failures.length} error(s):\n${summary}`);
    this.name = 'GenerationError';
    this.failures = failures;
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

/**
 * Thrown when fetching a schema or touching the filesystem fails.
 */
export class SchemaIoError extends Error {
  public readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(`${message}: ${path}`, cause === undefined ? undefined : { cause });
    this.name = 'SchemaIoError';
    this.path = path;
    Object.setPrototypeOf(this, SchemaIoError.prototype);
  }
}
