import { writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join, relative } from 'node:path';
import { DEFAULT_PACKAGE_NAME, SCHEMA_FILE_EXTENSION } from './config.js';
import { GenerationError, SchemaIoError } from './errors.js';
import type { GenerationFailure } from './errors.js';
import { createDefaultRegistry } from './generator/index.js';
import { GeneratorContext } from './generator/context.js';
import { hookName } from './generator/hooks.js';
import type { GeneratorRegistry } from './generator/hooks.js';
import { LANGUAGE_PROFILES } from './generator/profiles.js';
import { fetchSchema, isValidURL, listFiles, prepareOutputDir } from './io.js';
import { getLogger } from './logger.js';
import { toSnakeCase } from './naming.js';
import type { TargetLanguage } from './types.js';
import { assertLanguage } from './xsd/builtin.js';
import { parseXsd, parseXsdFile } from './xsd/parser.js';
import type { SchemaDocument } from './xsd/types.js';

const logger = getLogger('codegen');

/**
 * Options for `generateSource` and `generateFiles`.
 */
export interface CodegenOptions {
  /**
   * Target language: `Go`, `TypeScript`, `C`, `Java` or `Rust`.
   * Anything else throws `UnsupportedLanguageError`.
   */
  lang: string;
  /**
   * Package name written into Go and Java output.
   * @default 'schema'
   */
  packageName?: string;
  /**
   * When `true`, nodes whose hook reports a failure are skipped and the failures
   * are returned with the result. When `false`, the first failure throws
   * `GenerationError`.
   * @default false
   */
  continueOnError?: boolean;
  /**
   * Hooks to dispatch to. Defaults to the bundled Go, TypeScript and Rust renderers.
   */
  registry?: GeneratorRegistry;
}

export interface FileCodegenOptions extends CodegenOptions {
  /**
   * Directory the generated files are written to, created if missing. When
   * omitted nothing is written and the sources are only returned.
   */
  outputDir?: string;
}

export interface GenerationResult {
  lang: TargetLanguage;
  source: string;
  failures: GenerationFailure[];
}

export interface GeneratedFile extends GenerationResult {
  /** Schema file path or URL the source was generated from. */
  input: string;
  /** Path of the written file, or of the file that would be written. */
  path: string;
}

/**
 * Generates one source file for a parsed schema.
 *
 * Every node is dispatched to the hook named `<lang><kind>` (e.g. `GoComplexType`);
 * kinds without a hook are skipped.
 *
 * @throws `UnsupportedLanguageError` if `options.lang` is not supported.
 * @throws `GenerationError` on the first hook failure unless `continueOnError` is set.
 */
export function generateSource(document: SchemaDocument, options: CodegenOptions): GenerationResult {
  const { packageName = DEFAULT_PACKAGE_NAME, continueOnError = false, registry = createDefaultRegistry() } = options;
  const lang = assertLanguage(options.lang);
  const context = new GeneratorContext(document, lang);
  const failures: GenerationFailure[] = [];

  if (!registry.names().some((name) => name.startsWith(lang))) {
    logger.warn(`No hooks registered for ${lang}; only the file header is generated`);
  }

  for (const node of document.nodes) {
    const hook = hookName(lang, node.kind);
    const error = registry.dispatch(hook, context, node);
    if (!error) continue;
    failures.push({ hook, node: node.name, error });
    logger.error(`${hook} failed for "${node.name}": ${error.message}`);
    if (!continueOnError) {
      throw new GenerationError(failures);
    }
  }

  return { lang, source: context.render(packageName), failures };
}

/** Output file name: the schema's base name in snake_case plus the language extension. */
export function outputFileName(input: string, lang: TargetLanguage): string {
  const name = basename(input, extname(input)) || 'schema';
  return `${toSnakeCase(name)}${LANGUAGE_PROFILES[lang].extension}`;
}

interface LoadedSchema {
  input: string;
  /** Directory of the schema relative to the input directory; `''` for a single file or URL. */
  subdir: string;
  document: SchemaDocument;
}

async function loadSchemas(input: string): Promise<LoadedSchema[]> {
  if (isValidURL(input)) {
    const body = await fetchSchema(input);
    return [{ input, subdir: '', document: parseXsd(body.toString('utf-8'), input) }];
  }
  const files = (await listFiles(input)).filter((f) => extname(f).toLowerCase() === SCHEMA_FILE_EXTENSION);
  const schemas: LoadedSchema[] = [];
  for (const file of files) {
    const subdir = file === input ? '' : relative(input, dirname(file));
    schemas.push({ input: file, subdir, document: await parseXsdFile(file) });
  }
  return schemas;
}

/**
 * Generates sources for a schema file, a directory of schema files, or a schema URL.
 * Files found below a directory keep their subdirectory under `outputDir`.
 *
 * @throws `XsdParseError` if a schema cannot be read or parsed.
 * @throws `SchemaIoError` on fetch or filesystem failures, or when two schemas
 * map to the same output file.
 *
 * @example
 * ```typescript
 * import { generateFiles } from 'xsd-typegen';
 *
 * const files = await generateFiles('./schemas', { lang: 'Go', outputDir: './model' });
 * ```
 */
export async function generateFiles(input: string, options: FileCodegenOptions): Promise<GeneratedFile[]> {
  const lang = assertLanguage(options.lang);
  const { outputDir } = options;
  const schemas = await loadSchemas(input);

  const planned = new Map<string, LoadedSchema>();
  for (const schema of schemas) {
    const path = join(outputDir ?? '', schema.subdir, outputFileName(schema.input, lang));
    const other = planned.get(path);
    if (other !== undefined) {
      throw new SchemaIoError(path, `Schemas ${other.input} and ${schema.input} map to the same output file`);
    }
    planned.set(path, schema);
  }

  const generated: GeneratedFile[] = [];
  for (const [path, schema] of planned) {
    const result = generateSource(schema.document, options);
    if (outputDir !== undefined) {
      await prepareOutputDir(dirname(path));
      try {
        await writeFile(path, result.source, 'utf-8');
      } catch (err) {
        throw new SchemaIoError(path, 'Cannot write generated source', err);
      }
      logger.info(`Generated ${path}`, { input: schema.input, lang });
    }
    generated.push({ ...result, input: schema.input, path });
  }
  return generated;
}
