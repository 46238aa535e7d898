export { generateFiles, generateSource, outputFileName } from './codegen.js';
export type { CodegenOptions, FileCodegenOptions, GeneratedFile, GenerationResult } from './codegen.js';

export {
  GenerationError,
  SchemaIoError,
  UnsupportedLanguageError,
  XsdParseError,
} from './errors.js';
export type { GenerationFailure } from './errors.js';

export {
  createDefaultRegistry,
  createRegistry,
  GeneratorContext,
  goHooks,
  hookName,
  HookRegistry,
  registerLanguageHooks,
  rustHooks,
  typescriptHooks,
} from './generator/index.js';
export type { GeneratorRegistry, Hook, HookResult, LanguageHooks } from './generator/index.js';

export { fetchSchema, isValidURL, listFiles, prepareOutputDir } from './io.js';
export { FieldNameCounter, makeFirstUpperCase, toIdentifier, toSnakeCase, toTitle } from './naming.js';
export { SUPPORTED_LANGUAGES, isSupportedLanguage } from './types.js';
export type { KeyValuePair, TargetLanguage } from './types.js';
export { compareCodePoints, getNSPrefix, toSortedPairs, trimNSPrefix } from './utils.js';

export { assertLanguage, BUILT_IN_TYPES, getBuiltInType } from './xsd/builtin.js';
export type { BuiltInLookup } from './xsd/builtin.js';
export { parseXsd, parseXsdFile } from './xsd/parser.js';
export {
  lookupBuiltInType,
  resolveBaseOfSimpleType,
  resolveSimpleTypeNode,
  resolveType,
} from './xsd/resolver.js';
export type { ResolvedType } from './xsd/resolver.js';
export type * from './xsd/types.js';
export { hasConstraints } from './xsd/types.js';
