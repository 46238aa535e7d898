import { FieldNameCounter, toIdentifier } from '../naming.js';
import type { TargetLanguage } from '../types.js';
import { trimNSPrefix } from '../utils.js';
import { resolveType } from '../xsd/resolver.js';
import type { ResolvedType } from '../xsd/resolver.js';
import type { SchemaDocument, SchemaNode } from '../xsd/types.js';
import { LANGUAGE_PROFILES } from './profiles.js';

// Declaration kinds share identifier namespaces the way XSD symbol spaces do.
function declarationKey(node: SchemaNode): string {
  switch (node.kind) {
    case 'SimpleType':
    case 'ComplexType':
      return `type:${node.name}`;
    case 'Group':
      return `group:${node.name}`;
    case 'AttributeGroup':
      return `attributeGroup:${node.name}`;
    case 'Element':
      return `element:${node.name}`;
    case 'Attribute':
      return `attribute:${node.name}`;
  }
}

// Types claim identifiers first, then groups, then element and attribute aliases.
const CLAIM_ORDER: ReadonlyArray<ReadonlyArray<SchemaNode['kind']>> = [
  ['SimpleType', 'ComplexType'],
  ['Group', 'AttributeGroup'],
  ['Element', 'Attribute'],
];

/**
 * State of one generation run for one target language: the schema being rendered,
 * the identifiers handed out so far, and the fragments of output.
 *
 * A context is owned by a single run and must not be shared between runs.
 */
export class GeneratorContext {
  readonly lang: TargetLanguage;
  readonly nodes: readonly SchemaNode[];
  /** Identifier counter of this run. */
  readonly names = new FieldNameCounter();

  private readonly identifiers = new Map<string, string>();
  private readonly rendered = new Set<string>();
  private readonly imports = new Set<string>();
  private readonly fragments: string[] = [];

  constructor(document: SchemaDocument, lang: TargetLanguage) {
    this.lang = lang;
    this.nodes = document.nodes;

    for (const kinds of CLAIM_ORDER) {
      for (const node of document.nodes) {
        if (!kinds.includes(node.kind) || this.isSelfTyped(node)) continue;
        const key = declarationKey(node);
        if (!this.identifiers.has(key)) {
          this.identifiers.set(key, this.names.next(toIdentifier(node.name)));
        }
      }
    }
  }

  /**
   * An element or attribute whose type is the anonymous declaration named after
   * it needs no alias of its own.
   */
  isSelfTyped(node: SchemaNode): boolean {
    return (node.kind === 'Element' || node.kind === 'Attribute') && trimNSPrefix(node.type) === node.name;
  }

  /**
   * Claims the declaration for rendering. Returns its identifier the first time,
   * `undefined` if it was already rendered or needs no declaration.
   */
  declare(node: SchemaNode): string | undefined {
    const key = declarationKey(node);
    const identifier = this.identifiers.get(key);
    if (identifier === undefined || this.rendered.has(key)) return undefined;
    this.rendered.add(key);
    return identifier;
  }

  /** Identifier of the type declaration named `name`. */
  typeIdentifier(name: string): string {
    return this.identifiers.get(`type:${trimNSPrefix(name)}`) ?? toIdentifier(name);
  }

  groupIdentifier(name: string): string {
    return this.identifiers.get(`group:${trimNSPrefix(name)}`) ?? toIdentifier(name);
  }

  attributeGroupIdentifier(name: string): string {
    return this.identifiers.get(`attributeGroup:${trimNSPrefix(name)}`) ?? toIdentifier(name);
  }

  resolve(name: string): ResolvedType {
    return resolveType(name, this.nodes, this.lang);
  }

  /**
   * Spells a type reference in the target language: the built-in spelling for
   * primitives, the declaration's identifier for everything else.
   */
  spell(name: string): string {
    const resolved = this.resolve(name);
    return resolved.kind === 'primitive' ? resolved.spelling : this.typeIdentifier(resolved.name);
  }

  addImport(path: string): void {
    this.imports.add(path);
  }

  emit(fragment: string): void {
    this.fragments.push(fragment);
  }

  /** Assembles the generated file: header, then the fragments in emission order. */
  render(packageName: string): string {
    const header = LANGUAGE_PROFILES[this.lang].header(packageName, [...this.imports].sort());
    return [header, ...this.fragments].join('\n\n') + '\n';
  }
}
