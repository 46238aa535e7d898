import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { XMLParser } from 'fast-xml-parser';
import { XsdParseError } from '../errors.js';
import { getLogger } from '../logger.js';
import { getNSPrefix, trimNSPrefix } from '../utils.js';
import type {
  AttributeGroupNode,
  AttributeNode,
  ComplexTypeNode,
  ElementNode,
  GroupNode,
  Restriction,
  SchemaDocument,
  SchemaNode,
  SimpleTypeNode,
} from './types.js';

const logger = getLogger('parser');

// ---------------------------------------------------------------------------
// Internal raw types (fast-xml-parser output)
// ---------------------------------------------------------------------------

type RawNode = Record<string, unknown>;

// Local names that must always be parsed as arrays, whatever prefix the schema
// binds to the XMLSchema namespace.
const ALWAYS_ARRAY = new Set([
  'element',
  'attribute',
  'complexType',
  'simpleType',
  'sequence',
  'all',
  'choice',
  'include',
  'import',
  'group',
  'attributeGroup',
  'enumeration',
]);

// ---------------------------------------------------------------------------
// Namespace-prefix normalisation
// ---------------------------------------------------------------------------

/**
 * XSD element names that are remapped to their xs:-prefixed form when the schema
 * uses another prefix (xsd:) or declares XMLSchema as the default namespace.
 */
const XSD_LOCAL_NAMES = new Set([
  ...ALWAYS_ARRAY,
  'schema',
  'complexContent',
  'simpleContent',
  'extension',
  'restriction',
  'any',
  'annotation',
  'documentation',
  'union',
  'list',
  'pattern',
  'length',
  'minLength',
  'maxLength',
]);

function normalizeXsPrefix(node: unknown, prefix: string): unknown {
  if (Array.isArray(node)) {
    return node.map((child) => normalizeXsPrefix(child, prefix));
  }
  if (isObject(node)) {
    const result: RawNode = {};
    for (const [key, value] of Object.entries(node)) {
      const local = trimNSPrefix(key);
      const remap = !key.startsWith('@_') && getNSPrefix(key) === prefix && XSD_LOCAL_NAMES.has(local);
      result[remap ? `xs:${local}` : key] = normalizeXsPrefix(value, prefix);
    }
    return result;
  }
  return node;
}

/**
 * Normalises the XML encoding declaration to UTF-8.
 *
 * The content has already been decoded into a JS string, so a declared
 * ISO-8859-1 (or similar) encoding no longer describes it and makes
 * `fast-xml-parser` reject the document.
 */
function normalizeXmlEncodingDeclaration(content: string): string {
  return content.replace(/(<\?xml\b[^?]*?)\s+encoding=["'][^"']*["']/i, '$1 encoding="UTF-8"');
}

/**
 * Second pass over the same markup with `preserveOrder`: the grouped output of
 * `makeParser` loses the interleaving of different tags.
 */
function makeOrderedParser(): XMLParser {
  return new XMLParser({ preserveOrder: true, ignoreAttributes: true, parseTagValue: false });
}

function makeParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    isArray: (name, _jpath, _isLeafNode, isAttribute) => !isAttribute && ALWAYS_ARRAY.has(trimNSPrefix(name)),
    allowBooleanAttributes: true,
  });
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isObject(value: unknown): value is RawNode {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * fast-xml-parser yields `""` for empty tags such as `<xs:sequence/>`, so every
 * child is coerced before it is inspected.
 */
function asObject(value: unknown): RawNode {
  return isObject(value) ? value : {};
}

function children(node: RawNode, tag: string): RawNode[] {
  const value = node[`xs:${tag}`];
  if (value === undefined) return [];
  return (Array.isArray(value) ? value : [value]).map(asObject);
}

function child(node: RawNode, tag: string): RawNode | undefined {
  return node[`xs:${tag}`] === undefined ? undefined : children(node, tag)[0];
}

function attr(node: RawNode, name: string, fallback = ''): string {
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : fallback;
}

function optionalAttr(node: RawNode, name: string): string | undefined {
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

function parseCount(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) ? undefined : n;
}

function parseDoc(raw: RawNode): string | undefined {
  const annotation = child(raw, 'annotation');
  if (!annotation) return undefined;
  const documentation = annotation['xs:documentation'];
  const first: unknown = Array.isArray(documentation) ? documentation[0] : documentation;
  const text = isObject(first) ? first['#text'] : first;
  return typeof text === 'string' ? text.trim() || undefined : undefined;
}

/** Name of an anonymous type nested under `owner`, e.g. `Order-item`. */
function anonymousName(owner: string, name: string): string {
  return owner ? `${owner}-${name}` : name;
}

// ---------------------------------------------------------------------------
// Simple types
// ---------------------------------------------------------------------------

function parseRestriction(raw: RawNode): Restriction {
  const restriction: Restriction = {
    enum: children(raw, 'enumeration').map((e) => attr(e, 'value')),
  };
  const pattern = child(raw, 'pattern');
  if (pattern) restriction.pattern = attr(pattern, 'value');
  const length = child(raw, 'length');
  const minLength = child(raw, 'minLength') ?? length;
  const maxLength = child(raw, 'maxLength') ?? length;
  if (minLength) restriction.minLength = parseCount(optionalAttr(minLength, 'value'));
  if (maxLength) restriction.maxLength = parseCount(optionalAttr(maxLength, 'value'));
  return restriction;
}

/**
 * Parses an xs:simpleType. Anonymous member or item types are appended to `out`
 * ahead of the type itself.
 */
function parseSimpleType(raw: RawNode, name: string, out: SchemaNode[]): SimpleTypeNode {
  const node: SimpleTypeNode = {
    kind: 'SimpleType',
    name,
    doc: parseDoc(raw),
    base: 'xs:string',
    list: false,
    union: false,
    memberTypes: {},
    restriction: { enum: [] },
  };

  const restriction = child(raw, 'restriction');
  const list = child(raw, 'list');
  const union = child(raw, 'union');

  if (restriction) {
    const inlineBase = child(restriction, 'simpleType');
    if (inlineBase) {
      const baseNode = parseSimpleType(inlineBase, anonymousName(name, 'base'), out);
      out.push(baseNode);
      node.base = baseNode.name;
    } else {
      node.base = attr(restriction, 'base', 'xs:string');
    }
    node.restriction = parseRestriction(restriction);
  } else if (list) {
    node.list = true;
    const inlineItem = child(list, 'simpleType');
    if (inlineItem) {
      const itemNode = parseSimpleType(inlineItem, anonymousName(name, 'item'), out);
      out.push(itemNode);
      node.base = itemNode.name;
    } else {
      node.base = attr(list, 'itemType', 'xs:string');
    }
  } else if (union) {
    node.union = true;
    for (const member of attr(union, 'memberTypes').split(/\s+/).filter(Boolean)) {
      node.memberTypes[member] = member;
    }
    children(union, 'simpleType').forEach((inline, i) => {
      const memberNode = parseSimpleType(inline, anonymousName(name, `member${i + 1}`), out);
      out.push(memberNode);
      node.memberTypes[memberNode.name] = memberNode.name;
    });
  }

  return node;
}

// ---------------------------------------------------------------------------
// Attributes and elements
// ---------------------------------------------------------------------------

function parseAttribute(raw: RawNode, owner: string, out: SchemaNode[]): AttributeNode {
  const ref = optionalAttr(raw, 'ref');
  const name = ref ? trimNSPrefix(ref) : attr(raw, 'name');
  let type = attr(raw, 'type', ref ?? 'xs:string');

  const inlineType = child(raw, 'simpleType');
  if (inlineType) {
    const typeNode = parseSimpleType(inlineType, anonymousName(owner, name), out);
    out.push(typeNode);
    type = typeNode.name;
  }

  return {
    kind: 'Attribute',
    name,
    doc: parseDoc(raw),
    type,
    optional: attr(raw, 'use', 'optional') !== 'required',
    fixed: optionalAttr(raw, 'fixed'),
  };
}

function parseElement(raw: RawNode, owner: string, out: SchemaNode[]): ElementNode {
  const ref = optionalAttr(raw, 'ref');
  const name = ref ? trimNSPrefix(ref) : attr(raw, 'name');
  let type = attr(raw, 'type', ref ?? 'xs:string');

  const inlineComplex = child(raw, 'complexType');
  const inlineSimple = child(raw, 'simpleType');
  if (inlineComplex) {
    const typeNode = parseComplexType(inlineComplex, anonymousName(owner, name), out);
    out.push(typeNode);
    type = typeNode.name;
  } else if (inlineSimple) {
    const typeNode = parseSimpleType(inlineSimple, anonymousName(owner, name), out);
    out.push(typeNode);
    type = typeNode.name;
  }

  const maxOccurs = attr(raw, 'maxOccurs', '1');
  return {
    kind: 'Element',
    name,
    doc: parseDoc(raw),
    type,
    optional: attr(raw, 'minOccurs', '1') === '0',
    plural: maxOccurs === 'unbounded' || (parseCount(maxOccurs) ?? 1) > 1,
  };
}

// ---------------------------------------------------------------------------
// Complex types and groups
// ---------------------------------------------------------------------------

interface Particles {
  elements: ElementNode[];
  groups: string[];
}

/**
 * Collects the elements and group references of every compositor under `raw`,
 * descending into nested sequence/all/choice.
 */
function collectParticles(raw: RawNode, owner: string, out: SchemaNode[], particles: Particles): Particles {
  for (const compositor of ['sequence', 'all', 'choice']) {
    for (const body of children(raw, compositor)) {
      const isChoice = compositor === 'choice';
      for (const rawEl of children(body, 'element')) {
        const element = parseElement(rawEl, owner, out);
        particles.elements.push(isChoice ? { ...element, optional: true } : element);
      }
      for (const rawGroup of children(body, 'group')) {
        const ref = optionalAttr(rawGroup, 'ref');
        if (ref) particles.groups.push(ref);
      }
      collectParticles(body, owner, out, particles);
    }
  }
  return particles;
}

function collectAttributes(raw: RawNode, owner: string, out: SchemaNode[]): {
  attributes: AttributeNode[];
  attributeGroups: string[];
} {
  return {
    attributes: children(raw, 'attribute').map((a) => parseAttribute(a, owner, out)),
    attributeGroups: children(raw, 'attributeGroup')
      .map((g) => attr(g, 'ref'))
      .filter(Boolean),
  };
}

function parseComplexType(raw: RawNode, name: string, out: SchemaNode[]): ComplexTypeNode {
  const node: ComplexTypeNode = {
    kind: 'ComplexType',
    name,
    doc: parseDoc(raw),
    mixed: attr(raw, 'mixed') === 'true',
    attributes: [],
    elements: [],
    groups: [],
    attributeGroups: [],
  };

  // xs:complexContent and xs:simpleContent carry the model inside an extension
  // or restriction; otherwise it sits on the type itself.
  let body = raw;
  const complexContent = child(raw, 'complexContent');
  const simpleContent = child(raw, 'simpleContent');
  if (complexContent) {
    const derivation = child(complexContent, 'extension') ?? child(complexContent, 'restriction');
    if (derivation) {
      node.base = optionalAttr(derivation, 'base');
      body = derivation;
    }
  } else if (simpleContent) {
    const derivation = child(simpleContent, 'extension') ?? child(simpleContent, 'restriction');
    if (derivation) {
      node.valueType = attr(derivation, 'base', 'xs:string');
      body = derivation;
    }
  }

  const particles = collectParticles(body, name, out, { elements: [], groups: [] });
  node.elements = particles.elements;
  node.groups = particles.groups;
  const { attributes, attributeGroups } = collectAttributes(body, name, out);
  node.attributes = attributes;
  node.attributeGroups = attributeGroups;
  return node;
}

function parseGroup(raw: RawNode, name: string, out: SchemaNode[]): GroupNode {
  const particles = collectParticles(raw, name, out, { elements: [], groups: [] });
  return { kind: 'Group', name, doc: parseDoc(raw), ...particles };
}

function parseAttributeGroup(raw: RawNode, name: string, out: SchemaNode[]): AttributeGroupNode {
  return { kind: 'AttributeGroup', name, doc: parseDoc(raw), ...collectAttributes(raw, name, out) };
}

// ---------------------------------------------------------------------------
// Main parse functions
// ---------------------------------------------------------------------------

function findSchemaRoot(parsed: RawNode, source: string): { schema: RawNode; rootKey: string } {
  const rootKey = Object.keys(parsed).find((key) => trimNSPrefix(key) === 'schema');
  if (rootKey === undefined) {
    throw new XsdParseError(`Invalid XSD: root element <xs:schema> not found in ${source}`);
  }
  const prefix = getNSPrefix(rootKey);
  const normalized = prefix === 'xs' ? parsed : asObject(normalizeXsPrefix(parsed, prefix));
  return { schema: asObject(normalized['xs:schema']), rootKey };
}

/**
 * Local names of the schema's children in document order, e.g.
 * `['simpleType', 'element', 'simpleType']`. Children in another namespace are
 * left out.
 */
function topLevelOrder(ordered: unknown, rootKey: string): string[] {
  const entries = Array.isArray(ordered) ? ordered : [];
  const root = entries.find((entry) => isObject(entry) && rootKey in entry);
  const schemaChildren: unknown = isObject(root) ? root[rootKey] : undefined;
  if (!Array.isArray(schemaChildren)) return [];

  const prefix = getNSPrefix(rootKey);
  const order: string[] = [];
  for (const entry of schemaChildren) {
    if (!isObject(entry)) continue;
    const tag = Object.keys(entry).find((key) => key !== ':@' && key !== '#text');
    if (tag !== undefined && getNSPrefix(tag) === prefix) order.push(trimNSPrefix(tag));
  }
  return order;
}

/**
 * A declaration that another schema file contributes (xs:include / xs:import).
 */
interface SchemaReference {
  kind: 'include' | 'import';
  schemaLocation: string;
}

function parseSchemaContent(content: string, source: string): { document: SchemaDocument; references: SchemaReference[] } {
  let parsed: RawNode;
  let ordered: unknown;
  try {
    const xml = normalizeXmlEncodingDeclaration(content);
    parsed = asObject(makeParser().parse(xml));
    ordered = makeOrderedParser().parse(xml);
  } catch (err) {
    throw new XsdParseError(`Failed to parse XSD XML content from: ${source}`, err);
  }

  const { schema, rootKey } = findSchemaRoot(parsed, source);
  const nodes: SchemaNode[] = [];
  const references: SchemaReference[] = [];

  // The grouped output holds each tag's declarations in an array; walk the
  // document order and take the next entry of each array in turn.
  const cursors = new Map<string, number>();
  for (const local of topLevelOrder(ordered, rootKey)) {
    const index = cursors.get(local) ?? 0;
    cursors.set(local, index + 1);
    const raw: RawNode | undefined = children(schema, local)[index];
    if (raw === undefined) continue;

    const name = attr(raw, 'name');
    switch (local) {
      case 'simpleType':
        if (name) nodes.push(parseSimpleType(raw, name, nodes));
        break;
      case 'complexType':
        if (name) nodes.push(parseComplexType(raw, name, nodes));
        break;
      case 'element':
        nodes.push(parseElement(raw, '', nodes));
        break;
      case 'attribute':
        nodes.push(parseAttribute(raw, '', nodes));
        break;
      case 'group':
        if (name) nodes.push(parseGroup(raw, name, nodes));
        break;
      case 'attributeGroup':
        if (name) nodes.push(parseAttributeGroup(raw, name, nodes));
        break;
      case 'include':
      case 'import': {
        const schemaLocation = attr(raw, 'schemaLocation');
        if (schemaLocation) references.push({ kind: local === 'include' ? 'include' : 'import', schemaLocation });
        break;
      }
      default:
        break;
    }
  }

  logger.debug(`Parsed ${nodes.length} declaration(s) from ${source}`);
  return { document: { nodes }, references };
}

/**
 * Parses XSD markup into a schema document. xs:include and xs:import are not
 * followed; use `parseXsdFile` for that.
 *
 * @throws `XsdParseError` if the content is not XML or has no xs:schema root.
 */
export function parseXsd(content: string, source = '<inline>'): SchemaDocument {
  return parseSchemaContent(content, source).document;
}

/**
 * Internal recursive implementation. `visited` holds the absolute paths already
 * parsed so circular xs:include / xs:import chains terminate.
 */
async function parseXsdFileInternal(path: string, visited: Set<string>): Promise<SchemaDocument> {
  if (visited.has(path)) {
    return { nodes: [] };
  }
  visited.add(path);

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new XsdParseError(`Cannot read XSD file: ${path}`, err);
  }

  const { document, references } = parseSchemaContent(content, path);
  const baseDir = dirname(path);
  for (const reference of references) {
    if (/^[a-z][a-z0-9+.-]*:\/\//i.test(reference.schemaLocation)) {
      logger.warn(`Skipping remote xs:${reference.kind} ${reference.schemaLocation}`, { source: path });
      continue;
    }
    try {
      const referenced = await parseXsdFileInternal(resolve(baseDir, reference.schemaLocation), visited);
      document.nodes.push(...referenced.nodes);
    } catch (err) {
      if (!(err instanceof XsdParseError)) throw err;
      logger.warn(`Skipping unreadable xs:${reference.kind}: ${err.message}`, { source: path });
    }
  }
  return document;
}

/**
 * Reads an XSD file from disk and parses it, following xs:include and xs:import
 * with a local schemaLocation. Declarations from referenced files come after the
 * file's own.
 *
 * @param xsdPath - Absolute or relative path to the .xsd file.
 * @param baseDir - Optional base directory for resolving relative paths.
 */
export async function parseXsdFile(xsdPath: string, baseDir?: string): Promise<SchemaDocument> {
  const resolvedPath = baseDir ? resolve(baseDir, xsdPath) : resolve(xsdPath);
  return parseXsdFileInternal(resolvedPath, new Set<string>());
}
