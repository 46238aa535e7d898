import { FieldNameCounter, toIdentifier, toSnakeCase } from '../naming.js';
import { toSortedPairs, trimNSPrefix } from '../utils.js';
import type { AttributeNode, ElementNode, SimpleTypeNode } from '../xsd/types.js';
import { formatComment } from './comment.js';
import type { GeneratorContext } from './context.js';
import type { LanguageHooks } from './hooks.js';

const DERIVE = '#[derive(Debug, Clone, PartialEq, Serialize, Deserialize)]';

const RUST_KEYWORDS = new Set([
  'abstract', 'as', 'async', 'await', 'become', 'box', 'break', 'const', 'continue', 'crate', 'do', 'dyn',
  'else', 'enum', 'extern', 'false', 'final', 'fn', 'for', 'if', 'impl', 'in', 'let', 'loop', 'macro',
  'match', 'mod', 'move', 'mut', 'override', 'priv', 'pub', 'ref', 'return', 'self', 'static', 'struct',
  'super', 'trait', 'true', 'try', 'type', 'typeof', 'unsafe', 'unsized', 'use', 'virtual', 'where',
  'while', 'yield',
]);

/** snake_case field name; keywords get a trailing underscore (`type` → `type_`). */
function fieldName(name: string): string {
  let snake = toSnakeCase(trimNSPrefix(name)).replace(/[^\p{L}\p{N}_]+/gu, '_');
  if (snake === '' || /^\p{N}/u.test(snake)) snake = `_${snake}`;
  return RUST_KEYWORDS.has(snake) ? `${snake}_` : snake;
}

function attributeField(context: GeneratorContext, fields: FieldNameCounter, node: AttributeNode): string[] {
  const type = context.spell(node.type);
  const fixed = node.fixed === undefined ? '' : ` // fixed: ${JSON.stringify(node.fixed)}`;
  return [
    `    #[serde(rename = ${JSON.stringify(`@${trimNSPrefix(node.name)}`)})]`,
    `    pub ${fields.next(fieldName(node.name))}: ${node.optional ? `Option<${type}>` : type},${fixed}`,
  ];
}

function elementField(context: GeneratorContext, fields: FieldNameCounter, node: ElementNode): string[] {
  const type = context.spell(node.type);
  let fieldType = type;
  if (node.plural) fieldType = `Vec<${type}>`;
  else if (node.optional) fieldType = `Option<${type}>`;
  return [
    `    #[serde(rename = ${JSON.stringify(trimNSPrefix(node.name))})]`,
    `    pub ${fields.next(fieldName(node.name))}: ${fieldType},`,
  ];
}

function flattenedField(fields: FieldNameCounter, name: string, type: string): string[] {
  return ['    #[serde(flatten)]', `    pub ${fields.next(fieldName(name))}: ${type},`];
}

function enumDeclaration(id: string, node: SimpleTypeNode): string {
  const variants = new FieldNameCounter();
  const lines = node.restriction.enum.flatMap((value) => [
    `    #[serde(rename = ${JSON.stringify(value)})]`,
    `    ${variants.next(value === '' ? 'Empty' : toIdentifier(value))},`,
  ]);
  return [DERIVE, `pub enum ${id} {`, ...lines, '}'].join('\n');
}

function simpleTypeSpelling(context: GeneratorContext, node: SimpleTypeNode): string {
  if (node.list) {
    return `Vec<${context.spell(node.base)}>`;
  }
  if (node.union) {
    const members: Record<string, string> = {};
    for (const [key, type] of Object.entries(node.memberTypes)) members[key] = context.spell(type);
    const spellings = [...new Set(toSortedPairs(members).map((p) => p.value))];
    return spellings.length === 1 ? spellings[0] : 'String';
  }
  return context.spell(node.base);
}

/**
 * Renders schema declarations as Rust type aliases, enums and serde structs.
 */
export const rustHooks: LanguageHooks = {
  SimpleType(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    const comment = formatComment(id, node.doc, '//');
    if (!node.list && !node.union && node.restriction.enum.length > 0) {
      context.emit(`${comment}\n${enumDeclaration(id, node)}`);
      return;
    }
    context.emit(`${comment}\npub type ${id} = ${simpleTypeSpelling(context, node)};`);
  },

  ComplexType(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    const fields = new FieldNameCounter();
    const lines = [formatComment(id, node.doc, '//'), DERIVE, `pub struct ${id} {`];
    if (node.base && context.resolve(node.base).kind !== 'primitive') {
      lines.push(...flattenedField(fields, 'base', context.spell(node.base)));
    }
    for (const g of node.groups) lines.push(...flattenedField(fields, g, context.groupIdentifier(g)));
    for (const g of node.attributeGroups) lines.push(...flattenedField(fields, g, context.attributeGroupIdentifier(g)));
    if (node.valueType) {
      lines.push('    #[serde(rename = "$value")]', `    pub ${fields.next('value')}: ${context.spell(node.valueType)},`);
    } else if (node.mixed) {
      lines.push('    #[serde(rename = "$value")]', `    pub ${fields.next('value')}: Option<${context.spell('xs:string')}>,`);
    }
    for (const a of node.attributes) lines.push(...attributeField(context, fields, a));
    for (const e of node.elements) lines.push(...elementField(context, fields, e));
    lines.push('}');
    context.emit(lines.join('\n'));
  },

  Element(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    context.emit(`${formatComment(id, node.doc, '//')}\npub type ${id} = ${context.spell(node.type)};`);
  },

  Attribute(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    context.emit(`${formatComment(id, node.doc, '//')}\npub type ${id} = ${context.spell(node.type)};`);
  },

  Group(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    const fields = new FieldNameCounter();
    const lines = [formatComment(id, node.doc, '//'), DERIVE, `pub struct ${id} {`];
    for (const g of node.groups) lines.push(...flattenedField(fields, g, context.groupIdentifier(g)));
    for (const e of node.elements) lines.push(...elementField(context, fields, e));
    lines.push('}');
    context.emit(lines.join('\n'));
  },

  AttributeGroup(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    const fields = new FieldNameCounter();
    const lines = [formatComment(id, node.doc, '//'), DERIVE, `pub struct ${id} {`];
    for (const g of node.attributeGroups) lines.push(...flattenedField(fields, g, context.attributeGroupIdentifier(g)));
    for (const a of node.attributes) lines.push(...attributeField(context, fields, a));
    lines.push('}');
    context.emit(lines.join('\n'));
  },
};
