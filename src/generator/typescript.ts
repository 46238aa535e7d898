import { FieldNameCounter } from '../naming.js';
import { toSortedPairs, trimNSPrefix } from '../utils.js';
import type { AttributeNode, ElementNode, SimpleTypeNode } from '../xsd/types.js';
import { formatComment } from './comment.js';
import type { GeneratorContext } from './context.js';
import type { LanguageHooks } from './hooks.js';

function literal(value: string): string {
  return `'${value.replaceAll('\\', '\\\\').replaceAll("'", "\\'")}'`;
}

function propertyKey(name: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(name) ? name : literal(name);
}

function simpleTypeExpression(context: GeneratorContext, node: SimpleTypeNode): string {
  if (node.list) {
    return `Array<${context.spell(node.base)}>`;
  }
  if (node.union) {
    const members: Record<string, string> = {};
    for (const [key, type] of Object.entries(node.memberTypes)) members[key] = context.spell(type);
    const spellings = [...new Set(toSortedPairs(members).map((p) => p.value))];
    return spellings.length > 0 ? spellings.join(' | ') : 'string';
  }
  if (node.restriction.enum.length > 0) {
    return [...new Set(node.restriction.enum)].map(literal).join(' | ');
  }
  return context.spell(node.base);
}

function attributeField(context: GeneratorContext, fields: FieldNameCounter, node: AttributeNode): string {
  const key = propertyKey(fields.next(trimNSPrefix(node.name)));
  const type = context.spell(node.type);
  // A fixed string attribute narrows to its one value.
  const spelled = node.fixed !== undefined && type === 'string' ? literal(node.fixed) : type;
  return `  ${key}${node.optional ? '?' : ''}: ${spelled};`;
}

function elementField(context: GeneratorContext, fields: FieldNameCounter, node: ElementNode): string {
  const key = propertyKey(fields.next(trimNSPrefix(node.name)));
  const type = context.spell(node.type);
  return `  ${key}${node.optional ? '?' : ''}: ${node.plural ? `Array<${type}>` : type};`;
}

function interfaceHead(id: string, heritage: string[]): string {
  return heritage.length > 0 ? `export interface ${id} extends ${heritage.join(', ')} {` : `export interface ${id} {`;
}

/**
 * Renders schema declarations as TypeScript type aliases and interfaces.
 */
export const typescriptHooks: LanguageHooks = {
  SimpleType(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    context.emit([formatComment(id, node.doc, '//'), `export type ${id} = ${simpleTypeExpression(context, node)};`].join('\n'));
  },

  ComplexType(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    const heritage: string[] = [];
    // An interface can only extend another declaration, never a primitive.
    if (node.base && context.resolve(node.base).kind !== 'primitive') heritage.push(context.spell(node.base));
    heritage.push(...node.groups.map((g) => context.groupIdentifier(g)));
    heritage.push(...node.attributeGroups.map((g) => context.attributeGroupIdentifier(g)));

    const fields = new FieldNameCounter();
    const lines = [formatComment(id, node.doc, '//'), interfaceHead(id, heritage)];
    if (node.valueType) lines.push(`  ${fields.next('value')}: ${context.spell(node.valueType)};`);
    else if (node.mixed) lines.push(`  ${fields.next('value')}?: ${context.spell('xs:string')};`);
    lines.push(...node.attributes.map((a) => attributeField(context, fields, a)));
    lines.push(...node.elements.map((e) => elementField(context, fields, e)));
    lines.push('}');
    context.emit(lines.join('\n'));
  },

  Element(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    context.emit([formatComment(id, node.doc, '//'), `export type ${id} = ${context.spell(node.type)};`].join('\n'));
  },

  Attribute(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    context.emit([formatComment(id, node.doc, '//'), `export type ${id} = ${context.spell(node.type)};`].join('\n'));
  },

  Group(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    const fields = new FieldNameCounter();
    const lines = [
      formatComment(id, node.doc, '//'),
      interfaceHead(id, node.groups.map((g) => context.groupIdentifier(g))),
      ...node.elements.map((e) => elementField(context, fields, e)),
      '}',
    ];
    context.emit(lines.join('\n'));
  },

  AttributeGroup(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    const fields = new FieldNameCounter();
    const lines = [
      formatComment(id, node.doc, '//'),
      interfaceHead(id, node.attributeGroups.map((g) => context.attributeGroupIdentifier(g))),
      ...node.attributes.map((a) => attributeField(context, fields, a)),
      '}',
    ];
    context.emit(lines.join('\n'));
  },
};
