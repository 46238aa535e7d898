import { FieldNameCounter, toIdentifier } from '../naming.js';
import { toSortedPairs, trimNSPrefix } from '../utils.js';
import type { AttributeNode, ElementNode, SimpleTypeNode } from '../xsd/types.js';
import { formatComment } from './comment.js';
import type { GeneratorContext } from './context.js';
import type { LanguageHooks } from './hooks.js';

// Built-in spellings that live in a standard package.
const PACKAGE_QUALIFIERS: ReadonlyArray<[RegExp, string]> = [
  [/\bxml\./, 'encoding/xml'],
  [/\btime\./, 'time'],
];

function goType(context: GeneratorContext, name: string): string {
  const type = context.spell(name);
  for (const [qualifier, path] of PACKAGE_QUALIFIERS) {
    if (qualifier.test(type)) context.addImport(path);
  }
  return type;
}

function attributeField(context: GeneratorContext, fields: FieldNameCounter, node: AttributeNode): string {
  const local = trimNSPrefix(node.name);
  const type = goType(context, node.type);
  const tag = node.optional ? `${local},attr,omitempty` : `${local},attr`;
  const fixed = node.fixed === undefined ? '' : ` // fixed: ${JSON.stringify(node.fixed)}`;
  return `\t${fields.next(toIdentifier(local))} ${node.optional ? `*${type}` : type} \`xml:"${tag}"\`${fixed}`;
}

function elementField(context: GeneratorContext, fields: FieldNameCounter, node: ElementNode): string {
  const local = trimNSPrefix(node.name);
  const type = goType(context, node.type);
  let fieldType = type;
  if (node.plural) fieldType = `[]${type}`;
  else if (node.optional) fieldType = `*${type}`;
  const tag = node.optional ? `${local},omitempty` : local;
  return `\t${fields.next(toIdentifier(local))} ${fieldType} \`xml:"${tag}"\``;
}

function enumConstants(id: string, node: SimpleTypeNode): string {
  const names = new FieldNameCounter();
  const lines = node.restriction.enum.map((value) => `\t${names.next(`${id}${toIdentifier(value)}`)} ${id} = ${JSON.stringify(value)}`);
  return ['const (', ...lines, ')'].join('\n');
}

function simpleTypeSpelling(context: GeneratorContext, node: SimpleTypeNode): string {
  if (node.list) {
    return `[]${goType(context, node.base)}`;
  }
  if (node.union) {
    // Go has no union types; members that agree on one spelling keep it.
    const members: Record<string, string> = {};
    for (const [key, type] of Object.entries(node.memberTypes)) members[key] = goType(context, type);
    const spellings = [...new Set(toSortedPairs(members).map((p) => p.value))];
    return spellings.length === 1 ? spellings[0] : 'string';
  }
  return goType(context, node.base);
}

/**
 * Renders schema declarations as Go named types and structs with encoding/xml tags.
 */
export const goHooks: LanguageHooks = {
  SimpleType(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    const declaration = [formatComment(id, node.doc, '//'), `type ${id} ${simpleTypeSpelling(context, node)}`].join('\n');
    const isEnum = !node.list && !node.union && node.restriction.enum.length > 0;
    context.emit(isEnum ? `${declaration}\n\n${enumConstants(id, node)}` : declaration);
  },

  ComplexType(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    const fields = new FieldNameCounter();
    const lines = [formatComment(id, node.doc, '//'), `type ${id} struct {`];
    if (node.base && context.resolve(node.base).kind !== 'primitive') lines.push(`\t${context.spell(node.base)}`);
    lines.push(...node.groups.map((g) => `\t${context.groupIdentifier(g)}`));
    lines.push(...node.attributeGroups.map((g) => `\t${context.attributeGroupIdentifier(g)}`));
    if (node.valueType) lines.push(`\t${fields.next('Value')} ${goType(context, node.valueType)} \`xml:",chardata"\``);
    else if (node.mixed) lines.push(`\t${fields.next('Value')} ${goType(context, 'xs:string')} \`xml:",chardata"\``);
    lines.push(...node.attributes.map((a) => attributeField(context, fields, a)));
    lines.push(...node.elements.map((e) => elementField(context, fields, e)));
    lines.push('}');
    context.emit(lines.join('\n'));
  },

  Element(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    context.emit([formatComment(id, node.doc, '//'), `type ${id} ${goType(context, node.type)}`].join('\n'));
  },

  Attribute(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    context.emit([formatComment(id, node.doc, '//'), `type ${id} ${goType(context, node.type)}`].join('\n'));
  },

  Group(context, node) {
    const id = context.declare(node);
    if (id === undefined) return;
    const fields = new FieldNameCounter();
    const lines = [
      formatComment(id, node.doc, '//'),
      `type ${id} struct {`,
      ...node.groups.map((g) => `\t${context.groupIdentifier(g)}`),
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
      `type ${id} struct {`,
      ...node.attributeGroups.map((g) => `\t${context.attributeGroupIdentifier(g)}`),
      ...node.attributes.map((a) => attributeField(context, fields, a)),
      '}',
    ];
    context.emit(lines.join('\n'));
  },
};
