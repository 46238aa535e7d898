import type { TargetLanguage } from '../types.js';
import type { SchemaNode, SchemaNodeKind, SchemaNodeOfKind } from '../xsd/types.js';
import type { GeneratorContext } from './context.js';
import { HookRegistry } from './dispatcher.js';
import type { Hook, HookResult } from './dispatcher.js';

export type GeneratorHook = Hook<[GeneratorContext, SchemaNode]>;

export type GeneratorRegistry = HookRegistry<[GeneratorContext, SchemaNode]>;

/**
 * The renderers of one target language, one per node kind. Every entry is
 * optional; kinds without a renderer produce no output.
 */
export type LanguageHooks = {
  [K in SchemaNodeKind]?: (context: GeneratorContext, node: SchemaNodeOfKind<K>) => HookResult;
};

/** Conventional hook name, e.g. `GoSimpleType` or `TypeScriptComplexType`. */
export function hookName(lang: TargetLanguage, kind: SchemaNodeKind): string {
  return `${lang}${kind}`;
}

function isKind<K extends SchemaNodeKind>(node: SchemaNode, kind: K): node is SchemaNodeOfKind<K> {
  return node.kind === kind;
}

function bind<K extends SchemaNodeKind>(
  kind: K,
  render: (context: GeneratorContext, node: SchemaNodeOfKind<K>) => HookResult,
): GeneratorHook {
  return (context, node) => (isKind(node, kind) ? render(context, node) : undefined);
}

export function createRegistry(): GeneratorRegistry {
  return new HookRegistry<[GeneratorContext, SchemaNode]>();
}

/**
 * Registers a language's renderers under their conventional hook names.
 */
export function registerLanguageHooks(
  registry: GeneratorRegistry,
  lang: TargetLanguage,
  hooks: LanguageHooks,
): GeneratorRegistry {
  const { SimpleType, ComplexType, Element, Attribute, Group, AttributeGroup } = hooks;
  if (SimpleType) registry.register(hookName(lang, 'SimpleType'), bind('SimpleType', SimpleType));
  if (ComplexType) registry.register(hookName(lang, 'ComplexType'), bind('ComplexType', ComplexType));
  if (Element) registry.register(hookName(lang, 'Element'), bind('Element', Element));
  if (Attribute) registry.register(hookName(lang, 'Attribute'), bind('Attribute', Attribute));
  if (Group) registry.register(hookName(lang, 'Group'), bind('Group', Group));
  if (AttributeGroup) registry.register(hookName(lang, 'AttributeGroup'), bind('AttributeGroup', AttributeGroup));
  return registry;
}
