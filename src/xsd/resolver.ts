import { getLogger } from '../logger.js';
import { trimNSPrefix } from '../utils.js';
import { getBuiltInType } from './builtin.js';
import { hasConstraints } from './types.js';
import type { Restriction, SchemaNode, SimpleTypeNode } from './types.js';

const logger = getLogger('resolver');

/**
 * Outcome of resolving a type name for one target language.
 */
export type ResolvedType =
  /** An XSD built-in, or an unconstrained alias of one. */
  | { kind: 'primitive'; name: string; spelling: string }
  /** A simple type whose facets matter; it keeps its own declaration. */
  | { kind: 'restricted'; name: string; base: string; restriction: Restriction }
  | { kind: 'list'; name: string; itemType: string }
  | { kind: 'union'; name: string; memberTypes: string[] }
  /** A structural declaration (complex type) or an alias of another user type. */
  | { kind: 'reference'; name: string }
  /** Nothing matched; the name is echoed back verbatim. */
  | { kind: 'unresolved'; name: string };

/**
 * Flattens one level of aliasing for `name`.
 *
 * Scans `nodes` in order and stops at the first declaration that answers:
 * - a simple type with a pattern, enumeration or length facet returns its own name;
 * - an unconstrained simple type that is neither list nor union returns its base;
 * - an attribute or element returns its declared type.
 *
 * Returns `name` unchanged when nothing matches.
 */
export function resolveBaseOfSimpleType(name: string, nodes: readonly SchemaNode[]): string {
  for (const node of nodes) {
    if (node.name !== name) continue;
    switch (node.kind) {
      case 'SimpleType':
        if (hasConstraints(node.restriction)) return node.name;
        if (!node.list && !node.union) return node.base;
        break;
      case 'Attribute':
        return node.type;
      case 'Element':
        return node.type;
      default:
        break;
    }
  }
  return name;
}

/**
 * Returns the first simple type named `name` that is neither a list nor a union,
 * for callers that need its restriction facets.
 */
export function resolveSimpleTypeNode(name: string, nodes: readonly SchemaNode[]): SimpleTypeNode | undefined {
  for (const node of nodes) {
    if (node.kind === 'SimpleType' && !node.list && !node.union && node.name === name) {
      return node;
    }
  }
  return undefined;
}

/**
 * Looks `name` up in the built-in table, first as written (`xml:lang`), then
 * without its namespace prefix (`xs:string` → `string`).
 */
export function lookupBuiltInType(name: string, lang: string): string | undefined {
  const exact = getBuiltInType(name, lang);
  if (exact.ok) return exact.type;
  const local = getBuiltInType(trimNSPrefix(name), lang);
  return local.ok ? local.type : undefined;
}

function findTypeDeclaration(name: string, nodes: readonly SchemaNode[]): SchemaNode | undefined {
  return nodes.find((n) => (n.kind === 'SimpleType' || n.kind === 'ComplexType') && n.name === name);
}

/**
 * Resolves a type reference for a target language.
 *
 * Built-ins are tried first. Otherwise the type declaration decides: lists, unions
 * and constrained simple types keep their structure, complex types are references,
 * and anything else is flattened by exactly one level of aliasing.
 */
export function resolveType(name: string, nodes: readonly SchemaNode[], lang: string): ResolvedType {
  const builtIn = lookupBuiltInType(name, lang);
  if (builtIn !== undefined) {
    return { kind: 'primitive', name, spelling: builtIn };
  }

  const local = trimNSPrefix(name);
  const declaration = findTypeDeclaration(local, nodes);
  if (declaration?.kind === 'ComplexType') {
    return { kind: 'reference', name: local };
  }
  if (declaration?.kind === 'SimpleType') {
    if (declaration.list) {
      return { kind: 'list', name: local, itemType: declaration.base };
    }
    if (declaration.union) {
      return { kind: 'union', name: local, memberTypes: Object.values(declaration.memberTypes) };
    }
    if (hasConstraints(declaration.restriction)) {
      return { kind: 'restricted', name: local, base: declaration.base, restriction: declaration.restriction };
    }
  }

  const base = resolveBaseOfSimpleType(local, nodes);
  if (base !== local) {
    const spelling = lookupBuiltInType(base, lang);
    return spelling !== undefined
      ? { kind: 'primitive', name: local, spelling }
      : { kind: 'reference', name: trimNSPrefix(base) };
  }

  logger.debug(`Type "${name}" did not resolve; using the name as written`, { lang });
  return { kind: 'unresolved', name };
}
