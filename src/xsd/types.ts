/**
 * Facets of an xs:restriction that the generators care about.
 */
export interface Restriction {
  /** xs:pattern value, verbatim. */
  pattern?: string;
  /** xs:enumeration values in declaration order. */
  enum: string[];
  /** xs:minLength (or xs:length) value. */
  minLength?: number;
  /** xs:maxLength (or xs:length) value. */
  maxLength?: number;
}

interface NodeBase {
  /** Schema-local name. References to other declarations keep their prefix. */
  name: string;
  /** Text of the first xs:documentation, if any. */
  doc?: string;
}

/**
 * Represents a simple type definition (xs:simpleType).
 */
export interface SimpleTypeNode extends NodeBase {
  kind: 'SimpleType';
  /** xs:restriction base, or xs:list itemType when `list` is set. */
  base: string;
  list: boolean;
  union: boolean;
  /** Union members: member key → member type name. Empty unless `union` is set. */
  memberTypes: Record<string, string>;
  restriction: Restriction;
}

/**
 * Represents a single XSD attribute definition (xs:attribute).
 */
export interface AttributeNode extends NodeBase {
  kind: 'Attribute';
  type: string;
  optional: boolean;
  /** xs:attribute fixed value; the attribute can take no other. */
  fixed?: string;
}

/**
 * Represents an XSD element definition (xs:element).
 */
export interface ElementNode extends NodeBase {
  kind: 'Element';
  /** Type name; for an inline type this is the name of the anonymous declaration. */
  type: string;
  optional: boolean;
  /** maxOccurs > 1 or unbounded. */
  plural: boolean;
}

/**
 * Represents a complex type definition (xs:complexType).
 */
export interface ComplexTypeNode extends NodeBase {
  kind: 'ComplexType';
  /** Base type name when using xs:complexContent/xs:extension. */
  base?: string;
  /** Text content type when using xs:simpleContent. */
  valueType?: string;
  /** mixed="true": character data may appear between the child elements. */
  mixed: boolean;
  attributes: AttributeNode[];
  elements: ElementNode[];
  /** Referenced xs:group names. */
  groups: string[];
  /** Referenced xs:attributeGroup names. */
  attributeGroups: string[];
}

/**
 * Represents a named model group (xs:group).
 */
export interface GroupNode extends NodeBase {
  kind: 'Group';
  elements: ElementNode[];
  groups: string[];
}

/**
 * Represents a named attribute group (xs:attributeGroup).
 */
export interface AttributeGroupNode extends NodeBase {
  kind: 'AttributeGroup';
  attributes: AttributeNode[];
  attributeGroups: string[];
}

export type SchemaNode =
  | SimpleTypeNode
  | ComplexTypeNode
  | ElementNode
  | AttributeNode
  | GroupNode
  | AttributeGroupNode;

export type SchemaNodeKind = SchemaNode['kind'];

export type SchemaNodeOfKind<K extends SchemaNodeKind> = Extract<SchemaNode, { kind: K }>;

/**
 * A parsed schema: the top-level declarations in document order, followed by
 * those pulled in through xs:include and xs:import.
 */
export interface SchemaDocument {
  nodes: SchemaNode[];
}

export function hasConstraints(restriction: Restriction): boolean {
  return (
    restriction.pattern !== undefined ||
    restriction.enum.length > 0 ||
    restriction.minLength !== undefined ||
    restriction.maxLength !== undefined
  );
}
