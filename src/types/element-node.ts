/**
 * Decoded tag-tree shapes.
 */

/** Element name and the number of children it declares. */
export interface TagRecord {
  readonly name: string;
  readonly childCount: number;
}

/** Attribute name to canonical text, in the order the attributes were stored. */
export type AttributeMap = Map<string, string>;

/**
 * A decoded element. Children are owned by their parent; roots have none.
 */
export interface ElementNode {
  readonly name: string;
  readonly attributes: AttributeMap;
  readonly children: ElementNode[];
}

/**
 * Fixed header fields of a tag-tree container.
 */
export interface TagTreeHeader {
  /** Declared total file size; not checked against the buffer. */
  readonly declaredSize: bigint;
  /** Offset of the first attribute block, counted from byte 12; informational. */
  readonly attributesOffset: bigint;
  readonly elementNames: readonly string[];
  readonly attributeNames: readonly string[];
  readonly tagCount: number;
}

/**
 * Everything a single decode produces.
 */
export interface DecodedTagTree {
  readonly header: TagTreeHeader;
  readonly tags: readonly TagRecord[];
  readonly attributes: readonly AttributeMap[];
  readonly roots: ElementNode[];
}

/**
 * Coarse classification of a container by the names it carries.
 */
export type TagTreeKind = 'material' | 'gis' | 'animation' | 'unknown';
