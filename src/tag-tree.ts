/**
 * Tag-tree container decoding.
 *
 * Layout (little-endian): magic `C1 59 41 0D`, u64 total size, element name
 * table, attribute name table, u64 attributes-block offset, varint tag count,
 * one (varint element id, varint child count) pair per tag, then one attribute
 * block per tag.
 */
import { readAttributeBlocks } from './attributes.js';
import { TAG_TREE_MAGIC } from './constants/format.js';
import { buildElementForest, countOpenSlots } from './element-tree.js';
import { FormatError } from './errors.js';
import type { AttributeMap, DecodedTagTree, ElementNode, TagRecord, TagTreeHeader, TagTreeKind } from './types/element-node.js';
import { ByteCursor } from './utils/byte-cursor.js';
import { type NameTable, readNameTable } from './utils/name-table.js';

export interface DecodeOptions {
  /** Reject records whose declared child counts are not all filled. */
  readonly strict?: boolean;
}

const KIND_MARKERS: readonly (readonly [string, TagTreeKind])[] = [
  ['Material', 'material'],
  ['GisFiles', 'gis'],
  ['Anim', 'animation'],
];

/**
 * Validates the container magic.
 * @throws {FormatError} If the magic is missing or wrong
 */
function ensureMagic(cursor: ByteCursor): void {
  if (cursor.remaining < TAG_TREE_MAGIC.length) {
    throw new FormatError('Buffer too small to be a tag tree', 0);
  }
  const magic: Buffer = cursor.readBytes(TAG_TREE_MAGIC.length);
  if (!magic.equals(TAG_TREE_MAGIC)) {
    throw new FormatError(`Invalid tag-tree magic ${magic.toString('hex')}`, 0);
  }
}

function readTagRecords(cursor: ByteCursor, count: number, elementNames: NameTable): TagRecord[] {
  const tags: TagRecord[] = [];
  for (let index = 0; index < count; index++) {
    const idOffset: number = cursor.offset;
    const elementId: number = cursor.readVarUint();
    if (elementId >= elementNames.length) {
      throw new FormatError(`Element name id ${elementId} outside table of ${elementNames.length}`, idOffset);
    }
    const childCount: number = cursor.readVarUint();
    tags.push({ name: elementNames[elementId], childCount });
  }
  return tags;
}

/**
 * Parses header, name tables and tag records, leaving the cursor at the
 * first attribute block.
 */
function readHeader(cursor: ByteCursor): { readonly header: TagTreeHeader; readonly tags: TagRecord[] } {
  ensureMagic(cursor);
  const declaredSize: bigint = cursor.readUint64();
  const elementNames: NameTable = readNameTable(cursor);
  const attributeNames: NameTable = readNameTable(cursor);
  const attributesOffset: bigint = cursor.readUint64();
  const tagCount: number = cursor.readVarUint();
  const tags: TagRecord[] = readTagRecords(cursor, tagCount, elementNames);
  return {
    header: { declaredSize, attributesOffset, elementNames, attributeNames, tagCount },
    tags,
  };
}

/**
 * Tag-tree container operations over fully read buffers.
 */
export class TagTreeBinary {
  /**
   * Decodes a container into its element forest. Bytes after the last
   * attribute block are ignored.
   *
   * @throws {FormatError} On a malformed header, truncated data, a bad block terminator or an unknown attribute type
   * @throws {EncodingError} On a name or string that is not UTF-8
   */
  static decode({ buffer, strict = false }: { readonly buffer: Buffer } & DecodeOptions): DecodedTagTree {
    const cursor = new ByteCursor(buffer);
    const { header, tags } = readHeader(cursor);
    const attributes: AttributeMap[] = readAttributeBlocks(cursor, header.tagCount, header.attributeNames);

    if (strict) {
      const openSlots: number = countOpenSlots(tags);
      if (openSlots > 0) {
        throw new FormatError(`${openSlots} declared child slot(s) left unfilled`, cursor.offset);
      }
    }

    const roots: ElementNode[] = buildElementForest(tags, attributes);
    return { header, tags, attributes, roots };
  }

  /**
   * Reads the header fields and name tables without decoding attribute blocks.
   */
  static readHeader({ buffer }: { readonly buffer: Buffer }): TagTreeHeader {
    return readHeader(new ByteCursor(buffer)).header;
  }

  static isTagTree({ buffer }: { readonly buffer: Buffer }): boolean {
    return buffer.length >= TAG_TREE_MAGIC.length && buffer.subarray(0, TAG_TREE_MAGIC.length).equals(TAG_TREE_MAGIC);
  }

  /**
   * Classifies a container by the names it mentions.
   */
  static detectKind({ buffer }: { readonly buffer: Buffer }): TagTreeKind | null {
    if (!TagTreeBinary.isTagTree({ buffer })) {
      return null;
    }
    for (const [marker, kind] of KIND_MARKERS) {
      if (buffer.includes(marker, 0, 'latin1')) {
        return kind;
      }
    }
    return 'unknown';
  }
}

/**
 * Shorthand for {@link TagTreeBinary.decode} returning only the roots.
 */
export function decodeTagTree(buffer: Buffer, options: DecodeOptions = {}): ElementNode[] {
  return TagTreeBinary.decode({ buffer, ...options }).roots;
}
