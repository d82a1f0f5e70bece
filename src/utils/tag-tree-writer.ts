/**
 * Binary serialization of an element forest into a tag-tree container.
 * Produces exactly the layout {@link TagTreeBinary.decode} reads.
 */
import { typeCodeForKind } from '../attributes.js';
import { ATTRIBUTE_BLOCK_TERMINATOR, ATTRIBUTE_OFFSET_BASE, TAG_TREE_MAGIC } from '../constants/format.js';
import { flattenElementForest } from '../element-tree.js';
import { TagTreeError } from '../errors.js';
import type { AttributeValue } from '../types/attribute-value.js';
import type { AttributeMap, ElementNode, TagRecord } from '../types/element-node.js';
import { encodeVarUint } from './byte-cursor.js';
import { collectNames, type NameTable } from './name-table.js';

/**
 * Chooses the stored type of an attribute. Returning `null` stores the text.
 */
export type AttributeTyper = (element: string, attribute: string, text: string) => AttributeValue | null;

export interface EncodeOptions {
  readonly typeAttribute?: AttributeTyper;
}

const MAX_BYTE_FIELD = 0xff;

/**
 * Growable little-endian writer for tag-tree containers.
 */
export class TagTreeWriter {
  private buffer: Buffer;
  private offset: number;

  constructor() {
    this.buffer = Buffer.alloc(1024); // Start with 1KB, will grow as needed
    this.offset = 0;
  }

  /**
   * Encodes a forest. Element and attribute names are numbered in
   * first-seen order.
   */
  static encode(roots: readonly ElementNode[], options: EncodeOptions = {}): Buffer {
    const writer = new TagTreeWriter();
    writer.writeForest(roots, options.typeAttribute ?? (() => null));
    return writer.getBuffer();
  }

  private writeForest(roots: readonly ElementNode[], typeAttribute: AttributeTyper): void {
    const { tags, attributes } = flattenElementForest(roots);
    const elements = collectNames(tags.map((tag: TagRecord) => tag.name));
    const attributeNames = collectNames(attributes.flatMap((block: AttributeMap) => Array.from(block.keys())));
    if (attributeNames.table.length > MAX_BYTE_FIELD + 1) {
      throw new TagTreeError(`${attributeNames.table.length} attribute names exceed the one-byte name id`);
    }

    this.writeBytes(TAG_TREE_MAGIC);
    const sizeOffset: number = this.offset;
    this.writeUint64(0n);
    this.writeNameTable(elements.table);
    this.writeNameTable(attributeNames.table);
    const attributesOffsetField: number = this.offset;
    this.writeUint64(0n);

    this.writeBytes(encodeVarUint(tags.length));
    for (const tag of tags) {
      this.writeBytes(encodeVarUint(this.lookup(elements.ids, tag.name)));
      this.writeBytes(encodeVarUint(tag.childCount));
    }

    this.patchUint64(attributesOffsetField, BigInt(this.offset - ATTRIBUTE_OFFSET_BASE));
    tags.forEach((tag: TagRecord, index: number) => {
      this.writeAttributeBlock(tag.name, attributes[index], attributeNames.ids, typeAttribute);
    });
    this.patchUint64(sizeOffset, BigInt(this.offset));
  }

  private writeAttributeBlock(element: string, block: AttributeMap, ids: ReadonlyMap<string, number>, typeAttribute: AttributeTyper): void {
    if (block.size > MAX_BYTE_FIELD) {
      throw new TagTreeError(`Element "${element}" has ${block.size} attributes, at most ${MAX_BYTE_FIELD} fit`);
    }
    this.writeUint8(block.size);
    for (const [name, text] of block) {
      const value: AttributeValue = typeAttribute(element, name, text) ?? { kind: 'string', value: text };
      this.writeUint8(this.lookup(ids, name));
      this.writeUint8(typeCodeForKind(value.kind));
      this.writeAttributeValue(value);
    }
    this.writeBytes(ATTRIBUTE_BLOCK_TERMINATOR);
  }

  private writeAttributeValue(attribute: AttributeValue): void {
    switch (attribute.kind) {
      case 'string':
        this.writeCString(attribute.value);
        break;
      case 'uint32':
        this.ensureCapacity(4);
        this.buffer.writeUInt32LE(attribute.value, this.offset);
        this.offset += 4;
        break;
      case 'int32':
        this.ensureCapacity(4);
        this.buffer.writeInt32LE(attribute.value, this.offset);
        this.offset += 4;
        break;
      case 'uint64':
        this.writeUint64(attribute.value);
        break;
      case 'matrix':
        this.ensureCapacity(4 + attribute.value.length * 4);
        this.buffer.writeUInt32LE(attribute.value.length, this.offset);
        this.offset += 4;
        for (const item of attribute.value) {
          this.buffer.writeFloatLE(item, this.offset);
          this.offset += 4;
        }
        break;
    }
  }

  private writeNameTable(names: NameTable): void {
    this.writeBytes(encodeVarUint(names.length));
    for (const name of names) {
      this.writeCString(name);
    }
  }

  private lookup(ids: ReadonlyMap<string, number>, name: string): number {
    const id: number | undefined = ids.get(name);
    if (id === undefined) {
      throw new TagTreeError(`Name "${name}" missing from its table`);
    }
    return id;
  }

  private writeUint8(value: number): void {
    this.ensureCapacity(1);
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
  }

  private writeUint64(value: bigint): void {
    this.ensureCapacity(8);
    this.buffer.writeBigUInt64LE(value, this.offset);
    this.offset += 8;
  }

  private patchUint64(at: number, value: bigint): void {
    this.buffer.writeBigUInt64LE(value, at);
  }

  private writeCString(str: string): void {
    const strBuffer = Buffer.from(str, 'utf8');
    if (strBuffer.includes(0)) {
      throw new TagTreeError(`String ${JSON.stringify(str)} contains a NUL byte`);
    }
    this.writeBytes(strBuffer);
    this.writeUint8(0);
  }

  private writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer);
      this.buffer = newBuffer;
    }
  }

  private getBuffer(): Buffer {
    return this.buffer.subarray(0, this.offset);
  }
}
