/**
 * Tag-tree tools - Main entry point
 *
 * Decodes tag-tree asset containers and provides the rotor cipher and mesh
 * hash used to prepare and identify archive entries.
 */

// Container decoding
export { TagTreeBinary, decodeTagTree } from './tag-tree.js';
export type { DecodeOptions } from './tag-tree.js';
export { buildElementForest, linkTagRecords, countOpenSlots, flattenElementForest } from './element-tree.js';
export type { ElementArena } from './element-tree.js';
export { readAttributeBlock, readAttributeBlocks, readAttributeValue, formatAttributeValue, formatFixed4, attributeKindForCode } from './attributes.js';
export { ByteCursor, encodeVarUint } from './utils/byte-cursor.js';
export { readNameTable } from './utils/name-table.js';
export type { NameTable } from './utils/name-table.js';
export { TagTreeWriter } from './utils/tag-tree-writer.js';
export type { AttributeTyper, EncodeOptions } from './utils/tag-tree-writer.js';
export { exportXml, elementToXml } from './xml-export.js';
export type { XmlExportOptions } from './xml-export.js';

// Cipher and hash primitives
export { RotorCipher, WichmannHillGenerator, buildRotorTables, rotorEncrypt, rotorDecrypt } from './rotor-cipher.js';
export type { RotorKey, RotorTables } from './rotor-cipher.js';
export { meshHash, formatHash } from './mesh-hash.js';
export { isRotorPayload, unpackRotorPayload, packRotorPayload } from './rotor-payload.js';
export { ARCHIVE_ROTOR_KEY } from './constants/format.js';

// Shared types and errors
export { TagTreeError, FormatError, EncodingError } from './errors.js';
export type { AttributeKind, AttributeValue } from './types/attribute-value.js';
export type { AttributeMap, DecodedTagTree, ElementNode, TagRecord, TagTreeHeader, TagTreeKind } from './types/element-node.js';
