/**
 * Constants of the tag-tree container and the rotor-wrapped archive entries.
 */

/** Leading four bytes of every tag-tree container. */
export const TAG_TREE_MAGIC: Buffer = Buffer.from([0xc1, 0x59, 0x41, 0x0d]);

/** Bytes that close each element's attribute block. */
export const ATTRIBUTE_BLOCK_TERMINATOR: Buffer = Buffer.from([0x01, 0x00]);

/**
 * The attributes-block offset field counts from here (magic + total size).
 */
export const ATTRIBUTE_OFFSET_BASE = 12;

/**
 * Attribute type codes. `STRING_ALT` decodes exactly like `STRING`.
 */
export const ATTRIBUTE_TYPE_CODE = {
  STRING: 0x01,
  UINT32: 0x02,
  STRING_ALT: 0x03,
  INT32: 0x05,
  MATRIX: 0x06,
  UINT64: 0x08,
} as const;

export type AttributeTypeCode = (typeof ATTRIBUTE_TYPE_CODE)[keyof typeof ATTRIBUTE_TYPE_CODE];

export const ROTOR_SIZE = 256;
export const DEFAULT_ROTOR_COUNT = 6;

/** First two bytes of a rotor-encrypted archive entry. */
export const ROTOR_PAYLOAD_MARKERS: readonly Buffer[] = [
  Buffer.from([0x1d, 0x04]),
  Buffer.from([0x15, 0x23]),
];

/** Leading bytes XOR-ed by the rotor payload wrapper, and the XOR key. */
export const ROTOR_PAYLOAD_MASKED_PREFIX = 128;
export const ROTOR_PAYLOAD_MASK = 0x9a;

const ARCHIVE_KEY_PARTS = ['j2h56ogodh3se', '=dziaq.', '|os=5v7!"-234'] as const;

/**
 * Key the archive format wraps its rotor payloads with, assembled from its
 * three repeated fragments.
 */
export const ARCHIVE_ROTOR_KEY: string = (() => {
  const [head, dot, bar] = ARCHIVE_KEY_PARTS;
  return `${head.repeat(4)}${(dot + head + bar).repeat(5)}!#${dot.repeat(7)}${bar.repeat(2)}*&'`;
})();

/** Environment variable the CLI reads the rotor key from. */
export const ROTOR_KEY_ENV = 'TAGTREE_ROTOR_KEY';
