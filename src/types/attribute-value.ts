/**
 * Typed attribute payloads before they are rendered as text.
 */

export type AttributeValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'uint32'; readonly value: number }
  | { readonly kind: 'int32'; readonly value: number }
  | { readonly kind: 'uint64'; readonly value: bigint }
  | { readonly kind: 'matrix'; readonly value: readonly number[] };

export type AttributeKind = AttributeValue['kind'];
