/**
 * Renders a decoded forest as indented XML text, one root after another.
 */
import type { ElementNode } from './types/element-node.js';

export interface XmlExportOptions {
  /** Spaces per nesting level. */
  readonly indent?: number;
}

const DEFAULT_INDENT = 4;

function escapeXmlAttr(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/\r/g, '&#13;')
    .replace(/\n/g, '&#10;')
    .replace(/\t/g, '&#09;');
}

/**
 * Converts one element and its descendants to XML.
 */
export function elementToXml(node: ElementNode, indent: number = DEFAULT_INDENT, depth = 0): string {
  const pad: string = ' '.repeat(indent * depth);
  const attrStr: string = Array.from(node.attributes, ([k, v]) => ` ${k}="${escapeXmlAttr(v)}"`).join('');

  if (node.children.length === 0) {
    return `${pad}<${node.name}${attrStr} />`;
  }

  const parts: string[] = [`${pad}<${node.name}${attrStr}>`];
  for (const child of node.children) {
    parts.push(elementToXml(child, indent, depth + 1));
  }
  parts.push(`${pad}</${node.name}>`);
  return parts.join('\n');
}

/**
 * Converts a forest to XML, ending every root with a newline.
 */
export function exportXml(roots: readonly ElementNode[], { indent = DEFAULT_INDENT }: XmlExportOptions = {}): string {
  return roots.map((root: ElementNode) => `${elementToXml(root, indent)}\n`).join('');
}
