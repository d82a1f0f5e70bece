/**
 * Rebuilds an element forest from its flat (name, child count) records.
 */
import { FormatError } from './errors.js';
import type { AttributeMap, ElementNode, TagRecord } from './types/element-node.js';

/** A node that still expects `remaining` children. */
interface OpenSlot {
  readonly node: number;
  remaining: number;
}

/**
 * Index-addressed form of a forest: `parents[i]` is the arena index of
 * tag i's parent, or -1 for a root.
 */
export interface ElementArena {
  readonly parents: readonly number[];
  readonly roots: readonly number[];
  /** Declared child slots that no tag filled. */
  readonly openSlots: number;
}

/**
 * Assigns each record to a parent in a single forward pass. Open parents wait
 * in a FIFO; a record attaches to the front entry and a record that declares
 * children joins the back. A record arriving with nothing open starts a new root.
 */
export function linkTagRecords(tags: readonly TagRecord[]): ElementArena {
  const parents: number[] = [];
  const roots: number[] = [];
  const queue: OpenSlot[] = [];
  let head = 0;

  tags.forEach((tag: TagRecord, index: number) => {
    while (head < queue.length && queue[head].remaining === 0) {
      head += 1;
    }
    if (head === queue.length) {
      roots.push(index);
      parents.push(-1);
    } else {
      const front: OpenSlot = queue[head];
      parents.push(front.node);
      front.remaining -= 1;
    }
    if (tag.childCount > 0) {
      queue.push({ node: index, remaining: tag.childCount });
    }
  });

  let openSlots = 0;
  for (let i = head; i < queue.length; i++) {
    openSlots += queue[i].remaining;
  }
  return { parents, roots, openSlots };
}

/**
 * Materializes the forest. Roots come back in first-seen order and children
 * keep their record order.
 *
 * @throws {FormatError} If the two sequences differ in length
 */
export function buildElementForest(tags: readonly TagRecord[], attributes: readonly AttributeMap[]): ElementNode[] {
  if (tags.length !== attributes.length) {
    throw new FormatError(`${tags.length} tags but ${attributes.length} attribute blocks`, 0);
  }
  const arena: ElementArena = linkTagRecords(tags);
  const nodes: ElementNode[] = tags.map((tag: TagRecord, index: number): ElementNode => ({
    name: tag.name,
    attributes: attributes[index],
    children: [],
  }));
  arena.parents.forEach((parent: number, index: number) => {
    if (parent !== -1) {
      nodes[parent].children.push(nodes[index]);
    }
  });
  return arena.roots.map((index: number) => nodes[index]);
}

/**
 * Declared child slots left unfilled at the end of the records.
 */
export function countOpenSlots(tags: readonly TagRecord[]): number {
  return linkTagRecords(tags).openSlots;
}

/**
 * Flattens a forest back into records, the inverse of {@link buildElementForest}.
 * Each root's subtree is written level by level, which is the order the FIFO
 * hands out child slots in.
 */
export function flattenElementForest(roots: readonly ElementNode[]): { readonly tags: TagRecord[]; readonly attributes: AttributeMap[] } {
  const tags: TagRecord[] = [];
  const attributes: AttributeMap[] = [];
  for (const root of roots) {
    const level: ElementNode[] = [root];
    for (let cursor = 0; cursor < level.length; cursor++) {
      const node: ElementNode = level[cursor];
      tags.push({ name: node.name, childCount: node.children.length });
      attributes.push(node.attributes);
      level.push(...node.children);
    }
  }
  return { tags, attributes };
}
