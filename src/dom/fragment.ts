/**
 * Fragment building
 */

import { Document, cloneNode } from 'domhandler';
import type { ChildNode } from 'domhandler';

/**
 * Deep-copy `nodes` into a new standalone document, in order. The copies
 * share nothing with the source tree, so parsing a fragment can never
 * touch the page it came from.
 */
export function buildFragment(nodes: readonly ChildNode[]): Document {
  const copies = nodes.map((node) => cloneNode(node, true));
  const fragment = new Document(copies);

  copies.forEach((copy, i) => {
    copy.parent = fragment;
    copy.prev = copies[i - 1] ?? null;
    copy.next = copies[i + 1] ?? null;
  });

  return fragment;
}
