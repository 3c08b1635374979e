/**
 * Sibling-range extraction
 *
 * Wiki pages are flat: a heading and the content it governs are siblings,
 * not parent and child. These helpers recover a heading's logical section
 * by walking forward until the next heading of the same or higher rank.
 */

import { isTag } from 'domhandler';
import type { ChildNode, Element } from 'domhandler';
import { HEADING_TAGS } from '../lib/constants.js';
import { InvalidElementKindError } from '../lib/errors.js';
import { headingRank, nextSiblings } from './tree.js';

/**
 * Collect `start` and the siblings after it, stopping before the first
 * sibling element whose tag name is in `until`. Text between elements is
 * kept. When nothing matches, the rest of the parent is returned.
 */
export function collectSiblingsUntil(
  start: ChildNode,
  until: string | Iterable<string>
): ChildNode[] {
  const stopNames = new Set(typeof until === 'string' ? [until] : until);
  const found: ChildNode[] = [start];
  for (const sibling of nextSiblings(start)) {
    if (isTag(sibling) && stopNames.has(sibling.name)) break;
    found.push(sibling);
  }
  return found;
}

/**
 * Collect a heading and everything it governs: siblings up to the next
 * heading of equal or higher rank (h2 stops at h1 and h2, not h3).
 *
 * @throws {InvalidElementKindError} If `start` is not h1-h6
 */
export function collectHeadingSiblings(start: Element): ChildNode[] {
  const rank = headingRank(start);
  if (rank === undefined) {
    throw new InvalidElementKindError(
      `Element with ${start.name} (expected one of ${HEADING_TAGS.join(', ')})`
    );
  }
  return collectSiblingsUntil(start, HEADING_TAGS.slice(0, rank));
}
