/**
 * Definition list parsing
 */

import { isTag } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import { childNodes, children, textContent } from '../dom/tree.js';

/** Nested lists inside a sense hold examples, quotations and synonyms */
const EXCLUDED_ITEM_CHILDREN = new Set(['dl', 'ul']);

/**
 * The <li> children of every <ol> sitting directly at the top of
 * `fragment`. Lists nested deeper are not definition lists.
 */
export function definitionListItems(fragment: AnyNode): Element[] {
  return children(fragment)
    .filter((el) => el.name === 'ol')
    .flatMap((ol) => children(ol).filter((el) => el.name === 'li'));
}

/**
 * Text of one sense: every direct child of the item except nested
 * <dl>/<ul> lists, concatenated and trimmed.
 */
export function definitionText(item: Element): string {
  return childNodes(item)
    .filter((node) => !(isTag(node) && EXCLUDED_ITEM_CHILDREN.has(node.name)))
    .map(textContent)
    .join('')
    .trim();
}

/**
 * All definition strings of a section fragment, in document order.
 */
export function parseDefinitions(fragment: AnyNode): string[] {
  return definitionListItems(fragment).map(definitionText);
}
