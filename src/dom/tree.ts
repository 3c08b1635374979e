/**
 * Typed HTML tree helpers
 *
 * Markup is parsed with cheerio into a domhandler node tree. Everything
 * downstream walks that tree through the functions in this module instead
 * of selector strings, so tag and class matching stays type-checked.
 */

import { load } from 'cheerio';
import {
  type AnyNode,
  type ChildNode,
  type Document,
  type Element,
  isComment,
  isDocument,
  isTag,
  isText,
  hasChildren,
} from 'domhandler';
import { HEADING_TAGS } from '../lib/constants.js';

export type { AnyNode, ChildNode, Document, Element } from 'domhandler';

/** Predicate over elements used by the search helpers */
export type ElementPredicate = (element: Element) => boolean;

/**
 * Parse a full HTML page into a document tree.
 */
export function parseDocument(markup: string): Document {
  const root = load(markup).root().get(0);
  if (!root) {
    throw new Error('cheerio returned no document root');
  }
  return root;
}

/**
 * Parse an HTML fragment. Unlike {@link parseDocument} no html/head/body
 * wrappers are added, so the top-level nodes are the fragment's own.
 */
export function parseFragment(markup: string): Document {
  const root = load(markup, null, false).root().get(0);
  if (!root) {
    throw new Error('cheerio returned no fragment root');
  }
  return root;
}

/**
 * Serialize nodes back to markup without detaching them from their tree.
 */
export function renderMarkup(nodes: AnyNode | readonly AnyNode[]): string {
  const list = Array.isArray(nodes) ? [...nodes] : [nodes];
  return load('').html(list);
}

/** All child nodes (elements, text and comments) in document order */
export function childNodes(node: AnyNode): ChildNode[] {
  return hasChildren(node) ? [...node.children] : [];
}

/** Element children only, in document order */
export function children(node: AnyNode): Element[] {
  return childNodes(node).filter(isTag);
}

/** Every sibling following `node`, text nodes included */
export function nextSiblings(node: ChildNode): ChildNode[] {
  const found: ChildNode[] = [];
  for (let sibling = node.next; sibling; sibling = sibling.next) {
    found.push(sibling);
  }
  return found;
}

/** The closest following sibling that is an element */
export function nextElementSibling(node: ChildNode): Element | undefined {
  for (let sibling = node.next; sibling; sibling = sibling.next) {
    if (isTag(sibling)) return sibling;
  }
  return undefined;
}

/**
 * First descendant element of `root` matching `predicate`, pre-order.
 */
export function findFirst(root: AnyNode, predicate: ElementPredicate): Element | undefined {
  for (const child of children(root)) {
    if (predicate(child)) return child;
    const nested = findFirst(child, predicate);
    if (nested) return nested;
  }
  return undefined;
}

/**
 * All descendant elements of `root` matching `predicate`, pre-order.
 */
export function findAll(root: AnyNode, predicate: ElementPredicate): Element[] {
  const found: Element[] = [];
  const visit = (node: AnyNode): void => {
    for (const child of children(node)) {
      if (predicate(child)) found.push(child);
      visit(child);
    }
  };
  visit(root);
  return found;
}

/**
 * First element after `start` in document order (its own descendants
 * excluded) matching `predicate`. The walk climbs through ancestors but
 * never leaves `root`.
 */
export function findNext(
  start: Element,
  predicate: ElementPredicate,
  root: AnyNode
): Element | undefined {
  let current: AnyNode = start;
  while (current !== root) {
    if (isDocument(current)) return undefined;
    for (const sibling of nextSiblings(current)) {
      if (!isTag(sibling)) continue;
      if (predicate(sibling)) return sibling;
      const nested = findFirst(sibling, predicate);
      if (nested) return nested;
    }
    const parent: AnyNode | null = current.parent;
    if (!parent) return undefined;
    current = parent;
  }
  return undefined;
}

/** Tag-name check that narrows to Element */
export function isElementNamed(node: AnyNode, name: string): node is Element {
  return isTag(node) && node.name === name;
}

/** Class-list membership test on an element's `class` attribute */
export function hasClass(element: Element, className: string): boolean {
  const value = element.attribs['class'];
  if (!value) return false;
  return value.split(/\s+/).includes(className);
}

/** Heading rank 1-6 for h1..h6 elements, undefined for everything else */
export function headingRank(node: AnyNode): number | undefined {
  if (!isTag(node)) return undefined;
  const index = HEADING_TAGS.indexOf(node.name);
  return index === -1 ? undefined : index + 1;
}

/**
 * Concatenated text of every descendant text node. Comments are skipped.
 */
export function textContent(node: AnyNode): string {
  if (isText(node)) return node.data;
  if (!hasChildren(node)) return '';
  let text = '';
  for (const child of node.children) {
    text += textContent(child);
  }
  return text;
}

/**
 * Structural equality of two subtrees: node kind, tag name, attributes,
 * text data and children, recursively.
 */
export function nodesEqual(a: AnyNode, b: AnyNode): boolean {
  if (a.type !== b.type) return false;

  if (isText(a) || isComment(a)) {
    return (isText(b) || isComment(b)) && a.data === b.data;
  }

  if (isTag(a)) {
    if (!isTag(b) || a.name !== b.name) return false;
    const aKeys = Object.keys(a.attribs);
    if (aKeys.length !== Object.keys(b.attribs).length) return false;
    for (const key of aKeys) {
      if (a.attribs[key] !== b.attribs[key]) return false;
    }
  }

  const aChildren = childNodes(a);
  const bChildren = childNodes(b);
  if (aChildren.length !== bChildren.length) return false;
  return aChildren.every((child, i) => {
    const other = bChildren[i];
    return other !== undefined && nodesEqual(child, other);
  });
}
