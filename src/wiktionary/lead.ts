/**
 * Lead-line parsing
 *
 * The lead line is a section's first paragraph:
 *
 *   olvidar (first-person singular present olvido, first-person singular
 *   preterite olvidé, past participle olvidado)
 *
 * where each label is an <i> and each form a <b>. There is no structure
 * beyond that convention, so {@link parseLeadExtras} chases siblings
 * exactly as described below and makes no attempt to understand the text.
 */

import { isText } from 'domhandler';
import type { Element, Text } from 'domhandler';
import type { LeadExtra } from './types.js';
import {
  isElementNamed,
  nextElementSibling,
  nextSiblings,
  textContent,
} from '../dom/tree.js';

/**
 * Replace non-breaking spaces (U+00A0) with plain spaces.
 */
export function standardizeSpaces(text: string): string {
  return text.replace(/\u00a0/g, ' ');
}

/** First later sibling of `headword` that is text opening with "(" */
function openingParenthesis(headword: Element): Text | undefined {
  for (const sibling of nextSiblings(headword)) {
    if (isText(sibling) && sibling.data.trimStart().startsWith('(')) {
      return sibling;
    }
  }
  return undefined;
}

/**
 * Read the labelled forms that follow a headword.
 *
 * 1. Find the first later sibling of the headword that is a text node
 *    starting with "(" (leading whitespace ignored). None: no extras.
 * 2. Every later sibling of that text node that is an <i> is a label.
 * 3. If the label's next element sibling is a <b>, that is its value.
 *
 * Labels after the closing parenthesis are read too: the heuristic does
 * not track where the parenthetical ends.
 */
export function parseLeadExtras(headword: Element): LeadExtra[] {
  const opening = openingParenthesis(headword);
  if (!opening) return [];

  const extras: LeadExtra[] = [];
  for (const sibling of nextSiblings(opening)) {
    if (!isElementNamed(sibling, 'i')) continue;

    const attribute = textContent(sibling).trim();
    const next = nextElementSibling(sibling);
    if (next && next.name === 'b') {
      extras.push({ attribute, value: textContent(next).trim() });
    } else {
      extras.push({ attribute });
    }
  }
  return extras;
}
