/**
 * Heading-scoped fragments
 *
 * A language entry and a part-of-speech section are both "a heading plus
 * what it governs", copied out of the page into their own document.
 */

import type { Document } from 'domhandler';
import { HEADLINE_CLASS } from '../lib/constants.js';
import { findFirst, hasClass, headingRank, renderMarkup, textContent } from '../dom/tree.js';

export abstract class HeadingScope {
  protected constructor(readonly fragment: Document) {}

  /**
   * Label of the heading that opens the fragment. Wiktionary wraps it in a
   * `.mw-headline` span; bare headings fall back to their own text.
   */
  get title(): string {
    const headline = findFirst(this.fragment, (el) => hasClass(el, HEADLINE_CLASS));
    if (headline) return textContent(headline);
    const heading = findFirst(this.fragment, (el) => headingRank(el) !== undefined);
    return heading ? textContent(heading).trim() : '';
  }

  /** Markup of the fragment */
  html(): string {
    return renderMarkup(this.fragment.children);
  }

  /** Substring test against the fragment's markup */
  contains(text: string): boolean {
    return this.html().includes(text);
  }
}
