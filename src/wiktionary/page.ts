/**
 * Wiktionary page
 *
 * One fetched page for a (word, revision) pair. The markup is parsed once
 * and never modified; entries are copied out of it on demand.
 */

import { isTag } from 'domhandler';
import type { Document } from 'domhandler';
import { MISSING_ENTRY_MARKER } from '../lib/constants.js';
import {
  LanguageEntryNotFoundError,
  MarkupLayoutError,
  PageNotFoundError,
} from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { buildFragment } from '../dom/fragment.js';
import { collectHeadingSiblings } from '../dom/siblings.js';
import { findFirst, nodesEqual, parseDocument } from '../dom/tree.js';
import { fetchPageMarkup, type FetchOptions } from './fetch.js';
import { LanguageEntry } from './entry.js';

export interface PageOptions {
  /** Revision (oldid) the markup was taken from */
  revision?: number;
}

export class Page {
  readonly word: string;
  readonly revision: number | undefined;
  readonly markup: string;
  private readonly tree: Document;

  /**
   * @throws {PageNotFoundError} If `markup` is Wiktionary's "no entry" page
   */
  constructor(word: string, markup: string, options: PageOptions = {}) {
    if (markup.includes(MISSING_ENTRY_MARKER)) {
      loggers.page.forLookup({ word, revision: options.revision }).debug('No page for word');
      throw new PageNotFoundError();
    }
    this.word = word;
    this.revision = options.revision;
    this.markup = markup;
    this.tree = parseDocument(markup);
  }

  /**
   * Fetch and parse the page for `word`, optionally at a given revision.
   *
   * @example
   * ```typescript
   * const page = await Page.fetch('empleado', { revision: 62175311 });
   * const spanish = page.getEntry('Spanish');
   * ```
   */
  static async fetch(word: string, options: PageOptions & FetchOptions = {}): Promise<Page> {
    const markup = await fetchPageMarkup(word, options.revision, options);
    return new Page(word, markup, options);
  }

  /**
   * The entry for `language`, found by the heading anchor whose id equals
   * the language name exactly.
   *
   * @throws {LanguageEntryNotFoundError} If the page has no such anchor
   * @throws {MarkupLayoutError} If the anchor does not sit inside an h2
   */
  getEntry(language: string): LanguageEntry {
    const anchor = findFirst(this.tree, (el) => el.attribs['id'] === language);
    if (!anchor) {
      loggers.page
        .forLookup({ word: this.word, language, revision: this.revision })
        .debug('No entry for language');
      throw new LanguageEntryNotFoundError(language);
    }

    const heading = anchor.parent;
    if (!heading || !isTag(heading) || heading.name !== 'h2') {
      throw new MarkupLayoutError(
        `Anchor for ${language} is not inside an h2 heading`
      );
    }

    return new LanguageEntry(this, buildFragment(collectHeadingSiblings(heading)), language);
  }

  /** Substring test against the raw markup */
  contains(text: string): boolean {
    return this.markup.includes(text);
  }

  /** Same word, same revision and structurally equal markup */
  equals(other: Page): boolean {
    return (
      this.word === other.word &&
      this.revision === other.revision &&
      nodesEqual(this.tree, other.tree)
    );
  }

  toString(): string {
    if (this.revision === undefined) {
      return `Page('${this.word}')`;
    }
    return `Page('${this.word}', revision=${this.revision})`;
  }
}
