/**
 * Language entry
 *
 * The part of a page under one language's h2, e.g. everything from
 * "Spanish" up to "Swedish".
 */

import type { Document } from 'domhandler';
import { SectionNotFoundError } from '../lib/errors.js';
import { buildFragment } from '../dom/fragment.js';
import { collectHeadingSiblings } from '../dom/siblings.js';
import { findAll, nodesEqual } from '../dom/tree.js';
import { HeadingScope } from './scope.js';
import { Section } from './section.js';
import type { Page } from './page.js';
import type { Definition } from './types.js';

export class LanguageEntry extends HeadingScope {
  constructor(
    readonly page: Page,
    fragment: Document,
    readonly language: string
  ) {
    super(fragment);
  }

  /**
   * One section per h3 in the entry (Etymology, Pronunciation, Verb, ...),
   * each spanning up to the next h3 or higher heading.
   */
  get sections(): Section[] {
    return findAll(this.fragment, (el) => el.name === 'h3').map(
      (h3) => new Section(this, buildFragment(collectHeadingSiblings(h3)))
    );
  }

  /**
   * First section whose title is exactly `title`.
   *
   * @throws {SectionNotFoundError} If no section has that title
   */
  getSection(title: string): Section {
    const section = this.sections.find((s) => s.title === title);
    if (!section) {
      throw new SectionNotFoundError(title);
    }
    return section;
  }

  getSectionsWithDefinitions(): Section[] {
    return this.sections.filter((section) => section.hasDefinitions());
  }

  /** Definitions of every section, in page order */
  get definitions(): Definition[] {
    return this.getSectionsWithDefinitions().flatMap((section) => section.definitions);
  }

  get definitionStrings(): string[] {
    return this.definitions.map((definition) => definition.text);
  }

  equals(other: LanguageEntry): boolean {
    return (
      this.language === other.language &&
      this.page.equals(other.page) &&
      nodesEqual(this.fragment, other.fragment)
    );
  }

  override toString(): string {
    return `<${this.page.toString()} → '${this.title}'>`;
  }
}
