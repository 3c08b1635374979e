/**
 * Entry section
 *
 * One h3 subdivision of a language entry, usually a part of speech. All
 * properties are parsed from the fragment when read.
 */

import type { Document, Element } from 'domhandler';
import { GENDER_CLASS, HEADWORD_CLASS } from '../lib/constants.js';
import { InvalidOwnershipError } from '../lib/errors.js';
import { findFirst, hasClass, textContent } from '../dom/tree.js';
import { findConjugationContainer, parseConjugationTable } from './conjugation.js';
import { parseDefinitions } from './definitions.js';
import { LanguageEntry } from './entry.js';
import { parseLeadExtras, standardizeSpaces } from './lead.js';
import { HeadingScope } from './scope.js';
import type { Conjugation, Definition, EmptyDict, LeadExtra, SectionDict } from './types.js';

/**
 * Sections hang off a language entry and nothing else. The type system
 * already says so; this guards callers that arrive without types.
 *
 * @throws {InvalidOwnershipError}
 */
export function assertEntryOwner(parent: unknown): asserts parent is LanguageEntry {
  if (parent instanceof Section) {
    throw new InvalidOwnershipError('A section cannot be the parent of another section');
  }
  if (!(parent instanceof LanguageEntry)) {
    throw new InvalidOwnershipError('A section must belong to a language entry');
  }
}

export class Section extends HeadingScope {
  readonly entry: LanguageEntry;

  constructor(entry: LanguageEntry, fragment: Document) {
    super(fragment);
    assertEntryOwner(entry);
    this.entry = entry;
  }

  /** First paragraph of the section, which carries the headword */
  get leadParagraph(): Element | undefined {
    return findFirst(this.fragment, (el) => el.name === 'p');
  }

  /** Lead paragraph as plain text */
  get lead(): string | undefined {
    const paragraph = this.leadParagraph;
    return paragraph ? standardizeSpaces(textContent(paragraph).trim()) : undefined;
  }

  get headwordElement(): Element | undefined {
    const paragraph = this.leadParagraph;
    return paragraph && findFirst(paragraph, (el) => hasClass(el, HEADWORD_CLASS));
  }

  /** The headword as printed in the lead line */
  get word(): string | undefined {
    const headword = this.headwordElement;
    return headword ? textContent(headword).trim() : undefined;
  }

  get gender(): string | undefined {
    const paragraph = this.leadParagraph;
    const gender = paragraph && findFirst(paragraph, (el) => hasClass(el, GENDER_CLASS));
    return gender ? textContent(gender).trim() : undefined;
  }

  /** Labelled forms in the lead line's parenthetical, see parseLeadExtras */
  get leadExtras(): LeadExtra[] {
    const headword = this.headwordElement;
    return headword ? parseLeadExtras(headword) : [];
  }

  get definitions(): Definition[] {
    return parseDefinitions(this.fragment).map((text) => ({ text, extras: {}, section: this }));
  }

  hasDefinitions(): boolean {
    return this.definitions.length > 0;
  }

  /**
   * @throws {MarkupLayoutError} If a table is present but not in the
   *   expected layout
   */
  get conjugation(): Conjugation | undefined {
    const container = findConjugationContainer(this.fragment);
    return container ? parseConjugationTable(container) : undefined;
  }

  toDict(): SectionDict | EmptyDict {
    const definitions = this.definitions;
    if (definitions.length === 0) {
      return {};
    }

    const dict: SectionDict = {
      part_of_speech: this.title,
      word: this.word ?? null,
      extras: this.leadExtras,
      definitions: definitions.map(({ text }) => ({ text })),
    };
    const conjugation = this.conjugation;
    if (conjugation) {
      dict.conjugation = conjugation;
    }
    return dict;
  }

  override toString(): string {
    return `<${this.entry.page.toString()} → '${this.entry.title}' → '${this.title}'>`;
  }
}
