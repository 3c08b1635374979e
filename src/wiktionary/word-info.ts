/**
 * Word lookup
 *
 * Entry point for consumers: fetch a word's page, pick one language's entry
 * and expose it as definition strings, plain-text listings or a
 * JSON-compatible object.
 */

import { loggers } from '../lib/logger.js';
import type { FetchOptions } from './fetch.js';
import type { LanguageEntry } from './entry.js';
import { Page } from './page.js';
import { isSectionDict, type WordInfoDict } from './types.js';

export interface LookupOptions extends FetchOptions {
  /** Language heading to read, e.g. 'Spanish' */
  language: string;
  /** Page revision (oldid); latest when omitted */
  revision?: number;
}

export interface RenderListOptions {
  sep?: string;
  prefix?: string;
}

/**
 * Render items one per line with a bullet prefix.
 *
 * @example
 * ```typescript
 * renderList(['foo', 'bar']) // '- foo\n- bar'
 * renderList(['world', 'again'], { sep: '||', prefix: 'hello' })
 * // 'helloworld||helloagain'
 * ```
 */
export function renderList(items: Iterable<string>, options: RenderListOptions = {}): string {
  const { sep = '\n', prefix = '- ' } = options;
  return Array.from(items, (item) => `${prefix}${item}`).join(sep);
}

export class WordInfo {
  constructor(readonly entry: LanguageEntry) {}

  static fromEntry(entry: LanguageEntry): WordInfo {
    return new WordInfo(entry);
  }

  /** The word that was looked up */
  get word(): string {
    return this.entry.page.word;
  }

  get language(): string {
    return this.entry.language;
  }

  get definitionStrings(): string[] {
    return this.entry.definitionStrings;
  }

  /**
   * Each definition section as its title and lead line followed by its
   * definitions, sections separated by a blank line.
   */
  definitionOutput(): string {
    return this.entry
      .getSectionsWithDefinitions()
      .map((section) => {
        const lead = section.lead ?? '';
        const items = renderList(section.definitions.map((d) => d.text));
        return `${section.title}: ${lead}\n${items}`;
      })
      .join('\n\n');
  }

  /** The word on the first line, then every definition */
  compactDefinitionOutput(): string {
    return [this.word, ...this.definitionStrings.map((text) => `- ${text}`)].join('\n');
  }

  toDict(): WordInfoDict {
    return {
      word: this.word,
      language: this.language,
      definition_sections: this.entry.sections.map((s) => s.toDict()).filter(isSectionDict),
    };
  }

  equals(other: WordInfo): boolean {
    return this.entry.equals(other.entry);
  }
}

/**
 * Look up `word` and read its entry for `options.language`.
 *
 * @throws {PageNotFoundError} If Wiktionary has no page for the word
 * @throws {LanguageEntryNotFoundError} If the page has no such language
 *
 * @example
 * ```typescript
 * const info = await lookupWord('olvidar', { language: 'Spanish' });
 * info.definitionStrings[0] // '(transitive) to forget (be forgotten by)'
 * ```
 */
export async function lookupWord(word: string, options: LookupOptions): Promise<WordInfo> {
  const log = loggers.page
    .withOperation('lookupWord')
    .forLookup({ word, language: options.language, revision: options.revision });
  log.debug('Looking up word');

  const page = await Page.fetch(word, options);
  const info = WordInfo.fromEntry(page.getEntry(options.language));

  log.info('Looked up word', { definitions: info.definitionStrings.length });
  return info;
}
