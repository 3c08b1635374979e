/**
 * Wiktionary entry data model
 */

import type { PARTICIPLE_GENDERS, PERSON_CODES } from '../lib/constants.js';
import type { Section } from './section.js';

// ============================================================================
// Lead line
// ============================================================================

/**
 * One labelled form from a lead line's parenthetical, e.g.
 * `{ attribute: 'past participle', value: 'olvidado' }`.
 * `value` is missing when the label stands alone.
 */
export interface LeadExtra {
  attribute: string;
  value?: string;
}

// ============================================================================
// Definitions
// ============================================================================

/** One numbered sense of a word */
export interface Definition {
  /** Sense text with usage examples and nested quotations left out */
  readonly text: string;
  /** Reserved for per-sense data such as synonyms; currently always empty */
  readonly extras: Readonly<Record<string, unknown>>;
  /** Section the sense was read from */
  readonly section: Section;
}

// ============================================================================
// Conjugation
// ============================================================================

/** Person/number column of a conjugation row */
export type PersonCode = (typeof PERSON_CODES)[number];

/** Gender column of the past participle rows */
export type ParticipleGender = (typeof PARTICIPLE_GENDERS)[number];

/** Second-person singular cell with separate tú and vos forms */
export interface DualForm {
  'tú': string;
  vos: string;
}

/** Content of one table cell; null when the cell holds no form */
export type ConjugatedForm = string | DualForm | null;

export type PersonForms = Record<PersonCode, ConjugatedForm>;

export type ParticipleForms = Record<ParticipleGender, ConjugatedForm>;

/** Forms of one mood keyed by tense name as printed in the table */
export type MoodForms = Record<string, PersonForms>;

/**
 * A parsed verb conjugation table. Tense keys (`present`, `preterite`, ...)
 * come from the table's row headers.
 */
export interface Conjugation {
  infinitive: string;
  gerund: string;
  /** Keyed by `singular` / `plural` */
  'past participle': Record<string, ParticipleForms>;
  indicative: MoodForms;
  subjunctive: MoodForms;
  imperative: MoodForms;
}

// ============================================================================
// Serialized shapes
// ============================================================================

export interface DefinitionDict {
  text: string;
}

/** A definition section as a plain JSON-compatible object */
export interface SectionDict {
  part_of_speech: string;
  word: string | null;
  extras: LeadExtra[];
  definitions: DefinitionDict[];
  conjugation?: Conjugation;
}

/** What a section without definitions serializes to */
export type EmptyDict = Record<string, never>;

/** A looked-up word as a plain JSON-compatible object */
export interface WordInfoDict {
  word: string;
  language: string;
  definition_sections: SectionDict[];
}

/**
 * Narrow a serialized section to the populated shape
 */
export function isSectionDict(dict: SectionDict | EmptyDict): dict is SectionDict {
  return 'part_of_speech' in dict;
}
