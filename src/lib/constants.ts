/**
 * Centralized constants for Wiktionary extraction
 *
 * Site markers, markup class names and layout indices shared across
 * modules. Import from here to keep them consistent.
 */

// ============================================================================
// Site
// ============================================================================

/** Default English Wiktionary origin */
export const DEFAULT_BASE_URL = 'https://en.wiktionary.org';

/** Default User-Agent sent with page requests */
export const DEFAULT_USER_AGENT = 'wikt-extract/0.1 (dictionary lookup library)';

/** Default request timeout in milliseconds (10 seconds) */
export const DEFAULT_TIMEOUT_MS = 10000;

/** Text Wiktionary renders on the page served for a missing article */
export const MISSING_ENTRY_MARKER = 'Wiktionary does not yet have an entry for';

// ============================================================================
// Markup
// ============================================================================

/** Heading tags ordered by rank, h1 first */
export const HEADING_TAGS: readonly string[] = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

/** Class on the span carrying a heading's label */
export const HEADLINE_CLASS = 'mw-headline';

/** Class on the headword element in a section's lead line */
export const HEADWORD_CLASS = 'headword';

/** Class on the gender annotation in a section's lead line */
export const GENDER_CLASS = 'gender';

/** Class on the collapsible container around inflection tables */
export const NAV_FRAME_CLASS = 'NavFrame';

/** Substring identifying the heading above a conjugation table */
export const CONJUGATION_HEADING_TEXT = 'Conjugation';

// ============================================================================
// Conjugation table layout
// ============================================================================

/** Person/number columns of inflected rows */
export const PERSON_CODES = ['s1', 's2', 's3', 'pl1', 'pl2', 'pl3'] as const;

/** Gender columns of the past participle rows */
export const PARTICIPLE_GENDERS = ['masculine', 'feminine'] as const;

/** Row indices of the fixed Spanish conjugation table */
export const CONJUGATION_ROWS = {
  infinitive: 0,
  gerund: 1,
  pastParticiple: [3, 4],
  indicative: [8, 9, 10, 11, 12],
  subjunctive: [15, 16, 17, 18],
  imperative: [21, 22],
} as const;

/** Minimum number of rows the table must have */
export const CONJUGATION_ROW_COUNT = 23;
