/**
 * wikt-extract - Main Library Entry Point
 *
 * Re-exports the lookup API, the entry model and the tree helpers it is
 * built on.
 */

// ============================================================================
// LOOKUP
// ============================================================================
export { lookupWord, renderList, WordInfo } from './wiktionary/word-info.js';
export type { LookupOptions, RenderListOptions } from './wiktionary/word-info.js';

export {
  defaultHttpClient,
  fetchPageMarkup,
  pageUrl,
} from './wiktionary/fetch.js';
export type { FetchOptions, HttpClient, HttpRequestOptions } from './wiktionary/fetch.js';

// ============================================================================
// ENTRY MODEL
// ============================================================================
export { Page } from './wiktionary/page.js';
export type { PageOptions } from './wiktionary/page.js';
export { LanguageEntry } from './wiktionary/entry.js';
export { Section, assertEntryOwner } from './wiktionary/section.js';
export { HeadingScope } from './wiktionary/scope.js';
export { parseLeadExtras, standardizeSpaces } from './wiktionary/lead.js';
export { definitionListItems, definitionText, parseDefinitions } from './wiktionary/definitions.js';
export {
  findConjugationContainer,
  parseConjugationTable,
  parseFormCell,
} from './wiktionary/conjugation.js';
export { isSectionDict } from './wiktionary/types.js';
export type {
  Conjugation,
  ConjugatedForm,
  Definition,
  DefinitionDict,
  DualForm,
  EmptyDict,
  LeadExtra,
  MoodForms,
  ParticipleForms,
  ParticipleGender,
  PersonCode,
  PersonForms,
  SectionDict,
  WordInfoDict,
} from './wiktionary/types.js';

// ============================================================================
// TREE HELPERS
// ============================================================================
export { collectHeadingSiblings, collectSiblingsUntil } from './dom/siblings.js';
export { buildFragment } from './dom/fragment.js';
export {
  parseDocument,
  parseFragment,
  renderMarkup,
  children,
  childNodes,
  nextSiblings,
  nextElementSibling,
  findFirst,
  findAll,
  findNext,
  isElementNamed,
  hasClass,
  headingRank,
  textContent,
  nodesEqual,
} from './dom/tree.js';
export type { ElementPredicate } from './dom/tree.js';

// ============================================================================
// ERRORS, CONFIG, LOGGING
// ============================================================================
export {
  PageNotFoundError,
  LanguageEntryNotFoundError,
  SectionNotFoundError,
  InvalidElementKindError,
  InvalidOwnershipError,
  MarkupLayoutError,
  FetchError,
  isTypedError,
  isLookupError,
} from './lib/errors.js';
export type { ErrorKind, TypedError } from './lib/errors.js';

export {
  ExtractorConfigSchema,
  validateConfig,
  safeValidateConfig,
  formatValidationError,
} from './lib/config-schema.js';
export type { ExtractorConfig, ExtractorConfigInput } from './lib/config-schema.js';
export { loadConfig } from './lib/config.js';

export {
  Logger,
  createLogger,
  loggers,
  setLoggerProvider,
  resetLoggerProvider,
} from './lib/logger.js';
export type {
  LogLevel,
  LogEntry,
  LoggerOptions,
  LookupFields,
  LoggerProvider,
} from './lib/logger.js';
