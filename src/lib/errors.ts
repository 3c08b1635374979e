/**
 * Typed error hierarchy for Wiktionary extraction
 *
 * Every failure the library raises carries a `kind` discriminator so
 * callers can branch on it without string matching.
 *
 * Usage:
 * ```ts
 * import { LanguageEntryNotFoundError, isTypedError } from './lib/errors.js';
 *
 * try {
 *   page.getEntry('Spanish');
 * } catch (error) {
 *   if (error instanceof LanguageEntryNotFoundError) { ... }
 *   if (isTypedError(error) && error.kind === 'PAGE_NOT_FOUND') { ... }
 * }
 * ```
 */

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'PAGE_NOT_FOUND'
  | 'LANGUAGE_ENTRY_NOT_FOUND'
  | 'SECTION_NOT_FOUND'
  | 'INVALID_ELEMENT_KIND'
  | 'INVALID_OWNERSHIP'
  | 'MARKUP_LAYOUT'
  | 'FETCH';

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/**
 * The fetched page is Wiktionary's "no entry yet" page
 */
export class PageNotFoundError extends Error implements TypedError {
  readonly kind = 'PAGE_NOT_FOUND' as const;

  constructor(message = 'No Wiktionary page found') {
    super(message);
    this.name = 'PageNotFoundError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, PageNotFoundError.prototype);
  }
}

/**
 * The page has no heading anchored at the requested language
 */
export class LanguageEntryNotFoundError extends Error implements TypedError {
  readonly kind = 'LANGUAGE_ENTRY_NOT_FOUND' as const;

  constructor(readonly language: string) {
    super(`No ${language} entry found from Wiktionary page`);
    this.name = 'LanguageEntryNotFoundError';
    Object.setPrototypeOf(this, LanguageEntryNotFoundError.prototype);
  }
}

/**
 * Lookup of a section by title found nothing
 */
export class SectionNotFoundError extends Error implements TypedError {
  readonly kind = 'SECTION_NOT_FOUND' as const;

  constructor(readonly title: string) {
    super(`No section with title: ${title}`);
    this.name = 'SectionNotFoundError';
    Object.setPrototypeOf(this, SectionNotFoundError.prototype);
  }
}

/**
 * A heading-only operation received some other element
 */
export class InvalidElementKindError extends Error implements TypedError {
  readonly kind = 'INVALID_ELEMENT_KIND' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidElementKindError';
    Object.setPrototypeOf(this, InvalidElementKindError.prototype);
  }
}

/**
 * A section was attached to something other than a language entry
 */
export class InvalidOwnershipError extends Error implements TypedError {
  readonly kind = 'INVALID_OWNERSHIP' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidOwnershipError';
    Object.setPrototypeOf(this, InvalidOwnershipError.prototype);
  }
}

/**
 * Page markup does not have the layout the extractor was written for.
 * Not recoverable: the upstream site changed.
 */
export class MarkupLayoutError extends Error implements TypedError {
  readonly kind = 'MARKUP_LAYOUT' as const;

  constructor(message: string) {
    super(message);
    this.name = 'MarkupLayoutError';
    Object.setPrototypeOf(this, MarkupLayoutError.prototype);
  }
}

/**
 * HTTP request for a page failed
 */
export class FetchError extends Error implements TypedError {
  readonly kind = 'FETCH' as const;

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'FetchError';
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

/**
 * Type guard to check if an error is one of ours
 */
export function isTypedError(error: unknown): error is TypedError {
  return error instanceof Error && 'kind' in error && typeof error.kind === 'string';
}

/**
 * Whether an error means "the thing looked up is not there", as opposed
 * to a programming or layout failure
 */
export function isLookupError(error: unknown): boolean {
  if (!isTypedError(error)) return false;
  switch (error.kind) {
    case 'PAGE_NOT_FOUND':
    case 'LANGUAGE_ENTRY_NOT_FOUND':
    case 'SECTION_NOT_FOUND':
      return true;
    default:
      return false;
  }
}
