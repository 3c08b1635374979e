/**
 * Spanish conjugation table parsing
 *
 * The table is read by fixed row index, not by header text. Layout:
 *
 *   0      infinitive
 *   1      gerund
 *   2      past participle header (masculine | feminine)
 *   3-4    past participle, singular and plural
 *   5-7    spacer and indicative headers
 *   8-12   indicative: present, imperfect, preterite, future, conditional
 *   13-14  spacer and subjunctive header
 *   15-18  subjunctive: present, imperfect (ra), imperfect (se), future
 *   19-20  spacer and imperative header
 *   21-22  imperative: affirmative, negative
 *
 * Any other layout fails with MarkupLayoutError.
 */

import type { Document, Element } from 'domhandler';
import {
  CONJUGATION_HEADING_TEXT,
  CONJUGATION_ROWS,
  CONJUGATION_ROW_COUNT,
  NAV_FRAME_CLASS,
  PARTICIPLE_GENDERS,
  PERSON_CODES,
} from '../lib/constants.js';
import { MarkupLayoutError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { children, findAll, findFirst, findNext, hasClass, textContent } from '../dom/tree.js';
import type {
  Conjugation,
  ConjugatedForm,
  MoodForms,
  ParticipleForms,
  PersonForms,
} from './types.js';

function layoutError(message: string): MarkupLayoutError {
  loggers.parse
    .withOperation('parseConjugationTable')
    .warn('Unexpected conjugation table layout', { reason: message });
  return new MarkupLayoutError(message);
}

/**
 * The NavFrame container following the first h4 whose text mentions
 * "Conjugation", or undefined when the section has no table.
 */
export function findConjugationContainer(fragment: Document): Element | undefined {
  const heading = findAll(fragment, (el) => el.name === 'h4').find((h4) =>
    textContent(h4).includes(CONJUGATION_HEADING_TEXT)
  );
  if (!heading) return undefined;

  return findNext(
    heading,
    (el) => el.name === 'div' && hasClass(el, NAV_FRAME_CLASS),
    fragment
  );
}

/**
 * Form spans of a cell at any depth. A span inside another form span is
 * part of that form and is not counted again.
 */
function formSpans(node: Element): Element[] {
  return children(node).flatMap((el) => (el.name === 'span' ? [el] : formSpans(el)));
}

/**
 * Value of one form cell.
 *
 * - no form span: null
 * - one: its trimmed text, null if blank
 * - two or more: `{ tú, vos }` from the first two
 */
export function parseFormCell(cell: Element): ConjugatedForm {
  const [first, second] = formSpans(cell);
  if (!first) return null;
  if (!second) {
    const text = textContent(first).trim();
    return text === '' ? null : text;
  }
  return {
    'tú': textContent(first).trim(),
    vos: textContent(second).trim(),
  };
}

function rowAt(rows: readonly Element[], index: number): Element {
  const row = rows[index];
  if (!row) {
    throw layoutError(`Conjugation table has no row ${index}`);
  }
  return row;
}

function dataCells(row: Element, index: number, expected: number): Element[] {
  const cells = children(row).filter((el) => el.name === 'td');
  if (cells.length !== expected) {
    throw layoutError(
      `Conjugation row ${index} has ${cells.length} data cells, expected ${expected}`
    );
  }
  return cells;
}

function cellAt(cells: readonly Element[], index: number): ConjugatedForm {
  const cell = cells[index];
  if (!cell) {
    throw layoutError(`Missing data cell ${index}`);
  }
  return parseFormCell(cell);
}

/** Header text of a complex row, used as its key */
function rowKey(row: Element, index: number): string {
  const header = children(row).find((el) => el.name === 'th');
  if (!header) {
    throw layoutError(`Conjugation row ${index} has no header cell`);
  }
  return textContent(header).trim();
}

function parseSimpleRow(rows: readonly Element[], index: number): string {
  const [cell] = dataCells(rowAt(rows, index), index, 1);
  return cell ? textContent(cell).trim() : '';
}

function parsePersonRow(rows: readonly Element[], index: number): [string, PersonForms] {
  const row = rowAt(rows, index);
  const cells = dataCells(row, index, PERSON_CODES.length);
  const forms: PersonForms = {
    s1: cellAt(cells, 0),
    s2: cellAt(cells, 1),
    s3: cellAt(cells, 2),
    pl1: cellAt(cells, 3),
    pl2: cellAt(cells, 4),
    pl3: cellAt(cells, 5),
  };
  return [rowKey(row, index), forms];
}

function parseParticipleRow(rows: readonly Element[], index: number): [string, ParticipleForms] {
  const row = rowAt(rows, index);
  const cells = dataCells(row, index, PARTICIPLE_GENDERS.length);
  return [rowKey(row, index), { masculine: cellAt(cells, 0), feminine: cellAt(cells, 1) }];
}

function parseMood(rows: readonly Element[], indices: readonly number[]): MoodForms {
  return Object.fromEntries(indices.map((index) => parsePersonRow(rows, index)));
}

/**
 * Parse the conjugation table inside a NavFrame container.
 *
 * @throws {MarkupLayoutError} If the table is missing or its rows do not
 *   match the fixed layout
 */
export function parseConjugationTable(container: Element): Conjugation {
  const table = findFirst(container, (el) => el.name === 'table');
  if (!table) {
    throw layoutError('Conjugation container holds no table');
  }

  const rows = findAll(table, (el) => el.name === 'tr');
  if (rows.length < CONJUGATION_ROW_COUNT) {
    throw layoutError(
      `Conjugation table has ${rows.length} rows, expected at least ${CONJUGATION_ROW_COUNT}`
    );
  }

  return {
    infinitive: parseSimpleRow(rows, CONJUGATION_ROWS.infinitive),
    gerund: parseSimpleRow(rows, CONJUGATION_ROWS.gerund),
    'past participle': Object.fromEntries(
      CONJUGATION_ROWS.pastParticiple.map((index) => parseParticipleRow(rows, index))
    ),
    indicative: parseMood(rows, CONJUGATION_ROWS.indicative),
    subjunctive: parseMood(rows, CONJUGATION_ROWS.subjunctive),
    imperative: parseMood(rows, CONJUGATION_ROWS.imperative),
  };
}
