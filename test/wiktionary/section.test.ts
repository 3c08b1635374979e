/**
 * Tests for Section
 */

import { describe, it, expect } from 'vitest';
import { Page } from '../../src/wiktionary/page.js';
import { assertEntryOwner } from '../../src/wiktionary/section.js';
import { InvalidOwnershipError, MarkupLayoutError } from '../../src/lib/errors.js';
import { fixturePage } from '../helpers.js';

function spanish(name: 'olvidar' | 'empleado') {
  return fixturePage(name, name === 'empleado' ? 62175311 : undefined).getEntry('Spanish');
}

describe('Section', () => {
  describe('lead line', () => {
    it('should read the lead paragraph as plain text', () => {
      const verb = spanish('olvidar').getSection('Verb');

      expect(verb.lead).toBe(
        'olvidar (first-person singular present olvido, first-person singular preterite olvidé, past participle olvidado)'
      );
    });

    it('should read the headword', () => {
      expect(spanish('olvidar').getSection('Verb').word).toBe('olvidar');
    });

    it('should read labelled forms', () => {
      expect(spanish('olvidar').getSection('Verb').leadExtras).toEqual([
        { attribute: 'first-person singular present', value: 'olvido' },
        { attribute: 'first-person singular preterite', value: 'olvidé' },
        { attribute: 'past participle', value: 'olvidado' },
      ]);
    });

    it('should read gender and the forms after it', () => {
      const noun = spanish('empleado').getSection('Noun');

      expect(noun.gender).toBe('m');
      expect(noun.lead).toBe('empleado m (plural empleados, feminine empleada)');
      expect(noun.leadExtras).toEqual([
        { attribute: 'plural', value: 'empleados' },
        { attribute: 'feminine', value: 'empleada' },
      ]);
    });

    it('should have no headword, gender or forms without a headword', () => {
      const etymology = spanish('empleado').getSection('Etymology');

      expect(etymology.lead).toBe('From emplear + -ado.');
      expect(etymology.word).toBeUndefined();
      expect(etymology.gender).toBeUndefined();
      expect(etymology.leadExtras).toEqual([]);
    });

    it('should have no lead without a paragraph', () => {
      const pronunciation = spanish('olvidar').getSection('Pronunciation');

      expect(pronunciation.leadParagraph).toBeUndefined();
      expect(pronunciation.lead).toBeUndefined();
    });
  });

  describe('title', () => {
    it('should fall back to the heading text without a headline span', () => {
      const page = new Page(
        'x',
        '<h2><span id="Spanish">Spanish</span></h2><h3> Verb </h3><p>x</p><ol><li>y</li></ol>'
      );
      const entry = page.getEntry('Spanish');

      expect(entry.title).toBe('Spanish');
      expect(entry.sections.map((s) => s.title)).toEqual(['Verb']);
    });
  });

  describe('definitions', () => {
    it('should point back at the section', () => {
      const verb = spanish('olvidar').getSection('Verb');
      expect(verb.definitions.every((d) => d.section === verb)).toBe(true);
    });

    it('should be empty for sections without a definition list', () => {
      const pronunciation = spanish('olvidar').getSection('Pronunciation');

      expect(pronunciation.definitions).toEqual([]);
      expect(pronunciation.hasDefinitions()).toBe(false);
    });
  });

  describe('conjugation', () => {
    it('should be undefined without a conjugation heading', () => {
      expect(spanish('empleado').getSection('Noun').conjugation).toBeUndefined();
    });

    it('should parse the table under the conjugation heading', () => {
      expect(spanish('olvidar').getSection('Verb').conjugation?.infinitive).toBe('olvidar');
    });

    it('should reject a conjugation block without a table', () => {
      const verb = fixturePage('olvidar').getEntry('Portuguese').getSection('Verb');

      expect(() => verb.conjugation).toThrow(MarkupLayoutError);
      expect(() => verb.conjugation).toThrow('Conjugation container holds no table');
    });
  });

  describe('toDict', () => {
    it('should serialize a section without conjugation', () => {
      expect(spanish('empleado').getSection('Noun').toDict()).toEqual({
        part_of_speech: 'Noun',
        word: 'empleado',
        extras: [
          { attribute: 'plural', value: 'empleados' },
          { attribute: 'feminine', value: 'empleada' },
        ],
        definitions: [{ text: 'employee' }],
      });
    });

    it('should omit the conjugation key when there is no table', () => {
      expect('conjugation' in spanish('empleado').getSection('Noun').toDict()).toBe(false);
    });

    it('should include the conjugation when there is a table', () => {
      const dict = spanish('olvidar').getSection('Verb').toDict();

      expect(dict).toMatchObject({
        part_of_speech: 'Verb',
        word: 'olvidar',
        conjugation: { infinitive: 'olvidar', gerund: 'olvidando' },
      });
    });

    it('should serialize a section without definitions as an empty object', () => {
      expect(spanish('olvidar').getSection('Etymology').toDict()).toEqual({});
    });

    it('should use null for a missing headword', () => {
      const page = new Page(
        'x',
        '<h2><span class="mw-headline" id="Spanish">Spanish</span></h2>' +
          '<h3><span class="mw-headline">Noun</span></h3><ol><li>sense</li></ol>'
      );

      expect(page.getEntry('Spanish').getSection('Noun').toDict()).toEqual({
        part_of_speech: 'Noun',
        word: null,
        extras: [],
        definitions: [{ text: 'sense' }],
      });
    });
  });

  describe('assertEntryOwner', () => {
    it('should accept a language entry', () => {
      expect(() => assertEntryOwner(spanish('olvidar'))).not.toThrow();
    });

    it('should reject a section as parent', () => {
      const verb = spanish('olvidar').getSection('Verb');

      expect(() => assertEntryOwner(verb)).toThrow(InvalidOwnershipError);
      expect(() => assertEntryOwner(verb)).toThrow('A section cannot be the parent of another section');
    });

    it('should reject anything else', () => {
      expect(() => assertEntryOwner(fixturePage('olvidar'))).toThrow(
        'A section must belong to a language entry'
      );
      expect(() => assertEntryOwner({ language: 'Spanish' })).toThrow(InvalidOwnershipError);
    });
  });

  it('should describe itself with page, language and title', () => {
    expect(spanish('empleado').getSection('Noun').toString()).toBe(
      "<Page('empleado', revision=62175311) → 'Spanish' → 'Noun'>"
    );
  });
});
