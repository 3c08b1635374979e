/**
 * Tests for LanguageEntry
 */

import { describe, it, expect } from 'vitest';
import { Page } from '../../src/wiktionary/page.js';
import { SectionNotFoundError } from '../../src/lib/errors.js';
import { fixturePage } from '../helpers.js';

describe('LanguageEntry', () => {
  describe('sections', () => {
    it('should list every h3 under the language', () => {
      const entry = fixturePage('olvidar').getEntry('Spanish');
      expect(entry.sections.map((s) => s.title)).toEqual(['Etymology', 'Pronunciation', 'Verb']);
    });

    it('should belong to the entry', () => {
      const entry = fixturePage('olvidar').getEntry('Spanish');
      expect(entry.sections.every((s) => s.entry === entry)).toBe(true);
    });

    it('should keep each section to its own content', () => {
      const adjective = fixturePage('empleado').getEntry('Spanish').getSection('Adjective');

      expect(adjective.contains('employed')).toBe(true);
      expect(adjective.contains('employee')).toBe(false);
    });

    it('should be empty for an entry without h3 headings', () => {
      const page = new Page('x', '<h2><span class="mw-headline" id="Spanish">Spanish</span></h2><p>x</p>');
      expect(page.getEntry('Spanish').sections).toEqual([]);
    });
  });

  describe('getSection', () => {
    it('should find a section by exact title', () => {
      const verb = fixturePage('olvidar').getEntry('Spanish').getSection('Verb');
      expect(verb.word).toBe('olvidar');
    });

    it('should return the first section when titles repeat', () => {
      const page = new Page(
        'x',
        '<h2><span class="mw-headline" id="Spanish">Spanish</span></h2>' +
          '<h3><span class="mw-headline">Noun</span></h3><ol><li>first</li></ol>' +
          '<h3><span class="mw-headline">Noun</span></h3><ol><li>second</li></ol>'
      );

      expect(page.getEntry('Spanish').getSection('Noun').definitions.map((d) => d.text)).toEqual(['first']);
    });

    it('should reject an unknown title', () => {
      const entry = fixturePage('olvidar').getEntry('Spanish');

      expect(() => entry.getSection('Noun')).toThrow(SectionNotFoundError);
      expect(() => entry.getSection('Noun')).toThrow('No section with title: Noun');
    });
  });

  describe('definitions', () => {
    it('should keep only sections with definitions', () => {
      const entry = fixturePage('olvidar').getEntry('Spanish');
      expect(entry.getSectionsWithDefinitions().map((s) => s.title)).toEqual(['Verb']);
    });

    it('should list definitions of every section in page order', () => {
      const entry = fixturePage('empleado', 62175311).getEntry('Spanish');

      expect(entry.getSectionsWithDefinitions().map((s) => s.title)).toEqual([
        'Adjective',
        'Noun',
        'Participle',
      ]);
      expect(entry.definitionStrings).toEqual([
        'employed',
        'employee',
        'Masculine singular past participle of emplear.',
      ]);
    });

    it('should leave usage examples and synonyms out', () => {
      const entry = fixturePage('olvidar').getEntry('Spanish');

      expect(entry.definitionStrings).toEqual([
        '(transitive) to forget (be forgotten by)',
        '(reflexive, intransitive) to forget, elude, escape',
        '(with de, reflexive, intransitive) to forget, to leave behind',
      ]);
    });

    it('should link each definition to its section', () => {
      const [definition] = fixturePage('kauppa').getEntry('Finnish').definitions;
      expect(definition?.section.title).toBe('Noun');
      expect(definition?.extras).toEqual({});
    });
  });

  describe('equals', () => {
    it('should equal the same language of an equal page', () => {
      const a = fixturePage('olvidar').getEntry('Spanish');
      const b = fixturePage('olvidar').getEntry('Spanish');
      expect(a.equals(b)).toBe(true);
    });

    it('should differ between languages', () => {
      const page = fixturePage('olvidar');
      expect(page.getEntry('Spanish').equals(page.getEntry('Portuguese'))).toBe(false);
    });
  });

  it('should describe itself with page and language', () => {
    expect(fixturePage('olvidar').getEntry('Spanish').toString()).toBe("<Page('olvidar') → 'Spanish'>");
  });
});
