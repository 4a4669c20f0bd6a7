import { createReference } from '../src/models';
import { FilenameGenerator } from '../src/utils/filename';

describe('FilenameGenerator', () => {
  describe('extractLastName', () => {
    it('should take the part before the comma of the first author', () => {
      expect(FilenameGenerator.extractLastName('Smith, J. and Doe, A.')).toBe('Smith');
    });

    it('should return the whole name when there is no comma', () => {
      expect(FilenameGenerator.extractLastName('John Smith')).toBe('John Smith');
    });
  });

  describe('getStandardizedFilename', () => {
    it('should combine last name, year and the first three title words', () => {
      const ref = createReference('doe2021', 'article', {
        author: 'Doe, J.',
        year: '2021',
        title: 'A Study of Things!!',
      });

      expect(FilenameGenerator.getStandardizedFilename(ref)).toBe('Doe_2021_A_Study_of.pdf');
    });

    it('should use placeholders for missing fields', () => {
      const ref = createReference('anon', 'misc', {});

      expect(FilenameGenerator.getStandardizedFilename(ref)).toBe('Unknown_XXXX_Untitled.pdf');
    });

    it('should leave the title segment empty for an empty title', () => {
      const ref = createReference('doe2021', 'article', {
        author: 'Doe, J.',
        year: '2021',
        title: '',
      });

      expect(FilenameGenerator.getStandardizedFilename(ref)).toBe('Doe_2021_.pdf');
    });

    it('should keep non-ASCII letters and drop punctuation and LaTeX markup', () => {
      const accented = createReference('k1', 'article', {
        author: 'Müller, K.',
        year: '2019',
        title: 'Über-Analyse: Ça va',
      });
      const latex = createReference('k2', 'article', {
        author: 'Lee, B.',
        year: '2018',
        title: '{Deep} Learning for \\LaTeX{} Users',
      });

      expect(FilenameGenerator.getStandardizedFilename(accented)).toBe('Müller_2019_ÜberAnalyse_Ça_va.pdf');
      expect(FilenameGenerator.getStandardizedFilename(latex)).toBe('Lee_2018_Deep_Learning_for.pdf');
    });

    it('should read fields case-insensitively', () => {
      const ref = createReference('k', 'article', {
        Author: 'Doe, J.',
        YEAR: '2021',
        Title: 'Short',
      });

      expect(FilenameGenerator.getStandardizedFilename(ref)).toBe('Doe_2021_Short.pdf');
    });
  });
});
