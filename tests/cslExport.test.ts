import { formatBibliography, toCslJson } from '../src/cslExport';
import { createReference } from '../src/models';

const references = [
  createReference('lee2019', 'book', { author: 'Lee, B.', title: 'Widgets', year: '2019', publisher: 'Acme' }),
  createReference('doe2021', 'article', { author: 'Doe, J.', title: 'Gadgets', year: '2021', journal: 'Gadget Review' }),
];

function titles(json: string): unknown[] {
  const data: unknown = JSON.parse(json);
  if (!Array.isArray(data)) {
    throw new Error('expected an array');
  }
  return data.map((item: unknown) =>
    typeof item === 'object' && item !== null && 'title' in item ? item.title : undefined
  );
}

describe('toCslJson', () => {
  it('should convert every reference in order', () => {
    expect(titles(toCslJson(references))).toEqual(['Widgets', 'Gadgets']);
  });

  it('should return an empty array for no references', () => {
    expect(toCslJson([])).toBe('[]');
  });
});

describe('formatBibliography', () => {
  it('should dispatch on the format', () => {
    expect(formatBibliography(references, 'bibtex')).toContain('@book{lee2019,');
    expect(titles(formatBibliography(references, 'csl-json'))).toHaveLength(2);
  });
});
