import { describe, expect, it } from 'vitest';

import {
  classifyLine,
  findAllLabels,
  findLabel,
  firstOccurrence,
  normalizeWhitespace,
  splitPageLines,
  type LabelledEntry,
} from '@/lib/parsing/text';

const entries: LabelledEntry[] = [
  { label: 'HONTANILLA', match: 'contains' },
  { label: 'SAN RAFAEL', match: 'suffix' },
];

describe('normalizeWhitespace', () => {
  it('collapses unicode spaces and tabs into one space', () => {
    expect(normalizeWhitespace('\u00A0 30-dic\u00A0\u2003 31-dic\tAv\u202FC.J. ')).toBe(
      '30-dic 31-dic Av C.J.',
    );
  });

  it('composes decomposed accents', () => {
    expect(normalizeWhitespace('SEPU\u0301LVEDA')).toBe('SEP\u00DALVEDA');
  });
});

describe('splitPageLines', () => {
  it('drops blank lines', () => {
    expect(splitPageLines('uno\n\n   \r\ndos\u00A0 \rtres')).toEqual([
      'uno',
      'dos',
      'tres',
    ]);
  });
});

describe('label matching', () => {
  it('matches case-insensitively by containment', () => {
    expect(findLabel('02-ene av. hontanilla 18', entries)?.label).toBe(
      'HONTANILLA',
    );
  });

  it('requires suffix labels at the end of the line', () => {
    expect(findLabel('02-ene FARMACIA SAN RAFAEL', entries)?.label).toBe(
      'SAN RAFAEL',
    );
    expect(findLabel('SAN RAFAEL 02-ene', entries)).toBeNull();
  });

  it('returns every label on the line', () => {
    expect(
      findAllLabels('HONTANILLA / SAN RAFAEL', entries).map((e) => e.label),
    ).toEqual(['HONTANILLA', 'SAN RAFAEL']);
  });

  it('locates the first occurrence of a label', () => {
    expect(firstOccurrence('ab\n  plaza LOS dolores', 'Plaza los Dolores')).toBe(3);
    expect(firstOccurrence('nothing here', 'Plaza los Dolores')).toBeNull();
  });
});

describe('classifyLine', () => {
  it('covers the four line kinds', () => {
    expect(classifyLine(true, true)).toBe('both');
    expect(classifyLine(true, false)).toBe('dates');
    expect(classifyLine(false, true)).toBe('label');
    expect(classifyLine(false, false)).toBe('none');
  });
});
