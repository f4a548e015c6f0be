import { describe, expect, it } from 'vitest';

import { detectYear, hasLeadingDecemberDates } from '@/lib/parsing/yearDetection';

const june2025 = new Date('2025-06-01T12:00:00Z');

describe('detectYear', () => {
  it('prefers the rightmost year in the source URL', () => {
    const result = detectYear({
      text: 'SERVICIOS DE URGENCIA RURALES',
      sourceUrl:
        'https://cofsegovia.com/wp-content/uploads/2026/01/RURALES-2025.pdf',
      now: new Date('2026-03-01T12:00:00Z'),
    });
    expect(result).toMatchObject({
      year: 2025,
      source: 'url',
      isValid: true,
      decemberAdjusted: false,
    });
  });

  it('moves back one year when the bulletin opens in December', () => {
    const result = detectYear({
      text: 'GUARDIAS 2025\n02-dic-24 RIAZA',
      now: june2025,
    });
    expect(result).toMatchObject({
      year: 2024,
      detectedYear: 2025,
      source: 'pdf',
      decemberAdjusted: true,
      isValid: true,
    });
  });

  it('applies the December adjustment to URL years too', () => {
    const result = detectYear({
      text: '30-dic 31-dic Av C.J. CELA',
      sourceUrl: 'https://example.test/GUARDIAS-CUELLAR_2025.pdf',
      now: june2025,
    });
    expect(result.year).toBe(2024);
    expect(result.source).toBe('url');
  });

  it('ignores December dates beyond the first 500 characters', () => {
    const text = `CALENDARIO 2025 ${'x'.repeat(600)} 02-dic`;
    expect(hasLeadingDecemberDates(text)).toBe(false);
    expect(detectYear({ text, now: june2025 }).year).toBe(2025);
  });

  it('counts the 500 characters before collapsing whitespace', () => {
    const text = `CALENDARIO 2025${' '.repeat(600)}02-dic`;
    expect(hasLeadingDecemberDates(text)).toBe(false);
    expect(hasLeadingDecemberDates(`CALENDARIO 2025${' '.repeat(400)}02-dic`)).toBe(true);
  });

  it('uses the first year of an explicit span', () => {
    const result = detectYear({ text: 'CALENDARIO 2024-2025', now: june2025 });
    expect(result).toMatchObject({ year: 2024, source: 'pdf', warning: null });
  });

  it('tolerates separators between digits', () => {
    const result = detectYear({ text: 'GUARDIAS 2 0 2 5', now: june2025 });
    expect(result).toMatchObject({ year: 2025, source: 'flexible' });
  });

  it('skips an implausible URL year and falls through to the text', () => {
    const result = detectYear({
      text: 'GUARDIAS 2025',
      sourceUrl: 'https://example.test/2019/guardias.pdf',
      now: june2025,
    });
    expect(result).toMatchObject({ year: 2025, source: 'pdf', isValid: true });
  });

  it('warns when the year is exactly two years away', () => {
    const result = detectYear({ text: 'CALENDARIO 2027', now: june2025 });
    expect(result.year).toBe(2027);
    expect(result.isValid).toBe(true);
    expect(result.warning).toBe(
      'Year 2027 is 2 years away from 2025; check the bulletin.',
    );
  });

  it('falls back to the current year and flags the result', () => {
    const result = detectYear({ text: 'SERVICIOS DE URGENCIA', now: june2025 });
    expect(result).toMatchObject({
      year: 2025,
      source: 'fallback-current',
      isValid: false,
    });
    expect(result.warning).toBe(
      'No year found in the source URL or document text; using current year 2025.',
    );
  });

  it('marks December-adjusted fallbacks', () => {
    const result = detectYear({ text: 'SERVICIOS\n05-dic-24 COCA', now: june2025 });
    expect(result).toMatchObject({
      year: 2024,
      source: 'fallback-december',
      isValid: false,
    });
  });
});
