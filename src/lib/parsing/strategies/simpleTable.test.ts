import { describe, expect, it } from 'vitest';

import { parseBulletin, type ParseBulletinResult } from '@/lib/parsing/parse';

const FULL_DAY = '0:00-23:59';

function okSchedules(result: ParseBulletinResult) {
  if (result.status !== 'ok') throw new Error(`parse was empty: ${result.reason}`);
  return result.schedules;
}

describe('El Espinar simple table', () => {
  it('starts in the December before the current year', () => {
    const result = parseBulletin({
      regionId: 'el-espinar',
      pages: [
        'GUARDIAS EL ESPINAR\n30-dic 31-dic AV. HONTANILLA 18\n01-ene 02-ene 01-ene C/ MARQUES PERALES',
        '03-ene FARMACIA SAN RAFAEL',
      ],
      now: new Date('2025-03-01T12:00:00Z'),
    });

    const rows = okSchedules(result)['el-espinar'].map((s) => [
      s.date.day,
      s.date.year,
      s.shifts[FULL_DAY][0].name,
    ]);
    expect(rows).toEqual([
      [30, 2024, 'Farmacia Ana María Aparicio Hernán'],
      [31, 2024, 'Farmacia Ana María Aparicio Hernán'],
      [1, 2025, 'Farmacia Lda M J. Bartolomé Sánchez'],
      [2, 2025, 'Farmacia Lda M J. Bartolomé Sánchez'],
      [3, 2025, 'Farmacia San Rafael'],
    ]);
  });

  it('only matches San Rafael at the end of a line', () => {
    const result = parseBulletin({
      regionId: 'el-espinar',
      pages: ['SAN RAFAEL 04-ene\n05-ene SAN RAFAEL'],
      seedYear: 2025,
    });

    expect(okSchedules(result)['el-espinar'].map((s) => s.date.day)).toEqual([5]);
    expect(result.issues).toContainEqual({
      kind: 'incomplete-line',
      page: 1,
      detail: 'Dropped dates with no pharmacy label: 04-ene',
    });
  });

  it('does not carry pending dates across a page break', () => {
    const result = parseBulletin({
      regionId: 'el-espinar',
      pages: ['06-ene 07-ene AV. HONTANILLA 18\n08-ene', 'AV. HONTANILLA 18'],
      seedYear: 2025,
    });

    expect(okSchedules(result)['el-espinar'].map((s) => s.date.day)).toEqual([
      6, 7,
    ]);
    expect(result.issues.filter((i) => i.kind === 'incomplete-line')).toEqual([
      {
        kind: 'incomplete-line',
        page: 1,
        detail: 'Dropped dates with no pharmacy label: 08-ene',
      },
      {
        kind: 'incomplete-line',
        page: 2,
        detail: 'Dropped pharmacy label with no dates: HONTANILLA',
      },
    ]);
  });
});
