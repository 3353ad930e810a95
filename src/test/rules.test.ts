import { describe, expect, it } from 'vitest';
import {
  formatDateTimeUtc,
  normalizeNullableString,
  parseDateCell,
  parseNumberCell,
  standardizeColumnName
} from '../canon/rules.js';

describe('column name rules', () => {
  it('standardizes headers to snake case', () => {
    expect(standardizeColumnName('\uFEFF Total Revenue ')).toBe('total_revenue');
    expect(standardizeColumnName('Product_ID')).toBe('product_id');
  });

  it('treats only empty cells as null', () => {
    expect(normalizeNullableString('')).toBeNull();
    expect(normalizeNullableString(undefined)).toBeNull();
    expect(normalizeNullableString('   ')).toBe('   ');
    expect(normalizeNullableString(' P1 ')).toBe(' P1 ');
  });
});

describe('cell parsing', () => {
  it('parses numbers and keeps nulls', () => {
    expect(parseNumberCell('12.5', 'ctx')).toBe(12.5);
    expect(parseNumberCell('-3', 'ctx')).toBe(-3);
    expect(parseNumberCell(null, 'ctx')).toBeNull();
  });

  it('rejects non-numeric values with their location', () => {
    expect(() => parseNumberCell('abc', 'column "cost" of Fact_Sales (line 3)')).toThrow(
      'Non-numeric value "abc" in column "cost" of Fact_Sales (line 3).'
    );
  });

  it('reads dates without an offset as UTC', () => {
    expect(parseDateCell('2024-01-02', 'ctx')).toBe(Date.UTC(2024, 0, 2));
    expect(parseDateCell('2024-01-02 10:30:00', 'ctx')).toBe(Date.UTC(2024, 0, 2, 10, 30));
    expect(parseDateCell('2024-01-02T10:30:00+01:00', 'ctx')).toBe(Date.UTC(2024, 0, 2, 9, 30));
  });

  it('rejects impossible calendar dates', () => {
    expect(() => parseDateCell('2024-02-30', 'ctx')).toThrow('Unparseable date "2024-02-30" in ctx.');
    expect(() => parseDateCell('02/01/2024', 'ctx')).toThrow('Unparseable date');
  });

  it('formats epoch milliseconds as a UTC timestamp', () => {
    expect(formatDateTimeUtc(Date.UTC(2024, 0, 2, 9, 30))).toBe('2024-01-02 09:30:00');
  });
});
