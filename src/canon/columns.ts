import { requireColumn, type CellValue, type Dataset } from '../ingress/dataset.js';
import { parseDateCell, parseNumberCell } from './rules.js';

function cellContext(dataset: Dataset, column: string, rowIndex: number): string {
  // +2: one for the header line, one for 1-based line numbers.
  return `column "${column}" of ${dataset.name} (line ${rowIndex + 2})`;
}

export function cellValues(dataset: Dataset, column: string): CellValue[] {
  requireColumn(dataset, column);
  return dataset.rows.map((row) => row[column] ?? null);
}

/** Numeric values by row, null where the cell is empty. Throws on the first malformed cell. */
export function numberColumn(dataset: Dataset, column: string): Array<number | null> {
  return cellValues(dataset, column).map((value, index) =>
    parseNumberCell(value, cellContext(dataset, column, index))
  );
}

export function presentNumbers(dataset: Dataset, column: string): number[] {
  return numberColumn(dataset, column).filter((value): value is number => value !== null);
}

export function dateColumn(dataset: Dataset, column: string): Array<number | null> {
  return cellValues(dataset, column).map((value, index) =>
    parseDateCell(value, cellContext(dataset, column, index))
  );
}

export function nullCount(dataset: Dataset, column?: string): number {
  if (column !== undefined) {
    return cellValues(dataset, column).filter((value) => value === null).length;
  }
  let total = 0;
  for (const row of dataset.rows) {
    for (const name of Object.keys(dataset.columns)) {
      if ((row[name] ?? null) === null) {
        total += 1;
      }
    }
  }
  return total;
}

export function nonNullCount(dataset: Dataset, column: string): number {
  return dataset.rows.length - nullCount(dataset, column);
}

/** Occurrences beyond the first of each value; empty cells compare equal to each other. */
export function duplicateCount<T>(values: readonly T[]): number {
  const seen = new Set<T>();
  let duplicates = 0;
  for (const value of values) {
    if (seen.has(value)) {
      duplicates += 1;
    } else {
      seen.add(value);
    }
  }
  return duplicates;
}

export function distinctCount(dataset: Dataset, column: string): number {
  return new Set(cellValues(dataset, column).filter((value) => value !== null)).size;
}

export function countWhere<T>(values: readonly T[], predicate: (value: T) => boolean): number {
  return values.reduce((count, value) => (predicate(value) ? count + 1 : count), 0);
}
