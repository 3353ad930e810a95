import { z } from 'zod';
import type { ColumnSpec } from '../config/datasets.js';
import { normalizeNullableString, standardizeColumnName } from '../canon/rules.js';

export const columnTypeSchema = z.enum(['id', 'text', 'integer', 'decimal', 'money', 'date']);

export type ColumnType = z.infer<typeof columnTypeSchema>;

export type CellValue = string | null;

export type DatasetRow = Readonly<Record<string, CellValue>>;

/** A loaded table. Columns are keyed by their canonical (standardized, de-aliased) name. */
export interface Dataset {
  readonly name: string;
  readonly source: string;
  readonly columns: Readonly<Record<string, ColumnType>>;
  readonly rows: readonly DatasetRow[];
}

export interface CreateDatasetInput {
  name: string;
  source: string;
  headers: readonly string[];
  records: ReadonlyArray<ReadonlyArray<CellValue>>;
  columns?: Readonly<Record<string, ColumnSpec>>;
}

function buildAliasIndex(columns: Readonly<Record<string, ColumnSpec>>): Map<string, string> {
  const index = new Map<string, string>();
  for (const [canonical, spec] of Object.entries(columns)) {
    index.set(canonical, canonical);
    for (const alias of spec.aliases ?? []) {
      if (!index.has(alias)) {
        index.set(alias, canonical);
      }
    }
  }
  return index;
}

export function createDataset(input: CreateDatasetInput): Dataset {
  const declared = input.columns ?? {};
  const aliasIndex = buildAliasIndex(declared);

  const columnNames = input.headers.map((header) => {
    const standardized = standardizeColumnName(header);
    return aliasIndex.get(standardized) ?? standardized;
  });

  const seen = new Set<string>();
  for (const [index, columnName] of columnNames.entries()) {
    if (columnName.length === 0) {
      throw new Error(`Dataset "${input.name}" has an empty header in column ${index + 1} (${input.source}).`);
    }
    if (seen.has(columnName)) {
      throw new Error(
        `Dataset "${input.name}" has more than one column resolving to "${columnName}" (${input.source}).`
      );
    }
    seen.add(columnName);
  }

  const columns: Record<string, ColumnType> = {};
  for (const columnName of columnNames) {
    columns[columnName] = declared[columnName]?.type ?? 'text';
  }

  const rows = input.records.map((record) =>
    Object.freeze(
      Object.fromEntries(
        columnNames.map((columnName, index) => [columnName, normalizeNullableString(record[index])])
      )
    )
  );

  return Object.freeze({
    name: input.name,
    source: input.source,
    columns: Object.freeze(columns),
    rows: Object.freeze(rows)
  });
}

export function hasColumns(dataset: Dataset, ...columns: string[]): boolean {
  return columns.every((column) => Object.prototype.hasOwnProperty.call(dataset.columns, column));
}

export function requireColumn(dataset: Dataset, column: string): void {
  if (!hasColumns(dataset, column)) {
    throw new Error(`Dataset "${dataset.name}" has no "${column}" column.`);
  }
}
