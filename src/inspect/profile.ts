import { cellValues, duplicateCount, nullCount } from '../canon/columns.js';
import { hasColumns, type ColumnType, type Dataset } from '../ingress/dataset.js';
import { formatInteger, formatPercent, sharePct } from '../report/format.js';

export const KEY_COLUMNS = ['customer_id', 'product_id', 'store_id', 'date_id', 'sale_id', 'trans_id'] as const;

export interface ColumnProfile {
  name: string;
  type: ColumnType;
  nonNull: number;
  nulls: number;
}

export interface TableProfile {
  name: string;
  source: string;
  rowCount: number;
  columns: ColumnProfile[];
  /** Key columns present in the table that repeat a value. */
  duplicateKeys: Array<{ column: string; duplicates: number }>;
}

export function profileDataset(dataset: Dataset): TableProfile {
  const columns = Object.entries(dataset.columns).map(([name, type]) => {
    const nulls = nullCount(dataset, name);
    return { name, type, nonNull: dataset.rows.length - nulls, nulls };
  });

  const duplicateKeys = KEY_COLUMNS.filter((column) => hasColumns(dataset, column))
    .map((column) => ({ column, duplicates: duplicateCount(cellValues(dataset, column)) }))
    .filter((entry) => entry.duplicates > 0);

  return {
    name: dataset.name,
    source: dataset.source,
    rowCount: dataset.rows.length,
    columns,
    duplicateKeys
  };
}

export function formatTableProfile(profile: TableProfile): string[] {
  const lines = [
    `TABLE: ${profile.name}`,
    `Path: ${profile.source}`,
    `  Rows: ${formatInteger(profile.rowCount)}`,
    `  Columns: ${profile.columns.length}`,
    '',
    '  Column Names and Data Types:'
  ];

  for (const column of profile.columns) {
    lines.push(
      `    - ${column.name.padEnd(30)} (${column.type.padEnd(7)}) | Non-null: ${formatInteger(column.nonNull).padStart(6)} | Nulls: ${formatInteger(column.nulls).padStart(6)}`
    );
  }

  const withNulls = profile.columns.filter((column) => column.nulls > 0);
  lines.push('');
  if (withNulls.length === 0) {
    lines.push('  ✓ No missing values');
  } else {
    lines.push('  Missing Values:');
    for (const column of withNulls) {
      const pct = formatPercent(sharePct(column.nulls, profile.rowCount));
      lines.push(`    - ${column.name}: ${formatInteger(column.nulls)} (${pct})`);
    }
  }

  lines.push('');
  if (profile.duplicateKeys.length === 0) {
    lines.push('  ✓ No data quality issues detected');
  } else {
    lines.push('  Data Quality Issues:');
    for (const entry of profile.duplicateKeys) {
      lines.push(`    ⚠ ${formatInteger(entry.duplicates)} duplicate ${entry.column} values found`);
    }
  }

  return lines;
}
