import { cellValues } from '../canon/columns.js';
import { hasColumns, type Dataset } from '../ingress/dataset.js';
import { formatInteger } from '../report/format.js';

export interface ForeignKey {
  column: string;
  dimension: string;
}

export const FACT_FOREIGN_KEYS: readonly ForeignKey[] = [
  { column: 'product_id', dimension: 'Dim_Product' },
  { column: 'store_id', dimension: 'Dim_Store' },
  { column: 'customer_id', dimension: 'Dim_Customer' },
  { column: 'date_id', dimension: 'Dim_Date' }
];

export interface OrphanCheck extends ForeignKey {
  /** Distinct non-empty fact keys with no matching dimension row. */
  orphans: number;
}

function distinctKeys(dataset: Dataset, column: string): Set<string> {
  return new Set(cellValues(dataset, column).filter((value): value is string => value !== null));
}

/** Keys are checked only where both the fact and the dimension carry the column. */
export function findOrphanKeys(fact: Dataset, dimensions: ReadonlyMap<string, Dataset>): OrphanCheck[] {
  const checks: OrphanCheck[] = [];
  for (const key of FACT_FOREIGN_KEYS) {
    const dimension = dimensions.get(key.dimension);
    if (!dimension || !hasColumns(fact, key.column) || !hasColumns(dimension, key.column)) {
      continue;
    }
    const known = distinctKeys(dimension, key.column);
    const orphans = [...distinctKeys(fact, key.column)].filter((value) => !known.has(value)).length;
    checks.push({ ...key, orphans });
  }
  return checks;
}

export function formatOrphanCheck(check: OrphanCheck): string {
  return check.orphans === 0
    ? `✓ All ${check.column} values have matching ${check.dimension} records`
    : `⚠ ${formatInteger(check.orphans)} ${check.column} values in Fact_Sales not in ${check.dimension}`;
}
