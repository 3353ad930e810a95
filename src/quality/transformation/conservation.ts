import { presentNumbers } from '../../canon/columns.js';
import { hasColumns, type Dataset } from '../../ingress/dataset.js';
import { sum } from '../../lib/stats.js';
import { formatFixed, formatInteger, formatPercent } from '../../report/format.js';
import type { QualityRule } from '../types.js';
import type { TransformationContext } from './context.js';

export interface RecordCountComparison {
  original: number;
  transformed: number;
  /** transformed - original */
  difference: number;
  preserved: boolean;
}

export function compareRecordCounts(original: Dataset, transformed: Dataset): RecordCountComparison {
  const originalCount = original.rows.length;
  const transformedCount = transformed.rows.length;
  return {
    original: originalCount,
    transformed: transformedCount,
    difference: transformedCount - originalCount,
    preserved: transformedCount >= originalCount
  };
}

export interface ColumnRef {
  dataset: Dataset;
  column: string;
}

export interface ColumnTotalComparison {
  originalTotal: number;
  transformedTotal: number;
  /** transformed - original */
  difference: number;
  /** |original - transformed| / original * 100 */
  differencePct: number;
  withinTolerance: boolean;
}

export function compareColumnTotals(input: {
  original: ColumnRef;
  transformed: ColumnRef;
  tolerancePct: number;
}): ColumnTotalComparison {
  const originalTotal = sum(presentNumbers(input.original.dataset, input.original.column));
  const transformedTotal = sum(presentNumbers(input.transformed.dataset, input.transformed.column));
  if (originalTotal === 0) {
    throw new Error(`Total of ${input.original.column} in ${input.original.dataset.name} is zero.`);
  }
  const differencePct = (Math.abs(originalTotal - transformedTotal) / originalTotal) * 100;
  return {
    originalTotal,
    transformedTotal,
    difference: transformedTotal - originalTotal,
    differencePct,
    withinTolerance: differencePct < input.tolerancePct
  };
}

function revenueComparison({ sales, factSales, thresholds }: TransformationContext): ColumnTotalComparison {
  return compareColumnTotals({
    original: { dataset: sales, column: 'total_revenue' },
    transformed: { dataset: factSales, column: 'total_revenue' },
    tolerancePct: thresholds.revenueDiffPassPct
  });
}

export function recordCountRows(context: TransformationContext): string[][] {
  const counts = compareRecordCounts(context.sales, context.factSales);
  const drift = Math.abs(counts.difference) < context.thresholds.recordCountDriftWarnRows;
  return [
    ['Original Sales', formatInteger(counts.original), '✅'],
    ['Transformed Fact_Sales', formatInteger(counts.transformed), counts.preserved ? '✅' : '❌'],
    ['Difference', formatInteger(counts.difference), drift ? '✅' : '⚠️']
  ];
}

export function revenueIntegrityRows(context: TransformationContext): string[][] {
  const revenue = revenueComparison(context);
  return [
    ['Original', formatInteger(revenue.originalTotal)],
    ['Transformed', formatInteger(revenue.transformedTotal)],
    ['Difference', formatInteger(revenue.difference)],
    ['Difference %', formatPercent(revenue.differencePct, 2)]
  ];
}

export const recordCountRule: QualityRule<TransformationContext> = {
  name: 'transform.record_count',
  evaluate: ({ sales, factSales }) => {
    const counts = compareRecordCounts(sales, factSales);
    if (counts.preserved) {
      return {
        status: 'pass',
        metric: counts.difference,
        message: `Record count preserved (${formatInteger(counts.transformed)} >= ${formatInteger(counts.original)})`
      };
    }
    return {
      status: 'fail',
      metric: counts.difference,
      message: `Lost ${formatInteger(-counts.difference)} records during transformation!`
    };
  }
};

export const revenueIntegrityRule: QualityRule<TransformationContext> = {
  name: 'transform.revenue_integrity',
  appliesTo: ({ sales, factSales }) =>
    hasColumns(sales, 'total_revenue') && hasColumns(factSales, 'total_revenue'),
  evaluate: (context) => {
    const revenue = revenueComparison(context);
    const pct = revenue.differencePct;
    if (revenue.withinTolerance) {
      return {
        status: 'pass',
        metric: pct,
        message: `Revenue preserved perfectly (diff: ${formatFixed(pct, 4)}%)`
      };
    }
    if (pct < context.thresholds.revenueDiffWarnPct) {
      return { status: 'warning', metric: pct, message: `Revenue difference: ${formatPercent(pct, 2)}` };
    }
    return { status: 'fail', metric: pct, message: `Significant revenue discrepancy: ${formatPercent(pct, 2)}!` };
  }
};
