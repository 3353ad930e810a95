import {
  cellValues,
  countWhere,
  distinctCount,
  duplicateCount,
  nullCount,
  numberColumn,
  presentNumbers
} from '../../canon/columns.js';
import type { AuditThresholds } from '../../config/thresholds.js';
import { hasColumns, type Dataset } from '../../ingress/dataset.js';
import { describe, type SeriesSummary } from '../../lib/stats.js';
import { formatCountWithShare, formatInteger, formatMoney, formatPercent, sharePct } from '../../report/format.js';
import type { MetricRow, QualityRule } from '../types.js';

export interface SalesContext {
  sales: Dataset;
  thresholds: AuditThresholds;
}

export interface RevenueOutliers {
  summary: SeriesSummary;
  upper: number;
  lower: number;
}

export function findRevenueOutliers(sales: Dataset, iqrMultiplier: number): RevenueOutliers {
  const values = presentNumbers(sales, 'total_revenue');
  const summary = describe(values);
  const iqr = summary.q3 - summary.q1;
  const upperFence = summary.q3 + iqrMultiplier * iqr;
  const lowerFence = summary.q1 - iqrMultiplier * iqr;
  return {
    summary,
    upper: countWhere(values, (value) => value > upperFence),
    lower: countWhere(values, (value) => value < lowerFence)
  };
}

function dateRange(sales: Dataset): string {
  const dates = cellValues(sales, 'date').filter((value): value is string => value !== null).sort();
  const first = dates[0];
  const last = dates[dates.length - 1];
  if (first === undefined || last === undefined) {
    throw new Error('No dates present.');
  }
  return `${first} to ${last}`;
}

export const salesMetricRows: ReadonlyArray<MetricRow<SalesContext>> = [
  { label: 'Total Records', compute: ({ sales }) => formatInteger(sales.rows.length) },
  { label: 'Date Range', compute: ({ sales }) => dateRange(sales) },
  { label: 'Null Values', compute: ({ sales }) => `${formatInteger(nullCount(sales))} fields` },
  {
    label: 'Duplicate trans_id',
    compute: ({ sales }) => formatInteger(duplicateCount(cellValues(sales, 'trans_id')))
  },
  {
    label: 'Zero/Negative Revenue',
    compute: ({ sales }) =>
      formatInteger(countWhere(numberColumn(sales, 'total_revenue'), (value) => value !== null && value <= 0))
  },
  {
    label: 'Zero Quantity',
    compute: ({ sales }) => formatInteger(countWhere(numberColumn(sales, 'quantity'), (value) => value === 0))
  },
  { label: 'Unique Products', compute: ({ sales }) => formatInteger(distinctCount(sales, 'product_id')) },
  { label: 'Unique Stores', compute: ({ sales }) => formatInteger(distinctCount(sales, 'store_id')) },
  { label: 'Unique Customers', compute: ({ sales }) => formatInteger(distinctCount(sales, 'customer_id')) }
];

export const salesRules: ReadonlyArray<QualityRule<SalesContext>> = [
  {
    name: 'sales.no_nulls',
    evaluate: ({ sales }) => {
      const nulls = nullCount(sales);
      return nulls === 0
        ? { status: 'pass', metric: 0, message: 'Sales data has no null values' }
        : { status: 'fail', metric: nulls, message: `Sales data has ${formatInteger(nulls)} null values` };
    }
  },
  {
    name: 'sales.unique_transaction_ids',
    appliesTo: ({ sales }) => hasColumns(sales, 'trans_id'),
    evaluate: ({ sales }) => {
      const duplicates = duplicateCount(cellValues(sales, 'trans_id'));
      return duplicates === 0
        ? { status: 'pass', metric: 0, message: 'All transaction IDs are unique' }
        : {
            status: 'fail',
            metric: duplicates,
            message: `${formatInteger(duplicates)} duplicate transaction IDs`
          };
    }
  },
  {
    name: 'sales.positive_revenue',
    appliesTo: ({ sales }) => hasColumns(sales, 'total_revenue'),
    evaluate: ({ sales }) => {
      const invalid = countWhere(numberColumn(sales, 'total_revenue'), (value) => value !== null && value <= 0);
      return invalid === 0
        ? { status: 'pass', metric: 0, message: 'No zero/negative revenues in original data' }
        : {
            status: 'fail',
            metric: invalid,
            message: `${formatInteger(invalid)} transactions with invalid revenue`
          };
    }
  }
];

function summaryRow(label: string, pick: (summary: SeriesSummary) => number): MetricRow<SalesContext> {
  return {
    label,
    compute: ({ sales, thresholds }) =>
      formatMoney(pick(findRevenueOutliers(sales, thresholds.outlierIqrMultiplier).summary))
  };
}

export const revenueDistributionRows: ReadonlyArray<MetricRow<SalesContext>> = [
  summaryRow('Mean', (summary) => summary.mean),
  summaryRow('Median', (summary) => summary.median),
  summaryRow('Std Dev', (summary) => summary.std),
  summaryRow('Min', (summary) => summary.min),
  summaryRow('Max', (summary) => summary.max),
  summaryRow('Q1', (summary) => summary.q1),
  summaryRow('Q3', (summary) => summary.q3),
  {
    label: 'Outliers (Upper)',
    compute: ({ sales, thresholds }) =>
      formatCountWithShare(findRevenueOutliers(sales, thresholds.outlierIqrMultiplier).upper, sales.rows.length)
  },
  {
    label: 'Outliers (Lower)',
    compute: ({ sales, thresholds }) =>
      formatCountWithShare(findRevenueOutliers(sales, thresholds.outlierIqrMultiplier).lower, sales.rows.length)
  }
];

export const revenueOutlierRule: QualityRule<SalesContext> = {
  name: 'sales.revenue_outliers',
  appliesTo: ({ sales }) => hasColumns(sales, 'total_revenue'),
  evaluate: ({ sales, thresholds }) => {
    const { upper } = findRevenueOutliers(sales, thresholds.outlierIqrMultiplier);
    const share = sharePct(upper, sales.rows.length);
    if (share < thresholds.revenueOutlierSharePct) {
      return {
        status: 'pass',
        metric: upper,
        message: `Revenue outliers within acceptable range (<${thresholds.revenueOutlierSharePct}%)`
      };
    }
    return {
      status: 'warning',
      metric: upper,
      message: `${formatPercent(share)} revenue outliers detected`
    };
  }
};
