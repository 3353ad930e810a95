import { distinctCount, nonNullCount, nullCount, presentNumbers } from '../../canon/columns.js';
import type { AuditThresholds } from '../../config/thresholds.js';
import { hasColumns, type Dataset } from '../../ingress/dataset.js';
import { mean } from '../../lib/stats.js';
import { formatCountWithShare, formatFixed, formatInteger, formatPercent, sharePct } from '../../report/format.js';
import type { MetricRow, QualityRule, RuleOutcome } from '../types.js';

export interface DimProductContext {
  dimProduct: Dataset;
  thresholds: AuditThresholds;
}

/** Share of products with a value in `column`. */
export function coveragePct(dimProduct: Dataset, column: string): number {
  return sharePct(nonNullCount(dimProduct, column), dimProduct.rows.length);
}

export const dimProductMetricRows: ReadonlyArray<MetricRow<DimProductContext>> = [
  { label: 'Total Products', compute: ({ dimProduct }) => formatInteger(dimProduct.rows.length) },
  { label: 'Unique Product IDs', compute: ({ dimProduct }) => formatInteger(distinctCount(dimProduct, 'product_id')) },
  {
    label: 'Products with Sentiment',
    compute: ({ dimProduct }) =>
      formatCountWithShare(nonNullCount(dimProduct, 'avg_sentiment'), dimProduct.rows.length)
  },
  {
    label: 'Avg Sentiment Score',
    compute: ({ dimProduct }) => formatFixed(mean(presentNumbers(dimProduct, 'avg_sentiment')), 3)
  },
  {
    label: 'Products with Competitor Price',
    compute: ({ dimProduct }) =>
      formatCountWithShare(nonNullCount(dimProduct, 'competitor_price'), dimProduct.rows.length)
  },
  {
    label: 'Avg Price Difference',
    compute: ({ dimProduct }) => formatPercent(mean(presentNumbers(dimProduct, 'price_difference_pct')), 2)
  },
  { label: 'Missing Category', compute: ({ dimProduct }) => formatInteger(nullCount(dimProduct, 'category_name')) },
  { label: 'Missing Subcategory', compute: ({ dimProduct }) => formatInteger(nullCount(dimProduct, 'subcat_name')) }
];

function coverageOutcome(
  pct: number,
  passPct: number,
  warnPct: number,
  labels: { ok: string; low: string }
): RuleOutcome {
  const shown = formatPercent(pct);
  if (pct >= passPct) {
    return { status: 'pass', metric: pct, message: `${labels.ok}: ${shown}` };
  }
  if (pct >= warnPct) {
    return { status: 'warning', metric: pct, message: `${labels.ok}: ${shown}` };
  }
  return { status: 'fail', metric: pct, message: `${labels.low}: ${shown}` };
}

export const dimProductRules: ReadonlyArray<QualityRule<DimProductContext>> = [
  {
    name: 'dim_product.sentiment_coverage',
    appliesTo: ({ dimProduct }) => hasColumns(dimProduct, 'avg_sentiment'),
    evaluate: ({ dimProduct, thresholds }) =>
      coverageOutcome(
        coveragePct(dimProduct, 'avg_sentiment'),
        thresholds.sentimentCoveragePassPct,
        thresholds.sentimentCoverageWarnPct,
        { ok: 'Sentiment analysis coverage', low: 'Low sentiment coverage' }
      )
  },
  {
    name: 'dim_product.competitor_coverage',
    appliesTo: ({ dimProduct }) => hasColumns(dimProduct, 'competitor_price'),
    evaluate: ({ dimProduct, thresholds }) =>
      coverageOutcome(
        coveragePct(dimProduct, 'competitor_price'),
        thresholds.competitorCoveragePassPct,
        thresholds.competitorCoverageWarnPct,
        { ok: 'Competitor price matching', low: 'Low competitor price matching' }
      )
  }
];
