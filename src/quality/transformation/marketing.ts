import { countWhere, presentNumbers } from '../../canon/columns.js';
import { hasColumns } from '../../ingress/dataset.js';
import { extent, mean, sum } from '../../lib/stats.js';
import { formatCountWithShare, formatInteger, formatMoney, formatPercent, sharePct } from '../../report/format.js';
import type { MetricRow, QualityRule } from '../types.js';
import { numericRows } from './calculatedFields.js';
import type { TransformationContext } from './context.js';

function capPct(ratio: number): number {
  return Math.round(ratio * 100);
}

/** Transactions whose allocated marketing exceeds `capRatio` of their revenue. */
export function countExcessiveMarketing({ factSales, thresholds }: TransformationContext): number {
  return countWhere(numericRows(factSales, ['allocated_marketing_dzd', 'total_revenue']), (operands) => {
    if (operands === null) {
      return false;
    }
    const [marketing = 0, revenue = 0] = operands;
    return marketing > revenue * thresholds.marketingCapRatio;
  });
}

/** Σ marketing / Σ revenue, as a percentage. */
export function marketingRatioPct({ factSales }: TransformationContext): number {
  const revenue = sum(presentNumbers(factSales, 'total_revenue'));
  if (revenue === 0) {
    throw new Error(`Total revenue of ${factSales.name} is zero.`);
  }
  return (sum(presentNumbers(factSales, 'allocated_marketing_dzd')) / revenue) * 100;
}

export function marketingMetricRows(capRatio: number): Array<MetricRow<TransformationContext>> {
  return [
    {
      label: 'Avg Marketing per Transaction',
      compute: ({ factSales }) => formatMoney(mean(presentNumbers(factSales, 'allocated_marketing_dzd')))
    },
    {
      label: 'Max Marketing Allocated',
      compute: ({ factSales }) => formatMoney(extent(presentNumbers(factSales, 'allocated_marketing_dzd')).max)
    },
    {
      label: 'Transactions with Marketing',
      compute: ({ factSales }) =>
        formatInteger(countWhere(presentNumbers(factSales, 'allocated_marketing_dzd'), (value) => value > 0))
    },
    {
      label: `Excessive Marketing (>${capPct(capRatio)}% revenue)`,
      compute: (context) => formatCountWithShare(countExcessiveMarketing(context), context.factSales.rows.length)
    },
    { label: 'Marketing as % of Revenue', compute: (context) => formatPercent(marketingRatioPct(context), 2) }
  ];
}

export const marketingRules: ReadonlyArray<QualityRule<TransformationContext>> = [
  {
    name: 'transform.marketing_cap',
    appliesTo: ({ factSales }) => hasColumns(factSales, 'allocated_marketing_dzd', 'total_revenue'),
    evaluate: (context) => {
      const cap = capPct(context.thresholds.marketingCapRatio);
      const excessive = countExcessiveMarketing(context);
      if (excessive === 0) {
        return { status: 'pass', metric: 0, message: `Marketing allocation capped properly (≤${cap}% of revenue)` };
      }
      const share = sharePct(excessive, context.factSales.rows.length);
      return {
        status: 'fail',
        metric: excessive,
        message: `${formatInteger(excessive)} transactions exceed ${cap}% marketing cap (${formatPercent(share)} of transactions)!`
      };
    }
  },
  {
    name: 'transform.marketing_ratio',
    appliesTo: ({ factSales }) => hasColumns(factSales, 'allocated_marketing_dzd', 'total_revenue'),
    evaluate: (context) => {
      const pct = marketingRatioPct(context);
      const { marketingRatioMinPct: min, marketingRatioMaxPct: max } = context.thresholds;
      if (pct >= min && pct <= max) {
        return {
          status: 'pass',
          metric: pct,
          message: `Overall marketing ratio: ${formatPercent(pct, 2)} (industry standard: ${min}-${max}%)`
        };
      }
      return {
        status: 'warning',
        metric: pct,
        message: `Marketing ratio ${formatPercent(pct, 2)} outside typical range (${min}-${max}%)`
      };
    }
  }
];
