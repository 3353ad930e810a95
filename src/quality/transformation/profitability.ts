import { countWhere, numberColumn } from '../../canon/columns.js';
import { hasColumns } from '../../ingress/dataset.js';
import { formatInteger, formatPercent, sharePct } from '../../report/format.js';
import type { QualityRule } from '../types.js';
import { numericRows } from './calculatedFields.js';
import type { TransformationContext } from './context.js';

const BREAK_EVEN_BAND = 0.01;

export interface ProfitDistribution {
  positive: number;
  negative: number;
  /** Net profit within ±1% of the transaction's revenue. */
  breakEven: number;
  total: number;
}

export function profitDistribution({ factSales }: TransformationContext): ProfitDistribution {
  const netProfits = numberColumn(factSales, 'net_profit');
  const breakEven = countWhere(numericRows(factSales, ['net_profit', 'total_revenue']), (operands) => {
    if (operands === null) {
      return false;
    }
    const [netProfit = 0, revenue = 0] = operands;
    const band = revenue * BREAK_EVEN_BAND;
    return netProfit >= -band && netProfit <= band;
  });
  return {
    positive: countWhere(netProfits, (value) => value !== null && value > 0),
    negative: countWhere(netProfits, (value) => value !== null && value < 0),
    breakEven,
    total: factSales.rows.length
  };
}

export function profitDistributionRows(context: TransformationContext): string[][] {
  const distribution = profitDistribution(context);
  const row = (label: string, count: number): string[] => [
    label,
    formatInteger(count),
    formatPercent(sharePct(count, distribution.total))
  ];
  return [
    row('Positive Profit', distribution.positive),
    row('Negative Profit', distribution.negative),
    row('Break-even (±1%)', distribution.breakEven),
    ['Total', formatInteger(distribution.total), '100.0%']
  ];
}

export const negativeProfitShareRule: QualityRule<TransformationContext> = {
  name: 'transform.negative_profit_share',
  appliesTo: ({ factSales }) => hasColumns(factSales, 'net_profit'),
  evaluate: (context) => {
    const { negative, total } = profitDistribution(context);
    const pct = sharePct(negative, total);
    const { negativeProfitPassPct, negativeProfitWarnPct } = context.thresholds;
    if (pct < negativeProfitPassPct) {
      return { status: 'pass', metric: pct, message: `Negative profit transactions: ${formatPercent(pct)} (acceptable)` };
    }
    if (pct < negativeProfitWarnPct) {
      return { status: 'warning', metric: pct, message: `Negative profit transactions: ${formatPercent(pct)} (moderate)` };
    }
    return { status: 'fail', metric: pct, message: `Negative profit transactions: ${formatPercent(pct)} (too high!)` };
  }
};
