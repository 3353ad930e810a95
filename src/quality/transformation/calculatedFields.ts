import { cellValues, numberColumn } from '../../canon/columns.js';
import { hasColumns, type Dataset } from '../../ingress/dataset.js';
import { formatInteger } from '../../report/format.js';
import type { QualityRule, RuleOutcome } from '../types.js';
import type { TransformationContext } from './context.js';

/** A stored value next to the value recomputed from its operands. */
export interface Recomputation {
  actual: number;
  expected: number;
}

/**
 * Per-row numeric operands, or null for a row where any operand is empty.
 * Such rows cannot be recomputed and are left out of the comparison.
 */
export function numericRows(dataset: Dataset, columns: readonly string[]): Array<number[] | null> {
  const series = columns.map((column) => numberColumn(dataset, column));
  return dataset.rows.map((_, index) => {
    const values: number[] = [];
    for (const column of series) {
      const value = column[index] ?? null;
      if (value === null) {
        return null;
      }
      values.push(value);
    }
    return values;
  });
}

export function countMismatches(rows: ReadonlyArray<Recomputation | null>, tolerance: number): number {
  return rows.filter((row) => row !== null && Math.abs(row.actual - row.expected) > tolerance).length;
}

/** First unit cost per product id. */
function unitCostIndex(products: Dataset): Map<string, number | null> {
  const ids = cellValues(products, 'product_id');
  const costs = numberColumn(products, 'unit_cost');
  const index = new Map<string, number | null>();
  ids.forEach((id, position) => {
    if (id !== null && !index.has(id)) {
      index.set(id, costs[position] ?? null);
    }
  });
  return index;
}

export function costRecomputations({ factSales, products }: TransformationContext): Array<Recomputation | null> {
  const unitCosts = unitCostIndex(products);
  const productIds = cellValues(factSales, 'product_id');
  return numericRows(factSales, ['cost', 'quantity']).map((operands, index) => {
    const productId = productIds[index] ?? null;
    const unitCost = productId === null ? null : unitCosts.get(productId) ?? null;
    if (operands === null || unitCost === null) {
      return null;
    }
    const [cost = 0, quantity = 0] = operands;
    return { actual: cost, expected: quantity * unitCost };
  });
}

export function grossProfitRecomputations({ factSales }: TransformationContext): Array<Recomputation | null> {
  return numericRows(factSales, ['gross_profit', 'total_revenue', 'cost']).map((operands) => {
    if (operands === null) {
      return null;
    }
    const [grossProfit = 0, revenue = 0, cost = 0] = operands;
    return { actual: grossProfit, expected: revenue - cost };
  });
}

export function netProfitRecomputations({ factSales }: TransformationContext): Array<Recomputation | null> {
  return numericRows(factSales, [
    'net_profit',
    'total_revenue',
    'cost',
    'shipping_cost_total',
    'allocated_marketing_dzd'
  ]).map((operands) => {
    if (operands === null) {
      return null;
    }
    const [netProfit = 0, revenue = 0, cost = 0, shipping = 0, marketing = 0] = operands;
    return { actual: netProfit, expected: revenue - cost - shipping - marketing };
  });
}

function mismatchOutcome(errors: number, passMessage: string, failSuffix: string): RuleOutcome {
  return errors === 0
    ? { status: 'pass', metric: 0, message: passMessage }
    : { status: 'fail', metric: errors, message: `${formatInteger(errors)} transactions have ${failSuffix}` };
}

export const costCalculationRule: QualityRule<TransformationContext> = {
  name: 'transform.cost_calculation',
  appliesTo: ({ factSales, products }) =>
    hasColumns(factSales, 'cost', 'quantity', 'product_id') && hasColumns(products, 'product_id', 'unit_cost'),
  evaluate: (context) =>
    mismatchOutcome(
      countMismatches(costRecomputations(context), context.thresholds.calculationTolerance),
      'Cost calculation is accurate (quantity × unit_cost)',
      'incorrect cost calculations'
    )
};

export const grossProfitRule: QualityRule<TransformationContext> = {
  name: 'transform.gross_profit',
  appliesTo: ({ factSales }) => hasColumns(factSales, 'gross_profit', 'total_revenue', 'cost'),
  evaluate: (context) =>
    mismatchOutcome(
      countMismatches(grossProfitRecomputations(context), context.thresholds.calculationTolerance),
      'Gross profit calculation is accurate (revenue - cost)',
      'incorrect gross profit'
    )
};

export const netProfitRule: QualityRule<TransformationContext> = {
  name: 'transform.net_profit',
  appliesTo: ({ factSales }) =>
    hasColumns(factSales, 'net_profit', 'total_revenue', 'cost', 'shipping_cost_total', 'allocated_marketing_dzd'),
  evaluate: (context) =>
    mismatchOutcome(
      countMismatches(netProfitRecomputations(context), context.thresholds.calculationTolerance),
      'Net profit formula verified: Revenue - Cost - Shipping - Marketing',
      'incorrect net profit calculation'
    )
};
