import { countWhere, nullCount, numberColumn, presentNumbers } from '../../canon/columns.js';
import { hasColumns, type Dataset } from '../../ingress/dataset.js';
import { extent } from '../../lib/stats.js';
import { CURRENCY, formatInteger } from '../../report/format.js';
import type { MetricRow, QualityRule } from '../types.js';

export interface ProductsContext {
  products: Dataset;
}

function range(values: readonly number[]): string {
  const { min, max } = extent(values);
  return `${formatInteger(min)} - ${formatInteger(max)} ${CURRENCY}`;
}

/** Rows whose cost exceeds their price; rows missing either side are not counted. */
export function countNegativeMargins(products: Dataset): number {
  const costs = numberColumn(products, 'unit_cost');
  const prices = numberColumn(products, 'unit_price');
  return countWhere(costs.map((cost, index) => [cost, prices[index] ?? null] as const), ([cost, price]) =>
    cost !== null && price !== null && cost > price
  );
}

export const productMetricRows: ReadonlyArray<MetricRow<ProductsContext>> = [
  { label: 'Total Products', compute: ({ products }) => formatInteger(products.rows.length) },
  { label: 'Null Unit_Cost', compute: ({ products }) => formatInteger(nullCount(products, 'unit_cost')) },
  { label: 'Null Unit_Price', compute: ({ products }) => formatInteger(nullCount(products, 'unit_price')) },
  { label: 'Cost > Price (Invalid)', compute: ({ products }) => formatInteger(countNegativeMargins(products)) },
  {
    label: 'Zero Cost',
    compute: ({ products }) => formatInteger(countWhere(numberColumn(products, 'unit_cost'), (cost) => cost === 0))
  },
  { label: 'Price Range', compute: ({ products }) => range(presentNumbers(products, 'unit_price')) },
  { label: 'Cost Range', compute: ({ products }) => range(presentNumbers(products, 'unit_cost')) }
];

export const productRules: ReadonlyArray<QualityRule<ProductsContext>> = [
  {
    name: 'products.unit_cost_defined',
    appliesTo: ({ products }) => hasColumns(products, 'unit_cost'),
    evaluate: ({ products }) => {
      const missing = nullCount(products, 'unit_cost');
      return missing === 0
        ? { status: 'pass', metric: 0, message: 'All products have unit cost defined' }
        : { status: 'fail', metric: missing, message: `${formatInteger(missing)} products missing unit cost` };
    }
  },
  {
    name: 'products.price_above_cost',
    appliesTo: ({ products }) => hasColumns(products, 'unit_cost', 'unit_price'),
    evaluate: ({ products }) => {
      const invalid = countNegativeMargins(products);
      return invalid === 0
        ? { status: 'pass', metric: 0, message: 'All products have price > cost' }
        : {
            status: 'fail',
            metric: invalid,
            message: `${formatInteger(invalid)} products have cost > price (negative margin)`
          };
    }
  }
];
