import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { datasetLayout, type DatasetSpec } from '../config/datasets.js';
import { createDataset, type CellValue, type Dataset } from '../ingress/dataset.js';
import type { AuditDatasets } from '../ingress/extract.js';
import type { RowCountSource } from '../quality/types.js';

type Table = { headers: string[]; rows: CellValue[][] };

const { extracted, transformed } = datasetLayout;

export const salesTable: Table = {
  headers: ['trans_id', 'date', 'total_revenue', 'quantity', 'product_id', 'store_id', 'customer_id'],
  rows: [
    ['T1', '2024-01-01', '300', '2', 'P1', 'S1', 'C1'],
    ['T2', '2024-01-02', '520', '2', 'P2', 'S1', 'C2'],
    ['T3', '2024-01-02', '150', '1', 'P1', 'S2', 'C1'],
    ['T4', '2024-01-03', '780', '3', 'P2', 'S2', 'C3']
  ]
};

export const productsTable: Table = {
  headers: ['product_id', 'product_name', 'unit_cost', 'unit_price'],
  rows: [
    ['P1', 'Laptop', '100', '150'],
    ['P2', 'Phone', '200', '260']
  ]
};

export const reviewsTable: Table = {
  headers: ['review_id', 'product_id', 'rating', 'review_text'],
  rows: [
    ['R1', 'P1', '5', 'Great laptop'],
    ['R2', 'P1', '4', 'Good value'],
    ['R3', 'P2', '1', 'Broke fast']
  ]
};

// cost = quantity * unit_cost, marketing = 10% of revenue,
// net = revenue - cost - shipping - marketing
export const factSalesTable: Table = {
  headers: [
    'sale_id',
    'date_id',
    'date',
    'product_id',
    'store_id',
    'customer_id',
    'quantity',
    'total_revenue',
    'cost',
    'gross_profit',
    'shipping_cost_total',
    'allocated_marketing_dzd',
    'net_profit'
  ],
  rows: [
    ['T1', '1', '2024-01-01', 'P1', 'S1', 'C1', '2', '300', '200', '100', '20', '30', '50'],
    ['T2', '2', '2024-01-02', 'P2', 'S1', 'C2', '2', '520', '400', '120', '20', '52', '48'],
    ['T3', '2', '2024-01-02', 'P1', 'S2', 'C1', '1', '150', '100', '50', '10', '15', '25'],
    ['T4', '3', '2024-01-03', 'P2', 'S2', 'C3', '3', '780', '600', '180', '30', '78', '72']
  ]
};

export const dimProductTable: Table = {
  headers: [
    'product_id',
    'product_name',
    'category_name',
    'subcat_name',
    'unit_cost',
    'avg_sentiment',
    'competitor_price',
    'price_difference_pct'
  ],
  rows: [
    ['P1', 'Laptop', 'Computers', 'Laptops', '100', '0.6', '145', '3.4'],
    ['P2', 'Phone', 'Mobile', 'Smartphones', '200', '-0.2', '270', '-3.7']
  ]
};

export const dimDateTable: Table = {
  headers: ['date_id', 'date', 'day_of_week'],
  rows: [
    ['1', '2024-01-01', '0'],
    ['2', '2024-01-02', '1'],
    ['3', '2024-01-03', '2']
  ]
};

export const dimStoreTable: Table = {
  headers: ['store_id', 'store_name', 'monthly_target'],
  rows: [
    ['S1', 'Store One', '100000'],
    ['S2', 'Store Two', '80000']
  ]
};

export const dimCustomerTable: Table = {
  headers: ['customer_id', 'customer_name'],
  rows: [
    ['C1', 'Customer One'],
    ['C2', 'Customer Two'],
    ['C3', 'Customer Three']
  ]
};

export function datasetFrom(spec: DatasetSpec, table: Table): Dataset {
  return createDataset({
    name: spec.name,
    source: `memory:${spec.file}`,
    headers: table.headers,
    records: table.rows,
    columns: spec.columns
  });
}

/** Replaces one cell of a table, addressed by row index and header name. */
export function withCell(table: Table, rowIndex: number, column: string, value: CellValue): Table {
  const columnIndex = table.headers.indexOf(column);
  if (columnIndex < 0) {
    throw new Error(`No column ${column}`);
  }
  return {
    headers: table.headers,
    rows: table.rows.map((row, index) =>
      index === rowIndex ? row.map((cell, position) => (position === columnIndex ? value : cell)) : row
    )
  };
}

export function withoutColumn(table: Table, column: string): Table {
  const columnIndex = table.headers.indexOf(column);
  return {
    headers: table.headers.filter((_, index) => index !== columnIndex),
    rows: table.rows.map((row) => row.filter((_, index) => index !== columnIndex))
  };
}

export function sampleDatasets(): AuditDatasets {
  return {
    sales: datasetFrom(extracted.sales, salesTable),
    products: datasetFrom(extracted.products, productsTable),
    reviews: datasetFrom(extracted.reviews, reviewsTable),
    factSales: datasetFrom(transformed.factSales, factSalesTable),
    dimProduct: datasetFrom(transformed.dimProduct, dimProductTable),
    dimDate: datasetFrom(transformed.dimDate, dimDateTable),
    dimStore: datasetFrom(transformed.dimStore, dimStoreTable),
    dimCustomer: datasetFrom(transformed.dimCustomer, dimCustomerTable)
  };
}

export function staticRowCounts(label: string, counts: Record<string, number>): RowCountSource {
  return {
    label,
    async countRows(table: string): Promise<number> {
      const count = counts[table];
      if (count === undefined) {
        throw new Error(`no such table: ${table}`);
      }
      return count;
    }
  };
}

export function toCsv(table: Table): string {
  const lines = [table.headers, ...table.rows].map((row) => row.map((cell) => cell ?? '').join(','));
  return `${lines.join('\n')}\n`;
}

export interface SampleDataDir {
  root: string;
  extractedDir: string;
  transformedDir: string;
  cleanup(): Promise<void>;
}

/** Writes the sample tables as CSV under a fresh temp directory laid out as `extracted/` and `transformed/`. */
export async function writeSampleDataDir(): Promise<SampleDataDir> {
  const root = await mkdtemp(path.join(os.tmpdir(), 'etl-audit-'));
  const extractedDir = path.join(root, 'extracted');
  const transformedDir = path.join(root, 'transformed');
  await mkdir(extractedDir, { recursive: true });
  await mkdir(transformedDir, { recursive: true });

  const files: Array<[string, Table]> = [
    [path.join(extractedDir, extracted.sales.file), salesTable],
    [path.join(extractedDir, extracted.products.file), productsTable],
    [path.join(extractedDir, extracted.reviews.file), reviewsTable],
    [path.join(transformedDir, transformed.factSales.file), factSalesTable],
    [path.join(transformedDir, transformed.dimProduct.file), dimProductTable],
    [path.join(transformedDir, transformed.dimDate.file), dimDateTable],
    [path.join(transformedDir, transformed.dimStore.file), dimStoreTable],
    [path.join(transformedDir, transformed.dimCustomer.file), dimCustomerTable]
  ];
  for (const [filePath, table] of files) {
    await writeFile(filePath, toCsv(table), 'utf8');
  }

  return {
    root,
    extractedDir,
    transformedDir,
    cleanup: () => rm(root, { recursive: true, force: true })
  };
}
