import path from 'node:path';
import type Bottleneck from 'bottleneck';
import { datasetLayout, type DatasetSpec } from '../config/datasets.js';
import { fileExists } from '../lib/fs.js';
import { log } from '../lib/log.js';
import { createLoadLimiter } from '../lib/rateLimit.js';
import { readCsvDataset } from './csvReader.js';
import type { Dataset } from './dataset.js';

export interface AuditDatasets {
  sales: Dataset;
  products: Dataset;
  reviews: Dataset;
  factSales: Dataset;
  dimProduct: Dataset;
  dimDate: Dataset;
  dimStore: Dataset | null;
  dimCustomer: Dataset | null;
}

export interface ExtractInput {
  extractedDir: string;
  transformedDir: string;
  maxConcurrentLoads: number;
}

export async function loadOptionalDataset(directory: string, spec: DatasetSpec): Promise<Dataset | null> {
  const filePath = path.join(directory, spec.file);
  if (!(await fileExists(filePath))) {
    return null;
  }
  const dataset = await readCsvDataset(filePath, spec);
  log.info(`loaded ${spec.name}`, { rows: dataset.rows.length, columns: Object.keys(dataset.columns).length });
  return dataset;
}

export async function loadRequiredDataset(directory: string, spec: DatasetSpec): Promise<Dataset> {
  const dataset = await loadOptionalDataset(directory, spec);
  if (!dataset) {
    throw new Error(`Missing required dataset "${spec.name}" at ${path.join(directory, spec.file)}.`);
  }
  return dataset;
}

function scheduled<T>(limiter: Bottleneck, task: () => Promise<T>): Promise<T> {
  return limiter.schedule(task);
}

export async function extractAuditDatasets(input: ExtractInput): Promise<AuditDatasets> {
  const limiter = createLoadLimiter(input.maxConcurrentLoads);
  const { extracted, transformed } = datasetLayout;

  const required = (directory: string, spec: DatasetSpec): Promise<Dataset> =>
    scheduled(limiter, () => loadRequiredDataset(directory, spec));
  const optional = (directory: string, spec: DatasetSpec): Promise<Dataset | null> =>
    scheduled(limiter, () => loadOptionalDataset(directory, spec));

  const [sales, products, reviews, factSales, dimProduct, dimDate, dimStore, dimCustomer] =
    await Promise.all([
      required(input.extractedDir, extracted.sales),
      required(input.extractedDir, extracted.products),
      required(input.extractedDir, extracted.reviews),
      required(input.transformedDir, transformed.factSales),
      required(input.transformedDir, transformed.dimProduct),
      required(input.transformedDir, transformed.dimDate),
      optional(input.transformedDir, transformed.dimStore),
      optional(input.transformedDir, transformed.dimCustomer)
    ]);

  return { sales, products, reviews, factSales, dimProduct, dimDate, dimStore, dimCustomer };
}

/** Transformed tables keyed by warehouse table name, for reuse as CSV row counts. */
export function transformedTablesByName(datasets: AuditDatasets): Map<string, Dataset> {
  const tables = [datasets.factSales, datasets.dimProduct, datasets.dimDate, datasets.dimStore, datasets.dimCustomer];
  return new Map(
    tables.filter((dataset): dataset is Dataset => dataset !== null).map((dataset) => [dataset.name, dataset])
  );
}
