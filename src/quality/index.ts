import { RECONCILED_TABLES } from '../config/datasets.js';
import { defaultThresholds, type AuditThresholds } from '../config/thresholds.js';
import type { AuditDatasets } from '../ingress/extract.js';
import { log } from '../lib/log.js';
import { computeQualityScore, type QualityScore } from '../report/score.js';
import { analyzeDimensions } from './dimensions/index.js';
import { collectResults } from './engine.js';
import { analyzeOriginalData } from './original/index.js';
import { analyzeCrossStore, missingDatabaseSection, reconcileRowCounts } from './reconcile/crossStore.js';
import { validateTransformation } from './transformation/index.js';
import type { AuditRun, AuditSection, CheckResult, ReconciliationEntry, RowCountSource } from './types.js';

export type WarehouseInput =
  | { kind: 'missing'; dbPath: string }
  | { kind: 'available'; sourceA: RowCountSource; sourceB: RowCountSource };

export interface AuditInput {
  datasets: Pick<AuditDatasets, 'sales' | 'products' | 'reviews' | 'factSales' | 'dimProduct' | 'dimDate'>;
  warehouse: WarehouseInput;
  timeZone: string;
  thresholds?: AuditThresholds;
  generatedAt?: Date;
  tables?: readonly string[];
}

export interface AuditOutcome {
  run: AuditRun;
  results: CheckResult[];
  reconciliation: ReconciliationEntry[];
  score: QualityScore;
}

async function crossStoreSection(
  warehouse: WarehouseInput,
  tables: readonly string[]
): Promise<{ section: AuditSection; entries: ReconciliationEntry[] }> {
  if (warehouse.kind === 'missing') {
    return { section: missingDatabaseSection(warehouse.dbPath), entries: [] };
  }
  const { sourceA, sourceB } = warehouse;
  const entries = await reconcileRowCounts(tables, sourceA, sourceB);
  return { section: analyzeCrossStore(entries, [sourceA.label, sourceB.label]), entries };
}

/** Runs every check group in report order and scores the results. */
export async function runAudit(input: AuditInput): Promise<AuditOutcome> {
  const thresholds = input.thresholds ?? defaultThresholds;
  const { datasets } = input;

  log.info('[1/5] analyzing original data');
  const original = analyzeOriginalData({
    sales: datasets.sales,
    products: datasets.products,
    reviews: datasets.reviews,
    thresholds
  });

  log.info('[2/5] analyzing transformation quality');
  const transformation = validateTransformation({
    sales: datasets.sales,
    products: datasets.products,
    factSales: datasets.factSales,
    thresholds
  });

  log.info('[3/5] analyzing dimension tables');
  const dimensions = analyzeDimensions({
    dimProduct: datasets.dimProduct,
    dimDate: datasets.dimDate,
    thresholds
  });

  log.info('[4/5] reconciling CSV export with the warehouse');
  const crossStore = await crossStoreSection(input.warehouse, input.tables ?? RECONCILED_TABLES);

  log.info('[5/5] scoring');
  const sections = [original, transformation, dimensions, crossStore.section];
  const results = collectResults(sections);
  const score = computeQualityScore(results);
  log.info('audit complete', {
    checks: score.total_checks,
    score: score.score,
    percentage: Number(score.percentage.toFixed(1))
  });

  return {
    run: {
      generatedAt: input.generatedAt ?? new Date(),
      timeZone: input.timeZone,
      sections
    },
    results,
    reconciliation: crossStore.entries,
    score
  };
}
