import path from 'node:path';
import { RECONCILED_TABLES } from '../config/datasets.js';
import type { AppConfig } from '../config/env.js';
import { createCsvRowCountSource } from '../ingress/csvRowCounts.js';
import { extractAuditDatasets, transformedTablesByName } from '../ingress/extract.js';
import { WarehouseRowCounter } from '../ingress/warehouse.js';
import { formatInspection, inspectTransformedTables } from '../inspect/index.js';
import { fileExists } from '../lib/fs.js';
import { log } from '../lib/log.js';
import { utcDateStamp } from '../lib/time.js';
import { runAudit, type AuditOutcome } from '../quality/index.js';
import { reconcileRowCounts } from '../quality/reconcile/crossStore.js';
import type { ReconciliationEntry } from '../quality/types.js';
import { formatInteger, formatPercent } from '../report/format.js';
import { renderMarkdownReport } from '../report/markdown.js';
import { writeAuditWorkbook } from '../sinks/excel/index.js';
import { writeAuditJsonl } from '../sinks/jsonlSink.js';
import { writeMarkdownReport } from '../sinks/markdownSink.js';

export interface AuditCommandOptions {
  report?: string;
  excel?: string;
  now?: Date;
}

export interface AuditCommandResult {
  outcome: AuditOutcome;
  reportPath: string;
  checksPath: string;
  reconciliationPath: string;
  excelPath: string | null;
}

async function withWarehouse<T>(dbPath: string, task: (counter: WarehouseRowCounter | null) => Promise<T>): Promise<T> {
  if (!(await fileExists(dbPath))) {
    return task(null);
  }
  const counter = WarehouseRowCounter.open(dbPath);
  try {
    return await task(counter);
  } finally {
    counter.close();
  }
}

export async function runAuditCommand(
  config: AppConfig,
  options: AuditCommandOptions = {}
): Promise<AuditCommandResult> {
  const now = options.now ?? new Date();
  const datasets = await extractAuditDatasets({
    extractedDir: config.extractedDir,
    transformedDir: config.transformedDir,
    maxConcurrentLoads: config.AUDIT_MAX_CONCURRENT_LOADS
  });

  const outcome = await withWarehouse(config.resolvedDbPath, (counter) =>
    runAudit({
      datasets,
      warehouse: counter
        ? {
            kind: 'available',
            sourceA: createCsvRowCountSource({
              directory: config.transformedDir,
              preloaded: transformedTablesByName(datasets)
            }),
            sourceB: counter
          }
        : { kind: 'missing', dbPath: config.resolvedDbPath },
      timeZone: config.AUDIT_TIME_ZONE,
      generatedAt: now
    })
  );

  const reportPath = options.report ? path.resolve(options.report) : config.resolvedReportPath;
  await writeMarkdownReport(reportPath, renderMarkdownReport(outcome.run));

  const { checksPath, reconciliationPath } = await writeAuditJsonl({
    outputDir: config.resolvedOutputDir,
    day: utcDateStamp(now),
    results: outcome.results,
    reconciliation: outcome.reconciliation
  });
  log.info('wrote check log', { checks: outcome.results.length, checksPath, reconciliationPath });

  let excelPath: string | null = null;
  if (options.excel) {
    excelPath = path.resolve(options.excel);
    await writeAuditWorkbook({
      outputPath: excelPath,
      score: outcome.score,
      results: outcome.results,
      reconciliation: outcome.reconciliation
    });
    log.info('wrote workbook', { excelPath });
  }

  const { score } = outcome;
  console.log(
    `[quality] checks=${score.total_checks} score=${score.score.toFixed(1)} percentage=${formatPercent(score.percentage)} grade=${score.grade.label}`
  );

  return { outcome, reportPath, checksPath, reconciliationPath, excelPath };
}

export function formatReconciliationLine(entry: ReconciliationEntry): string {
  const status = entry.match ? '✅' : '❌';
  return `${status} ${entry.table_name}: CSV ${formatInteger(entry.count_source_a)} | DB ${formatInteger(entry.count_source_b)}`;
}

export async function runReconcileCommand(config: AppConfig): Promise<ReconciliationEntry[]> {
  const entries = await withWarehouse(config.resolvedDbPath, async (counter) => {
    if (!counter) {
      throw new Error(`Database file not found at ${config.resolvedDbPath}.`);
    }
    const csv = createCsvRowCountSource({ directory: config.transformedDir });
    return reconcileRowCounts(RECONCILED_TABLES, csv, counter);
  });

  for (const entry of entries) {
    console.log(formatReconciliationLine(entry));
  }
  const mismatches = entries.filter((entry) => !entry.match).length;
  log.info('reconciliation finished', { tables: entries.length, mismatches });
  return entries;
}

export async function runInspectCommand(config: AppConfig): Promise<void> {
  const report = await inspectTransformedTables(config.transformedDir);
  for (const line of formatInspection(report)) {
    console.log(line);
  }
}
