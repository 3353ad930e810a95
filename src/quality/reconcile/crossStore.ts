import { log } from '../../lib/log.js';
import { formatInteger } from '../../report/format.js';
import { runRules } from '../engine.js';
import { SectionBuilder } from '../section.js';
import type { AuditSection, CheckResult, QualityRule, ReconciliationEntry, RowCountSource } from '../types.js';

export const CROSS_STORE_TITLE = '🗄️ Database vs CSV Integrity';

export function compareRowCounts(table: string, countA: number, countB: number): ReconciliationEntry {
  return Object.freeze({
    table_name: table,
    count_source_a: countA,
    count_source_b: countB,
    match: countA === countB
  });
}

async function countOrZero(source: RowCountSource, table: string): Promise<number> {
  try {
    return await source.countRows(table);
  } catch (error) {
    log.warn(`could not count ${table} rows in ${source.label}; counting 0`, {
      reason: error instanceof Error ? error.message : String(error)
    });
    return 0;
  }
}

/** One entry per table, in the order given. A count that cannot be read is taken as 0. */
export async function reconcileRowCounts(
  tables: readonly string[],
  sourceA: RowCountSource,
  sourceB: RowCountSource
): Promise<ReconciliationEntry[]> {
  const entries: ReconciliationEntry[] = [];
  for (const table of tables) {
    const countA = await countOrZero(sourceA, table);
    const countB = await countOrZero(sourceB, table);
    entries.push(compareRowCounts(table, countA, countB));
  }
  return entries;
}

interface ReconciliationContext {
  entry: ReconciliationEntry;
  labels: readonly [string, string];
}

function reconciliationRule(table: string): QualityRule<ReconciliationContext> {
  return {
    name: `reconcile.${table}`,
    evaluate: ({ entry, labels: [labelA, labelB] }) => {
      const countA = formatInteger(entry.count_source_a);
      const countB = formatInteger(entry.count_source_b);
      if (entry.match) {
        return {
          status: 'pass',
          metric: entry.count_source_a,
          message: `${table}: ${labelA} and ${labelB} match (${countA} rows)`
        };
      }
      return {
        status: 'fail',
        metric: entry.count_source_a - entry.count_source_b,
        message: `${table}: ${labelA} (${countA}) != ${labelB} (${countB})`
      };
    }
  };
}

export function reconciliationChecks(
  entries: readonly ReconciliationEntry[],
  labels: readonly [string, string]
): CheckResult[] {
  return entries.flatMap((entry) =>
    runRules([reconciliationRule(entry.table_name)], { entry, labels }, { section: 'integrity' })
  );
}

export function analyzeCrossStore(
  entries: readonly ReconciliationEntry[],
  labels: readonly [string, string]
): AuditSection {
  return new SectionBuilder('integrity', CROSS_STORE_TITLE)
    .checks(reconciliationChecks(entries, labels))
    .reconciliation(labels, entries)
    .build();
}

/** Section for a run where the database file is absent: a single failing check, no comparison table. */
export function missingDatabaseSection(dbPath: string): AuditSection {
  log.warn('database file not found', { dbPath });
  const rule: QualityRule<string> = {
    name: 'reconcile.database',
    evaluate: () => ({ status: 'fail', metric: null, message: 'Database file not found!' })
  };
  return new SectionBuilder('integrity', CROSS_STORE_TITLE)
    .checks(runRules([rule], dbPath, { section: 'integrity' }))
    .build();
}
