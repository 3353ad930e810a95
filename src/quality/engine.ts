import { sha256 } from '../lib/hash.js';
import { log } from '../lib/log.js';
import type {
  AuditSection,
  AuditSectionKey,
  CheckResult,
  MetricRow,
  MetricTable,
  QualityRule,
  RuleOutcome
} from './types.js';

export const NOT_AVAILABLE = 'N/A';

export function checkId(section: AuditSectionKey, name: string): string {
  return sha256(`${section}|${name}`);
}

export function createCheckResult(input: RuleOutcome & { section: AuditSectionKey; name: string }): CheckResult {
  return Object.freeze({
    check_id: checkId(input.section, input.name),
    section: input.section,
    name: input.name,
    status: input.status,
    metric: input.metric,
    message: input.message
  });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Evaluates rules in registry order. A rule that throws becomes a failing result
 * carrying the error message; the remaining rules still run.
 */
export function runRules<TContext>(
  rules: ReadonlyArray<QualityRule<TContext>>,
  context: TContext,
  options: { section: AuditSectionKey }
): CheckResult[] {
  const results: CheckResult[] = [];

  for (const rule of rules) {
    if (rule.appliesTo && !rule.appliesTo(context)) {
      log.debug(`skipping ${rule.name}: inputs not present`);
      continue;
    }

    let outcome: RuleOutcome;
    try {
      outcome = rule.evaluate(context);
    } catch (error) {
      const reason = describeError(error);
      log.warn(`check ${rule.name} could not be evaluated`, { reason });
      outcome = {
        status: 'fail',
        metric: null,
        message: `${rule.name} could not be evaluated: ${reason}`
      };
    }

    results.push(createCheckResult({ ...outcome, section: options.section, name: rule.name }));
  }

  return results;
}

/** Builds a two-column table; a row whose value cannot be computed renders as N/A. */
export function buildMetricTable<TContext>(
  columns: readonly [string, string],
  rows: ReadonlyArray<MetricRow<TContext>>,
  context: TContext
): MetricTable {
  return {
    columns,
    rows: rows.map((row) => {
      try {
        return [row.label, row.compute(context)];
      } catch (error) {
        log.debug(`metric "${row.label}" unavailable`, { reason: describeError(error) });
        return [row.label, NOT_AVAILABLE];
      }
    })
  };
}

export function collectResults(sections: readonly AuditSection[]): CheckResult[] {
  return sections.flatMap((section) =>
    section.blocks.flatMap((block) => (block.kind === 'check' ? [block.result] : []))
  );
}

/** Builds a table from one computation; if it throws, every cell of a single row renders as N/A. */
export function buildComputedTable(
  columns: readonly string[],
  compute: () => ReadonlyArray<readonly string[]>
): MetricTable {
  try {
    return { columns, rows: compute() };
  } catch (error) {
    log.debug(`table "${columns.join(' | ')}" unavailable`, { reason: describeError(error) });
    return { columns, rows: [columns.map(() => NOT_AVAILABLE)] };
  }
}
