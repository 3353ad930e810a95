import { z } from 'zod';

export const checkStatusSchema = z.enum(['pass', 'fail', 'warning']);
export type CheckStatus = z.infer<typeof checkStatusSchema>;

export const auditSectionKeySchema = z.enum(['original', 'transformation', 'dimensions', 'integrity']);
export type AuditSectionKey = z.infer<typeof auditSectionKeySchema>;

export const checkResultSchema = z.object({
  check_id: z.string(),
  section: auditSectionKeySchema,
  name: z.string(),
  status: checkStatusSchema,
  metric: z.union([z.number(), z.string(), z.null()]),
  message: z.string()
});

export type CheckResult = Readonly<z.infer<typeof checkResultSchema>>;
export type CheckMetric = CheckResult['metric'];

export const reconciliationEntrySchema = z.object({
  table_name: z.string(),
  count_source_a: z.number().int().nonnegative(),
  count_source_b: z.number().int().nonnegative(),
  match: z.boolean()
});

export type ReconciliationEntry = Readonly<z.infer<typeof reconciliationEntrySchema>>;

export interface RuleOutcome {
  status: CheckStatus;
  metric: CheckMetric;
  message: string;
}

export interface QualityRule<TContext> {
  name: string;
  /** Rules whose inputs are absent are skipped and do not count toward the score. */
  appliesTo?: (context: TContext) => boolean;
  evaluate: (context: TContext) => RuleOutcome;
}

export interface MetricRow<TContext> {
  label: string;
  compute: (context: TContext) => string;
}

export interface MetricTable {
  columns: readonly string[];
  rows: ReadonlyArray<readonly string[]>;
}

export interface RowCountSource {
  label: string;
  countRows(table: string): Promise<number>;
}

export type AuditBlock =
  | { kind: 'heading'; level: 2 | 3; title: string }
  | { kind: 'note'; text: string }
  | { kind: 'table'; table: MetricTable }
  | { kind: 'check'; result: CheckResult }
  | {
      kind: 'reconciliation';
      labels: readonly [string, string];
      entries: readonly ReconciliationEntry[];
    };

export interface AuditSection {
  key: AuditSectionKey;
  title: string;
  blocks: readonly AuditBlock[];
}

export interface AuditRun {
  generatedAt: Date;
  timeZone: string;
  sections: readonly AuditSection[];
}
