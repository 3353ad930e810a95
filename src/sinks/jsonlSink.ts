import path from 'node:path';
import { z } from 'zod';
import { readJsonl, writeJsonl } from '../lib/fs.js';
import {
  checkResultSchema,
  reconciliationEntrySchema,
  type CheckResult,
  type ReconciliationEntry
} from '../quality/types.js';

export interface AuditJsonlInput {
  outputDir: string;
  /** YYYY-MM-DD partition directory. */
  day: string;
  results: readonly CheckResult[];
  reconciliation: readonly ReconciliationEntry[];
}

export interface AuditJsonlPaths {
  checksPath: string;
  reconciliationPath: string;
}

export async function writeAuditJsonl(input: AuditJsonlInput): Promise<AuditJsonlPaths> {
  const dayDir = path.join(input.outputDir, input.day);
  const checksPath = path.join(dayDir, 'checks.jsonl');
  const reconciliationPath = path.join(dayDir, 'reconciliation.jsonl');

  await writeJsonl(checksPath, z.array(checkResultSchema).parse(input.results));
  await writeJsonl(reconciliationPath, z.array(reconciliationEntrySchema).parse(input.reconciliation));

  return { checksPath, reconciliationPath };
}

export async function readCheckLog(filePath: string): Promise<CheckResult[]> {
  return z.array(checkResultSchema).parse(await readJsonl(filePath));
}

export async function readReconciliationLog(filePath: string): Promise<ReconciliationEntry[]> {
  return z.array(reconciliationEntrySchema).parse(await readJsonl(filePath));
}
