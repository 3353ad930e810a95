import ExcelJS from 'exceljs';
import path from 'node:path';
import { ensureDir } from '../../lib/fs.js';
import type { CheckResult, ReconciliationEntry } from '../../quality/types.js';
import type { QualityScore } from '../../report/score.js';

export interface WriteAuditWorkbookInput {
  outputPath: string;
  score: QualityScore;
  results: readonly CheckResult[];
  reconciliation: readonly ReconciliationEntry[];
  /** Column headers for the two reconciled sources, e.g. CSV and DB. */
  sourceLabels?: readonly [string, string];
}

type SheetCell = string | number | boolean;

function addSheet(workbook: ExcelJS.Workbook, name: string, header: string[], rows: SheetCell[][]): void {
  const worksheet = workbook.addWorksheet(name);
  worksheet.addRow(header);

  const headerRow = worksheet.getRow(1);
  headerRow.font = { bold: true };
  headerRow.fill = {
    type: 'pattern',
    pattern: 'solid',
    fgColor: { argb: 'FFE0E0E0' }
  };

  for (const row of rows) {
    worksheet.addRow(row);
  }

  worksheet.columns.forEach((column) => {
    column.width = Math.max(column.width ?? 10, 15);
  });
}

export function buildAuditWorkbook(input: Omit<WriteAuditWorkbookInput, 'outputPath'>): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const [labelA, labelB] = input.sourceLabels ?? ['CSV', 'DB'];

  addSheet(workbook, 'Summary', ['Metric', 'Value'], [
    ['Total Checks', input.score.total_checks],
    ['Quality Score', input.score.score],
    ['Percentage', Number(input.score.percentage.toFixed(1))],
    ['Grade', input.score.grade.label]
  ]);

  addSheet(
    workbook,
    'Checks',
    ['Section', 'Check', 'Status', 'Metric', 'Message'],
    input.results.map((result) => [
      result.section,
      result.name,
      result.status,
      // Empty cell for checks without a metric
      result.metric ?? '',
      result.message
    ])
  );

  addSheet(
    workbook,
    'Reconciliation',
    ['Table', `${labelA} Rows`, `${labelB} Rows`, 'Match'],
    input.reconciliation.map((entry) => [
      entry.table_name,
      entry.count_source_a,
      entry.count_source_b,
      entry.match
    ])
  );

  return workbook;
}

export async function writeAuditWorkbook(input: WriteAuditWorkbookInput): Promise<void> {
  await ensureDir(path.dirname(input.outputPath));
  await buildAuditWorkbook(input).xlsx.writeFile(input.outputPath);
}
