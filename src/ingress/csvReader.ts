import ExcelJS, { type CellValue as ExcelCellValue } from 'exceljs';
import type { DatasetSpec } from '../config/datasets.js';
import { createDataset, type CellValue, type Dataset } from './dataset.js';

export interface CsvTable {
  headers: string[];
  records: CellValue[][];
}

// exceljs converts numeric and date-like cells by default; keep the raw text so
// parsing happens in one place with row-level error messages. Empty fields stay
// as '' so a row of empty fields still occupies its row.
function keepRawCell(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function toCellValue(value: ExcelCellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value.length === 0 ? null : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return null;
}

export async function readCsvTable(filePath: string): Promise<CsvTable> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = await workbook.csv.readFile(filePath, { map: keepRawCell });

  const headerRow = worksheet.getRow(1);
  const width = headerRow.cellCount;
  const headers: string[] = [];
  for (let column = 1; column <= width; column += 1) {
    headers.push(toCellValue(headerRow.getCell(column).value) ?? '');
  }

  const records: CellValue[][] = [];
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber += 1) {
    const row = worksheet.getRow(rowNumber);
    // A blank line parses as a single empty field; a line of separators is a row of nulls.
    if (row.cellCount <= 1 && toCellValue(row.getCell(1).value) === null) {
      continue;
    }
    const record: CellValue[] = [];
    for (let column = 1; column <= width; column += 1) {
      record.push(toCellValue(row.getCell(column).value));
    }
    records.push(record);
  }

  return { headers, records };
}

export async function readCsvDataset(filePath: string, spec: DatasetSpec): Promise<Dataset> {
  const table = await readCsvTable(filePath);
  return createDataset({
    name: spec.name,
    source: filePath,
    headers: table.headers,
    records: table.records,
    columns: spec.columns
  });
}
