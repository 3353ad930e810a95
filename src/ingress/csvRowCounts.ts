import path from 'node:path';
import { fileExists } from '../lib/fs.js';
import { log } from '../lib/log.js';
import type { RowCountSource } from '../quality/types.js';
import { readCsvTable } from './csvReader.js';
import type { Dataset } from './dataset.js';

export interface CsvRowCountSourceInput {
  directory: string;
  /** Tables already loaded for the audit, keyed by table name; counted without re-reading. */
  preloaded?: ReadonlyMap<string, Dataset>;
}

export function createCsvRowCountSource(input: CsvRowCountSourceInput): RowCountSource {
  return {
    label: 'CSV',
    async countRows(table: string): Promise<number> {
      const loaded = input.preloaded?.get(table);
      if (loaded) {
        return loaded.rows.length;
      }
      const filePath = path.join(input.directory, `${table}.csv`);
      if (!(await fileExists(filePath))) {
        log.warn(`no CSV export for ${table}; counting 0 rows`, { filePath });
        return 0;
      }
      const csv = await readCsvTable(filePath);
      return csv.records.length;
    }
  };
}
