import Database from 'better-sqlite3';
import { z } from 'zod';
import { retryAsync } from '../lib/retry.js';
import type { RowCountSource } from '../quality/types.js';

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const countRowSchema = z.object({
  count: z.number().int().nonnegative()
});

/**
 * Row counts from the SQLite warehouse written by the loader.
 * Opened read-only; the loader may still hold a write lock, so busy errors are retried.
 */
export class WarehouseRowCounter implements RowCountSource {
  readonly label = 'DB';
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  static open(dbPath: string): WarehouseRowCounter {
    return new WarehouseRowCounter(new Database(dbPath, { readonly: true, fileMustExist: true }));
  }

  async countRows(table: string): Promise<number> {
    if (!TABLE_NAME_PATTERN.test(table)) {
      throw new Error(`Refusing to count rows of table with unexpected name "${table}".`);
    }
    return retryAsync(async () => this.countOnce(table), {
      maxRetries: 3,
      baseDelayMs: 200,
      maxDelayMs: 2_000
    });
  }

  close(): void {
    this.db.close();
  }

  private countOnce(table: string): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS count FROM "${table}"`).get();
    return countRowSchema.parse(row).count;
  }
}
