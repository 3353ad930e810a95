import type {
  AuditBlock,
  AuditSection,
  AuditSectionKey,
  CheckResult,
  MetricTable,
  ReconciliationEntry
} from './types.js';

/** Append-only block list for one report section; insertion order is report order. */
export class SectionBuilder {
  private readonly key: AuditSectionKey;
  private readonly title: string;
  private readonly blocks: AuditBlock[] = [];

  constructor(key: AuditSectionKey, title: string) {
    this.key = key;
    this.title = title;
  }

  heading(title: string, level: 2 | 3 = 2): this {
    this.blocks.push({ kind: 'heading', level, title });
    return this;
  }

  note(text: string): this {
    this.blocks.push({ kind: 'note', text });
    return this;
  }

  table(table: MetricTable): this {
    this.blocks.push({ kind: 'table', table });
    return this;
  }

  checks(results: readonly CheckResult[]): this {
    for (const result of results) {
      if (result.section !== this.key) {
        throw new Error(`Check ${result.name} belongs to section "${result.section}", not "${this.key}".`);
      }
      this.blocks.push({ kind: 'check', result });
    }
    return this;
  }

  reconciliation(labels: readonly [string, string], entries: readonly ReconciliationEntry[]): this {
    this.blocks.push({ kind: 'reconciliation', labels, entries: [...entries] });
    return this;
  }

  build(): AuditSection {
    return Object.freeze({
      key: this.key,
      title: this.title,
      blocks: Object.freeze([...this.blocks])
    });
  }
}
