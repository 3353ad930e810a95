import type { AuditSection, CheckResult, MetricTable } from '../quality/types.js';

export function checksOf(section: AuditSection): CheckResult[] {
  return section.blocks.flatMap((block) => (block.kind === 'check' ? [block.result] : []));
}

export function headingsOf(section: AuditSection): string[] {
  return section.blocks.flatMap((block) => (block.kind === 'heading' ? [block.title] : []));
}

/** The first table after the given heading. */
export function tableAfter(section: AuditSection, heading: string): MetricTable {
  const start = section.blocks.findIndex((block) => block.kind === 'heading' && block.title === heading);
  for (const block of section.blocks.slice(start + 1)) {
    if (start >= 0 && block.kind === 'table') {
      return block.table;
    }
  }
  throw new Error(`No table after heading "${heading}"`);
}

export function checkNamed(section: AuditSection, name: string): CheckResult {
  const result = checksOf(section).find((check) => check.name === name);
  if (!result) {
    throw new Error(`No check named ${name}`);
  }
  return result;
}
