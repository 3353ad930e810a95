import { formatTimestamp } from '../lib/time.js';
import { collectResults } from '../quality/engine.js';
import type { AuditBlock, AuditRun, CheckStatus, MetricTable } from '../quality/types.js';
import { formatFixed, formatInteger, formatPercent } from './format.js';
import { computeQualityScore, type QualityScore } from './score.js';

export const REPORT_TITLE = '🔍 Enhanced Data Quality & Feature Engineering Audit';

const STATUS_PREFIX: Record<CheckStatus, string> = {
  pass: '✅ **PASS**',
  fail: '❌ **FAIL**',
  warning: '⚠️ **WARNING**'
};

const RULE = '---';

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function renderTable(table: MetricTable): string {
  const line = (cells: readonly string[]): string => `| ${cells.map(escapeCell).join(' | ')} |`;
  return [line(table.columns), line(table.columns.map(() => '---')), ...table.rows.map(line)].join('\n');
}

function renderBlock(block: AuditBlock): string {
  switch (block.kind) {
    case 'heading':
      return `${'#'.repeat(block.level)} ${block.title}`;
    case 'note':
      return block.text;
    case 'table':
      return renderTable(block.table);
    case 'check':
      return `${STATUS_PREFIX[block.result.status]}: ${block.result.message}`;
    case 'reconciliation': {
      const [labelA, labelB] = block.labels;
      return renderTable({
        columns: ['Table', `${labelA} Rows`, `${labelB} Rows`, 'Match'],
        rows: block.entries.map((entry) => [
          entry.table_name,
          formatInteger(entry.count_source_a),
          formatInteger(entry.count_source_b),
          entry.match ? '✅' : '❌'
        ])
      });
    }
  }
}

export function renderSummary(score: QualityScore): string[] {
  return [
    '## 📋 Quality Score Summary',
    `**Total Checks**: ${score.total_checks}`,
    `**Quality Score**: ${formatFixed(score.score, 1)} / ${score.total_checks}`,
    `**Percentage**: ${formatPercent(score.percentage)}`,
    `${score.grade.emoji} **Overall Quality Grade**: ${score.grade.label}`
  ];
}

/** Deterministic for a given run: the timestamp comes from `run.generatedAt`, never the clock. */
export function renderMarkdownReport(run: AuditRun): string {
  const score = computeQualityScore(collectResults(run.sections));
  const blocks: string[] = [
    `# ${REPORT_TITLE}`,
    `**Generated**: ${formatTimestamp(run.generatedAt, run.timeZone)}`,
    RULE,
    ...renderSummary(score),
    RULE
  ];

  for (const section of run.sections) {
    blocks.push(`# ${section.title}`);
    blocks.push(...section.blocks.map(renderBlock));
  }

  return `${blocks.join('\n\n')}\n`;
}
