#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig, type AppConfig } from '../config/env.js';
import { log, setLogLevel } from '../lib/log.js';
import { runAuditCommand, runInspectCommand, runReconcileCommand } from './commands.js';

function configure(): AppConfig {
  const config = loadConfig();
  setLogLevel(config.LOG_LEVEL);
  return config;
}

async function runAudit(options: { report?: string; excel?: string }): Promise<void> {
  const result = await runAuditCommand(configure(), options);
  log.info('audit finished', { reportPath: result.reportPath });
}

async function runReconcile(): Promise<void> {
  const entries = await runReconcileCommand(configure());
  if (entries.some((entry) => !entry.match)) {
    process.exitCode = 1;
  }
}

async function runInspect(): Promise<void> {
  await runInspectCommand(configure());
}

const program = new Command();
program.name('etl-audit').description('Data quality audit for the sales star schema').version('0.1.0');

program
  .command('audit')
  .description('Run every check and write the Markdown report, JSONL check log and optional workbook')
  .option('--report <path>', 'Markdown report path (defaults to AUDIT_REPORT_PATH)')
  .option('--excel <path>', 'also write an Excel workbook of the results')
  .action(runAudit);
program
  .command('reconcile')
  .description('Compare CSV export row counts with the warehouse')
  .action(runReconcile);
program.command('inspect').description('Profile the transformed tables and their key references').action(runInspect);

program.parseAsync(process.argv).catch((error) => {
  log.error('command failed', error);
  process.exitCode = 1;
});
