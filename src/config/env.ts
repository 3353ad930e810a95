import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { isValidTimeZone } from '../lib/time.js';

dotenv.config();

const envSchema = z.object({
  AUDIT_DATA_DIR: z.string().trim().min(1).default('./Data'),
  AUDIT_DB_PATH: z.string().trim().min(1).default('./database/warehouse.db'),
  AUDIT_REPORT_PATH: z.string().trim().min(1).default('./DATA_QUALITY_REPORT.md'),
  AUDIT_OUTPUT_DIR: z.string().trim().min(1).default('./data/audit'),
  AUDIT_TIME_ZONE: z
    .string()
    .trim()
    .min(1)
    .default('Africa/Algiers')
    .refine(isValidTimeZone, (value) => ({ message: `Unknown time zone "${value}".` })),
  AUDIT_MAX_CONCURRENT_LOADS: z.coerce.number().int().positive().default(4),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export type AppConfig = z.infer<typeof envSchema> & {
  extractedDir: string;
  transformedDir: string;
  resolvedDbPath: string;
  resolvedReportPath: string;
  resolvedOutputDir: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid audit configuration (${details}). Check your .env file.`);
  }

  const config = parsed.data;
  const resolvedDataDir = path.resolve(config.AUDIT_DATA_DIR);

  return {
    ...config,
    extractedDir: path.join(resolvedDataDir, 'extracted'),
    transformedDir: path.join(resolvedDataDir, 'transformed'),
    resolvedDbPath: path.resolve(config.AUDIT_DB_PATH),
    resolvedReportPath: path.resolve(config.AUDIT_REPORT_PATH),
    resolvedOutputDir: path.resolve(config.AUDIT_OUTPUT_DIR)
  };
}
