import { datasetLayout } from '../config/datasets.js';
import { loadOptionalDataset } from '../ingress/extract.js';
import type { Dataset } from '../ingress/dataset.js';
import { log } from '../lib/log.js';
import { formatTableProfile, profileDataset, type TableProfile } from './profile.js';
import { findOrphanKeys, formatOrphanCheck, type OrphanCheck } from './referentialIntegrity.js';

export interface InspectionReport {
  profiles: TableProfile[];
  /** Table names whose CSV file was not found. */
  missing: string[];
  /** Null when not every table loaded. */
  orphans: OrphanCheck[] | null;
}

const { factSales, dimProduct, dimDate, dimStore, dimCustomer } = datasetLayout.transformed;
const INSPECTED_TABLES = [dimCustomer, dimDate, dimProduct, dimStore, factSales];

export function inspectDatasets(loaded: ReadonlyMap<string, Dataset>, missing: readonly string[]): InspectionReport {
  const profiles = [...loaded.values()].map(profileDataset);
  const fact = loaded.get(factSales.name);
  const orphans = missing.length === 0 && fact ? findOrphanKeys(fact, loaded) : null;
  return { profiles, missing: [...missing], orphans };
}

export async function inspectTransformedTables(transformedDir: string): Promise<InspectionReport> {
  const loaded = new Map<string, Dataset>();
  const missing: string[] = [];
  for (const spec of INSPECTED_TABLES) {
    const dataset = await loadOptionalDataset(transformedDir, spec);
    if (dataset) {
      loaded.set(spec.name, dataset);
    } else {
      log.warn(`${spec.name} not found`, { directory: transformedDir, file: spec.file });
      missing.push(spec.name);
    }
  }
  return inspectDatasets(loaded, missing);
}

export function formatInspection(report: InspectionReport): string[] {
  const lines: string[] = [];
  for (const profile of report.profiles) {
    lines.push(...formatTableProfile(profile), '');
  }
  for (const name of report.missing) {
    lines.push(`TABLE: ${name}`, '  ✗ FILE NOT FOUND!', '');
  }

  lines.push('REFERENTIAL INTEGRITY CHECKS');
  if (report.orphans === null) {
    lines.push('  ⚠ Not all files loaded - skipping integrity checks');
  } else {
    lines.push(...report.orphans.map((check) => `  ${formatOrphanCheck(check)}`));
  }
  return lines;
}
