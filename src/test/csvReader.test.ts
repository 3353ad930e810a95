import { mkdtemp, rm, unlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { datasetLayout } from '../config/datasets.js';
import { readCsvDataset, readCsvTable } from '../ingress/csvReader.js';
import { createCsvRowCountSource } from '../ingress/csvRowCounts.js';
import { extractAuditDatasets, transformedTablesByName } from '../ingress/extract.js';
import { datasetFrom, dimDateTable, writeSampleDataDir, type SampleDataDir } from './fixtures.js';

describe('readCsvTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'etl-audit-csv-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('keeps cells as raw text and empty cells as null', async () => {
    const filePath = path.join(dir, 'sales.csv');
    await writeFile(filePath, 'Sale ID,Date,Revenue\nT1,2024-01-01,0300\nT2,,450\n', 'utf8');

    const table = await readCsvTable(filePath);

    expect(table.headers).toEqual(['Sale ID', 'Date', 'Revenue']);
    expect(table.records).toEqual([
      ['T1', '2024-01-01', '0300'],
      ['T2', null, '450']
    ]);
  });

  it('keeps a row of empty fields and skips blank lines', async () => {
    const filePath = path.join(dir, 'Dim_Store.csv');
    await writeFile(filePath, 'store_id,store_name\nS1,A\n,\n\nS3,C\n', 'utf8');

    const table = await readCsvTable(filePath);

    expect(table.records).toEqual([
      ['S1', 'A'],
      [null, null],
      ['S3', 'C']
    ]);
    await expect(createCsvRowCountSource({ directory: dir }).countRows('Dim_Store')).resolves.toBe(3);
  });

  it('loads a dataset under its canonical column names', async () => {
    const filePath = path.join(dir, 'sales.csv');
    await writeFile(filePath, 'Sale ID,Date,Revenue\nT1,2024-01-01,300\n', 'utf8');

    const dataset = await readCsvDataset(filePath, datasetLayout.extracted.sales);

    expect(dataset.name).toBe('sales');
    expect(dataset.source).toBe(filePath);
    expect(dataset.rows).toEqual([{ trans_id: 'T1', date: '2024-01-01', total_revenue: '300' }]);
  });
});

describe('extractAuditDatasets', () => {
  let data: SampleDataDir;

  beforeEach(async () => {
    data = await writeSampleDataDir();
  });

  afterEach(async () => {
    await data.cleanup();
  });

  it('loads every table of the layout', async () => {
    const datasets = await extractAuditDatasets({
      extractedDir: data.extractedDir,
      transformedDir: data.transformedDir,
      maxConcurrentLoads: 2
    });

    expect(datasets.sales.rows).toHaveLength(4);
    expect(datasets.factSales.rows[3]?.net_profit).toBe('72');
    expect(datasets.dimCustomer?.rows).toHaveLength(3);
    expect([...transformedTablesByName(datasets).keys()]).toEqual([
      'Fact_Sales',
      'Dim_Product',
      'Dim_Date',
      'Dim_Store',
      'Dim_Customer'
    ]);
  });

  it('treats missing dimension exports as absent', async () => {
    await unlink(path.join(data.transformedDir, 'Dim_Store.csv'));

    const datasets = await extractAuditDatasets({
      extractedDir: data.extractedDir,
      transformedDir: data.transformedDir,
      maxConcurrentLoads: 4
    });

    expect(datasets.dimStore).toBeNull();
  });

  it('fails when a required table is missing', async () => {
    const reviewsPath = path.join(data.extractedDir, 'reviews.csv');
    await unlink(reviewsPath);

    await expect(
      extractAuditDatasets({
        extractedDir: data.extractedDir,
        transformedDir: data.transformedDir,
        maxConcurrentLoads: 4
      })
    ).rejects.toThrow(`Missing required dataset "reviews" at ${reviewsPath}.`);
  });
});

describe('createCsvRowCountSource', () => {
  let data: SampleDataDir;

  beforeEach(async () => {
    data = await writeSampleDataDir();
  });

  afterEach(async () => {
    await data.cleanup();
  });

  it('counts data rows of each export and 0 for a missing file', async () => {
    await unlink(path.join(data.transformedDir, 'Dim_Customer.csv'));
    const source = createCsvRowCountSource({ directory: data.transformedDir });

    expect(source.label).toBe('CSV');
    await expect(source.countRows('Fact_Sales')).resolves.toBe(4);
    await expect(source.countRows('Dim_Customer')).resolves.toBe(0);
  });

  it('uses already loaded tables', async () => {
    const dimDate = datasetFrom(datasetLayout.transformed.dimDate, {
      headers: dimDateTable.headers,
      rows: dimDateTable.rows.slice(0, 1)
    });
    const source = createCsvRowCountSource({
      directory: data.transformedDir,
      preloaded: new Map([['Dim_Date', dimDate]])
    });

    await expect(source.countRows('Dim_Date')).resolves.toBe(1);
  });
});
