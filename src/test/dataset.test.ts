import { describe, expect, it } from 'vitest';
import { cellValues, duplicateCount, nullCount, numberColumn } from '../canon/columns.js';
import { datasetLayout } from '../config/datasets.js';
import { createDataset, hasColumns } from '../ingress/dataset.js';

const salesSpec = datasetLayout.extracted.sales;

describe('createDataset', () => {
  it('standardizes headers and renames aliases to canonical columns', () => {
    const dataset = createDataset({
      name: 'sales',
      source: 'memory',
      headers: ['Sale ID', ' Date ', 'Revenue', 'Channel'],
      records: [['T1', '2024-01-01', '300', 'web']],
      columns: salesSpec.columns
    });

    expect(Object.keys(dataset.columns)).toEqual(['trans_id', 'date', 'total_revenue', 'channel']);
    expect(dataset.columns.total_revenue).toBe('money');
    expect(dataset.columns.channel).toBe('text');
    expect(dataset.rows[0]).toEqual({ trans_id: 'T1', date: '2024-01-01', total_revenue: '300', channel: 'web' });
  });

  it('turns empty cells into nulls and keeps whitespace as text', () => {
    const dataset = createDataset({
      name: 'sales',
      source: 'memory',
      headers: ['trans_id', 'channel'],
      records: [
        ['T1', '  '],
        ['T2', null],
        ['T3', '']
      ]
    });

    expect(nullCount(dataset)).toBe(2);
    expect(nullCount(dataset, 'trans_id')).toBe(0);
    expect(dataset.rows[0]?.channel).toBe('  ');
  });

  it('rejects two headers that resolve to the same column', () => {
    expect(() =>
      createDataset({
        name: 'sales',
        source: 'sales.csv',
        headers: ['trans_id', 'Sale_ID'],
        records: [],
        columns: salesSpec.columns
      })
    ).toThrow('Dataset "sales" has more than one column resolving to "trans_id" (sales.csv).');
  });

  it('rejects an empty header', () => {
    expect(() =>
      createDataset({ name: 'sales', source: 'sales.csv', headers: ['trans_id', ' '], records: [] })
    ).toThrow('Dataset "sales" has an empty header in column 2 (sales.csv).');
  });
});

describe('column accessors', () => {
  const dataset = createDataset({
    name: 'Fact_Sales',
    source: 'memory',
    headers: ['sale_id', 'cost'],
    records: [
      ['T1', '200'],
      ['T1', null],
      ['T2', 'n/a']
    ]
  });

  it('reports the line of a malformed number', () => {
    expect(() => numberColumn(dataset, 'cost')).toThrow(
      'Non-numeric value "n/a" in column "cost" of Fact_Sales (line 4).'
    );
  });

  it('fails on a column the dataset does not have', () => {
    expect(hasColumns(dataset, 'sale_id', 'cost')).toBe(true);
    expect(() => cellValues(dataset, 'net_profit')).toThrow('Dataset "Fact_Sales" has no "net_profit" column.');
  });

  it('counts repeats beyond the first occurrence', () => {
    expect(duplicateCount(cellValues(dataset, 'sale_id'))).toBe(1);
    expect(duplicateCount([null, null, 'a'])).toBe(1);
  });
});
