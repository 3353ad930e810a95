import { describe, expect, it } from 'vitest';
import { datasetLayout } from '../config/datasets.js';
import { defaultThresholds, type AuditThresholds } from '../config/thresholds.js';
import { analyzeDimensions } from '../quality/dimensions/index.js';
import { countDateGaps } from '../quality/dimensions/dimDate.js';
import { datasetFrom, dimDateTable, dimProductTable, withCell } from './fixtures.js';
import { checkNamed, checksOf, tableAfter } from './helpers.js';

const { dimProduct, dimDate } = datasetLayout.transformed;

function analyze(
  tables: { dimProduct?: typeof dimProductTable; dimDate?: typeof dimDateTable } = {},
  thresholds: AuditThresholds = defaultThresholds
) {
  return analyzeDimensions({
    dimProduct: datasetFrom(dimProduct, tables.dimProduct ?? dimProductTable),
    dimDate: datasetFrom(dimDate, tables.dimDate ?? dimDateTable),
    thresholds
  });
}

describe('analyzeDimensions', () => {
  it('passes complete dimensions', () => {
    const section = analyze();

    expect(section.title).toBe('📊 Dimension Tables Quality');
    expect(checksOf(section).map((check) => [check.name, check.status, check.message])).toEqual([
      ['dim_product.sentiment_coverage', 'pass', 'Sentiment analysis coverage: 100.0%'],
      ['dim_product.competitor_coverage', 'pass', 'Competitor price matching: 100.0%'],
      ['dim_date.unique_dates', 'pass', 'All dates are unique']
    ]);
  });

  it('profiles Dim_Product', () => {
    const table = tableAfter(analyze(), 'Dim_Product Analysis');

    expect(table.columns).toEqual(['Check', 'Result']);
    expect(table.rows).toEqual([
      ['Total Products', '2'],
      ['Unique Product IDs', '2'],
      ['Products with Sentiment', '2 (100.0%)'],
      ['Avg Sentiment Score', '0.200'],
      ['Products with Competitor Price', '2 (100.0%)'],
      ['Avg Price Difference', '-0.15%'],
      ['Missing Category', '0'],
      ['Missing Subcategory', '0']
    ]);
  });

  it('profiles Dim_Date', () => {
    expect(tableAfter(analyze(), 'Dim_Date Analysis').rows).toEqual([
      ['Total Dates', '3'],
      ['Date Range', '2024-01-01 00:00:00 to 2024-01-03 00:00:00'],
      ['Date Gaps (>1 day)', '0'],
      ['Weekdays', '3'],
      ['Weekends', '0'],
      ['Duplicates', '0']
    ]);
  });

  it('grades sentiment and competitor coverage', () => {
    let table = withCell(dimProductTable, 1, 'avg_sentiment', null);
    table = withCell(table, 1, 'competitor_price', null);

    const section = analyze({ dimProduct: table });
    expect(checkNamed(section, 'dim_product.sentiment_coverage')).toMatchObject({
      status: 'fail',
      metric: 50,
      message: 'Low sentiment coverage: 50.0%'
    });
    expect(checkNamed(section, 'dim_product.competitor_coverage')).toMatchObject({
      status: 'warning',
      message: 'Competitor price matching: 50.0%'
    });

    const lenient = analyze({ dimProduct: table }, { ...defaultThresholds, sentimentCoverageWarnPct: 40 });
    expect(checkNamed(lenient, 'dim_product.sentiment_coverage')).toMatchObject({
      status: 'warning',
      message: 'Sentiment analysis coverage: 50.0%'
    });
  });

  it('compares dates by value, not by text', () => {
    const table = withCell(dimDateTable, 1, 'date', '2024-01-01 00:00:00');
    const section = analyze({ dimDate: table });

    expect(checkNamed(section, 'dim_date.unique_dates')).toMatchObject({
      status: 'fail',
      metric: 1,
      message: '1 duplicate dates found!'
    });
    expect(tableAfter(section, 'Dim_Date Analysis').rows[2]).toEqual(['Date Gaps (>1 day)', '1']);
  });

  it('counts weekend days', () => {
    const table = withCell(dimDateTable, 2, 'day_of_week', '6');
    expect(tableAfter(analyze({ dimDate: table }), 'Dim_Date Analysis').rows.slice(3, 5)).toEqual([
      ['Weekdays', '2'],
      ['Weekends', '1']
    ]);
  });

  it('counts gaps between consecutive dates', () => {
    const dataset = datasetFrom(dimDate, {
      headers: dimDateTable.headers,
      rows: [
        ['1', '2024-01-05', '4'],
        ['2', '2024-01-01', '0'],
        ['3', '2024-01-02', '1'],
        ['4', '2024-01-09', '1']
      ]
    });
    expect(countDateGaps(dataset)).toBe(2);
  });
});
