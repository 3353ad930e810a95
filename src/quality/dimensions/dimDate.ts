import { countWhere, dateColumn, duplicateCount, numberColumn } from '../../canon/columns.js';
import { formatDateTimeUtc } from '../../canon/rules.js';
import { hasColumns, type Dataset } from '../../ingress/dataset.js';
import { formatInteger } from '../../report/format.js';
import type { MetricRow, QualityRule } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DimDateContext {
  dimDate: Dataset;
}

function presentDates(dimDate: Dataset): number[] {
  return dateColumn(dimDate, 'date')
    .filter((value): value is number => value !== null)
    .sort((a, b) => a - b);
}

/** Consecutive dates (in calendar order) more than one day apart. */
export function countDateGaps(dimDate: Dataset): number {
  const dates = presentDates(dimDate);
  let gaps = 0;
  for (let index = 1; index < dates.length; index += 1) {
    const previous = dates[index - 1];
    const current = dates[index];
    if (previous !== undefined && current !== undefined && current - previous > DAY_MS) {
      gaps += 1;
    }
  }
  return gaps;
}

export function countDuplicateDates(dimDate: Dataset): number {
  return duplicateCount(dateColumn(dimDate, 'date'));
}

function dateRange(dimDate: Dataset): string {
  const dates = presentDates(dimDate);
  const first = dates[0];
  const last = dates[dates.length - 1];
  if (first === undefined || last === undefined) {
    throw new Error('No dates present.');
  }
  return `${formatDateTimeUtc(first)} to ${formatDateTimeUtc(last)}`;
}

function countDaysOfWeek(dimDate: Dataset, days: readonly number[]): number {
  return countWhere(numberColumn(dimDate, 'day_of_week'), (day) => day !== null && days.includes(day));
}

export const dimDateMetricRows: ReadonlyArray<MetricRow<DimDateContext>> = [
  { label: 'Total Dates', compute: ({ dimDate }) => formatInteger(dimDate.rows.length) },
  { label: 'Date Range', compute: ({ dimDate }) => dateRange(dimDate) },
  { label: 'Date Gaps (>1 day)', compute: ({ dimDate }) => formatInteger(countDateGaps(dimDate)) },
  { label: 'Weekdays', compute: ({ dimDate }) => formatInteger(countDaysOfWeek(dimDate, [0, 1, 2, 3, 4])) },
  { label: 'Weekends', compute: ({ dimDate }) => formatInteger(countDaysOfWeek(dimDate, [5, 6])) },
  { label: 'Duplicates', compute: ({ dimDate }) => formatInteger(countDuplicateDates(dimDate)) }
];

export const dimDateRules: ReadonlyArray<QualityRule<DimDateContext>> = [
  {
    name: 'dim_date.unique_dates',
    appliesTo: ({ dimDate }) => hasColumns(dimDate, 'date'),
    evaluate: ({ dimDate }) => {
      const duplicates = countDuplicateDates(dimDate);
      return duplicates === 0
        ? { status: 'pass', metric: 0, message: 'All dates are unique' }
        : { status: 'fail', metric: duplicates, message: `${formatInteger(duplicates)} duplicate dates found!` };
    }
  }
];
