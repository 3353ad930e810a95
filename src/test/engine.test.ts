import { describe, expect, it } from 'vitest';
import { buildComputedTable, buildMetricTable, checkId, collectResults, runRules } from '../quality/engine.js';
import { SectionBuilder } from '../quality/section.js';
import type { QualityRule } from '../quality/types.js';

interface Context {
  values: number[];
  hasValues: boolean;
}

const rules: Array<QualityRule<Context>> = [
  {
    name: 'values.present',
    evaluate: ({ values }) =>
      values.length > 0
        ? { status: 'pass', metric: values.length, message: 'values present' }
        : { status: 'fail', metric: 0, message: 'no values' }
  },
  {
    name: 'values.ratio',
    evaluate: () => {
      throw new Error('Cannot compute a share of an empty total.');
    }
  },
  {
    name: 'values.optional',
    appliesTo: ({ hasValues }) => hasValues,
    evaluate: () => ({ status: 'warning', metric: null, message: 'optional check ran' })
  },
  {
    name: 'values.last',
    evaluate: () => ({ status: 'pass', metric: 'ok', message: 'still evaluated' })
  }
];

describe('runRules', () => {
  it('turns a throwing rule into a failure and keeps going', () => {
    const results = runRules(rules, { values: [1, 2], hasValues: true }, { section: 'original' });

    expect(results.map((result) => [result.name, result.status])).toEqual([
      ['values.present', 'pass'],
      ['values.ratio', 'fail'],
      ['values.optional', 'warning'],
      ['values.last', 'pass']
    ]);
    expect(results[1]).toMatchObject({
      metric: null,
      message: 'values.ratio could not be evaluated: Cannot compute a share of an empty total.'
    });
  });

  it('skips rules whose inputs are absent', () => {
    const results = runRules(rules, { values: [], hasValues: false }, { section: 'original' });

    expect(results.map((result) => result.name)).toEqual(['values.present', 'values.ratio', 'values.last']);
  });

  it('derives stable check ids from section and name', () => {
    const first = runRules(rules, { values: [1], hasValues: true }, { section: 'dimensions' });
    const second = runRules(rules, { values: [1], hasValues: true }, { section: 'dimensions' });

    expect(first[0]?.check_id).toBe(checkId('dimensions', 'values.present'));
    expect(first[0]?.check_id).toMatch(/^[0-9a-f]{64}$/);
    expect(first).toEqual(second);
    expect(checkId('original', 'values.present')).not.toBe(checkId('dimensions', 'values.present'));
  });

  it('freezes results', () => {
    const [result] = runRules(rules, { values: [1], hasValues: true }, { section: 'original' });
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe('tables', () => {
  it('renders a metric that cannot be computed as N/A', () => {
    const table = buildMetricTable(
      ['Metric', 'Value'],
      [
        { label: 'Count', compute: (context: Context) => String(context.values.length) },
        {
          label: 'Max',
          compute: () => {
            throw new Error('No values present.');
          }
        }
      ],
      { values: [4, 5], hasValues: true }
    );

    expect(table.rows).toEqual([
      ['Count', '2'],
      ['Max', 'N/A']
    ]);
  });

  it('renders a single N/A row when a computed table throws', () => {
    const table = buildComputedTable(['Category', 'Count', 'Percentage'], () => {
      throw new Error('empty');
    });

    expect(table.rows).toEqual([['N/A', 'N/A', 'N/A']]);
  });
});

describe('SectionBuilder', () => {
  it('keeps blocks in insertion order and collects checks across sections', () => {
    const [present] = runRules(rules.slice(0, 1), { values: [1], hasValues: true }, { section: 'original' });
    const [last] = runRules(rules.slice(3), { values: [1], hasValues: true }, { section: 'dimensions' });
    if (!present || !last) {
      throw new Error('expected results');
    }

    const original = new SectionBuilder('original', 'Original').heading('Sales').checks([present]).build();
    const dimensions = new SectionBuilder('dimensions', 'Dimensions').note('note').checks([last]).build();

    expect(original.blocks.map((block) => block.kind)).toEqual(['heading', 'check']);
    expect(collectResults([original, dimensions]).map((result) => result.name)).toEqual([
      'values.present',
      'values.last'
    ]);
  });

  it('rejects checks from another section', () => {
    const [result] = runRules(rules.slice(0, 1), { values: [1], hasValues: true }, { section: 'original' });
    if (!result) {
      throw new Error('expected a result');
    }

    expect(() => new SectionBuilder('integrity', 'Integrity').checks([result])).toThrow(
      'Check values.present belongs to section "original", not "integrity".'
    );
  });
});
