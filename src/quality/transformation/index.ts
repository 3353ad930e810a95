import { buildComputedTable, buildMetricTable, runRules } from '../engine.js';
import { SectionBuilder } from '../section.js';
import type { AuditSection } from '../types.js';
import { costCalculationRule, grossProfitRule, netProfitRule } from './calculatedFields.js';
import {
  recordCountRows,
  recordCountRule,
  revenueIntegrityRows,
  revenueIntegrityRule
} from './conservation.js';
import type { TransformationContext } from './context.js';
import { marketingMetricRows, marketingRules } from './marketing.js';
import { negativeProfitShareRule, profitDistributionRows } from './profitability.js';

export type { TransformationContext } from './context.js';
export { compareColumnTotals, compareRecordCounts } from './conservation.js';

export function validateTransformation(context: TransformationContext): AuditSection {
  const section = new SectionBuilder('transformation', '🔄 Transformation Quality Analysis');
  const options = { section: 'transformation' } as const;

  section
    .heading('Record Count Integrity')
    .table(buildComputedTable(['Dataset', 'Records', 'Status'], () => recordCountRows(context)))
    .checks(runRules([recordCountRule], context, options));

  section
    .heading('Revenue Integrity Check')
    .table(buildComputedTable(['Source', 'Total Revenue (DZD)'], () => revenueIntegrityRows(context)))
    .checks(runRules([revenueIntegrityRule], context, options));

  section
    .heading('Feature Engineering Quality')
    .note('**Calculated Fields Validation:**')
    .checks(runRules([costCalculationRule, grossProfitRule], context, options));

  section
    .heading('Net Profit Calculation Validation', 3)
    .checks(runRules([netProfitRule], context, options))
    .table(buildComputedTable(['Category', 'Count', 'Percentage'], () => profitDistributionRows(context)))
    .checks(runRules([negativeProfitShareRule], context, options));

  section
    .heading('Marketing Cost Allocation Analysis', 3)
    .table(
      buildMetricTable(['Metric', 'Value'], marketingMetricRows(context.thresholds.marketingCapRatio), context)
    )
    .checks(runRules(marketingRules, context, options));

  return section.build();
}
