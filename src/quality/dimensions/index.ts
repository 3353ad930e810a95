import type { AuditThresholds } from '../../config/thresholds.js';
import type { Dataset } from '../../ingress/dataset.js';
import { buildMetricTable, runRules } from '../engine.js';
import { SectionBuilder } from '../section.js';
import type { AuditSection } from '../types.js';
import { dimDateMetricRows, dimDateRules } from './dimDate.js';
import { dimProductMetricRows, dimProductRules } from './dimProduct.js';

export interface DimensionInput {
  dimProduct: Dataset;
  dimDate: Dataset;
  thresholds: AuditThresholds;
}

const CHECK_COLUMNS = ['Check', 'Result'] as const;

export function analyzeDimensions(input: DimensionInput): AuditSection {
  const section = new SectionBuilder('dimensions', '📊 Dimension Tables Quality');
  const options = { section: 'dimensions' } as const;

  const productContext = { dimProduct: input.dimProduct, thresholds: input.thresholds };
  section
    .heading('Dim_Product Analysis')
    .table(buildMetricTable(CHECK_COLUMNS, dimProductMetricRows, productContext))
    .checks(runRules(dimProductRules, productContext, options));

  const dateContext = { dimDate: input.dimDate };
  section
    .heading('Dim_Date Analysis')
    .table(buildMetricTable(CHECK_COLUMNS, dimDateMetricRows, dateContext))
    .checks(runRules(dimDateRules, dateContext, options));

  return section.build();
}
