import type { AuditThresholds } from '../../config/thresholds.js';
import { hasColumns, type Dataset } from '../../ingress/dataset.js';
import { buildMetricTable, runRules } from '../engine.js';
import { SectionBuilder } from '../section.js';
import type { AuditSection } from '../types.js';
import { productMetricRows, productRules } from './products.js';
import { reviewMetricRows, reviewRules } from './reviews.js';
import { revenueDistributionRows, revenueOutlierRule, salesMetricRows, salesRules } from './sales.js';

export interface OriginalDataInput {
  sales: Dataset;
  products: Dataset;
  reviews: Dataset;
  thresholds: AuditThresholds;
}

const METRIC_COLUMNS = ['Metric', 'Value'] as const;

export function analyzeOriginalData(input: OriginalDataInput): AuditSection {
  const section = new SectionBuilder('original', '📥 Original Data Analysis (Pre-Transformation)');
  const options = { section: 'original' } as const;

  const salesContext = { sales: input.sales, thresholds: input.thresholds };
  section
    .heading('Sales Data Quality')
    .table(buildMetricTable(METRIC_COLUMNS, salesMetricRows, salesContext))
    .checks(runRules(salesRules, salesContext, options));

  if (hasColumns(input.sales, 'total_revenue')) {
    section
      .heading('Revenue Distribution Analysis', 3)
      .table(buildMetricTable(['Statistic', 'Value'], revenueDistributionRows, salesContext))
      .checks(runRules([revenueOutlierRule], salesContext, options));
  }

  const productsContext = { products: input.products };
  section
    .heading('Product Data Quality')
    .table(buildMetricTable(METRIC_COLUMNS, productMetricRows, productsContext))
    .checks(runRules(productRules, productsContext, options));

  const reviewsContext = { reviews: input.reviews, thresholds: input.thresholds };
  section
    .heading('Reviews Data Quality')
    .table(buildMetricTable(METRIC_COLUMNS, reviewMetricRows, reviewsContext))
    .checks(runRules(reviewRules, reviewsContext, options));

  return section.build();
}
