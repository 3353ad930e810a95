import type { AuditThresholds } from '../../config/thresholds.js';
import type { Dataset } from '../../ingress/dataset.js';

export interface TransformationContext {
  sales: Dataset;
  products: Dataset;
  factSales: Dataset;
  thresholds: AuditThresholds;
}
