import { cellValues, countWhere, distinctCount, nullCount, numberColumn } from '../../canon/columns.js';
import type { AuditThresholds } from '../../config/thresholds.js';
import { hasColumns, type Dataset } from '../../ingress/dataset.js';
import { formatFixed, formatInteger } from '../../report/format.js';
import type { MetricRow, QualityRule } from '../types.js';

export interface ReviewsContext {
  reviews: Dataset;
  thresholds: AuditThresholds;
}

function reviewsPerProduct(reviews: Dataset): number {
  const products = distinctCount(reviews, 'product_id');
  if (products === 0) {
    throw new Error('No reviewed products.');
  }
  return reviews.rows.length / products;
}

export const reviewMetricRows: ReadonlyArray<MetricRow<ReviewsContext>> = [
  { label: 'Total Reviews', compute: ({ reviews }) => formatInteger(reviews.rows.length) },
  { label: 'Products with Reviews', compute: ({ reviews }) => formatInteger(distinctCount(reviews, 'product_id')) },
  { label: 'Avg Reviews per Product', compute: ({ reviews }) => formatFixed(reviewsPerProduct(reviews), 1) },
  { label: 'Null Review Text', compute: ({ reviews }) => formatInteger(nullCount(reviews, 'review_text')) },
  { label: 'Null Ratings', compute: ({ reviews }) => formatInteger(nullCount(reviews, 'rating')) },
  {
    label: 'Rating Distribution',
    compute: ({ reviews }) => {
      const ratings = numberColumn(reviews, 'rating');
      const ones = countWhere(ratings, (rating) => rating === 1);
      const fives = countWhere(ratings, (rating) => rating === 5);
      return `1★: ${formatInteger(ones)}, 5★: ${formatInteger(fives)}`;
    }
  },
  {
    label: 'Empty Reviews',
    compute: ({ reviews, thresholds }) =>
      formatInteger(
        countWhere(
          cellValues(reviews, 'review_text'),
          (text) => text !== null && text.length < thresholds.minReviewTextLength
        )
      )
  }
];

export const reviewRules: ReadonlyArray<QualityRule<ReviewsContext>> = [
  {
    name: 'reviews.text_present',
    appliesTo: ({ reviews }) => hasColumns(reviews, 'review_text'),
    evaluate: ({ reviews }) => {
      const missing = nullCount(reviews, 'review_text');
      return missing === 0
        ? { status: 'pass', metric: 0, message: 'No missing review text' }
        : { status: 'warning', metric: missing, message: `${formatInteger(missing)} reviews missing text` };
    }
  }
];
