export interface AuditThresholds {
  /** Upper revenue outliers above this share of rows downgrade to a warning. */
  revenueOutlierSharePct: number;
  /** Outlier fences sit this many IQRs beyond Q1/Q3. */
  outlierIqrMultiplier: number;
  recordCountDriftWarnRows: number;
  revenueDiffPassPct: number;
  revenueDiffWarnPct: number;
  /** Absolute tolerance for recomputed monetary fields. */
  calculationTolerance: number;
  negativeProfitPassPct: number;
  negativeProfitWarnPct: number;
  marketingCapRatio: number;
  marketingRatioMinPct: number;
  marketingRatioMaxPct: number;
  sentimentCoveragePassPct: number;
  sentimentCoverageWarnPct: number;
  competitorCoveragePassPct: number;
  competitorCoverageWarnPct: number;
  minReviewTextLength: number;
}

export const defaultThresholds: AuditThresholds = {
  revenueOutlierSharePct: 5,
  outlierIqrMultiplier: 3,
  recordCountDriftWarnRows: 10,
  revenueDiffPassPct: 0.01,
  revenueDiffWarnPct: 1,
  calculationTolerance: 0.01,
  negativeProfitPassPct: 10,
  negativeProfitWarnPct: 20,
  marketingCapRatio: 0.3,
  marketingRatioMinPct: 5,
  marketingRatioMaxPct: 20,
  sentimentCoveragePassPct: 90,
  sentimentCoverageWarnPct: 70,
  competitorCoveragePassPct: 80,
  competitorCoverageWarnPct: 30,
  minReviewTextLength: 5
};
