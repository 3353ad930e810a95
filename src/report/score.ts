import type { CheckResult, CheckStatus } from '../quality/types.js';

export interface QualityGrade {
  label: string;
  emoji: string;
}

export interface QualityScore {
  /** Pass-equivalent weight: pass 1, warning 0.5, fail 0. */
  score: number;
  total_checks: number;
  percentage: number;
  grade: QualityGrade;
}

const STATUS_WEIGHT: Record<CheckStatus, number> = {
  pass: 1,
  warning: 0.5,
  fail: 0
};

const GRADES: ReadonlyArray<{ minPct: number; grade: QualityGrade }> = [
  { minPct: 95, grade: { label: 'A+ (Excellent)', emoji: '🌟' } },
  { minPct: 85, grade: { label: 'A (Very Good)', emoji: '✅' } },
  { minPct: 75, grade: { label: 'B (Good)', emoji: '👍' } },
  { minPct: 60, grade: { label: 'C (Acceptable)', emoji: '⚠️' } }
];

const LOWEST_GRADE: QualityGrade = { label: 'D (Needs Improvement)', emoji: '❌' };

export function gradeFor(percentage: number): QualityGrade {
  return GRADES.find((band) => percentage >= band.minPct)?.grade ?? LOWEST_GRADE;
}

export function computeQualityScore(results: readonly CheckResult[]): QualityScore {
  const score = results.reduce((total, result) => total + STATUS_WEIGHT[result.status], 0);
  const total = results.length;
  const percentage = total > 0 ? (score / total) * 100 : 0;
  return {
    score,
    total_checks: total,
    percentage,
    grade: gradeFor(percentage)
  };
}
