import type { ExtractionClassification } from "./extraction-record.entity.js";

export const TREND_PERIODS = ["daily", "weekly", "monthly", "yearly"] as const;

export type TrendPeriod = (typeof TREND_PERIODS)[number];

export type TrendDirection = "improving" | "stable" | "declining";

export interface AverageMetrics {
  temperature: number;
  pressure: number;
  timeSeconds: number;
  qualityScore: number;
}

export type QualityDistribution = Record<ExtractionClassification, number>;

export interface ExtractionTrends {
  period: TrendPeriod;
  from: string;
  to: string;
  count: number;
  /** Percentage (0–100) of records classified as perfect. */
  perfectExtractionRate: number;
  averages: AverageMetrics;
  medianQualityScore: number;
  trendDirection: TrendDirection;
  qualityDistribution: QualityDistribution;
}
