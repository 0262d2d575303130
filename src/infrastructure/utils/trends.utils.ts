import { mean, median } from "simple-statistics";
import type { ExtractionRecord } from "../../core/domain/entities/extraction-record.entity.js";
import type {
  ExtractionTrends,
  QualityDistribution,
  TrendDirection,
  TrendPeriod,
} from "../../core/domain/entities/trends.entity.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export const PERIOD_WINDOW_MS: Record<TrendPeriod, number> = {
  daily: DAY_MS,
  weekly: 7 * DAY_MS,
  monthly: 30 * DAY_MS,
  yearly: 365 * DAY_MS,
};

function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function averageOf(values: number[]): number {
  return values.length ? round(mean(values)) : 0;
}

function directionFor(count: number, perfectRate: number): TrendDirection {
  if (count === 0) return "stable";
  if (perfectRate > 75) return "improving";
  if (perfectRate > 50) return "stable";
  return "declining";
}

/**
 * Aggregate the records created within `period` before `now`: perfect rate,
 * parameter averages, quality distribution and an overall direction.
 */
export function computeTrends(
  records: readonly ExtractionRecord[],
  period: TrendPeriod,
  now: Date = new Date(),
): ExtractionTrends {
  const to = now.getTime();
  const from = to - PERIOD_WINDOW_MS[period];
  const inWindow = records.filter((r) => {
    const t = new Date(r.createdAt).getTime();
    return t >= from && t <= to;
  });

  const distribution: QualityDistribution = {
    perfect: 0,
    good: 0,
    suboptimal: 0,
  };
  for (const r of inWindow) distribution[r.outcome.classification] += 1;

  const perfectExtractionRate = inWindow.length
    ? round((distribution.perfect / inWindow.length) * 100)
    : 0;
  const scores = inWindow.map((r) => r.outcome.qualityScore);

  return {
    period,
    from: new Date(from).toISOString(),
    to: new Date(to).toISOString(),
    count: inWindow.length,
    perfectExtractionRate,
    averages: {
      temperature: averageOf(inWindow.map((r) => r.parameters.temperature)),
      pressure: averageOf(inWindow.map((r) => r.parameters.pressure)),
      timeSeconds: averageOf(inWindow.map((r) => r.parameters.timeSeconds)),
      qualityScore: averageOf(scores),
    },
    medianQualityScore: scores.length ? round(median(scores)) : 0,
    trendDirection: directionFor(inWindow.length, perfectExtractionRate),
    qualityDistribution: distribution,
  };
}
