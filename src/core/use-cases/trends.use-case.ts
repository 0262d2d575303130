import type { ExtractionTrends, TrendPeriod } from "../domain/entities/trends.entity.js";
import type { IMetricsStore } from "../domain/repositories/metrics-store.repository.js";
import { computeTrends } from "../../infrastructure/utils/trends.utils.js";

export class GetTrendsUseCase {
  constructor(
    private store: IMetricsStore,
    private clock: () => Date = () => new Date(),
  ) {}

  execute(period: TrendPeriod): ExtractionTrends {
    return computeTrends(this.store.all(), period, this.clock());
  }
}
