import type { ServerResponse } from "node:http";
import type { ExtractionService } from "../../core/use-cases/extraction.use-case.js";
import type { GetTrendsUseCase } from "../../core/use-cases/trends.use-case.js";
import type { AlertMonitor } from "../../core/use-cases/alert-monitor.use-case.js";
import { TrendsQuerySchema, queryToObject } from "../validation.js";
import { sendJson } from "../http.utils.js";

export class MetricsController {
  constructor(
    private extractionService: ExtractionService,
    private getTrendsUseCase: GetTrendsUseCase,
    private alertMonitor?: AlertMonitor,
  ) {}

  /** GET /metrics: full history, oldest first. Empty history is `[]`. */
  getHistory(res: ServerResponse) {
    sendJson(res, 200, this.extractionService.history());
  }

  getTrends(query: URLSearchParams, res: ServerResponse) {
    const parseRes = TrendsQuerySchema.safeParse(queryToObject(query));
    if (!parseRes.success) {
      sendJson(res, 400, {
        error: parseRes.error.issues[0]?.message || "Invalid input",
      });
      return;
    }
    sendJson(res, 200, this.getTrendsUseCase.execute(parseRes.data.period));
  }

  getAlerts(res: ServerResponse) {
    sendJson(res, 200, this.alertMonitor?.alerts() ?? []);
  }
}
