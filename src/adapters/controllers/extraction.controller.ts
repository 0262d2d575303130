import type { ServerResponse } from "node:http";
import type { ExtractionService } from "../../core/use-cases/extraction.use-case.js";
import { StartQuerySchema, queryToObject } from "../validation.js";
import { sendJson } from "../http.utils.js";

export class ExtractionController {
  constructor(private extractionService: ExtractionService) {}

  /** POST /start?temperature=&pressure=&time_seconds= */
  start(query: URLSearchParams, res: ServerResponse) {
    const parseRes = StartQuerySchema.safeParse(queryToObject(query));
    if (!parseRes.success) {
      sendJson(res, 400, {
        error: parseRes.error.issues[0]?.message || "Invalid input",
      });
      return;
    }
    const { temperature, pressure, time_seconds } = parseRes.data;

    const result = this.extractionService.start({
      temperature,
      pressure,
      timeSeconds: time_seconds,
    });
    if (!result.success) {
      sendJson(res, 400, result.error.toJSON());
      return;
    }
    sendJson(res, 200, result.data);
  }
}
