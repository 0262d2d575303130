import { z } from "zod";
import { TREND_PERIODS } from "../core/domain/entities/trends.entity.js";

/**
 * Query-string schemas for the HTTP routes. Brewing parameters stay raw
 * strings here; numeric parsing and range checks belong to the
 * ParameterValidator.
 */

export const StartQuerySchema = z.object({
  temperature: z.string().optional(),
  pressure: z.string().optional(),
  time_seconds: z.string().optional(),
});

export const TrendsQuerySchema = z.object({
  period: z
    .enum(TREND_PERIODS, {
      errorMap: () => ({
        message: `period must be one of: ${TREND_PERIODS.join(", ")}`,
      }),
    })
    .default("daily"),
});

/** First value of each query key, as a plain object for zod. */
export function queryToObject(params: URLSearchParams): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of params) {
    if (!(key in out)) out[key] = value;
  }
  return out;
}
