import type { ExtractionParameters } from "../src/core/domain/entities/extraction-parameters.entity.js";
import type { ExtractionRecord } from "../src/core/domain/entities/extraction-record.entity.js";
import { simulateExtraction } from "../src/core/domain/services/extraction-simulator.service.js";
import { parseConfig } from "../src/infrastructure/services/config.service.js";

export const FIXED_NOW = new Date("2026-01-10T12:00:00.000Z");

export const fixedClock = () => FIXED_NOW;

/** Config with every default applied. */
export function defaultConfig() {
  return parseConfig({});
}

export function recordFor(
  id: number,
  parameters: ExtractionParameters,
  createdAt: Date = FIXED_NOW,
): ExtractionRecord {
  return {
    id,
    createdAt: createdAt.toISOString(),
    parameters,
    outcome: simulateExtraction(parameters),
  };
}

export const IDEAL_SHOT: ExtractionParameters = {
  temperature: 93,
  pressure: 9,
  timeSeconds: 25,
};
