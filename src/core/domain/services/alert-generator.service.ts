import { randomUUID } from "node:crypto";
import type {
  Alert,
  AlertCategory,
  AlertSeverity,
} from "../entities/alert.entity.js";
import type { AlertsConfig } from "../entities/config.entity.js";
import type { ExtractionRecord } from "../entities/extraction-record.entity.js";

type AlertDraft = Omit<Alert, "id" | "createdAt" | "recordId" | "rule">;

export interface AlertRule {
  name: string;
  evaluate(
    record: ExtractionRecord,
    history: readonly ExtractionRecord[],
  ): AlertDraft | null;
}

function draft(
  severity: AlertSeverity,
  category: AlertCategory,
  message: string,
  metadata: Record<string, number | string>,
): AlertDraft {
  return { severity, category, message, metadata };
}

export function temperatureDeviationRule(config: AlertsConfig): AlertRule {
  const { min, max } = config.temperatureRange;
  return {
    name: "temperature_deviation",
    evaluate: ({ parameters }) =>
      parameters.temperature < min || parameters.temperature > max
        ? draft(
            "critical",
            "parameter_deviation",
            `Temperature ${parameters.temperature}°C outside acceptable range ${min}–${max}°C`,
            { temperature: parameters.temperature, min, max },
          )
        : null,
  };
}

export function pressureInstabilityRule(config: AlertsConfig): AlertRule {
  const { min, max } = config.pressureRange;
  return {
    name: "pressure_instability",
    evaluate: ({ parameters }) =>
      parameters.pressure < min || parameters.pressure > max
        ? draft(
            "warning",
            "parameter_deviation",
            `Pressure ${parameters.pressure} bar outside stable range ${min}–${max} bar`,
            { pressure: parameters.pressure, min, max },
          )
        : null,
  };
}

export function lowPerfectRateRule(config: AlertsConfig): AlertRule {
  return {
    name: "low_perfect_rate",
    evaluate: (_record, history) => {
      if (history.length < config.minSampleSize) return null;
      const perfect = history.filter(
        (r) => r.outcome.classification === "perfect",
      ).length;
      const rate = perfect / history.length;
      if (rate >= config.perfectRateThreshold) return null;
      return draft(
        "warning",
        "extraction_quality",
        `Low perfect extraction rate: ${perfect} of ${history.length} shots`,
        { perfectRate: rate, threshold: config.perfectRateThreshold },
      );
    },
  };
}

/**
 * Runs every rule against a freshly recorded extraction and the history
 * that includes it.
 */
export class AlertGenerator {
  private rules: AlertRule[];

  constructor(
    config: AlertsConfig,
    private clock: () => Date = () => new Date(),
    rules?: AlertRule[],
  ) {
    this.rules = rules ?? [
      lowPerfectRateRule(config),
      temperatureDeviationRule(config),
      pressureInstabilityRule(config),
    ];
  }

  generateAlerts(
    record: ExtractionRecord,
    history: readonly ExtractionRecord[],
  ): Alert[] {
    const createdAt = this.clock().toISOString();
    const alerts: Alert[] = [];
    for (const rule of this.rules) {
      const hit = rule.evaluate(record, history);
      if (!hit) continue;
      alerts.push({
        ...hit,
        id: randomUUID(),
        createdAt,
        rule: rule.name,
        recordId: record.id,
      });
    }
    return alerts;
  }
}
