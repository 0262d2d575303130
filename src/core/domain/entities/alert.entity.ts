import type { RecordId } from "./extraction-record.entity.js";

export type AlertSeverity = "info" | "warning" | "critical";

export const SEVERITY_RANK: Record<AlertSeverity, number> = {
  info: 0,
  warning: 1,
  critical: 2,
};

export type AlertCategory =
  | "extraction_quality"
  | "parameter_deviation"
  | "performance_trend";

export interface Alert {
  readonly id: string;
  readonly createdAt: string;
  readonly rule: string;
  readonly severity: AlertSeverity;
  readonly category: AlertCategory;
  readonly message: string;
  readonly recordId: RecordId;
  readonly metadata?: Readonly<Record<string, number | string>>;
}
