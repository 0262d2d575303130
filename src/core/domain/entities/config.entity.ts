import type {
  ExtractionParameters,
  NumericRange,
  ParameterBounds,
} from "./extraction-parameters.entity.js";
import type { AlertSeverity } from "./alert.entity.js";

export interface ServerConfig {
  host: string;
  port: number;
}

export interface ExtractionConfig {
  defaults: ExtractionParameters;
  bounds: ParameterBounds;
}

export type PersistenceDriver = "none" | "jsonl" | "sqlite";

export interface PersistenceConfig {
  driver: PersistenceDriver;
  /** Directory for JSONL flush files. */
  dir: string;
  basename: string;
  sqlitePath: string;
}

export interface AlertsConfig {
  enabled: boolean;
  temperatureRange: NumericRange;
  pressureRange: NumericRange;
  /** Fraction (0–1) of perfect extractions below which the history is flagged. */
  perfectRateThreshold: number;
  minSampleSize: number;
}

export interface EmailNotificationConfig {
  enabled: boolean;
  senderEmail?: string;
  appPassword?: string;
  recipientEmail?: string;
  minSeverity: AlertSeverity;
}

export interface NotificationsConfig {
  email: EmailNotificationConfig;
}

export interface Config {
  server: ServerConfig;
  extraction: ExtractionConfig;
  persistence: PersistenceConfig;
  alerts: AlertsConfig;
  notifications: NotificationsConfig;
}
