import type { Alert } from "../entities/alert.entity.js";

export interface IAlertStore {
  appendAll(alerts: readonly Alert[]): void;
  all(): readonly Alert[];
}
