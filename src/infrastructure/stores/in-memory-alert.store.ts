import type { Alert } from "../../core/domain/entities/alert.entity.js";
import type { IAlertStore } from "../../core/domain/repositories/alert-store.repository.js";

export class InMemoryAlertStore implements IAlertStore {
  private alerts: Alert[] = [];

  appendAll(alerts: readonly Alert[]): void {
    for (const alert of alerts) this.alerts.push(Object.freeze(alert));
  }

  all(): readonly Alert[] {
    return this.alerts.slice();
  }
}
