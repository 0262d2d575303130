import PQueue from "p-queue";
import {
  SEVERITY_RANK,
  type Alert,
  type AlertSeverity,
} from "../domain/entities/alert.entity.js";
import type { ExtractionRecord } from "../domain/entities/extraction-record.entity.js";
import type { IAlertStore } from "../domain/repositories/alert-store.repository.js";
import type { AlertGenerator } from "../domain/services/alert-generator.service.js";
import type { INotificationService } from "../domain/services/notification.service.js";

export interface AlertDelivery {
  notifier: INotificationService;
  minSeverity: AlertSeverity;
}

/**
 * Evaluates alert rules for each new record, keeps the alerts and hands
 * qualifying ones to the notifier one at a time.
 */
export class AlertMonitor {
  private deliveryQueue = new PQueue({ concurrency: 1 });

  constructor(
    private generator: AlertGenerator,
    private alertStore: IAlertStore,
    private delivery?: AlertDelivery,
  ) {}

  observe(
    record: ExtractionRecord,
    history: readonly ExtractionRecord[],
  ): Alert[] {
    const alerts = this.generator.generateAlerts(record, history);
    if (alerts.length === 0) return alerts;

    this.alertStore.appendAll(alerts);
    for (const alert of alerts) {
      if (alert.severity === "critical") {
        console.warn(`[AlertMonitor] ${alert.rule}: ${alert.message}`);
      }
      this.deliver(alert);
    }
    return alerts;
  }

  alerts(): readonly Alert[] {
    return this.alertStore.all();
  }

  /** Resolves once every queued notification has been attempted. */
  async drain(): Promise<void> {
    await this.deliveryQueue.onIdle();
  }

  private deliver(alert: Alert) {
    const delivery = this.delivery;
    if (!delivery) return;
    if (SEVERITY_RANK[alert.severity] < SEVERITY_RANK[delivery.minSeverity]) {
      return;
    }
    void this.deliveryQueue.add(async () => {
      try {
        await delivery.notifier.sendAlert(alert);
      } catch (err) {
        console.error(
          `[AlertMonitor] Failed to deliver alert ${alert.id} (${alert.rule}):`,
          err,
        );
      }
    });
  }
}
