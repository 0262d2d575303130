import type { Alert } from "../entities/alert.entity.js";

export interface INotificationService {
  sendAlert(alert: Alert): Promise<void>;
}
