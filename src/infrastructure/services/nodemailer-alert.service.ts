import nodemailer, { type Transporter } from "nodemailer";
import type { Alert } from "../../core/domain/entities/alert.entity.js";
import type { EmailNotificationConfig } from "../../core/domain/entities/config.entity.js";
import type { INotificationService } from "../../core/domain/services/notification.service.js";

const SEVERITY_COLOR: Record<Alert["severity"], string> = {
  info: "#2563eb",
  warning: "#d97706",
  critical: "#d93025",
};

export interface MailerCredentials {
  user?: string;
  pass?: string;
}

/** Env (`MAILER_EMAIL`, `MAILER_PASSWORD`) wins over config. `user` is also the sender. */
export function mailerCredentials(
  config: EmailNotificationConfig,
): MailerCredentials {
  return {
    user: process.env.MAILER_EMAIL || config.senderEmail,
    pass: process.env.MAILER_PASSWORD || config.appPassword,
  };
}

export class NodemailerAlertService implements INotificationService {
  private transporter: Transporter;
  private sender?: string;

  constructor(
    private config: EmailNotificationConfig,
    transporter?: Transporter,
  ) {
    const credentials = mailerCredentials(config);
    this.sender = credentials.user;
    this.transporter =
      transporter ??
      nodemailer.createTransport({
        service: "gmail",
        auth: { user: credentials.user ?? "", pass: credentials.pass ?? "" },
      });
  }

  async sendAlert(alert: Alert): Promise<void> {
    const sender = this.sender;
    const recipient = this.config.recipientEmail;
    if (!sender || !recipient) return;

    const subject = `[espresso-sim] ${alert.severity.toUpperCase()}: ${alert.rule}`;
    const metadataRows = Object.entries(alert.metadata ?? {})
      .map(
        ([key, value]) => `
          <tr>
            <td style="padding:6px 8px;color:#64748b;font-size:13px;">${key}</td>
            <td style="padding:6px 8px;color:#334155;font-size:13px;">${value}</td>
          </tr>`,
      )
      .join("");

    const html = `
<!DOCTYPE html>
<html>
  <body style="margin:0;padding:24px;background-color:#f4f4f5;font-family:'Segoe UI', Tahoma, Geneva, Verdana, sans-serif;">
    <div style="background:#ffffff;border-left:4px solid ${SEVERITY_COLOR[alert.severity]};padding:20px;border-radius:8px;">
      <h2 style="margin:0 0 12px 0;color:#333;font-size:18px;">Extraction Alert</h2>
      <p><strong>Rule:</strong> ${alert.rule}</p>
      <p><strong>Message:</strong> ${alert.message}</p>
      <p><strong>Record:</strong> #${alert.recordId}</p>
      <p><strong>Raised:</strong> ${alert.createdAt}</p>
      <table role="presentation" cellpadding="0" cellspacing="0">${metadataRows}</table>
    </div>
  </body>
</html>`;

    await this.transporter.sendMail({
      from: sender,
      to: recipient,
      subject,
      text: `${alert.message} (record #${alert.recordId})`,
      html,
    });
  }
}
