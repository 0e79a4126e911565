/**
 * Applicant notifications over email and SMS.
 *
 * Every send produces a `DeliveryResult`; transport failures are logged,
 * counted and reported, never thrown to the caller. Single-application
 * notifications are queued so the request that triggered them does not wait.
 * Bulk sends run through the same queue and are awaited for their report.
 */
import type { ApplicationStatus } from "@bursary/shared";
import { NotificationDeliveryError, errorMessage } from "./errors";
import { logError, logInfo, maskEmail, maskPhone } from "./logger";
import { NotificationQueue, QueueClosedError } from "./notification-queue";
import {
  applicationReceivedEmail,
  applicationReceivedSms,
  customEmail,
  customSms,
  deadlineReminderEmail,
  deadlineReminderSms,
  documentRequestEmail,
  guardianReceivedSms,
  notificationSignature,
  statusChangeEmail,
  statusChangeSms,
  type EmailContent,
  type TemplateApplication,
} from "./notification-templates";
import { recordNotificationDelivery } from "./observability/metrics";
import type { EmailTransport } from "./transports/email";
import type { SmsTransport } from "./transports/sms";

export type NotificationChannel = "email" | "sms";

export interface DeliveryResult {
  channel: NotificationChannel;
  recipient: string;
  success: boolean;
  error?: string;
}

export interface BulkDeliveryReport {
  total: number;
  success: number;
  failed: number;
  failedRecipients: string[];
}

/** Applicant fields the dispatcher needs beyond the template ones. */
export type NotifiableApplication = TemplateApplication & {
  email: string;
  phoneNumber: string;
  guardianPhone: string;
};

export interface NotificationDispatcherDeps {
  email: EmailTransport;
  sms: SmsTransport;
  queue: NotificationQueue;
  signature?: string;
}

export function summarizeDeliveries(results: DeliveryResult[]): BulkDeliveryReport {
  const failedRecipients = results.filter((r) => !r.success).map((r) => r.recipient);
  return {
    total: results.length,
    success: results.length - failedRecipients.length,
    failed: failedRecipients.length,
    failedRecipients,
  };
}

export class NotificationDispatcher {
  private readonly signature: string;

  constructor(private readonly deps: NotificationDispatcherDeps) {
    this.signature = deps.signature ?? notificationSignature();
  }

  get queue(): NotificationQueue {
    return this.deps.queue;
  }

  async sendEmail(to: string, content: EmailContent): Promise<DeliveryResult> {
    try {
      const outcome = await this.deps.email.send({ to, subject: content.subject, text: content.text, html: content.html });
      recordNotificationDelivery("email", outcome);
      return { channel: "email", recipient: to, success: true };
    } catch (error) {
      return this.failed(new NotificationDeliveryError("email", to, errorMessage(error)));
    }
  }

  async sendSms(to: string, body: string): Promise<DeliveryResult> {
    try {
      const outcome = await this.deps.sms.send({ to, body });
      recordNotificationDelivery("sms", outcome);
      return { channel: "sms", recipient: to, success: true };
    } catch (error) {
      return this.failed(new NotificationDeliveryError("sms", to, errorMessage(error)));
    }
  }

  /** Confirmation to the applicant by email and SMS, and to the guardian by SMS. */
  async applicationReceived(app: NotifiableApplication): Promise<DeliveryResult[]> {
    return Promise.all([
      this.sendEmail(app.email, applicationReceivedEmail(app, this.signature)),
      this.sendSms(app.phoneNumber, applicationReceivedSms(app, this.signature)),
      this.sendSms(app.guardianPhone, guardianReceivedSms(app, this.signature)),
    ]);
  }

  async statusChanged(app: NotifiableApplication, newStatus: ApplicationStatus): Promise<DeliveryResult[]> {
    return Promise.all([
      this.sendEmail(app.email, statusChangeEmail(app, newStatus, this.signature)),
      this.sendSms(app.phoneNumber, statusChangeSms(app, newStatus, this.signature)),
    ]);
  }

  queueApplicationReceived(app: NotifiableApplication): boolean {
    return this.deps.queue.enqueue(`application-received:${app.referenceNumber}`, async () => {
      this.logOutcome("application-received", app.referenceNumber, await this.applicationReceived(app));
    });
  }

  queueStatusChanged(app: NotifiableApplication, newStatus: ApplicationStatus): boolean {
    return this.deps.queue.enqueue(`status-changed:${app.referenceNumber}`, async () => {
      this.logOutcome("status-changed", app.referenceNumber, await this.statusChanged(app, newStatus));
    });
  }

  /** Status-change notices for a batch, awaited through the queue. */
  async statusChangedBatch(
    apps: NotifiableApplication[],
    newStatus: ApplicationStatus
  ): Promise<BulkDeliveryReport> {
    const results = await Promise.all(
      apps.map((app) =>
        this.runQueued(`status-changed:${app.referenceNumber}`, () => this.statusChanged(app, newStatus), [
          { channel: "email", recipient: app.email },
          { channel: "sms", recipient: app.phoneNumber },
        ])
      )
    );
    return summarizeDeliveries(results.flat());
  }

  async bulkEmail(
    apps: NotifiableApplication[],
    build: (app: NotifiableApplication) => EmailContent
  ): Promise<BulkDeliveryReport> {
    const results = await Promise.all(
      apps.map((app) =>
        this.runQueued(`bulk-email:${app.referenceNumber}`, async () => [await this.sendEmail(app.email, build(app))], [
          { channel: "email", recipient: app.email },
        ])
      )
    );
    const report = summarizeDeliveries(results.flat());
    logInfo("Bulk email completed", { total: report.total, success: report.success, failed: report.failed });
    return report;
  }

  async bulkSms(recipients: Array<{ phone: string; body: string }>): Promise<BulkDeliveryReport> {
    const results = await Promise.all(
      recipients.map((recipient) =>
        this.runQueued("bulk-sms", async () => [await this.sendSms(recipient.phone, recipient.body)], [
          { channel: "sms", recipient: recipient.phone },
        ])
      )
    );
    const report = summarizeDeliveries(results.flat());
    logInfo("Bulk SMS completed", { total: report.total, success: report.success, failed: report.failed });
    return report;
  }

  customEmail(apps: NotifiableApplication[], subject: string, message?: string | null): Promise<BulkDeliveryReport> {
    return this.bulkEmail(apps, (app) => customEmail(app, subject, message, this.signature));
  }

  deadlineReminder(apps: NotifiableApplication[], days: number): Promise<BulkDeliveryReport> {
    return this.bulkEmail(apps, (app) => deadlineReminderEmail(app, days, this.signature));
  }

  documentRequest(apps: NotifiableApplication[], documents: string[]): Promise<BulkDeliveryReport> {
    return this.bulkEmail(apps, (app) => documentRequestEmail(app, documents, this.signature));
  }

  customSms(apps: NotifiableApplication[], message: string): Promise<BulkDeliveryReport> {
    const body = customSms(message, this.signature);
    return this.bulkSms(apps.map((app) => ({ phone: app.phoneNumber, body })));
  }

  deadlineReminderSms(apps: NotifiableApplication[], days: number): Promise<BulkDeliveryReport> {
    const body = deadlineReminderSms(days, this.signature);
    return this.bulkSms(apps.map((app) => ({ phone: app.phoneNumber, body })));
  }

  private async runQueued(
    name: string,
    task: () => Promise<DeliveryResult[]>,
    expected: Array<Pick<DeliveryResult, "channel" | "recipient">>
  ): Promise<DeliveryResult[]> {
    try {
      return await this.deps.queue.run(name, task);
    } catch (error) {
      if (!(error instanceof QueueClosedError)) throw error;
      return expected.map((entry) => ({ ...entry, success: false, error: error.message }));
    }
  }

  private failed(error: NotificationDeliveryError): DeliveryResult {
    recordNotificationDelivery(error.channel, "failed");
    logError("Notification delivery failed", {
      channel: error.channel,
      to: error.channel === "email" ? maskEmail(error.recipient) : maskPhone(error.recipient),
      error: error.message,
    });
    return { channel: error.channel, recipient: error.recipient, success: false, error: error.message };
  }

  private logOutcome(event: string, referenceNumber: string, results: DeliveryResult[]): void {
    const report = summarizeDeliveries(results);
    logInfo("Notification dispatch completed", {
      event,
      referenceNumber,
      delivered: report.success,
      failed: report.failed,
    });
  }
}
