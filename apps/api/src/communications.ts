/**
 * Administrator-initiated messages to applicants: custom email, deadline
 * reminders, requests for additional documents, and custom SMS.
 *
 * Recipients are either the listed reference numbers or every application
 * matching the status/ward filter. Sends go through the notification queue
 * and are awaited so the caller gets the delivery report.
 */
import { z } from "zod";
import { ApplicationStatusEnum, WardEnum } from "@bursary/shared";
import type { ApplicationRecord, ApplicationStore } from "./application-store";
import { daysRemaining, isDeadlineOpen, type DeadlineStore } from "./deadlines";
import { parseOrThrow, PolicyViolationError } from "./errors";
import { logInfo } from "./logger";
import type { BulkDeliveryReport, NotificationDispatcher } from "./notifications";

const MAX_RECIPIENTS = 1000;

const RecipientSelection = {
  referenceNumbers: z.array(z.string().trim().min(1)).min(1).max(MAX_RECIPIENTS).optional(),
  status: ApplicationStatusEnum.optional(),
  ward: WardEnum.optional(),
};

export const CustomEmailSchema = z
  .object({
    ...RecipientSelection,
    subject: z.string().trim().min(1, "subject is required").max(200),
    message: z.string().trim().min(1, "message is required").max(5000),
  })
  .strict();

export const DeadlineReminderSchema = z
  .object({
    ...RecipientSelection,
    includeSms: z.boolean().default(false),
  })
  .strict();

export const DocumentRequestSchema = z
  .object({
    ...RecipientSelection,
    documents: z.array(z.string().trim().min(1)).min(1, "List at least one document").max(20),
  })
  .strict();

export const CustomSmsSchema = z
  .object({
    ...RecipientSelection,
    message: z.string().trim().min(1, "message is required").max(480),
  })
  .strict();

type Selection = {
  referenceNumbers?: string[];
  status?: z.infer<typeof ApplicationStatusEnum>;
  ward?: z.infer<typeof WardEnum>;
};

export interface CommunicationResult {
  matched: number;
  notFound: string[];
  delivery: BulkDeliveryReport;
}

export interface DeadlineReminderResult extends CommunicationResult {
  daysRemaining: number;
  sms?: BulkDeliveryReport;
}

export interface CommunicationServiceDeps {
  store: Pick<ApplicationStore, "findByReferenceNumber" | "listForReport">;
  deadlines: Pick<DeadlineStore, "getActive">;
  notifier: NotificationDispatcher;
  clock: () => Date;
}

export class CommunicationService {
  constructor(private readonly deps: CommunicationServiceDeps) {}

  async customEmail(payload: unknown): Promise<CommunicationResult> {
    const request = parseOrThrow(CustomEmailSchema, payload, "Invalid email request");
    const { recipients, notFound } = await this.resolve(request);
    const delivery = await this.deps.notifier.customEmail(recipients, request.subject, request.message);
    return this.finish("custom-email", recipients, notFound, delivery);
  }

  async deadlineReminder(payload: unknown): Promise<DeadlineReminderResult> {
    const request = parseOrThrow(DeadlineReminderSchema, payload, "Invalid reminder request");
    const now = this.deps.clock();
    const deadline = await this.deps.deadlines.getActive();
    if (!deadline || !isDeadlineOpen(deadline, now)) {
      throw new PolicyViolationError("NO_ACTIVE_DEADLINE", "There is no open application deadline to remind about");
    }
    const days = daysRemaining(deadline, now);
    const { recipients, notFound } = await this.resolve(request);
    const delivery = await this.deps.notifier.deadlineReminder(recipients, days);
    const sms = request.includeSms ? await this.deps.notifier.deadlineReminderSms(recipients, days) : undefined;
    return {
      ...this.finish("deadline-reminder", recipients, notFound, delivery),
      daysRemaining: days,
      ...(sms ? { sms } : {}),
    };
  }

  async documentRequest(payload: unknown): Promise<CommunicationResult> {
    const request = parseOrThrow(DocumentRequestSchema, payload, "Invalid document request");
    const { recipients, notFound } = await this.resolve(request);
    const delivery = await this.deps.notifier.documentRequest(recipients, request.documents);
    return this.finish("document-request", recipients, notFound, delivery);
  }

  async customSms(payload: unknown): Promise<CommunicationResult> {
    const request = parseOrThrow(CustomSmsSchema, payload, "Invalid SMS request");
    const { recipients, notFound } = await this.resolve(request);
    const delivery = await this.deps.notifier.customSms(recipients, request.message);
    return this.finish("custom-sms", recipients, notFound, delivery);
  }

  private async resolve(selection: Selection): Promise<{ recipients: ApplicationRecord[]; notFound: string[] }> {
    if (!selection.referenceNumbers) {
      const recipients = await this.deps.store.listForReport({ status: selection.status, ward: selection.ward });
      return { recipients, notFound: [] };
    }
    const recipients: ApplicationRecord[] = [];
    const notFound: string[] = [];
    for (const referenceNumber of new Set(selection.referenceNumbers)) {
      const record = await this.deps.store.findByReferenceNumber(referenceNumber);
      if (record) recipients.push(record);
      else notFound.push(referenceNumber);
    }
    return { recipients, notFound };
  }

  private finish(
    kind: string,
    recipients: ApplicationRecord[],
    notFound: string[],
    delivery: BulkDeliveryReport
  ): CommunicationResult {
    logInfo("Applicant communication sent", {
      kind,
      matched: recipients.length,
      notFound: notFound.length,
      delivered: delivery.success,
      failed: delivery.failed,
    });
    return { matched: recipients.length, notFound, delivery };
  }
}
