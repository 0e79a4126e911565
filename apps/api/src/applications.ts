/**
 * Application service: intake, duplicate pre-check, applicant self-edit,
 * status tracking, and the administrator's read/delete operations.
 *
 * Validation, duplicate and policy failures are raised before anything is
 * written. Notifications are queued after the write commits and never affect
 * the outcome.
 */
import {
  ApplicationEditSchema,
  ApplicationIntakeSchema,
  ApplicationStatusEnum,
  DuplicateCheckSchema,
  WardEnum,
  type ApplicationFields,
  type ApplicationStatus,
  type DuplicateMatchType,
  type StatusLogEntry,
} from "@bursary/shared";
import { z } from "zod";
import type {
  ApplicationListFilters,
  ApplicationRecord,
  ApplicationStore,
  Page,
  PageRequest,
} from "./application-store";
import { isDeadlineOpen, type DeadlineStore } from "./deadlines";
import { allowReapplication, type DuplicateDetector, type ReapplicationDecision } from "./duplicate-detection";
import { assertEditable, canEdit, editTimeRemaining, emailsMatch, selfEditReason, trackedChanges } from "./editability";
import type { EditabilityCode } from "./editability";
import {
  AuthorizationError,
  DuplicateBlockedError,
  NotFoundError,
  PolicyViolationError,
  parseOrThrow,
  ValidationError,
} from "./errors";
import { logError, logInfo } from "./logger";
import type { NotificationDispatcher } from "./notifications";
import { withSpan } from "./observability/tracing";
import type { StorageAdapter } from "./storage";

/** A record as returned over the API; the internal numeric id stays inside. */
export type ApplicationView = Omit<ApplicationRecord, "id">;

export function toApplicationView(record: ApplicationRecord): ApplicationView {
  const { id: _id, ...view } = record;
  return view;
}

export interface SubmissionResult {
  referenceNumber: string;
  status: ApplicationStatus;
  submittedAt: Date;
  duplicateWarning?: {
    message: string;
    existingReference: string;
    matchType: DuplicateMatchType;
  };
  notifications: "queued" | "not_queued";
}

export interface DuplicateCheckResult {
  isDuplicate: boolean;
  isSuspicious: boolean;
  message: string;
  existingReference: string | null;
  matchType: DuplicateMatchType | null;
  reapplication?: ReapplicationDecision;
}

export interface EditEligibility {
  canEdit: boolean;
  code: EditabilityCode;
  reason: string;
  status: ApplicationStatus;
  submittedAt: Date;
  editTimeRemaining?: string;
}

export interface EditResult {
  message: string;
  referenceNumber: string;
  changesMade: number;
  editTimeRemaining: string;
  application: ApplicationView;
}

export interface StatusHistory {
  referenceNumber: string;
  currentStatus: ApplicationStatus;
  history: Array<Omit<StatusLogEntry, "changedBy"> & { changedBy: string }>;
}

export interface ApplicationServiceDeps {
  store: ApplicationStore;
  deadlines: DeadlineStore;
  detector: DuplicateDetector;
  notifier: NotificationDispatcher;
  storage: StorageAdapter;
  clock: () => Date;
  /** Called after a record is created or deleted, e.g. to drop cached statistics. */
  onChange?: () => void;
}

const OwnershipSchema = z
  .object({
    referenceNumber: z.string().trim().min(1, "referenceNumber is required"),
    email: z.string().trim().min(1, "email is required"),
  })
  .strict();

const EditRequestSchema = z
  .object({
    email: z.string().trim().min(1, "email is required"),
    updates: z.unknown(),
  })
  .strict();

export const ListQuerySchema = z.object({
  status: ApplicationStatusEnum.optional(),
  ward: WardEnum.optional(),
  search: z.string().trim().min(1).optional(),
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(20),
});

export const OWNERSHIP_MISMATCH_MESSAGE = "Email does not match application record";
export const EDIT_OWNERSHIP_MESSAGE = "You can only edit your own application";

/** Reject `startDate > endDate` before a report or list query runs. */
export function assertDateRange(filters: Pick<ApplicationListFilters, "startDate" | "endDate">): void {
  if (filters.startDate && filters.endDate && filters.startDate.getTime() > filters.endDate.getTime()) {
    throw new ValidationError("startDate must not be after endDate", {
      startDate: ["startDate must not be after endDate"],
    });
  }
}

export class ApplicationService {
  constructor(private readonly deps: ApplicationServiceDeps) {}

  async submit(payload: unknown): Promise<SubmissionResult> {
    const fields = parseOrThrow(ApplicationIntakeSchema, payload, "Application validation failed");
    const now = this.deps.clock();

    return withSpan("application.submit", { "application.ward": fields.ward }, async () => {
      const deadline = await this.deps.deadlines.getActive();
      if (deadline && !isDeadlineOpen(deadline, now)) {
        throw new PolicyViolationError("SUBMISSIONS_CLOSED", "Applications are not being accepted at this time");
      }

      const classification = await this.deps.detector.check(fields, now);
      if (classification.outcome === "blocked") {
        throw new DuplicateBlockedError(
          classification.reason,
          classification.existingReference,
          classification.matchType
        );
      }

      const record = await this.deps.store.create({ ...fields, submittedAt: now });
      this.deps.onChange?.();
      logInfo("Application created", { referenceNumber: record.referenceNumber, ward: record.ward });

      const queued = this.deps.notifier.queueApplicationReceived(record);
      return {
        referenceNumber: record.referenceNumber,
        status: record.status,
        submittedAt: record.submittedAt,
        ...(classification.outcome === "suspicious"
          ? {
              duplicateWarning: {
                message: classification.reason,
                existingReference: classification.existingReference,
                matchType: classification.matchType,
              },
            }
          : {}),
        notifications: queued ? "queued" : "not_queued",
      };
    });
  }

  /** Classify a prospective submission without creating anything. */
  async checkDuplicate(payload: unknown): Promise<DuplicateCheckResult> {
    const candidate = parseOrThrow(DuplicateCheckSchema, payload);
    const now = this.deps.clock();
    const classification = await this.deps.detector.check(candidate, now);
    if (classification.outcome === "clean") {
      return {
        isDuplicate: false,
        isSuspicious: false,
        message: "No duplicate application found",
        existingReference: null,
        matchType: null,
      };
    }

    const existing = await this.deps.store.findByReferenceNumber(classification.existingReference);
    return {
      isDuplicate: classification.outcome === "blocked",
      isSuspicious: classification.outcome === "suspicious",
      message: classification.reason,
      existingReference: classification.existingReference,
      matchType: classification.matchType,
      ...(existing ? { reapplication: allowReapplication(existing, now) } : {}),
    };
  }

  async checkEditEligibility(payload: unknown): Promise<EditEligibility> {
    const { referenceNumber, email } = parseOrThrow(OwnershipSchema, payload);
    const record = await this.requireOwned(referenceNumber, email, OWNERSHIP_MISMATCH_MESSAGE);
    const now = this.deps.clock();
    const decision = canEdit(record, await this.deps.deadlines.getActive(), now);
    return {
      canEdit: decision.canEdit,
      code: decision.code,
      reason: decision.reason,
      status: record.status,
      submittedAt: record.submittedAt,
      ...(decision.canEdit ? { editTimeRemaining: editTimeRemaining(record, now) } : {}),
    };
  }

  async getForEdit(payload: unknown): Promise<{ application: ApplicationView; editTimeRemaining: string; canEdit: true }> {
    const { referenceNumber, email } = parseOrThrow(OwnershipSchema, payload);
    const record = await this.requireOwned(referenceNumber, email, OWNERSHIP_MISMATCH_MESSAGE);
    const now = this.deps.clock();
    assertEditable(record, await this.deps.deadlines.getActive(), now);
    return { application: toApplicationView(record), editTimeRemaining: editTimeRemaining(record, now), canEdit: true };
  }

  /**
   * Applicant self-edit. Ownership, then policy, then field validation; the
   * update and its log entry commit together.
   */
  async edit(referenceNumber: string, payload: unknown): Promise<EditResult> {
    const request = parseOrThrow(EditRequestSchema, payload);
    const current = await this.requireOwned(referenceNumber, request.email, EDIT_OWNERSHIP_MESSAGE);
    const now = this.deps.clock();
    assertEditable(current, await this.deps.deadlines.getActive(), now);
    const updates: Partial<ApplicationFields> = parseOrThrow(ApplicationEditSchema, request.updates, "Invalid application update");

    const changes = trackedChanges(current, { ...current, ...updates });
    const updated = await this.deps.store.update(referenceNumber, updates, {
      at: now,
      expectedStatus: current.status,
      log:
        changes.length > 0
          ? {
              oldStatus: current.status,
              newStatus: current.status,
              changedBy: null,
              reason: selfEditReason(changes),
              changedAt: now,
            }
          : undefined,
    });
    logInfo("Application edited by applicant", { referenceNumber, changesMade: changes.length });

    return {
      message: "Application updated successfully",
      referenceNumber,
      changesMade: changes.length,
      editTimeRemaining: editTimeRemaining(updated, now),
      application: toApplicationView(updated),
    };
  }

  /** Public tracking by reference number. */
  async trackStatus(referenceNumber: string): Promise<{ referenceNumber: string; status: ApplicationStatus; submittedAt: Date }> {
    const record = await this.require(referenceNumber);
    return { referenceNumber: record.referenceNumber, status: record.status, submittedAt: record.submittedAt };
  }

  async list(query: unknown): Promise<Page<ApplicationView>> {
    const parsed = parseOrThrow(ListQuerySchema, query, "Invalid list query");
    const { page, pageSize, ...filters } = parsed;
    assertDateRange(filters);
    const request: PageRequest = { page, pageSize };
    const result = await this.deps.store.list(filters, request);
    return { ...result, items: result.items.map(toApplicationView) };
  }

  async get(referenceNumber: string): Promise<ApplicationView> {
    return toApplicationView(await this.require(referenceNumber));
  }

  async history(referenceNumber: string): Promise<StatusHistory> {
    const record = await this.require(referenceNumber);
    const logs = await this.deps.store.listStatusLogs(referenceNumber);
    return {
      referenceNumber,
      currentStatus: record.status,
      history: logs.map((log) => ({ ...log, changedBy: log.changedBy ?? "System" })),
    };
  }

  /** Delete a record with its log, then release its stored documents. */
  async delete(referenceNumber: string): Promise<{ referenceNumber: string; documentsReleased: number }> {
    const deleted = await this.deps.store.delete(referenceNumber);
    if (!deleted) throw new NotFoundError();
    this.deps.onChange?.();

    let released = 0;
    for (const document of Object.values(deleted.documents)) {
      if (!document) continue;
      try {
        await this.deps.storage.delete(document.storageKey);
        released++;
      } catch (error) {
        logError("Failed to release stored document", { referenceNumber, storageKey: document.storageKey, error });
      }
    }
    logInfo("Application deleted", { referenceNumber, documentsReleased: released });
    return { referenceNumber, documentsReleased: released };
  }

  private async require(referenceNumber: string): Promise<ApplicationRecord> {
    const record = await this.deps.store.findByReferenceNumber(referenceNumber);
    if (!record) throw new NotFoundError();
    return record;
  }

  private async requireOwned(referenceNumber: string, email: string, mismatchMessage: string): Promise<ApplicationRecord> {
    const record = await this.require(referenceNumber);
    if (!emailsMatch(email, record.email)) {
      throw new AuthorizationError(mismatchMessage, "EMAIL_MISMATCH");
    }
    return record;
  }
}
