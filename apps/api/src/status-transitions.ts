/**
 * Administrative status transitions and their audit trail.
 *
 * A transition to the current status is a no-op and writes nothing. A change
 * out of a final status is refused. Otherwise the status update and its log
 * entry commit together, and only then is the applicant notified.
 */
import { ApplicationStatusEnum, isTerminalStatus } from "@bursary/shared";
import type { ApplicationStatus, StatusLogEntry } from "@bursary/shared";
import type { ApplicationRecord, ApplicationStore } from "./application-store";
import { isDomainError, NotFoundError, PolicyViolationError, ValidationError, errorMessage } from "./errors";
import { logError, logInfo } from "./logger";
import type { BulkDeliveryReport, NotificationDispatcher } from "./notifications";
import { recordStatusTransition } from "./observability/metrics";
import { withSpan } from "./observability/tracing";

export type TransitionResult =
  | {
      changed: false;
      referenceNumber: string;
      oldStatus: ApplicationStatus;
      newStatus: ApplicationStatus;
    }
  | {
      changed: true;
      referenceNumber: string;
      oldStatus: ApplicationStatus;
      newStatus: ApplicationStatus;
      log: StatusLogEntry;
      notificationQueued: boolean;
    };

export interface BulkTransitionFailure {
  referenceNumber: string;
  error: string;
  message: string;
}

export interface BulkTransitionReport {
  total: number;
  updated: number;
  unchanged: number;
  failed: BulkTransitionFailure[];
  notifications: Pick<BulkDeliveryReport, "success" | "total" | "failedRecipients">;
}

export interface StatusTransitionDeps {
  store: ApplicationStore;
  notifier: NotificationDispatcher;
  clock: () => Date;
  /** Called after every committed change, e.g. to drop cached statistics. */
  onChange?: () => void;
}

export function parseStatus(value: unknown): ApplicationStatus {
  const parsed = ApplicationStatusEnum.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError("Unknown application status", {
      status: [`Status must be one of: ${ApplicationStatusEnum.options.join(", ")}`],
    });
  }
  return parsed.data;
}

type Applied =
  | { changed: false; record: ApplicationRecord }
  | { changed: true; record: ApplicationRecord; oldStatus: ApplicationStatus; log: StatusLogEntry };

export class StatusTransitionService {
  constructor(private readonly deps: StatusTransitionDeps) {}

  async transition(
    referenceNumber: string,
    newStatus: unknown,
    actor: string | null,
    reason?: string | null
  ): Promise<TransitionResult> {
    const status = parseStatus(newStatus);
    const applied = await this.apply(referenceNumber, status, actor, reason ?? null);
    if (!applied.changed) {
      return { changed: false, referenceNumber, oldStatus: status, newStatus: status };
    }
    const notificationQueued = this.deps.notifier.queueStatusChanged(applied.record, status);
    return {
      changed: true,
      referenceNumber,
      oldStatus: applied.oldStatus,
      newStatus: status,
      log: applied.log,
      notificationQueued,
    };
  }

  /**
   * Apply one status to many records. Each record succeeds or fails on its own;
   * notifications for the changed records are awaited and summarised.
   */
  async bulkTransition(
    referenceNumbers: string[],
    newStatus: unknown,
    actor: string | null,
    reason?: string | null
  ): Promise<BulkTransitionReport> {
    const status = parseStatus(newStatus);
    const unique = [...new Set(referenceNumbers.map((ref) => ref.trim()).filter(Boolean))];
    const changed: ApplicationRecord[] = [];
    const failed: BulkTransitionFailure[] = [];
    let unchanged = 0;

    for (const referenceNumber of unique) {
      try {
        const applied = await this.apply(referenceNumber, status, actor, reason ?? null);
        if (applied.changed) changed.push(applied.record);
        else unchanged++;
      } catch (error) {
        if (!isDomainError(error)) {
          logError("Bulk status update failed for application", { referenceNumber, error });
        }
        failed.push({
          referenceNumber,
          error: isDomainError(error) ? error.code : "INTERNAL_ERROR",
          message: isDomainError(error) ? error.message : errorMessage(error),
        });
      }
    }

    const deliveries = await this.deps.notifier.statusChangedBatch(changed, status);
    logInfo("Bulk status update completed", {
      status,
      total: unique.length,
      updated: changed.length,
      unchanged,
      failed: failed.length,
    });
    return {
      total: unique.length,
      updated: changed.length,
      unchanged,
      failed,
      notifications: {
        success: deliveries.success,
        total: deliveries.total,
        failedRecipients: deliveries.failedRecipients,
      },
    };
  }

  private async apply(
    referenceNumber: string,
    status: ApplicationStatus,
    actor: string | null,
    reason: string | null
  ): Promise<Applied> {
    return withSpan("application.transition", { "application.status": status }, async () => {
      const current = await this.deps.store.findByReferenceNumber(referenceNumber);
      if (!current) throw new NotFoundError();
      if (current.status === status) {
        return { changed: false, record: current };
      }
      if (isTerminalStatus(current.status)) {
        throw new PolicyViolationError(
          "STATUS_FINAL",
          `Application is already ${current.status} and its status can no longer change`
        );
      }

      const { record, log } = await this.deps.store.recordStatusChange(
        referenceNumber,
        current.status,
        status,
        actor,
        reason,
        this.deps.clock()
      );
      recordStatusTransition(current.status, status);
      this.deps.onChange?.();
      logInfo("Application status changed", {
        referenceNumber,
        oldStatus: current.status,
        newStatus: status,
      });
      return { changed: true, record, oldStatus: current.status, log };
    });
  }
}
