/**
 * Applicant self-edit policy.
 *
 * A record is editable while it is pending, at most 24 hours old, and the
 * active deadline window (if any) is open. The first failing check decides
 * the code and reason.
 */
import { TRACKED_EDIT_FIELDS } from "@bursary/shared";
import type { ApplicationFields, DeadlineWindow } from "@bursary/shared";
import type { ApplicationRecord } from "./application-store";
import { isDeadlineOpen } from "./deadlines";
import { PolicyViolationError } from "./errors";

export const EDIT_WINDOW_MS = 24 * 60 * 60 * 1000;

export type EditabilityCode =
  | "EDITABLE"
  | "APPLICATION_APPROVED"
  | "APPLICATION_REJECTED"
  | "EDIT_WINDOW_EXPIRED"
  | "DEADLINE_PASSED";

export interface EditabilityDecision {
  canEdit: boolean;
  code: EditabilityCode;
  reason: string;
}

type EditableView = Pick<ApplicationRecord, "status" | "submittedAt">;

export function canEdit(application: EditableView, deadline: DeadlineWindow | null, now: Date): EditabilityDecision {
  if (application.status === "approved") {
    return { canEdit: false, code: "APPLICATION_APPROVED", reason: "Application has been approved and cannot be edited" };
  }
  if (application.status === "rejected") {
    return {
      canEdit: false,
      code: "APPLICATION_REJECTED",
      reason: "Rejected applications cannot be edited. Please submit a new application",
    };
  }
  if (now.getTime() - application.submittedAt.getTime() > EDIT_WINDOW_MS) {
    return {
      canEdit: false,
      code: "EDIT_WINDOW_EXPIRED",
      reason: "Edit window expired. Applications can only be edited within 24 hours of submission",
    };
  }
  if (deadline && deadline.isActive && !isDeadlineOpen(deadline, now)) {
    return { canEdit: false, code: "DEADLINE_PASSED", reason: "Application deadline has passed" };
  }
  return { canEdit: true, code: "EDITABLE", reason: "Application can be edited" };
}

export function assertEditable(application: EditableView, deadline: DeadlineWindow | null, now: Date): void {
  const decision = canEdit(application, deadline, now);
  if (!decision.canEdit) {
    throw new PolicyViolationError(decision.code, decision.reason);
  }
}

/** `"3 hour(s) 15 minute(s)"`, `"42 minute(s)"`, or `"Expired"` once the window has closed. */
export function editTimeRemaining(application: Pick<ApplicationRecord, "submittedAt">, now: Date): string {
  const remainingMs = EDIT_WINDOW_MS - (now.getTime() - application.submittedAt.getTime());
  if (remainingMs <= 0) return "Expired";

  const totalSeconds = remainingMs / 1000;
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  if (hours > 0) return `${hours} hour(s) ${minutes} minute(s)`;
  return `${minutes} minute(s)`;
}

export function emailsMatch(submitted: string, stored: string): boolean {
  return submitted.trim().toLowerCase() === stored.trim().toLowerCase();
}

/** `field: old → new` for each tracked field that differs. */
export function trackedChanges(
  before: Pick<ApplicationFields, (typeof TRACKED_EDIT_FIELDS)[number]>,
  after: Pick<ApplicationFields, (typeof TRACKED_EDIT_FIELDS)[number]>
): string[] {
  const changes: string[] = [];
  for (const field of TRACKED_EDIT_FIELDS) {
    if (before[field] !== after[field]) {
      changes.push(`${field}: ${before[field]} → ${after[field]}`);
    }
  }
  return changes;
}

export function selfEditReason(changes: string[]): string {
  return `Application edited by applicant. Changes: ${changes.join(", ")}`;
}
