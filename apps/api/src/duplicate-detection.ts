/**
 * Duplicate application detection.
 *
 * Rules run in priority order and the first match wins:
 *   1. same ID number, any status, any age            → blocked (exact_id)
 *   2. same email + phone within 180 days, not rejected → blocked (email_phone)
 *   3. same institution + admission number, 180 days, not rejected → blocked (institution_admission)
 *   4. same name + ward + institution, 180 days, not rejected → suspicious (fuzzy)
 *   5. otherwise clean
 * When several records match a rule the earliest submission is cited.
 */
import type { ApplicationFields, DuplicateMatchType, Ward } from "@bursary/shared";
import type { ApplicationRecord, ApplicationStore, FieldMatchQuery } from "./application-store";
import { logInfo, logWarn } from "./logger";
import { recordDuplicateCheck } from "./observability/metrics";
import { withSpan } from "./observability/tracing";

const DAY_MS = 24 * 60 * 60 * 1000;
export const DUPLICATE_WINDOW_DAYS = 180;
export const REAPPLICATION_AFTER_DAYS = 90;

export interface DuplicateCandidate {
  idNumber: string;
  email: string;
  phoneNumber: string;
  institutionName?: string | null;
  admissionNumber?: string | null;
  fullName?: string | null;
  ward?: Ward | null;
}

export type DuplicateClassification =
  | { outcome: "blocked"; reason: string; existingReference: string; matchType: DuplicateMatchType }
  | { outcome: "suspicious"; reason: string; existingReference: string; matchType: "fuzzy" }
  | { outcome: "clean" };

export function duplicateReason(
  matchType: DuplicateMatchType,
  existingReference: string,
  candidate: Partial<Pick<ApplicationFields, "idNumber" | "institutionName" | "admissionNumber">> = {}
): string {
  switch (matchType) {
    case "exact_id":
      return `An application with ID number ${candidate.idNumber ?? ""} already exists. Reference: ${existingReference}`;
    case "email_phone":
      return `An application with this email and phone number already exists. Reference: ${existingReference}`;
    case "institution_admission":
      return `An application for ${candidate.institutionName ?? ""} with admission number ${candidate.admissionNumber ?? ""} already exists. Reference: ${existingReference}`;
    case "fuzzy":
      return `A similar application was found. If this is not you, proceed. Reference: ${existingReference}`;
  }
}

function present(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export class DuplicateDetector {
  constructor(private readonly store: Pick<ApplicationStore, "queryByFields">) {}

  async check(candidate: DuplicateCandidate, now: Date): Promise<DuplicateClassification> {
    return withSpan("duplicate.check", {}, async () => {
      const classification = await this.classify(candidate, now);
      if (classification.outcome === "clean") {
        recordDuplicateCheck("clean", null);
      } else {
        recordDuplicateCheck(classification.outcome, classification.matchType);
        const log = classification.outcome === "blocked" ? logWarn : logInfo;
        log("Duplicate application detected", {
          outcome: classification.outcome,
          matchType: classification.matchType,
          existingReference: classification.existingReference,
        });
      }
      return classification;
    });
  }

  private async classify(candidate: DuplicateCandidate, now: Date): Promise<DuplicateClassification> {
    const exact = await this.earliest({ idNumber: candidate.idNumber });
    if (exact) {
      return this.blocked("exact_id", exact, candidate);
    }

    const windowed: Pick<FieldMatchQuery, "submittedSince" | "excludeStatuses"> = {
      submittedSince: new Date(now.getTime() - DUPLICATE_WINDOW_DAYS * DAY_MS),
      excludeStatuses: ["rejected"],
    };

    const emailPhone = await this.earliest({
      email: candidate.email,
      phoneNumber: candidate.phoneNumber,
      ...windowed,
    });
    if (emailPhone) {
      return this.blocked("email_phone", emailPhone, candidate);
    }

    if (present(candidate.institutionName) && present(candidate.admissionNumber)) {
      const institution = await this.earliest({
        institutionName: candidate.institutionName,
        admissionNumber: candidate.admissionNumber,
        ...windowed,
      });
      if (institution) {
        return this.blocked("institution_admission", institution, candidate);
      }
    }

    if (present(candidate.fullName) && candidate.ward && present(candidate.institutionName)) {
      const fuzzy = await this.earliest({
        fullName: candidate.fullName,
        ward: candidate.ward,
        institutionName: candidate.institutionName,
        ...windowed,
      });
      if (fuzzy) {
        return {
          outcome: "suspicious",
          reason: duplicateReason("fuzzy", fuzzy.referenceNumber),
          existingReference: fuzzy.referenceNumber,
          matchType: "fuzzy",
        };
      }
    }

    return { outcome: "clean" };
  }

  private async earliest(match: FieldMatchQuery): Promise<ApplicationRecord | null> {
    const matches = await this.store.queryByFields(match);
    return matches[0] ?? null;
  }

  private blocked(
    matchType: DuplicateMatchType,
    existing: ApplicationRecord,
    candidate: DuplicateCandidate
  ): DuplicateClassification {
    return {
      outcome: "blocked",
      reason: duplicateReason(matchType, existing.referenceNumber, {
        idNumber: candidate.idNumber,
        institutionName: candidate.institutionName ?? undefined,
        admissionNumber: candidate.admissionNumber ?? undefined,
      }),
      existingReference: existing.referenceNumber,
      matchType,
    };
  }
}

export interface ReapplicationDecision {
  eligible: boolean;
  reason: string;
}

/** A rejected application frees its applicant to apply again once it is more than 90 days old. */
export function allowReapplication(
  existing: Pick<ApplicationRecord, "status" | "submittedAt">,
  now: Date
): ReapplicationDecision {
  if (
    existing.status === "rejected" &&
    now.getTime() - existing.submittedAt.getTime() > REAPPLICATION_AFTER_DAYS * DAY_MS
  ) {
    return { eligible: true, reason: "Previous application was rejected over 3 months ago" };
  }
  return { eligible: false, reason: "Active application exists" };
}
