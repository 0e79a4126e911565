import { describe, expect, it } from "vitest";
import type { DeadlineWindow } from "@bursary/shared";
import {
  assertEditable,
  canEdit,
  editTimeRemaining,
  emailsMatch,
  selfEditReason,
  trackedChanges,
} from "./editability";
import { PolicyViolationError } from "./errors";
import { daysBefore, FIXED_NOW, hoursBefore, sampleFields } from "./memory-store.test-helpers";

function deadline(overrides: Partial<DeadlineWindow> = {}): DeadlineWindow {
  return {
    id: 1,
    name: "2026 intake",
    startDate: daysBefore(FIXED_NOW, 30),
    endDate: new Date("2026-04-30T23:59:59.000Z"),
    isActive: true,
    createdAt: daysBefore(FIXED_NOW, 30),
    updatedAt: daysBefore(FIXED_NOW, 30),
    ...overrides,
  };
}

describe("canEdit", () => {
  it("allows a pending record inside the window with the deadline open", () => {
    expect(canEdit({ status: "pending", submittedAt: hoursBefore(FIXED_NOW, 2) }, deadline(), FIXED_NOW)).toEqual({
      canEdit: true,
      code: "EDITABLE",
      reason: "Application can be edited",
    });
  });

  it("refuses approved and rejected records first", () => {
    const closed = deadline({ endDate: daysBefore(FIXED_NOW, 1) });
    expect(canEdit({ status: "approved", submittedAt: hoursBefore(FIXED_NOW, 48) }, closed, FIXED_NOW)).toEqual({
      canEdit: false,
      code: "APPLICATION_APPROVED",
      reason: "Application has been approved and cannot be edited",
    });
    expect(canEdit({ status: "rejected", submittedAt: hoursBefore(FIXED_NOW, 1) }, null, FIXED_NOW)).toEqual({
      canEdit: false,
      code: "APPLICATION_REJECTED",
      reason: "Rejected applications cannot be edited. Please submit a new application",
    });
  });

  it("still allows an edit at exactly 24 hours and refuses one a second later", () => {
    const exactly = new Date(FIXED_NOW.getTime() - 24 * 60 * 60 * 1000);
    expect(canEdit({ status: "pending", submittedAt: exactly }, null, FIXED_NOW).code).toBe("EDITABLE");

    const justOver = new Date(exactly.getTime() - 1000);
    expect(canEdit({ status: "pending", submittedAt: justOver }, null, FIXED_NOW)).toEqual({
      canEdit: false,
      code: "EDIT_WINDOW_EXPIRED",
      reason: "Edit window expired. Applications can only be edited within 24 hours of submission",
    });
  });

  it("refuses edits once the active deadline has passed", () => {
    const closed = deadline({ endDate: hoursBefore(FIXED_NOW, 1) });
    expect(canEdit({ status: "pending", submittedAt: hoursBefore(FIXED_NOW, 3) }, closed, FIXED_NOW)).toEqual({
      canEdit: false,
      code: "DEADLINE_PASSED",
      reason: "Application deadline has passed",
    });
  });

  it("ignores an inactive deadline", () => {
    const inactive = deadline({ endDate: hoursBefore(FIXED_NOW, 1), isActive: false });
    expect(canEdit({ status: "pending", submittedAt: hoursBefore(FIXED_NOW, 3) }, inactive, FIXED_NOW).canEdit).toBe(
      true
    );
  });
});

describe("assertEditable", () => {
  it("throws a policy violation carrying the refusal code", () => {
    let caught: unknown;
    try {
      assertEditable({ status: "approved", submittedAt: FIXED_NOW }, null, FIXED_NOW);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PolicyViolationError);
    if (!(caught instanceof PolicyViolationError)) return;
    expect(caught.code).toBe("APPLICATION_APPROVED");
    expect(caught.statusCode).toBe(403);
  });
});

describe("editTimeRemaining", () => {
  it("reports hours and minutes left", () => {
    const submittedAt = new Date(FIXED_NOW.getTime() - (20 * 60 + 45) * 60 * 1000);
    expect(editTimeRemaining({ submittedAt }, FIXED_NOW)).toBe("3 hour(s) 15 minute(s)");
  });

  it("reports minutes only in the last hour", () => {
    const submittedAt = new Date(FIXED_NOW.getTime() - (23 * 60 + 18) * 60 * 1000);
    expect(editTimeRemaining({ submittedAt }, FIXED_NOW)).toBe("42 minute(s)");
  });

  it("reports Expired from the 24 hour mark", () => {
    expect(editTimeRemaining({ submittedAt: hoursBefore(FIXED_NOW, 24) }, FIXED_NOW)).toBe("Expired");
  });
});

describe("ownership and change tracking", () => {
  it("compares emails without regard to case or surrounding spaces", () => {
    expect(emailsMatch(" Jane.Mwende@Example.com ", "jane.mwende@example.com")).toBe(true);
    expect(emailsMatch("someone@example.com", "jane.mwende@example.com")).toBe(false);
  });

  it("lists each tracked field that changed", () => {
    const before = sampleFields();
    const after = sampleFields({ amount: 60000, ward: "ndithini", village: "Elsewhere" });
    const changes = trackedChanges(before, after);
    expect(changes).toEqual(["amount: 45000 → 60000", "ward: kivaa → ndithini"]);
    expect(selfEditReason(changes)).toBe(
      "Application edited by applicant. Changes: amount: 45000 → 60000, ward: kivaa → ndithini"
    );
  });
});
