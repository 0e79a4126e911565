import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ApplicationService } from "./applications";
import { DuplicateDetector } from "./duplicate-detection";
import {
  AuthorizationError,
  DuplicateBlockedError,
  NotFoundError,
  PolicyViolationError,
  ValidationError,
} from "./errors";
import { RecordingEmailTransport, RecordingSmsTransport } from "./fake-transports.test-helpers";
import {
  FIXED_NOW,
  InMemoryApplicationStore,
  InMemoryDeadlineStore,
  daysBefore,
  hoursBefore,
  rejectionOf,
  sampleFields,
} from "./memory-store.test-helpers";
import { NotificationQueue } from "./notification-queue";
import { NotificationDispatcher } from "./notifications";
import { LocalStorageAdapter } from "./storage";

const PDF_BYTES = Buffer.from("%PDF-1.4\nid copy\n");

function intakePayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { ...sampleFields(), phoneNumber: "0712 345 678", email: " Jane.Mwende@Example.com ", ...overrides };
}

describe("ApplicationService", () => {
  let tempDir = "";
  let store: InMemoryApplicationStore;
  let deadlines: InMemoryDeadlineStore;
  let storage: LocalStorageAdapter;
  let email: RecordingEmailTransport;
  let sms: RecordingSmsTransport;
  let queue: NotificationQueue;
  let onChange: ReturnType<typeof vi.fn>;
  let service: ApplicationService;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "bursary-applications-"));
    store = new InMemoryApplicationStore();
    deadlines = new InMemoryDeadlineStore();
    storage = new LocalStorageAdapter(tempDir);
    email = new RecordingEmailTransport();
    sms = new RecordingSmsTransport();
    queue = new NotificationQueue(3);
    queue.start();
    onChange = vi.fn();
    service = new ApplicationService({
      store,
      deadlines,
      detector: new DuplicateDetector(store),
      notifier: new NotificationDispatcher({ email, sms, queue, signature: "Test Office" }),
      storage,
      clock: () => FIXED_NOW,
      onChange,
    });
  });

  afterEach(async () => {
    await queue.shutdown(1000);
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("submit", () => {
    it("creates a pending record with normalised contact details and queues the receipt notice", async () => {
      const result = await service.submit(intakePayload());

      expect(result.referenceNumber).toMatch(/^BUR-[0-9A-F]{8}$/);
      expect(result.status).toBe("pending");
      expect(result.submittedAt).toEqual(FIXED_NOW);
      expect(result.notifications).toBe("queued");
      expect(result).not.toHaveProperty("duplicateWarning");

      const stored = await store.findByReferenceNumber(result.referenceNumber);
      expect(stored?.phoneNumber).toBe("+254712345678");
      expect(stored?.email).toBe("jane.mwende@example.com");
      expect(onChange).toHaveBeenCalledTimes(1);

      await queue.drain();
      expect(email.sent.map((m) => m.to)).toEqual(["jane.mwende@example.com"]);
      expect(sms.sent.map((m) => m.to)).toEqual(["+254712345678", "+254722000111"]);
    });

    it("refuses a submission without the accuracy confirmation", async () => {
      const error = await rejectionOf(service.submit(intakePayload({ confirmation: false })));

      expect(error).toBeInstanceOf(ValidationError);
      if (!(error instanceof ValidationError)) return;
      expect(error.message).toBe("Application validation failed");
      expect(error.fieldErrors).toEqual({
        confirmation: ["You must confirm that the information provided is accurate"],
      });
      expect(store.size).toBe(0);
    });

    it("blocks a reused ID number and creates nothing", async () => {
      store.seed({ referenceNumber: "BUR-00000001", status: "rejected", submittedAt: daysBefore(FIXED_NOW, 400) });

      const error = await rejectionOf(service.submit(intakePayload()));

      expect(error).toBeInstanceOf(DuplicateBlockedError);
      if (!(error instanceof DuplicateBlockedError)) return;
      expect(error.matchType).toBe("exact_id");
      expect(error.existingReference).toBe("BUR-00000001");
      expect(error.message).toBe("An application with ID number 12345678 already exists. Reference: BUR-00000001");
      expect(store.size).toBe(1);
      expect(onChange).not.toHaveBeenCalled();
    });

    it("accepts a similar application with a warning", async () => {
      store.seed({
        referenceNumber: "BUR-00000002",
        idNumber: "22223333",
        email: "other@example.com",
        phoneNumber: "+254700111222",
        admissionNumber: "MU/2025/999",
        submittedAt: daysBefore(FIXED_NOW, 10),
      });

      const result = await service.submit(intakePayload());

      expect(result.duplicateWarning).toEqual({
        message: "A similar application was found. If this is not you, proceed. Reference: BUR-00000002",
        existingReference: "BUR-00000002",
        matchType: "fuzzy",
      });
      expect(store.size).toBe(2);
    });

    it("refuses submissions while the active deadline is closed", async () => {
      await deadlines.create(
        {
          name: "Closed intake",
          startDate: new Date("2026-01-01T00:00:00.000Z"),
          endDate: new Date("2026-02-01T00:00:00.000Z"),
          isActive: true,
        },
        FIXED_NOW
      );

      const error = await rejectionOf(service.submit(intakePayload()));

      expect(error).toBeInstanceOf(PolicyViolationError);
      if (!(error instanceof PolicyViolationError)) return;
      expect(error.code).toBe("SUBMISSIONS_CLOSED");
      expect(store.size).toBe(0);
    });
  });

  describe("checkDuplicate", () => {
    it("reports a clean candidate", async () => {
      expect(
        await service.checkDuplicate({ idNumber: "12345678", email: "jane.mwende@example.com", phoneNumber: "0712345678" })
      ).toEqual({
        isDuplicate: false,
        isSuspicious: false,
        message: "No duplicate application found",
        existingReference: null,
        matchType: null,
      });
    });

    it("includes the reapplication decision for an old rejected record", async () => {
      store.seed({ referenceNumber: "BUR-00000003", status: "rejected", submittedAt: daysBefore(FIXED_NOW, 120) });

      expect(
        await service.checkDuplicate({ idNumber: "12345678", email: "new@example.com", phoneNumber: "0700999888" })
      ).toEqual({
        isDuplicate: true,
        isSuspicious: false,
        message: "An application with ID number 12345678 already exists. Reference: BUR-00000003",
        existingReference: "BUR-00000003",
        matchType: "exact_id",
        reapplication: { eligible: true, reason: "Previous application was rejected over 3 months ago" },
      });
      expect(store.size).toBe(1);
    });
  });

  describe("edit eligibility", () => {
    it("reports the remaining edit window for a fresh pending record", async () => {
      const seeded = store.seed({ referenceNumber: "BUR-00000004", submittedAt: hoursBefore(FIXED_NOW, 2) });

      expect(
        await service.checkEditEligibility({ referenceNumber: "BUR-00000004", email: "JANE.MWENDE@example.com" })
      ).toEqual({
        canEdit: true,
        code: "EDITABLE",
        reason: "Application can be edited",
        status: "pending",
        submittedAt: seeded.submittedAt,
        editTimeRemaining: "22 hour(s) 0 minute(s)",
      });
    });

    it("explains why an approved record cannot be edited", async () => {
      const seeded = store.seed({ referenceNumber: "BUR-00000005", status: "approved" });

      expect(
        await service.checkEditEligibility({ referenceNumber: "BUR-00000005", email: "jane.mwende@example.com" })
      ).toEqual({
        canEdit: false,
        code: "APPLICATION_APPROVED",
        reason: "Application has been approved and cannot be edited",
        status: "approved",
        submittedAt: seeded.submittedAt,
      });
    });

    it("rejects an email that does not own the record", async () => {
      store.seed({ referenceNumber: "BUR-00000006" });

      const error = await rejectionOf(
        service.checkEditEligibility({ referenceNumber: "BUR-00000006", email: "someone@example.com" })
      );

      expect(error).toBeInstanceOf(AuthorizationError);
      if (!(error instanceof AuthorizationError)) return;
      expect(error.message).toBe("Email does not match application record");
      expect(error.code).toBe("EMAIL_MISMATCH");
    });

    it("returns the record for editing while the window is open", async () => {
      store.seed({ referenceNumber: "BUR-00000007", submittedAt: hoursBefore(FIXED_NOW, 23.5) });

      const result = await service.getForEdit({ referenceNumber: "BUR-00000007", email: "jane.mwende@example.com" });

      expect(result.canEdit).toBe(true);
      expect(result.editTimeRemaining).toBe("30 minute(s)");
      expect(result.application.referenceNumber).toBe("BUR-00000007");
      expect(result.application).not.toHaveProperty("id");
    });
  });

  describe("edit", () => {
    it("applies the changes and logs the tracked ones", async () => {
      store.seed({ referenceNumber: "BUR-00000008", submittedAt: hoursBefore(FIXED_NOW, 1) });

      const result = await service.edit("BUR-00000008", {
        email: "JANE.MWENDE@example.com",
        updates: { amount: 50000, village: "Kivaa East" },
      });

      expect(result.message).toBe("Application updated successfully");
      expect(result.changesMade).toBe(1);
      expect(result.editTimeRemaining).toBe("23 hour(s) 0 minute(s)");
      expect(result.application.amount).toBe(50000);
      expect(result.application.village).toBe("Kivaa East");

      const logs = await store.listStatusLogs("BUR-00000008");
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        oldStatus: "pending",
        newStatus: "pending",
        changedBy: null,
        reason: "Application edited by applicant. Changes: amount: 45000 → 50000",
        changedAt: FIXED_NOW,
      });
    });

    it("writes no log entry when only untracked fields change", async () => {
      store.seed({ referenceNumber: "BUR-00000009", submittedAt: hoursBefore(FIXED_NOW, 1) });

      const result = await service.edit("BUR-00000009", {
        email: "jane.mwende@example.com",
        updates: { village: "Kivaa East" },
      });

      expect(result.changesMade).toBe(0);
      expect(store.logCount).toBe(0);
    });

    it("refuses to change the ID number", async () => {
      store.seed({ referenceNumber: "BUR-0000000A", submittedAt: hoursBefore(FIXED_NOW, 1) });

      const error = await rejectionOf(
        service.edit("BUR-0000000A", {
          email: "jane.mwende@example.com",
          updates: { idNumber: "99999999", amount: 50000 },
        })
      );

      expect(error).toBeInstanceOf(ValidationError);
      if (!(error instanceof ValidationError)) return;
      expect(error.message).toBe("Invalid application update");
      expect(error.fieldErrors).toEqual({ _root: ["Unrecognized key(s) in object: 'idNumber'"] });
      expect((await store.findByReferenceNumber("BUR-0000000A"))?.amount).toBe(45000);
    });

    it("refuses edits after the 24 hour window", async () => {
      store.seed({ referenceNumber: "BUR-0000000B", submittedAt: hoursBefore(FIXED_NOW, 25) });

      const error = await rejectionOf(
        service.edit("BUR-0000000B", { email: "jane.mwende@example.com", updates: { amount: 1000 } })
      );

      expect(error).toBeInstanceOf(PolicyViolationError);
      if (!(error instanceof PolicyViolationError)) return;
      expect(error.code).toBe("EDIT_WINDOW_EXPIRED");
      expect(store.logCount).toBe(0);
    });

    it("refuses edits from another applicant", async () => {
      store.seed({ referenceNumber: "BUR-0000000C", submittedAt: hoursBefore(FIXED_NOW, 1) });

      const error = await rejectionOf(
        service.edit("BUR-0000000C", { email: "intruder@example.com", updates: { amount: 1000 } })
      );

      expect(error).toBeInstanceOf(AuthorizationError);
      if (!(error instanceof AuthorizationError)) return;
      expect(error.message).toBe("You can only edit your own application");
      expect(store.logCount).toBe(0);
      expect((await store.findByReferenceNumber("BUR-0000000C"))?.amount).toBe(45000);
    });
  });

  describe("tracking and administration", () => {
    it("tracks status by reference number", async () => {
      store.seed({ referenceNumber: "BUR-0000000D", status: "approved" });

      expect(await service.trackStatus("BUR-0000000D")).toEqual({
        referenceNumber: "BUR-0000000D",
        status: "approved",
        submittedAt: FIXED_NOW,
      });
      expect(await rejectionOf(service.trackStatus("BUR-FFFFFFFF"))).toBeInstanceOf(NotFoundError);
    });

    it("shows the history newest first with system entries named", async () => {
      store.seed({ referenceNumber: "BUR-0000000E", status: "approved" });
      store.seedLog("BUR-0000000E", {
        oldStatus: "pending",
        newStatus: "pending",
        changedBy: null,
        reason: "Application edited by applicant. Changes: amount: 45000 → 40000",
        changedAt: hoursBefore(FIXED_NOW, 5),
      });
      store.seedLog("BUR-0000000E", {
        oldStatus: "pending",
        newStatus: "approved",
        changedBy: "admin-1",
        reason: null,
        changedAt: hoursBefore(FIXED_NOW, 1),
      });

      const history = await service.history("BUR-0000000E");

      expect(history.currentStatus).toBe("approved");
      expect(history.history.map((entry) => entry.changedBy)).toEqual(["admin-1", "System"]);
    });

    it("pages the list and rejects an inverted date range", async () => {
      store.seed({ idNumber: "10000001", submittedAt: hoursBefore(FIXED_NOW, 3) });
      store.seed({ idNumber: "10000002", submittedAt: hoursBefore(FIXED_NOW, 2) });
      store.seed({ idNumber: "10000003", submittedAt: hoursBefore(FIXED_NOW, 1) });

      const page = await service.list({ page: "2", pageSize: "2" });
      expect(page.total).toBe(3);
      expect(page.items.map((item) => item.idNumber)).toEqual(["10000001"]);

      const error = await rejectionOf(service.list({ startDate: "2026-03-10", endDate: "2026-03-01" }));
      expect(error).toBeInstanceOf(ValidationError);
      if (!(error instanceof ValidationError)) return;
      expect(error.message).toBe("startDate must not be after endDate");
    });

    it("deletes a record and releases its stored documents", async () => {
      const storageKey = "applications/BUR-0000000F/idFront-1.pdf";
      await storage.write(storageKey, PDF_BYTES);
      store.seed({
        referenceNumber: "BUR-0000000F",
        documents: {
          idFront: {
            storageKey,
            fileName: "id.pdf",
            mimeType: "application/pdf",
            sizeBytes: PDF_BYTES.length,
            checksum: "abc",
            uploadedAt: FIXED_NOW.toISOString(),
          },
        },
      });

      expect(await service.delete("BUR-0000000F")).toEqual({ referenceNumber: "BUR-0000000F", documentsReleased: 1 });
      expect(await storage.read(storageKey)).toBeNull();
      expect(store.size).toBe(0);
      expect(onChange).toHaveBeenCalledTimes(1);
      expect(await rejectionOf(service.delete("BUR-0000000F"))).toBeInstanceOf(NotFoundError);
    });
  });
});
