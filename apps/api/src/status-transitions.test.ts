import { describe, expect, it, vi } from "vitest";
import type { ApplicationRecord } from "./application-store";
import { ConflictError, NotFoundError, PolicyViolationError, ValidationError } from "./errors";
import { RecordingEmailTransport, RecordingSmsTransport } from "./fake-transports.test-helpers";
import { FIXED_NOW, InMemoryApplicationStore, rejectionOf } from "./memory-store.test-helpers";
import { NotificationQueue } from "./notification-queue";
import { NotificationDispatcher } from "./notifications";
import { StatusTransitionService } from "./status-transitions";

function setup(store = new InMemoryApplicationStore()) {
  const email = new RecordingEmailTransport();
  const sms = new RecordingSmsTransport();
  const queue = new NotificationQueue(2);
  queue.start();
  const notifier = new NotificationDispatcher({ email, sms, queue, signature: "Test Office" });
  const onChange = vi.fn();
  const service = new StatusTransitionService({ store, notifier, clock: () => FIXED_NOW, onChange });
  return { store, email, sms, queue, onChange, service };
}

describe("StatusTransitionService.transition", () => {
  it("moves a pending record, logs the change and queues the notices", async () => {
    const { store, email, sms, queue, onChange, service } = setup();
    store.seed({ referenceNumber: "BUR-AAAA0001" });

    const result = await service.transition("BUR-AAAA0001", "approved", "admin-1", "Meets criteria");

    expect(result).toEqual({
      changed: true,
      referenceNumber: "BUR-AAAA0001",
      oldStatus: "pending",
      newStatus: "approved",
      notificationQueued: true,
      log: {
        id: 1,
        referenceNumber: "BUR-AAAA0001",
        oldStatus: "pending",
        newStatus: "approved",
        changedBy: "admin-1",
        reason: "Meets criteria",
        changedAt: FIXED_NOW,
      },
    });
    expect((await store.findByReferenceNumber("BUR-AAAA0001"))?.status).toBe("approved");
    expect(onChange).toHaveBeenCalledTimes(1);

    await queue.drain();
    expect(email.sent.map((m) => m.subject)).toEqual(["Application Status Update - BUR-AAAA0001"]);
    expect(sms.sent).toEqual([
      {
        to: "+254712345678",
        body: [
          "Congratulations Jane Mwende!",
          "Your bursary application (BUR-AAAA0001) has been APPROVED.",
          "Amount: KSh 45,000",
          "Visit our office for disbursement details.",
          "- Test Office",
        ].join("\n"),
      },
    ]);
  });

  it("treats a transition to the current status as a no-op", async () => {
    const { store, email, queue, onChange, service } = setup();
    store.seed({ referenceNumber: "BUR-AAAA0002" });

    const result = await service.transition("BUR-AAAA0002", "pending", "admin-1");

    expect(result).toEqual({
      changed: false,
      referenceNumber: "BUR-AAAA0002",
      oldStatus: "pending",
      newStatus: "pending",
    });
    await queue.drain();
    expect(store.logCount).toBe(0);
    expect(onChange).not.toHaveBeenCalled();
    expect(email.sent).toHaveLength(0);
  });

  it("refuses to move a record out of a final status", async () => {
    const { store, service } = setup();
    store.seed({ referenceNumber: "BUR-AAAA0003", status: "approved" });

    const error = await rejectionOf(service.transition("BUR-AAAA0003", "rejected", "admin-1"));

    expect(error).toBeInstanceOf(PolicyViolationError);
    if (!(error instanceof PolicyViolationError)) return;
    expect(error.code).toBe("STATUS_FINAL");
    expect(error.message).toBe("Application is already approved and its status can no longer change");
    expect((await store.findByReferenceNumber("BUR-AAAA0003"))?.status).toBe("approved");
    expect(store.logCount).toBe(0);
  });

  it("rejects an unknown status before touching the store", async () => {
    const { store, service } = setup();
    const find = vi.spyOn(store, "findByReferenceNumber");

    const error = await rejectionOf(service.transition("BUR-AAAA0004", "archived", "admin-1"));

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) return;
    expect(error.fieldErrors).toEqual({ status: ["Status must be one of: pending, approved, rejected"] });
    expect(find).not.toHaveBeenCalled();
  });

  it("reports a missing record", async () => {
    const { service } = setup();
    const error = await rejectionOf(service.transition("BUR-DEADBEEF", "approved", "admin-1"));
    expect(error).toBeInstanceOf(NotFoundError);
  });

  it("surfaces a status change made by a concurrent writer", async () => {
    class RacingStore extends InMemoryApplicationStore {
      async findByReferenceNumber(referenceNumber: string): Promise<ApplicationRecord | null> {
        const record = await super.findByReferenceNumber(referenceNumber);
        if (record) this.patch(referenceNumber, { status: "rejected" });
        return record;
      }
    }
    const store = new RacingStore();
    const { service, onChange } = setup(store);
    store.seed({ referenceNumber: "BUR-AAAA0005" });

    const error = await rejectionOf(service.transition("BUR-AAAA0005", "approved", "admin-1"));

    expect(error).toBeInstanceOf(ConflictError);
    if (!(error instanceof ConflictError)) return;
    expect(error.message).toBe("Application status changed from pending to rejected by another request");
    expect(store.logCount).toBe(0);
    expect(onChange).not.toHaveBeenCalled();
  });
});

describe("StatusTransitionService.bulkTransition", () => {
  it("applies each record independently and reports every outcome", async () => {
    const { store, onChange, service } = setup();
    store.seed({ referenceNumber: "BUR-BBBB0001", email: "first@example.com", phoneNumber: "+254711000001" });
    store.seed({ referenceNumber: "BUR-BBBB0002", status: "approved" });
    store.seed({ referenceNumber: "BUR-BBBB0003", status: "rejected" });

    const report = await service.bulkTransition(
      ["BUR-BBBB0001", "BUR-BBBB0002", " BUR-BBBB0001 ", "BUR-BBBB0003", "BUR-DEADBEEF"],
      "rejected",
      "admin-1",
      "Incomplete documents"
    );

    expect(report).toEqual({
      total: 4,
      updated: 1,
      unchanged: 1,
      failed: [
        {
          referenceNumber: "BUR-BBBB0002",
          error: "STATUS_FINAL",
          message: "Application is already approved and its status can no longer change",
        },
        { referenceNumber: "BUR-DEADBEEF", error: "APPLICATION_NOT_FOUND", message: "Application not found" },
      ],
      notifications: { success: 2, total: 2, failedRecipients: [] },
    });
    expect(onChange).toHaveBeenCalledTimes(1);
    expect(await store.listStatusLogs("BUR-BBBB0001")).toHaveLength(1);
  });

  it("counts failed deliveries without failing the update", async () => {
    const { store, email, service } = setup();
    store.seed({ referenceNumber: "BUR-CCCC0001", email: "ok@example.com", phoneNumber: "+254711000001" });
    store.seed({ referenceNumber: "BUR-CCCC0002", email: "bounce@example.com", phoneNumber: "+254711000002" });
    email.failFor.add("bounce@example.com");

    const report = await service.bulkTransition(["BUR-CCCC0001", "BUR-CCCC0002"], "approved", "admin-1");

    expect(report.updated).toBe(2);
    expect(report.notifications).toEqual({ success: 3, total: 4, failedRecipients: ["bounce@example.com"] });
  });
});
