import { describe, expect, it } from "vitest";
import { RecordingEmailTransport, RecordingSmsTransport } from "./fake-transports.test-helpers";
import { FIXED_NOW, sampleFields } from "./memory-store.test-helpers";
import { NotificationQueue } from "./notification-queue";
import { NotificationDispatcher, summarizeDeliveries, type NotifiableApplication } from "./notifications";

function app(overrides: Partial<NotifiableApplication> = {}): NotifiableApplication {
  const fields = sampleFields();
  return {
    referenceNumber: "BUR-1A2B3C4D",
    fullName: fields.fullName,
    institutionName: fields.institutionName,
    amount: fields.amount,
    ward: fields.ward,
    status: "pending",
    submittedAt: FIXED_NOW,
    email: fields.email,
    phoneNumber: fields.phoneNumber,
    guardianPhone: fields.guardianPhone,
    ...overrides,
  };
}

function setup() {
  const email = new RecordingEmailTransport();
  const sms = new RecordingSmsTransport();
  const queue = new NotificationQueue(3);
  queue.start();
  const dispatcher = new NotificationDispatcher({ email, sms, queue, signature: "Test Office" });
  return { email, sms, queue, dispatcher };
}

describe("NotificationDispatcher", () => {
  it("confirms receipt to the applicant by email and SMS and to the guardian by SMS", async () => {
    const { email, sms, dispatcher } = setup();

    const results = await dispatcher.applicationReceived(app());

    expect(results).toEqual([
      { channel: "email", recipient: "jane.mwende@example.com", success: true },
      { channel: "sms", recipient: "+254712345678", success: true },
      { channel: "sms", recipient: "+254722000111", success: true },
    ]);
    expect(email.sent[0].subject).toBe("Application Received - BUR-1A2B3C4D");
    expect(sms.sent[1]).toEqual({
      to: "+254722000111",
      body: "Dear Guardian,\nJane Mwende has submitted a bursary application.\nReference: BUR-1A2B3C4D\n- Test Office",
    });
  });

  it("reports a transport failure as a failed result instead of throwing", async () => {
    const { sms, dispatcher } = setup();
    sms.failFor.add("+254712345678");

    const results = await dispatcher.statusChanged(app(), "rejected");

    expect(results).toEqual([
      { channel: "email", recipient: "jane.mwende@example.com", success: true },
      {
        channel: "sms",
        recipient: "+254712345678",
        success: false,
        error: "SMS gateway responded with HTTP 503",
      },
    ]);
  });

  it("queues the receipt notice and returns immediately", async () => {
    const { email, sms, queue, dispatcher } = setup();

    expect(dispatcher.queueApplicationReceived(app())).toBe(true);
    await queue.drain();

    expect(email.sent).toHaveLength(1);
    expect(sms.sent).toHaveLength(2);
  });

  it("builds a custom email with the applicant's details appended", async () => {
    const { email, dispatcher } = setup();

    const report = await dispatcher.customEmail([app()], "Interview schedule", "Please attend on Monday.");

    expect(report).toEqual({ total: 1, success: 1, failed: 0, failedRecipients: [] });
    expect(email.sent[0].subject).toBe("Interview schedule");
    expect(email.sent[0].text).toBe(
      [
        "Dear Jane Mwende,",
        "",
        "Please attend on Monday.",
        "",
        "Your Application Details:",
        "- Reference Number: BUR-1A2B3C4D",
        "- Submitted Date: 2026-03-10 12:00:00",
        "- Institution: Machakos University",
        "- Amount Requested: KSh 45,000",
        "- Status: PENDING",
        "",
        "You can use your reference number to track your application status.",
        "",
        "Best regards,",
        "Test Office",
      ].join("\n")
    );
  });

  it("summarises bulk SMS with the failed numbers", async () => {
    const { sms, dispatcher } = setup();
    sms.failFor.add("+254711000002");

    const report = await dispatcher.customSms(
      [app({ phoneNumber: "+254711000001" }), app({ phoneNumber: "+254711000002" })],
      "Cheques are ready for collection."
    );

    expect(report).toEqual({ total: 2, success: 1, failed: 1, failedRecipients: ["+254711000002"] });
    expect(sms.sent).toEqual([{ to: "+254711000001", body: "Cheques are ready for collection.\n- Test Office" }]);
  });

  it("sends deadline reminders with the remaining days", async () => {
    const { email, sms, dispatcher } = setup();

    await dispatcher.deadlineReminder([app()], 5);
    await dispatcher.deadlineReminderSms([app()], 5);

    expect(email.sent[0].subject).toBe("Deadline Reminder - 5 Days Remaining");
    expect(sms.sent[0].body).toBe(
      "Reminder: the bursary application deadline is in 5 days.\nSubmit or update your application before it closes.\n- Test Office"
    );
  });

  it("fails every recipient once the queue has shut down", async () => {
    const { email, queue, dispatcher } = setup();
    await queue.shutdown(100);

    const report = await dispatcher.documentRequest([app()], ["ID copy"]);

    expect(report).toEqual({ total: 1, success: 0, failed: 1, failedRecipients: ["jane.mwende@example.com"] });
    expect(email.sent).toHaveLength(0);
  });
});

describe("summarizeDeliveries", () => {
  it("counts an empty batch as nothing sent", () => {
    expect(summarizeDeliveries([])).toEqual({ total: 0, success: 0, failed: 0, failedRecipients: [] });
  });
});
