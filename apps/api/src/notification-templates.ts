/**
 * Email and SMS wording for applicant notifications.
 * Every message is signed with NOTIFY_SIGNATURE.
 */
import type { ApplicationStatus } from "@bursary/shared";
import type { ApplicationRecord } from "./application-store";
import { escapeHtml, formatKsh, formatTimestamp, formatWard } from "./format";

export interface EmailContent {
  subject: string;
  text: string;
  html: string;
}

export type TemplateApplication = Pick<
  ApplicationRecord,
  "referenceNumber" | "fullName" | "institutionName" | "amount" | "ward" | "status" | "submittedAt"
>;

export function notificationSignature(): string {
  return (process.env.NOTIFY_SIGNATURE || "Bursary Office").trim();
}

function htmlDocument(signature: string, heading: string, bodyHtml: string): string {
  return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><meta name="viewport" content="width=device-width, initial-scale=1.0"></head>
<body style="font-family: Arial, sans-serif; line-height: 1.6; max-width: 640px; margin: 0 auto; padding: 20px; color: #333;">
  <div style="background: #006400; padding: 16px 20px; border-radius: 8px 8px 0 0;">
    <h1 style="color: white; margin: 0; font-size: 1.25rem;">${escapeHtml(signature)}</h1>
  </div>
  <div style="background: #f9f9f9; padding: 24px; border: 1px solid #e0e0e0; border-top: none; border-radius: 0 0 8px 8px;">
    <h2 style="margin-top: 0;">${escapeHtml(heading)}</h2>
    ${bodyHtml}
  </div>
</body>
</html>`;
}

function detailList(rows: Array<[string, string]>): { text: string; html: string } {
  return {
    text: rows.map(([label, value]) => `- ${label}: ${value}`).join("\n"),
    html: `<ul>${rows
      .map(([label, value]) => `<li>${escapeHtml(label)}: ${escapeHtml(value)}</li>`)
      .join("")}</ul>`,
  };
}

// ── Email ──

export function applicationReceivedEmail(app: TemplateApplication, signature = notificationSignature()): EmailContent {
  const details = detailList([
    ["Reference Number", app.referenceNumber],
    ["Institution", app.institutionName],
    ["Amount", formatKsh(app.amount)],
    ["Ward", formatWard(app.ward)],
    ["Submitted", formatTimestamp(app.submittedAt)],
  ]);
  const closing = "Keep your reference number for tracking. You will be notified by email and SMS when the status changes.";
  return {
    subject: `Application Received - ${app.referenceNumber}`,
    text: [
      `Dear ${app.fullName},`,
      "",
      "Your bursary application has been received and is under review.",
      "",
      details.text,
      "",
      closing,
      "",
      `- ${signature}`,
    ].join("\n"),
    html: htmlDocument(
      signature,
      "Application Received",
      `<p>Dear <strong>${escapeHtml(app.fullName)}</strong>, your bursary application has been received and is under review.</p>
    ${details.html}
    <p>${escapeHtml(closing)}</p>`
    ),
  };
}

function statusDetail(status: ApplicationStatus): string | null {
  if (status === "approved") return "Please contact our office for further instructions on fund disbursement.";
  if (status === "rejected") return "If you have questions, please contact our office with your reference number.";
  return null;
}

export function statusChangeEmail(
  app: TemplateApplication,
  newStatus: ApplicationStatus,
  signature = notificationSignature()
): EmailContent {
  const statusUpper = newStatus.toUpperCase();
  const details = detailList([
    ["Reference Number", app.referenceNumber],
    ["Institution", app.institutionName],
    ["Amount", formatKsh(app.amount)],
  ]);
  const detail = statusDetail(newStatus);
  return {
    subject: `Application Status Update - ${app.referenceNumber}`,
    text: [
      `Dear ${app.fullName},`,
      "",
      `Your bursary application status has been updated to: ${statusUpper}`,
      "",
      details.text,
      ...(detail ? ["", detail] : []),
      "",
      "Best regards,",
      signature,
    ].join("\n"),
    html: htmlDocument(
      signature,
      `Application Status: ${statusUpper}`,
      `<p>Dear <strong>${escapeHtml(app.fullName)}</strong>,</p>
    <p>Your bursary application status has been updated.</p>
    ${details.html}
    ${detail ? `<p>${escapeHtml(detail)}</p>` : ""}`
    ),
  };
}

const DEFAULT_CUSTOM_MESSAGE = "Your bursary application has been successfully received.";

/** Admin-composed email; the applicant's details are appended to every message. */
export function customEmail(
  app: TemplateApplication,
  subject: string,
  message: string | null | undefined,
  signature = notificationSignature()
): EmailContent {
  const body = message && message.trim().length > 0 ? message.trim() : DEFAULT_CUSTOM_MESSAGE;
  const details = detailList([
    ["Reference Number", app.referenceNumber],
    ["Submitted Date", formatTimestamp(app.submittedAt)],
    ["Institution", app.institutionName],
    ["Amount Requested", formatKsh(app.amount)],
    ["Status", app.status.toUpperCase()],
  ]);
  const tracking = "You can use your reference number to track your application status.";
  return {
    subject,
    text: [
      `Dear ${app.fullName},`,
      "",
      body,
      "",
      "Your Application Details:",
      details.text,
      "",
      tracking,
      "",
      "Best regards,",
      signature,
    ].join("\n"),
    html: htmlDocument(
      signature,
      subject,
      `<p>Dear <strong>${escapeHtml(app.fullName)}</strong>,</p>
    <p>${escapeHtml(body)}</p>
    <p><strong>Your Application Details:</strong></p>
    ${details.html}
    <p>${escapeHtml(tracking)}</p>`
    ),
  };
}

export function deadlineReminderEmail(
  app: TemplateApplication,
  days: number,
  signature = notificationSignature()
): EmailContent {
  return customEmail(
    app,
    `Deadline Reminder - ${days} Days Remaining`,
    `This is a reminder that the bursary application deadline is in ${days} days. Please make any necessary updates before the deadline.`,
    signature
  );
}

export function documentRequestEmail(
  app: TemplateApplication,
  documents: string[],
  signature = notificationSignature()
): EmailContent {
  return customEmail(
    app,
    "Additional Documents Required",
    `We require additional documents for your application: ${documents.join(", ")}. Please submit within 7 days.`,
    signature
  );
}

// ── SMS ──

export function applicationReceivedSms(app: TemplateApplication, signature = notificationSignature()): string {
  return [
    `Dear ${app.fullName},`,
    "Your bursary application has been received.",
    `Reference: ${app.referenceNumber}`,
    "You will be notified of the outcome.",
    `- ${signature}`,
  ].join("\n");
}

export function guardianReceivedSms(app: TemplateApplication, signature = notificationSignature()): string {
  return [
    "Dear Guardian,",
    `${app.fullName} has submitted a bursary application.`,
    `Reference: ${app.referenceNumber}`,
    `- ${signature}`,
  ].join("\n");
}

export function statusChangeSms(
  app: TemplateApplication,
  newStatus: ApplicationStatus,
  signature = notificationSignature()
): string {
  if (newStatus === "approved") {
    return [
      `Congratulations ${app.fullName}!`,
      `Your bursary application (${app.referenceNumber}) has been APPROVED.`,
      `Amount: ${formatKsh(app.amount)}`,
      "Visit our office for disbursement details.",
      `- ${signature}`,
    ].join("\n");
  }
  if (newStatus === "rejected") {
    return [
      `Dear ${app.fullName},`,
      `Your bursary application (${app.referenceNumber}) was not approved at this time.`,
      "Contact our office for more information.",
      `- ${signature}`,
    ].join("\n");
  }
  return `Dear ${app.fullName}, your application status: ${newStatus.toUpperCase()}\n- ${signature}`;
}

export function deadlineReminderSms(days: number, signature = notificationSignature()): string {
  return [
    `Reminder: the bursary application deadline is in ${days} days.`,
    "Submit or update your application before it closes.",
    `- ${signature}`,
  ].join("\n");
}

export function customSms(message: string, signature = notificationSignature()): string {
  return `${message}\n- ${signature}`;
}
