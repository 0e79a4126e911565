/**
 * Email notification transport via nodemailer.
 *
 * Configuration via environment variables:
 *   EMAIL_PROVIDER   — "stub" (default) or "smtp"
 *   SMTP_HOST        — SMTP server host (default: localhost)
 *   SMTP_PORT        — SMTP port (default: 587)
 *   SMTP_SECURE      — "true" for TLS on connect (port 465), default false
 *   SMTP_USER        — SMTP authentication username
 *   SMTP_PASS        — SMTP authentication password
 *   SMTP_FROM        — From address (default: "Bursary Office <noreply@bursary.local>")
 *   EMAIL_ENABLED    — Set to "true" to enable actual email sending (default: false)
 *
 * With EMAIL_ENABLED unset, messages are logged and reported as suppressed.
 */
import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import { logInfo, logWarn, maskEmail } from "../logger";

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

/** `suppressed`: accepted but deliberately not delivered (stub or disabled channel). */
export type DeliveryOutcome = "sent" | "suppressed";

export interface EmailTransport {
  name: string;
  /** Throws when the provider refuses the message. */
  send(message: EmailMessage): Promise<DeliveryOutcome>;
  close?(): void;
}

export function createStubEmailTransport(): EmailTransport {
  return {
    name: "EMAIL_STUB",
    async send(message: EmailMessage): Promise<DeliveryOutcome> {
      logInfo("Email stub adapter accepted notification", {
        to: maskEmail(message.to),
        subject: message.subject,
      });
      return "suppressed";
    },
  };
}

export function createSmtpEmailTransport(): EmailTransport {
  let transporter: Transporter | null = null;

  function getTransporter(): Transporter {
    if (transporter) return transporter;

    const host = process.env.SMTP_HOST || "localhost";
    const port = parseInt(process.env.SMTP_PORT || "587", 10);
    const secure = process.env.SMTP_SECURE === "true";
    const user = process.env.SMTP_USER;
    const pass = process.env.SMTP_PASS;

    transporter = nodemailer.createTransport({
      host,
      port,
      secure,
      ...(user && pass ? { auth: { user, pass } } : {}),
      // Do not reject self-signed certs in dev
      tls: { rejectUnauthorized: process.env.NODE_ENV === "production" },
    });
    return transporter;
  }

  return {
    name: "EMAIL_SMTP",
    async send(message: EmailMessage): Promise<DeliveryOutcome> {
      if (process.env.EMAIL_ENABLED !== "true") {
        logInfo("Email dispatch suppressed (EMAIL_ENABLED=false)", {
          to: maskEmail(message.to),
          subject: message.subject,
        });
        return "suppressed";
      }

      const from = process.env.SMTP_FROM || "Bursary Office <noreply@bursary.local>";
      await getTransporter().sendMail({
        from,
        to: message.to,
        subject: message.subject,
        text: message.text,
        ...(message.html ? { html: message.html } : {}),
      });
      logInfo("Email sent", { to: maskEmail(message.to), subject: message.subject });
      return "sent";
    },
    close(): void {
      transporter?.close();
      transporter = null;
    },
  };
}

export function createEmailTransport(): EmailTransport {
  const provider = (process.env.EMAIL_PROVIDER || "stub").trim().toLowerCase();
  if (provider === "smtp") return createSmtpEmailTransport();
  if (provider !== "stub") {
    logWarn("Unknown EMAIL_PROVIDER configured, using stub adapter", { provider });
  }
  return createStubEmailTransport();
}
