/**
 * SMS notification transport.
 *
 *   SMS_PROVIDER     — "stub" (default) or "gateway"
 *   SMS_GATEWAY_URL  — bulk messaging endpoint (form-encoded POST)
 *   SMS_API_KEY      — sent as the `apiKey` header
 *   SMS_USERNAME     — gateway account name
 *   SMS_SENDER_ID    — optional alphanumeric sender id
 *   SMS_ENABLED      — set to "true" to deliver; otherwise messages are logged only
 */
import { normalizeKenyanPhone } from "@bursary/shared";
import { resilientFetch, type ResilientFetchOptions } from "../http-client";
import { logInfo, logWarn, maskPhone } from "../logger";
import type { DeliveryOutcome } from "./email";

export interface SmsMessage {
  to: string;
  body: string;
}

export interface SmsTransport {
  name: string;
  /** Throws when the gateway refuses the message. */
  send(message: SmsMessage): Promise<DeliveryOutcome>;
}

export function createStubSmsTransport(): SmsTransport {
  return {
    name: "SMS_STUB",
    async send(message: SmsMessage): Promise<DeliveryOutcome> {
      const to = normalizeKenyanPhone(message.to);
      logInfo(
        process.env.SMS_ENABLED === "true"
          ? "SMS stub adapter accepted notification"
          : "SMS dispatch suppressed (SMS_ENABLED=false)",
        { to: maskPhone(to), preview: message.body.slice(0, 120) }
      );
      return "suppressed";
    },
  };
}

export interface SmsGatewayConfig {
  url: string;
  apiKey: string;
  username: string;
  senderId?: string;
  timeoutMs?: number;
  maxRetries?: number;
  http?: (url: string, options: ResilientFetchOptions) => Promise<Response>;
}

export function smsGatewayConfigFromEnv(): SmsGatewayConfig | null {
  const url = process.env.SMS_GATEWAY_URL?.trim();
  const apiKey = process.env.SMS_API_KEY?.trim();
  const username = process.env.SMS_USERNAME?.trim();
  if (!url || !apiKey || !username) return null;
  return { url, apiKey, username, senderId: process.env.SMS_SENDER_ID?.trim() || undefined };
}

export function createGatewaySmsTransport(config: SmsGatewayConfig): SmsTransport {
  const http = config.http ?? resilientFetch;
  return {
    name: "SMS_GATEWAY",
    async send(message: SmsMessage): Promise<DeliveryOutcome> {
      const to = normalizeKenyanPhone(message.to);
      if (process.env.SMS_ENABLED !== "true") {
        logInfo("SMS dispatch suppressed (SMS_ENABLED=false)", {
          to: maskPhone(to),
          preview: message.body.slice(0, 120),
        });
        return "suppressed";
      }

      const form = new URLSearchParams({ username: config.username, to, message: message.body });
      if (config.senderId) form.set("from", config.senderId);

      const response = await http(config.url, {
        method: "POST",
        headers: {
          apiKey: config.apiKey,
          Accept: "application/json",
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: form.toString(),
        timeoutMs: config.timeoutMs ?? 10_000,
        maxRetries: config.maxRetries ?? 2,
      });
      if (!response.ok) {
        throw new Error(`SMS gateway responded with HTTP ${response.status}`);
      }
      logInfo("SMS sent", { to: maskPhone(to) });
      return "sent";
    },
  };
}

export function createSmsTransport(): SmsTransport {
  const provider = (process.env.SMS_PROVIDER || "stub").trim().toLowerCase();
  if (provider === "gateway") {
    const config = smsGatewayConfigFromEnv();
    if (config) return createGatewaySmsTransport(config);
    logWarn("SMS_PROVIDER=gateway is missing SMS_GATEWAY_URL, SMS_API_KEY or SMS_USERNAME, using stub adapter");
    return createStubSmsTransport();
  }
  if (provider !== "stub") {
    logWarn("Unknown SMS_PROVIDER configured, using stub adapter", { provider });
  }
  return createStubSmsTransport();
}
