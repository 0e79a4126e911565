import type { DeliveryOutcome, EmailMessage, EmailTransport } from "./transports/email";
import type { SmsMessage, SmsTransport } from "./transports/sms";

/** Records every message; recipients listed in `failFor` make `send` throw. */
export class RecordingEmailTransport implements EmailTransport {
  readonly name = "EMAIL_RECORDING";
  readonly sent: EmailMessage[] = [];
  readonly failFor = new Set<string>();

  async send(message: EmailMessage): Promise<DeliveryOutcome> {
    if (this.failFor.has(message.to)) {
      throw new Error(`SMTP rejected ${message.to}`);
    }
    this.sent.push(message);
    return "sent";
  }
}

export class RecordingSmsTransport implements SmsTransport {
  readonly name = "SMS_RECORDING";
  readonly sent: SmsMessage[] = [];
  readonly failFor = new Set<string>();

  async send(message: SmsMessage): Promise<DeliveryOutcome> {
    if (this.failFor.has(message.to)) {
      throw new Error("SMS gateway responded with HTTP 503");
    }
    this.sent.push(message);
    return "sent";
  }
}

/** Email transport whose sends stay pending until `release` is called. */
export class GatedEmailTransport implements EmailTransport {
  readonly name = "EMAIL_GATED";
  readonly sent: EmailMessage[] = [];
  private waiters: Array<() => void> = [];

  async send(message: EmailMessage): Promise<DeliveryOutcome> {
    await new Promise<void>((resolve) => this.waiters.push(resolve));
    this.sent.push(message);
    return "sent";
  }

  get waiting(): number {
    return this.waiters.length;
  }

  release(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
