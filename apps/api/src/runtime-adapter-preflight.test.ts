import { describe, expect, it } from "vitest";
import { evaluateRuntimeAdapterPreflight, runRuntimeAdapterPreflightOrThrow } from "./runtime-adapter-preflight";

function envFixture(overrides: Record<string, string | undefined>): NodeJS.ProcessEnv {
  return {
    NODE_ENV: "test",
    EMAIL_PROVIDER: "stub",
    SMS_PROVIDER: "stub",
    EMAIL_ENABLED: "false",
    SMS_ENABLED: "false",
    ...overrides,
  };
}

function codes(issues: Array<{ code: string }>): string[] {
  return issues.map((issue) => issue.code);
}

describe("runtime adapter preflight", () => {
  it("fails production runtime when an enabled channel uses the stub adapter", () => {
    expect(() =>
      runRuntimeAdapterPreflightOrThrow(
        envFixture({
          NODE_ENV: "production",
          EMAIL_ENABLED: "true",
          STORAGE_BASE_DIR: "/var/lib/bursary",
        })
      )
    ).toThrow(/STUB_EMAIL_PROVIDER/);
  });

  it("only warns about stub adapters outside production", () => {
    const result = evaluateRuntimeAdapterPreflight(
      envFixture({ NODE_ENV: "development", EMAIL_ENABLED: "true", SMS_ENABLED: "true" })
    );

    expect(result.errors).toEqual([]);
    expect(codes(result.warnings)).toEqual(["STUB_EMAIL_PROVIDER", "STUB_SMS_PROVIDER"]);
  });

  it("rejects unknown providers", () => {
    const result = evaluateRuntimeAdapterPreflight(envFixture({ EMAIL_PROVIDER: "sendgrid", SMS_PROVIDER: "carrier" }));

    expect(codes(result.errors)).toEqual(["UNKNOWN_EMAIL_PROVIDER", "UNKNOWN_SMS_PROVIDER"]);
  });

  it("requires SMTP settings and paired credentials for the smtp provider", () => {
    const result = evaluateRuntimeAdapterPreflight(
      envFixture({ EMAIL_PROVIDER: "smtp", SMTP_HOST: "smtp.example.com", SMTP_USER: "mailer" })
    );

    expect(codes(result.errors)).toEqual(["MISSING_SMTP_PORT", "MISSING_SMTP_FROM", "MISSING_CREDENTIAL_PAIR"]);
  });

  it("requires gateway credentials for the gateway SMS provider", () => {
    const result = evaluateRuntimeAdapterPreflight(
      envFixture({ SMS_PROVIDER: "gateway", SMS_GATEWAY_URL: "https://sms.example.com/send" })
    );

    expect(codes(result.errors)).toEqual(["MISSING_SMS_API_KEY", "MISSING_SMS_USERNAME"]);
  });

  it("passes a production profile with real providers", () => {
    const env = envFixture({
      NODE_ENV: "production",
      EMAIL_PROVIDER: "smtp",
      SMTP_HOST: "smtp.example.com",
      SMTP_PORT: "587",
      SMTP_FROM: "noreply@example.com",
      SMTP_USER: "mailer",
      SMTP_PASS: "test-secret",
      EMAIL_ENABLED: "true",
      SMS_PROVIDER: "gateway",
      SMS_GATEWAY_URL: "https://sms.example.com/send",
      SMS_API_KEY: "test-secret",
      SMS_USERNAME: "bursary",
      SMS_ENABLED: "true",
      STORAGE_BASE_DIR: "/var/lib/bursary",
    });

    expect(() => runRuntimeAdapterPreflightOrThrow(env)).not.toThrow();
    expect(evaluateRuntimeAdapterPreflight(env).warnings).toEqual([]);
  });

  it("warns when delivery is switched off", () => {
    const result = evaluateRuntimeAdapterPreflight(envFixture({}));

    expect(codes(result.warnings)).toEqual(["EMAIL_DISABLED", "SMS_DISABLED"]);
  });
});
