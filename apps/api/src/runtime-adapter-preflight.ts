type PreflightLevel = "error" | "warning";

export interface RuntimeAdapterPreflightIssue {
  level: PreflightLevel;
  code: string;
  message: string;
}

export interface RuntimeAdapterPreflightResult {
  errors: RuntimeAdapterPreflightIssue[];
  warnings: RuntimeAdapterPreflightIssue[];
}

type EnvMap = NodeJS.ProcessEnv;

const EMAIL_PROVIDERS = new Set(["stub", "smtp"]);
const SMS_PROVIDERS = new Set(["stub", "gateway"]);

function normalize(value: string | undefined, fallback = ""): string {
  return (value || fallback).trim();
}

function normalizeLower(value: string | undefined, fallback = ""): string {
  return normalize(value, fallback).toLowerCase();
}

function isTruthy(value: string | undefined): boolean {
  return normalizeLower(value) === "true";
}

function isProductionRuntime(env: EnvMap): boolean {
  return normalizeLower(env.NODE_ENV) === "production";
}

function requirePair(
  issues: RuntimeAdapterPreflightIssue[],
  env: EnvMap,
  leftKey: string,
  rightKey: string
): void {
  const left = normalize(env[leftKey]);
  const right = normalize(env[rightKey]);
  if ((left && !right) || (!left && right)) {
    issues.push({
      level: "error",
      code: "MISSING_CREDENTIAL_PAIR",
      message: `${leftKey} and ${rightKey} must be configured together`,
    });
  }
}

function addIssue(
  result: RuntimeAdapterPreflightResult,
  level: PreflightLevel,
  code: string,
  message: string
): void {
  const issue: RuntimeAdapterPreflightIssue = { level, code, message };
  if (level === "error") {
    result.errors.push(issue);
    return;
  }
  result.warnings.push(issue);
}

export function evaluateRuntimeAdapterPreflight(env: EnvMap = process.env): RuntimeAdapterPreflightResult {
  const result: RuntimeAdapterPreflightResult = { errors: [], warnings: [] };

  const emailProvider = normalizeLower(env.EMAIL_PROVIDER, "stub");
  const smsProvider = normalizeLower(env.SMS_PROVIDER, "stub");
  const production = isProductionRuntime(env);

  if (!EMAIL_PROVIDERS.has(emailProvider)) {
    addIssue(
      result,
      "error",
      "UNKNOWN_EMAIL_PROVIDER",
      `Unsupported EMAIL_PROVIDER=${emailProvider}. Supported: stub, smtp`
    );
  }
  if (!SMS_PROVIDERS.has(smsProvider)) {
    addIssue(
      result,
      "error",
      "UNKNOWN_SMS_PROVIDER",
      `Unsupported SMS_PROVIDER=${smsProvider}. Supported: stub, gateway`
    );
  }

  if (emailProvider === "smtp") {
    if (!normalize(env.SMTP_HOST)) {
      addIssue(result, "error", "MISSING_SMTP_HOST", "SMTP_HOST is required when EMAIL_PROVIDER=smtp");
    }
    if (!normalize(env.SMTP_PORT)) {
      addIssue(result, "error", "MISSING_SMTP_PORT", "SMTP_PORT is required when EMAIL_PROVIDER=smtp");
    }
    if (!normalize(env.SMTP_FROM)) {
      addIssue(result, "error", "MISSING_SMTP_FROM", "SMTP_FROM is required when EMAIL_PROVIDER=smtp");
    }
    requirePair(result.errors, env, "SMTP_USER", "SMTP_PASS");
  }

  if (smsProvider === "gateway") {
    for (const key of ["SMS_GATEWAY_URL", "SMS_API_KEY", "SMS_USERNAME"]) {
      if (!normalize(env[key])) {
        addIssue(result, "error", `MISSING_${key}`, `${key} is required when SMS_PROVIDER=gateway`);
      }
    }
  }

  if (!isTruthy(env.EMAIL_ENABLED)) {
    addIssue(
      result,
      "warning",
      "EMAIL_DISABLED",
      "EMAIL_ENABLED is not true; applicant emails will be logged but not delivered"
    );
  }
  if (!isTruthy(env.SMS_ENABLED)) {
    addIssue(
      result,
      "warning",
      "SMS_DISABLED",
      "SMS_ENABLED is not true; applicant SMS will be logged but not delivered"
    );
  }

  if (emailProvider === "stub" && isTruthy(env.EMAIL_ENABLED) && !isTruthy(env.ALLOW_STUB_EMAIL_PROVIDER_IN_PRODUCTION)) {
    addIssue(
      result,
      production ? "error" : "warning",
      "STUB_EMAIL_PROVIDER",
      "EMAIL_PROVIDER=stub with EMAIL_ENABLED=true does not deliver email; configure smtp or set ALLOW_STUB_EMAIL_PROVIDER_IN_PRODUCTION=true"
    );
  }
  if (smsProvider === "stub" && isTruthy(env.SMS_ENABLED) && !isTruthy(env.ALLOW_STUB_SMS_PROVIDER_IN_PRODUCTION)) {
    addIssue(
      result,
      production ? "error" : "warning",
      "STUB_SMS_PROVIDER",
      "SMS_PROVIDER=stub with SMS_ENABLED=true does not deliver SMS; configure gateway or set ALLOW_STUB_SMS_PROVIDER_IN_PRODUCTION=true"
    );
  }

  if (production && !normalize(env.STORAGE_BASE_DIR)) {
    addIssue(
      result,
      "warning",
      "DEFAULT_STORAGE_DIR",
      "STORAGE_BASE_DIR is not set; documents are written to the uploads/ directory beside the code"
    );
  }

  return result;
}

export function runRuntimeAdapterPreflightOrThrow(env: EnvMap = process.env): void {
  const result = evaluateRuntimeAdapterPreflight(env);
  if (result.errors.length === 0) {
    return;
  }
  const details = result.errors.map((issue) => `${issue.code}: ${issue.message}`).join("; ");
  throw new Error(`[RUNTIME_ADAPTER_PREFLIGHT_FAILED] ${details}`);
}
