import dotenv from "dotenv";
import path from "path";
import { evaluateRuntimeAdapterPreflight, type RuntimeAdapterPreflightIssue } from "../src/runtime-adapter-preflight";

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

function formatIssue(prefix: string, issue: RuntimeAdapterPreflightIssue): string {
  return `${prefix} ${issue.code}: ${issue.message}`;
}

async function main() {
  const result = evaluateRuntimeAdapterPreflight(process.env);
  console.log(
    `[RUNTIME_ADAPTER_PREFLIGHT] email=${process.env.EMAIL_PROVIDER || "stub"} sms=${process.env.SMS_PROVIDER || "stub"} env=${process.env.NODE_ENV || "development"}`
  );

  for (const warning of result.warnings) {
    console.warn(formatIssue("[RUNTIME_ADAPTER_PREFLIGHT_WARNING]", warning));
  }
  for (const error of result.errors) {
    console.error(formatIssue("[RUNTIME_ADAPTER_PREFLIGHT_ERROR]", error));
  }
  if (result.errors.length > 0) process.exit(1);

  console.log(`[RUNTIME_ADAPTER_PREFLIGHT_OK] warnings=${result.warnings.length}`);
}

main().catch((error) => {
  console.error(`[RUNTIME_ADAPTER_PREFLIGHT_ERROR] ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
