/**
 * Runtime safety helpers.
 */
export function isTestRuntime(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST === "true";
}

export function isProductionRuntime(): boolean {
  return process.env.NODE_ENV === "production";
}

export function parsePositiveIntEnv(rawValue: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(rawValue || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Clamp a configured integer into `[min, max]`, falling back when unset or invalid. */
export function parseBoundedIntEnv(
  rawValue: string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  const parsed = parsePositiveIntEnv(rawValue, fallback);
  return Math.min(max, Math.max(min, parsed));
}
