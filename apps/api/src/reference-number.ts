import { v4 as uuidv4 } from "uuid";
import { logWarn } from "./logger";

export const REFERENCE_MAX_ATTEMPTS = 5;

export function referencePrefix(): string {
  return (process.env.REFERENCE_PREFIX || "BUR").trim().toUpperCase();
}

/** `BUR-1A2B3C4D`: the prefix and the first eight hex characters of a random UUID. */
export function generateReferenceNumber(prefix: string = referencePrefix()): string {
  return `${prefix}-${uuidv4().replace(/-/g, "").slice(0, 8).toUpperCase()}`;
}

export function isReferenceNumber(value: string): boolean {
  return /^[A-Z0-9]+-[0-9A-F]{8}$/.test(value);
}

export class ReferenceExhaustedError extends Error {
  constructor(readonly attempts: number) {
    super(`Unable to allocate a unique reference number after ${attempts} attempts`);
    this.name = "ReferenceExhaustedError";
  }
}

/**
 * Run `insert` with fresh reference numbers until it does not collide.
 * Uniqueness is decided by the store's constraint, never by a pre-check.
 */
export async function withUniqueReference<T>(
  insert: (referenceNumber: string) => Promise<T>,
  isCollision: (error: unknown) => boolean,
  generate: () => string = generateReferenceNumber,
  maxAttempts: number = REFERENCE_MAX_ATTEMPTS
): Promise<T> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const referenceNumber = generate();
    try {
      return await insert(referenceNumber);
    } catch (error) {
      if (!isCollision(error)) throw error;
      logWarn("Reference number collision, retrying", { referenceNumber, attempt });
    }
  }
  throw new ReferenceExhaustedError(maxAttempts);
}
