/**
 * Primitive / reusable Zod types for the bursary application model.
 */
import { z } from "zod";
import {
  normalizeEmail,
  normalizeKenyanPhone,
  validateKenyanPhone,
  validateNationalId,
} from "../validation";

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

export const NonEmptyString = z.string().trim().min(1);
export const ISODateTime = z.string().datetime({ offset: true }).or(z.string().datetime());
export const Email = z.string().trim().email().max(254).transform(normalizeEmail);

/** Kenyan mobile number, stored as `+254…`. */
export const Phone = z
  .string()
  .trim()
  .refine((value) => validateKenyanPhone(value) === null, "Enter a valid Kenyan phone number")
  .transform(normalizeKenyanPhone);

export const NationalIdNumber = z
  .string()
  .trim()
  .refine((value) => validateNationalId(value) === null, "ID number must be 6-10 digits");

// ---------------------------------------------------------------------------
// Stored document reference (for uploaded files)
// ---------------------------------------------------------------------------

export const StoredDocumentSchema = z.object({
  storageKey: NonEmptyString,
  fileName: NonEmptyString,
  mimeType: z.enum(["application/pdf", "image/jpeg", "image/png"]),
  sizeBytes: z.number().int().min(1),
  checksum: NonEmptyString,
  uploadedAt: ISODateTime,
});

export type StoredDocument = z.infer<typeof StoredDocumentSchema>;
