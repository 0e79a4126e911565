/**
 * Error codes raised while storing an applicant's document.
 *
 * Storage helpers throw plain `Error`s whose message is one of these codes;
 * the document service turns them into `ValidationError`s on the `file` field.
 */
import { ValidationError } from "./errors";

export const UploadErrorCode = {
  NO_FILE: "NO_FILE",
  EMPTY_FILE: "EMPTY_FILE",
  INVALID_FILE_TYPE: "INVALID_FILE_TYPE",
  /** Magic bytes in the file header do not match the declared MIME type. */
  MIME_MISMATCH: "MIME_MISMATCH",
  FILE_TOO_LARGE: "FILE_TOO_LARGE",
  /** Storage key resolves outside the base directory or through a symlink. */
  INVALID_STORAGE_KEY: "INVALID_STORAGE_KEY",
} as const;

export type UploadErrorCodeValue = (typeof UploadErrorCode)[keyof typeof UploadErrorCode];

export const UPLOAD_ERROR_DESCRIPTIONS: Record<UploadErrorCodeValue, string> = {
  NO_FILE: "No file was included in the upload request.",
  EMPTY_FILE: "The uploaded file is empty.",
  INVALID_FILE_TYPE: "Only PDF, JPEG and PNG files are allowed.",
  MIME_MISMATCH: "The file content does not match its declared type.",
  FILE_TOO_LARGE: "The file exceeds the maximum allowed size.",
  INVALID_STORAGE_KEY: "Invalid file path.",
};

export function isUploadError(message: string): message is UploadErrorCodeValue {
  return message in UPLOAD_ERROR_DESCRIPTIONS;
}

export function uploadError(code: UploadErrorCodeValue): ValidationError {
  const description = UPLOAD_ERROR_DESCRIPTIONS[code];
  return new ValidationError(description, { file: [description] }, code);
}

/** The matching `ValidationError` for a storage failure, or null when it is not an upload error. */
export function toUploadValidationError(error: unknown): ValidationError | null {
  if (error instanceof Error && isUploadError(error.message)) {
    return uploadError(error.message);
  }
  return null;
}
