/**
 * Applicant document uploads.
 *
 * Each application has one file per slot. A new upload replaces the slot and
 * releases the previous file; the same ownership and editability gate as
 * self-edit applies.
 */
import path from "path";
import { Readable } from "stream";
import { v4 as uuidv4 } from "uuid";
import { DocumentSlotEnum, type DocumentSlot, type StoredDocument } from "@bursary/shared";
import type { ApplicationStore } from "./application-store";
import type { DeadlineStore } from "./deadlines";
import { assertEditable, emailsMatch } from "./editability";
import { AuthorizationError, NotFoundError, ValidationError } from "./errors";
import { logError, logInfo, logWarn } from "./logger";
import { streamToStorageWithValidation, type StorageAdapter } from "./storage";
import { toUploadValidationError, uploadError, UploadErrorCode } from "./upload-errors";

const EXTENSION_BY_MIME = {
  "application/pdf": ".pdf",
  "image/jpeg": ".jpg",
  "image/png": ".png",
} as const;

type AllowedMimeType = keyof typeof EXTENSION_BY_MIME;

function isAllowedMimeType(mimeType: string): mimeType is AllowedMimeType {
  return mimeType in EXTENSION_BY_MIME;
}

export function sanitizeFilename(raw: string): string {
  const base = path.basename(raw || "upload");
  return base.replace(/[^a-zA-Z0-9._-]/g, "_").slice(0, 255) || "upload";
}

export function documentStorageKey(referenceNumber: string, slot: DocumentSlot, mimeType: AllowedMimeType): string {
  return `applications/${referenceNumber}/${slot}-${uuidv4()}${EXTENSION_BY_MIME[mimeType]}`;
}

export interface DocumentUpload {
  slot: string;
  email: string;
  fileName: string;
  mimeType: string;
  stream: Readable;
}

export interface DocumentUploadResult {
  referenceNumber: string;
  slot: DocumentSlot;
  document: StoredDocument;
  replaced: boolean;
}

export interface DocumentServiceDeps {
  store: ApplicationStore;
  deadlines: DeadlineStore;
  storage: StorageAdapter;
  clock: () => Date;
  maxFileBytes?: number;
}

export class DocumentService {
  constructor(private readonly deps: DocumentServiceDeps) {}

  async upload(referenceNumber: string, upload: DocumentUpload): Promise<DocumentUploadResult> {
    const slot = DocumentSlotEnum.safeParse(upload.slot);
    if (!slot.success) {
      throw new ValidationError(`Unknown document slot: ${upload.slot}`, {
        slot: [`Expected one of ${DocumentSlotEnum.options.join(", ")}`],
      });
    }
    const mimeType = upload.mimeType;
    if (!isAllowedMimeType(mimeType)) {
      throw uploadError(UploadErrorCode.INVALID_FILE_TYPE);
    }

    const record = await this.deps.store.findByReferenceNumber(referenceNumber);
    if (!record) throw new NotFoundError();
    if (!emailsMatch(upload.email, record.email)) {
      throw new AuthorizationError("You can only upload documents for your own application", "EMAIL_MISMATCH");
    }
    const now = this.deps.clock();
    assertEditable(record, await this.deps.deadlines.getActive(), now);

    const storageKey = documentStorageKey(referenceNumber, slot.data, mimeType);
    let stored: { bytesWritten: number; checksum: string };
    try {
      stored = await streamToStorageWithValidation(
        this.deps.storage,
        upload.stream,
        storageKey,
        mimeType,
        this.deps.maxFileBytes
      );
    } catch (error) {
      throw toUploadValidationError(error) ?? error;
    }

    const document: StoredDocument = {
      storageKey,
      fileName: sanitizeFilename(upload.fileName),
      mimeType,
      sizeBytes: stored.bytesWritten,
      checksum: stored.checksum,
      uploadedAt: now.toISOString(),
    };

    let previous: StoredDocument | null;
    try {
      ({ previous } = await this.deps.store.attachDocument(referenceNumber, slot.data, document, now));
    } catch (error) {
      await this.deps.storage.delete(storageKey).catch((cleanupError: unknown) => {
        logWarn("Failed to remove orphaned upload", { storageKey, error: cleanupError });
      });
      throw error;
    }

    if (previous) {
      try {
        await this.deps.storage.delete(previous.storageKey);
      } catch (error) {
        logError("Failed to release replaced document", { referenceNumber, storageKey: previous.storageKey, error });
      }
    }

    logInfo("Document uploaded", { referenceNumber, slot: slot.data, sizeBytes: document.sizeBytes });
    return { referenceNumber, slot: slot.data, document, replaced: previous !== null };
  }

  /** Stream a stored document back to an administrator. */
  async open(referenceNumber: string, slot: string): Promise<{ document: StoredDocument; stream: Readable }> {
    const parsedSlot = DocumentSlotEnum.safeParse(slot);
    const record = await this.deps.store.findByReferenceNumber(referenceNumber);
    if (!record) throw new NotFoundError();
    const document = parsedSlot.success ? record.documents[parsedSlot.data] : undefined;
    if (!document) throw new NotFoundError("Document not found", "DOCUMENT_NOT_FOUND");
    const stream = await this.deps.storage.readStream(document.storageKey);
    if (!stream) throw new NotFoundError("Stored file not found", "FILE_NOT_FOUND");
    return { document, stream };
  }
}
