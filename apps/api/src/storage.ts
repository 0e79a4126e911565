/**
 * Pluggable document storage abstraction.
 * Default: local filesystem under STORAGE_BASE_DIR.
 */
import { promises as fs, createReadStream } from "fs";
import { createWriteStream } from "fs";
import crypto from "crypto";
import path from "path";
import { PassThrough, Readable, Transform } from "stream";
import { pipeline } from "stream/promises";
import { logInfo, logWarn } from "./logger";
import { isUploadError, UploadErrorCode } from "./upload-errors";

export interface StorageAdapter {
  name: string;
  write(key: string, data: Buffer): Promise<void>;
  /** Stream data to storage with size enforcement. Returns bytes written. */
  writeStream(key: string, stream: Readable, maxBytes?: number): Promise<number>;
  read(key: string): Promise<Buffer | null>;
  /** Stream read for downloads; avoids buffering the entire file in memory. */
  readStream(key: string): Promise<Readable | null>;
  /** Remove a stored object. Missing objects are not an error. */
  delete(key: string): Promise<void>;
}

export const DEFAULT_MAX_FILE_BYTES = 5 * 1024 * 1024;

export function resolveStorageMaxFileBytes(): number {
  const parsed = Number.parseInt(process.env.STORAGE_MAX_FILE_BYTES || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_MAX_FILE_BYTES;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

// Local filesystem storage (default)
export class LocalStorageAdapter implements StorageAdapter {
  name = "local";
  constructor(
    private baseDir: string,
    private maxFileBytes: number = resolveStorageMaxFileBytes()
  ) {}

  private resolveSafePath(key: string): string {
    const base = path.resolve(this.baseDir);
    const resolved = path.resolve(base, key);
    if (resolved !== base && !resolved.startsWith(`${base}${path.sep}`)) {
      throw new Error(UploadErrorCode.INVALID_STORAGE_KEY);
    }
    return resolved;
  }

  private async assertNoSymlinkInPath(resolvedPath: string): Promise<void> {
    const base = path.resolve(this.baseDir);
    const relative = path.relative(base, resolvedPath);
    if (!relative || relative === ".") return;

    const segments = relative.split(path.sep).filter(Boolean);
    let current = base;
    for (const segment of segments) {
      current = path.join(current, segment);
      try {
        const stat = await fs.lstat(current);
        if (stat.isSymbolicLink()) {
          throw new Error(UploadErrorCode.INVALID_STORAGE_KEY);
        }
      } catch (error) {
        if (errorCode(error) === "ENOENT") {
          return;
        }
        throw error;
      }
    }
  }

  async write(key: string, data: Buffer): Promise<void> {
    if (data.length > this.maxFileBytes) {
      throw new Error(UploadErrorCode.FILE_TOO_LARGE);
    }
    const fullPath = this.resolveSafePath(key);
    await this.assertNoSymlinkInPath(fullPath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, data);
  }

  async writeStream(key: string, stream: Readable, maxBytes?: number): Promise<number> {
    const limit = maxBytes ?? this.maxFileBytes;
    const fullPath = this.resolveSafePath(key);
    await this.assertNoSymlinkInPath(fullPath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });

    let bytesWritten = 0;
    const sizeGuard = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        bytesWritten += chunk.length;
        if (bytesWritten > limit) {
          callback(new Error(UploadErrorCode.FILE_TOO_LARGE));
        } else {
          callback(null, chunk);
        }
      },
    });

    try {
      await pipeline(stream, sizeGuard, createWriteStream(fullPath));
    } catch (err) {
      // Clean up partial file on failure
      await fs.unlink(fullPath).catch((cleanupError: unknown) => {
        if (errorCode(cleanupError) !== "ENOENT") {
          logWarn("Failed to remove partial upload", { key, error: cleanupError });
        }
      });
      throw err;
    }
    return bytesWritten;
  }

  async read(key: string): Promise<Buffer | null> {
    let fullPath: string;
    try {
      fullPath = this.resolveSafePath(key);
    } catch {
      return null;
    }
    try {
      await this.assertNoSymlinkInPath(fullPath);
      return await fs.readFile(fullPath);
    } catch {
      return null;
    }
  }

  async readStream(key: string): Promise<Readable | null> {
    let fullPath: string;
    try {
      fullPath = this.resolveSafePath(key);
    } catch {
      return null;
    }
    try {
      await this.assertNoSymlinkInPath(fullPath);
      await fs.access(fullPath);
      return createReadStream(fullPath);
    } catch {
      return null;
    }
  }

  async delete(key: string): Promise<void> {
    const fullPath = this.resolveSafePath(key);
    await this.assertNoSymlinkInPath(fullPath);
    try {
      await fs.unlink(fullPath);
    } catch (error) {
      if (errorCode(error) === "ENOENT") return;
      throw error;
    }
  }
}

export function createStorageFromEnv(): StorageAdapter {
  const baseDir = process.env.STORAGE_BASE_DIR || path.resolve(__dirname, "..", "..", "..", "uploads");
  const adapter = new LocalStorageAdapter(baseDir);
  logInfo("Storage adapter configured", { adapter: adapter.name });
  return adapter;
}

// ── Magic-byte MIME validation ──

const MAGIC_BYTES: Array<{ mime: string; bytes: number[]; offset?: number }> = [
  { mime: "application/pdf", bytes: [0x25, 0x50, 0x44, 0x46] },         // %PDF
  { mime: "image/jpeg", bytes: [0xFF, 0xD8, 0xFF] },                     // JPEG SOI
  { mime: "image/png", bytes: [0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A] },   // PNG signature
];

/**
 * Validate that the first bytes of a buffer match the declared MIME type.
 * Returns true if the magic bytes match or if the MIME type has no known signature.
 */
export function validateMagicBytes(header: Buffer, declaredMime: string): boolean {
  const rule = MAGIC_BYTES.find((m) => m.mime === declaredMime);
  if (!rule) return true;
  const offset = rule.offset || 0;
  if (header.length < rule.bytes.length + offset) return false;
  return rule.bytes.every((b, i) => header[offset + i] === b);
}

/**
 * Stream a multipart file to storage with size enforcement and magic-byte MIME validation.
 * Returns { bytesWritten, checksum } on success.
 */
export async function streamToStorageWithValidation(
  storage: StorageAdapter,
  stream: Readable,
  storageKey: string,
  declaredMime: string,
  maxBytes?: number
): Promise<{ bytesWritten: number; checksum: string }> {
  const hash = crypto.createHash("sha256");
  let headerBuf: Buffer | null = null;
  let headerValidated = false;

  const validator = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      if (!headerValidated) {
        headerBuf = headerBuf ? Buffer.concat([headerBuf, chunk]) : chunk;
        if (headerBuf.length >= 8) {
          if (!validateMagicBytes(headerBuf, declaredMime)) {
            return callback(new Error(UploadErrorCode.MIME_MISMATCH));
          }
          headerValidated = true;
        }
      }
      hash.update(chunk);
      callback(null, chunk);
    },
    flush(callback) {
      if (!headerBuf || headerBuf.length === 0) {
        return callback(new Error(UploadErrorCode.EMPTY_FILE));
      }
      // File shorter than the 8-byte header window
      if (!headerValidated && !validateMagicBytes(headerBuf, declaredMime)) {
        return callback(new Error(UploadErrorCode.MIME_MISMATCH));
      }
      callback();
    },
  });

  const pass = new PassThrough();
  // Never rejects; the write failure is read from the outcome.
  const written = storage.writeStream(storageKey, pass, maxBytes).then(
    (bytes) => ({ ok: true as const, bytes }),
    (error: unknown) => ({ ok: false as const, error })
  );
  try {
    await pipeline(stream, validator, pass);
  } catch (error) {
    pass.destroy();
    const outcome = await written;
    if (!outcome.ok) {
      logWarn("Storage write aborted after validation failure", { storageKey, error: outcome.error });
      // A size limit hit inside the adapter surfaces here as a closed stream.
      if (outcome.error instanceof Error && isUploadError(outcome.error.message)) throw outcome.error;
    }
    throw error;
  }
  const outcome = await written;
  if (!outcome.ok) throw outcome.error;
  const bytesWritten = outcome.bytes;
  return { bytesWritten, checksum: hash.digest("hex") };
}
