/**
 * Document storage abstraction. The local filesystem adapter is the default;
 * another adapter can be installed at startup through `setStorage`.
 */
import { createHash } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { logInfo } from "./logger";
import { parsePositiveIntEnv } from "./runtime-safety";
import { UploadErrorCode } from "./upload-errors";

export interface StorageAdapter {
  name: string;
  write(key: string, data: Buffer): Promise<void>;
  read(key: string): Promise<Buffer | null>;
  delete(key: string): Promise<void>;
}

export function resolveStorageMaxFileBytes(): number {
  return parsePositiveIntEnv("STORAGE_MAX_FILE_BYTES", 10 * 1024 * 1024);
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

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

    let current = base;
    for (const segment of relative.split(path.sep).filter(Boolean)) {
      current = path.join(current, segment);
      try {
        const stat = await fs.lstat(current);
        if (stat.isSymbolicLink()) {
          throw new Error(UploadErrorCode.INVALID_STORAGE_KEY);
        }
      } catch (error: unknown) {
        if (isMissingFileError(error)) return;
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

  async delete(key: string): Promise<void> {
    const fullPath = this.resolveSafePath(key);
    await this.assertNoSymlinkInPath(fullPath);
    try {
      await fs.unlink(fullPath);
    } catch (error: unknown) {
      if (!isMissingFileError(error)) throw error;
    }
  }
}

let storageAdapter: StorageAdapter | null = null;

export function getStorage(): StorageAdapter {
  if (!storageAdapter) {
    const baseDir = process.env.STORAGE_BASE_DIR || path.resolve(__dirname, "..", "..", "..", "uploads");
    storageAdapter = new LocalStorageAdapter(baseDir);
  }
  return storageAdapter;
}

export function setStorage(adapter: StorageAdapter): void {
  storageAdapter = adapter;
  logInfo("Storage adapter configured", { adapter: adapter.name });
}

// ── Magic-byte MIME validation ──

const MAGIC_BYTES: Array<{ mime: string; bytes: number[] }> = [
  { mime: "application/pdf", bytes: [0x25, 0x50, 0x44, 0x46] },         // %PDF
  { mime: "image/jpeg", bytes: [0xFF, 0xD8, 0xFF] },                     // JPEG SOI
  { mime: "image/png", bytes: [0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A] },   // PNG signature
];

/**
 * True when the header matches the declared MIME type's signature, or when
 * the type has no known signature (plain text).
 */
export function validateMagicBytes(header: Buffer, declaredMime: string): boolean {
  const rule = MAGIC_BYTES.find((m) => m.mime === declaredMime);
  if (!rule) return true;
  if (header.length < rule.bytes.length) return false;
  return rule.bytes.every((b, i) => header[i] === b);
}

/**
 * Validates and stores an uploaded document. Returns its size and sha256.
 */
export async function storeValidatedUpload(
  storageKey: string,
  data: Buffer,
  declaredMime: string
): Promise<{ sizeBytes: number; checksum: string }> {
  if (data.length === 0) {
    throw new Error(UploadErrorCode.EMPTY_FILE);
  }
  if (!validateMagicBytes(data.subarray(0, 8), declaredMime)) {
    throw new Error(UploadErrorCode.MIME_MISMATCH);
  }
  await getStorage().write(storageKey, data);
  return {
    sizeBytes: data.length,
    checksum: createHash("sha256").update(data).digest("hex"),
  };
}
