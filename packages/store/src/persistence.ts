import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import type { Cipher } from "./cipher.js";
import { DecryptionError, PersistenceError, SnapshotFormatError } from "./errors.js";
import { SnapshotDocumentSchema, type SnapshotDocument } from "./schema.js";

export type SnapshotFs = Pick<typeof fs, "open" | "readFile" | "rename" | "rm" | "mkdir" | "stat">;
export type StoreLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * One encrypted snapshot file. `save` writes `<name>.tmp` beside the target, fsyncs it and renames it over
 * the target, so a failed or interrupted save leaves the previous snapshot intact.
 */
export class SnapshotFile {
  private readonly fs: SnapshotFs;
  private readonly logger: StoreLogger | undefined;
  readonly tempPath: string;

  constructor(
    readonly filePath: string,
    private readonly cipher: Cipher,
    options: { fs?: SnapshotFs; logger?: StoreLogger } = {}
  ) {
    this.fs = options.fs ?? fs;
    this.logger = options.logger;
    this.tempPath = `${filePath}.tmp`;
  }

  /** Returns null on first run (no file, or an empty one). */
  async load(): Promise<SnapshotDocument | null> {
    await this.fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await this.removeStaleTemp();

    let encrypted: Buffer;
    try {
      encrypted = await this.fs.readFile(this.filePath);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        this.logger?.info({ path: this.filePath }, "no snapshot yet, starting empty");
        return null;
      }
      throw new PersistenceError(`Failed to read snapshot ${this.filePath}`, { cause: err });
    }
    if (encrypted.length === 0) return null;

    const decrypted = this.cipher.decrypt(encrypted);
    if (!decrypted.ok) {
      throw new DecryptionError(`Failed to decrypt ${this.filePath} (${decrypted.reason}). Check the secret key.`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(decrypted.plaintext.toString("utf8"));
    } catch (err) {
      throw new SnapshotFormatError(`Snapshot ${this.filePath} is not valid JSON`, { cause: err });
    }
    const parsed = SnapshotDocumentSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SnapshotFormatError(`Snapshot ${this.filePath} has an unexpected shape: ${parsed.error.message}`, {
        cause: parsed.error
      });
    }
    return parsed.data;
  }

  async save(document: SnapshotDocument): Promise<void> {
    const token = this.cipher.encrypt(Buffer.from(JSON.stringify(document), "utf8"));

    try {
      await this.fs.mkdir(path.dirname(this.filePath), { recursive: true });
    } catch (err) {
      throw new PersistenceError(`Failed to create directory for ${this.filePath}`, { cause: err });
    }

    let handle: FileHandle | null = null;
    try {
      handle = await this.fs.open(this.tempPath, "w");
      await handle.writeFile(token);
      await handle.sync();
      await handle.close();
      handle = null;
      await this.fs.rename(this.tempPath, this.filePath);
    } catch (err) {
      await this.discardTemp(handle);
      throw new PersistenceError(`Failed to write snapshot ${this.filePath}`, { cause: err });
    }

    await this.syncDirectory();
    this.logger?.debug({ path: this.filePath, bytes: token.length }, "snapshot saved");
  }

  private async discardTemp(handle: FileHandle | null): Promise<void> {
    if (handle) {
      await handle.close().catch((err: unknown) => {
        this.logger?.warn({ err, path: this.tempPath }, "closing temp snapshot failed");
      });
    }
    await this.fs.rm(this.tempPath, { force: true }).catch((err: unknown) => {
      this.logger?.error({ err, path: this.tempPath }, "removing temp snapshot failed");
    });
  }

  private async removeStaleTemp(): Promise<void> {
    try {
      await this.fs.stat(this.tempPath);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return;
      throw new PersistenceError(`Failed to inspect ${this.tempPath}`, { cause: err });
    }
    this.logger?.warn({ path: this.tempPath }, "removing temp snapshot left by an interrupted save");
    await this.fs.rm(this.tempPath, { force: true });
  }

  // The rename is only durable once the directory entry is flushed. Not supported on Windows.
  private async syncDirectory(): Promise<void> {
    if (process.platform === "win32") return;
    try {
      const dir = await this.fs.open(path.dirname(this.filePath), "r");
      try {
        await dir.sync();
      } finally {
        await dir.close();
      }
    } catch (err) {
      this.logger?.warn({ err, path: this.filePath }, "directory fsync failed after snapshot rename");
    }
  }
}
