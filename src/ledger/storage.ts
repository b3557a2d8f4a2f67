import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { ensureDir, sleep } from '../core/utils';
import { StoreUnavailableError, VersionConflictError } from '../core/errors';

export interface VersionedContent {
  content: string;
  // opaque; '' when the document does not exist yet
  version: string;
}

export type ConditionalWriteResult = { ok: true; version: string } | { ok: false; conflict: VersionConflictError };

/**
 * A single text document with check-and-set writes. Backs both the transaction
 * ledger and the signal cooldown registry.
 */
export interface VersionedStore {
  readonly label: string;
  read(): Promise<VersionedContent>;
  conditionalWrite(content: string, expectedVersion: string, message?: string): Promise<ConditionalWriteResult>;
}

export const contentVersion = (content: string) =>
  crypto.createHash('sha256').update(content, 'utf-8').digest('hex').slice(0, 16);

export interface FileStoreOptions {
  lockAttempts?: number;
  lockDelayMs?: number;
  // a lock file older than this is taken to be left behind by a crashed writer
  staleLockMs?: number;
}

const hasCode = (err: unknown, code: string) => err instanceof Error && 'code' in err && err.code === code;

/**
 * Local file backend. The version token is a content hash, and the compare and
 * the rename run under an exclusive `<file>.lock`, so two processes on one
 * machine (cron poller and a manual edit) cannot both write on the same base.
 */
export class FileVersionedStore implements VersionedStore {
  readonly label: string;
  private readonly filePath: string;
  private readonly lockPath: string;
  private readonly lockAttempts: number;
  private readonly lockDelayMs: number;
  private readonly staleLockMs: number;

  constructor(filePath: string, options: FileStoreOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.lockPath = `${this.filePath}.lock`;
    this.label = `file:${this.filePath}`;
    this.lockAttempts = options.lockAttempts ?? 20;
    this.lockDelayMs = options.lockDelayMs ?? 50;
    this.staleLockMs = options.staleLockMs ?? 30_000;
  }

  private readCurrent(): VersionedContent {
    if (!fs.existsSync(this.filePath)) return { content: '', version: '' };
    const content = fs.readFileSync(this.filePath, 'utf-8');
    return { content, version: contentVersion(content) };
  }

  async read(): Promise<VersionedContent> {
    return this.readCurrent();
  }

  private clearStaleLock() {
    try {
      const age = Date.now() - fs.statSync(this.lockPath).mtimeMs;
      if (age > this.staleLockMs) {
        console.warn(`${this.label}: removing stale lock (${Math.round(age / 1000)}s old)`);
        fs.unlinkSync(this.lockPath);
      }
    } catch (err) {
      // released between the failed open and the stat
      if (!hasCode(err, 'ENOENT')) throw err;
    }
  }

  private async acquireLock(): Promise<number> {
    ensureDir(path.dirname(this.filePath));
    for (let attempt = 1; ; attempt++) {
      try {
        return fs.openSync(this.lockPath, 'wx');
      } catch (err) {
        if (!hasCode(err, 'EEXIST')) throw err;
        if (attempt >= this.lockAttempts) {
          throw new StoreUnavailableError(this.label, `lock ${this.lockPath} is held by another writer`);
        }
        this.clearStaleLock();
        await sleep(this.lockDelayMs);
      }
    }
  }

  async conditionalWrite(content: string, expectedVersion: string): Promise<ConditionalWriteResult> {
    const fd = await this.acquireLock();
    try {
      const current = this.readCurrent();
      if (current.version !== expectedVersion) {
        return { ok: false, conflict: new VersionConflictError(expectedVersion) };
      }
      const tmp = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
      fs.writeFileSync(tmp, content);
      fs.renameSync(tmp, this.filePath);
      return { ok: true, version: contentVersion(content) };
    } finally {
      fs.closeSync(fd);
      fs.unlinkSync(this.lockPath);
    }
  }
}
