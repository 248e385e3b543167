/**
 * Advisory file lock serializing load/evaluate/act/save across processes
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { StateLockError, hasErrorCode } from '../core/errors';
import { isNotFound } from '../core/state-store';

export interface StateLock {
  runExclusive<T>(owner: string, fn: () => Promise<T>): Promise<T>;
}

/** For single-owner stores such as the dry-run memory store */
export const noLock: StateLock = {
  runExclusive<T>(_owner: string, fn: () => Promise<T>): Promise<T> {
    return fn();
  }
};

export interface FileLockOptions {
  /** Give up acquiring after this long */
  timeoutMs: number;
  retryIntervalMs: number;
  /** A lock older than this is considered abandoned */
  staleAfterMs: number;
}

const DEFAULT_OPTIONS: FileLockOptions = {
  timeoutMs: 15000,
  retryIntervalMs: 50,
  staleAfterMs: 120000
};

const LockRecordSchema = z.object({
  owner: z.string(),
  pid: z.number().int(),
  timestamp: z.number()
});

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return hasErrorCode(error, 'EPERM');
  }
}

export class FileLock implements StateLock {
  private readonly options: FileLockOptions;
  /** Exact record this instance wrote, while it holds the lock */
  private held: string | undefined;

  constructor(
    readonly lockPath: string,
    options: Partial<FileLockOptions> = {},
    private readonly getCurrentTime: () => number = Date.now
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async runExclusive<T>(owner: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(owner);
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  async acquire(owner: string): Promise<void> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
    const startTime = Date.now();

    while (Date.now() - startTime < this.options.timeoutMs) {
      const record = this.createRecord(owner);
      if (await createExclusive(this.lockPath, record)) {
        this.held = record;
        return;
      }
      const stale = await this.readIfStale(this.lockPath);
      if (stale !== undefined && (await this.takeOver(stale))) {
        continue;
      }
      await sleep(this.options.retryIntervalMs);
    }

    throw new StateLockError(`Timed out after ${this.options.timeoutMs}ms waiting for ${this.lockPath}`);
  }

  /** Removes the lock file only while it still carries this instance's record */
  async release(): Promise<void> {
    const held = this.held;
    this.held = undefined;
    if (held !== undefined) {
      await removeIfUnchanged(this.lockPath, held);
    }
  }

  private createRecord(owner: string): string {
    return JSON.stringify({ owner, pid: process.pid, timestamp: this.getCurrentTime() });
  }

  /**
   * Remove an abandoned lock under a takeover guard, so that only one waiter
   * compares and deletes it at a time
   */
  private async takeOver(staleRecord: string): Promise<boolean> {
    const guardPath = `${this.lockPath}.takeover`;
    if (!(await createExclusive(guardPath, this.createRecord('takeover')))) {
      const staleGuard = await this.readIfStale(guardPath);
      if (staleGuard !== undefined) {
        await removeIfUnchanged(guardPath, staleGuard);
      }
      return false;
    }
    try {
      return await removeIfUnchanged(this.lockPath, staleRecord);
    } finally {
      await fs.rm(guardPath, { force: true });
    }
  }

  /** Content of the file when it is abandoned, otherwise undefined */
  private async readIfStale(filePath: string): Promise<string | undefined> {
    const content = await readIfExists(filePath);
    if (content === undefined) {
      return undefined;
    }

    const record = parseLockRecord(content);
    if (!record) {
      // Possibly caught between another process's create and write
      return (await this.olderThanStaleWindow(filePath)) ? content : undefined;
    }
    const abandoned =
      this.getCurrentTime() - record.timestamp > this.options.staleAfterMs || !isProcessAlive(record.pid);
    return abandoned ? content : undefined;
  }

  private async olderThanStaleWindow(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return Date.now() - stats.mtimeMs > this.options.staleAfterMs;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }
}

async function createExclusive(filePath: string, content: string): Promise<boolean> {
  try {
    await fs.writeFile(filePath, content, { flag: 'wx' });
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'EEXIST')) {
      return false;
    }
    throw error;
  }
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
}

async function removeIfUnchanged(filePath: string, expected: string): Promise<boolean> {
  if ((await readIfExists(filePath)) !== expected) {
    return false;
  }
  await fs.rm(filePath, { force: true });
  return true;
}

function parseLockRecord(content: string): z.infer<typeof LockRecordSchema> | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return undefined;
  }
  const parsed = LockRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
