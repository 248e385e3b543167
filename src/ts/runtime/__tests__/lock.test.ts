/**
 * Unit tests for the state file lock
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { StateLockError } from '../../core/errors';
import { FileLock, isProcessAlive, noLock } from '../lock';

// Above any pid_max, so never a running process
const DEAD_PID = 2147483646;

describe('FileLock', () => {
  let testDir: string;
  let lockPath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wan-failover-lock-'));
    lockPath = path.join(testDir, 'state', 'failover_state.lock');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  test('should run the section and release the lock', async () => {
    const lock = new FileLock(lockPath);

    const result = await lock.runExclusive('cycle', async () => {
      const record: unknown = JSON.parse(await fs.readFile(lockPath, 'utf-8'));
      expect(record).toEqual(expect.objectContaining({ owner: 'cycle', pid: process.pid }));
      return 42;
    });

    expect(result).toBe(42);
    await expect(fs.stat(lockPath)).rejects.toThrow();
  });

  test('should release the lock when the section throws', async () => {
    const lock = new FileLock(lockPath);

    await expect(
      lock.runExclusive('cycle', async () => {
        throw new Error('evaluation failed');
      })
    ).rejects.toThrow('evaluation failed');

    await expect(fs.stat(lockPath)).rejects.toThrow();
  });

  test('should serialize concurrent sections', async () => {
    const lock = new FileLock(lockPath, { retryIntervalMs: 5 });
    const order: string[] = [];

    const section = (name: string) =>
      lock.runExclusive(name, async () => {
        order.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 20));
        order.push(`${name}:end`);
      });

    await Promise.all([section('monitor'), section('check')]);

    expect(order).toHaveLength(4);
    expect(order[1]).toBe(`${order[0].split(':')[0]}:end`);
  });

  test('should take over a lock older than the stale window', async () => {
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, JSON.stringify({ owner: 'check', pid: process.pid, timestamp: 1000 }), 'utf-8');
    const lock = new FileLock(lockPath, { timeoutMs: 500 }, () => 1_700_000_000_000);

    await expect(lock.runExclusive('cycle', async () => 'acquired')).resolves.toBe('acquired');
  });

  test('should admit one of several waiters over a lock left by a dead process', async () => {
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    const locks = [0, 1, 2].map(() => new FileLock(lockPath, { timeoutMs: 2000, retryIntervalMs: 1 }));
    let active = 0;
    let maxActive = 0;

    for (let round = 0; round < 25; round++) {
      await fs.writeFile(lockPath, JSON.stringify({ owner: 'monitor', pid: DEAD_PID, timestamp: Date.now() }), 'utf-8');

      await Promise.all(
        locks.map((lock, index) =>
          lock.runExclusive(`waiter-${index}`, async () => {
            active++;
            maxActive = Math.max(maxActive, active);
            await new Promise((resolve) => setTimeout(resolve, 2));
            active--;
          })
        )
      );
    }

    expect(maxActive).toBe(1);
    await expect(fs.stat(lockPath)).rejects.toThrow();
    await expect(fs.stat(`${lockPath}.takeover`)).rejects.toThrow();
  });

  test('should leave a lock another owner has taken over on release', async () => {
    const lock = new FileLock(lockPath);
    const successor = JSON.stringify({ owner: 'check', pid: process.pid, timestamp: Date.now() });

    await lock.runExclusive('cycle', async () => {
      await fs.writeFile(lockPath, successor, 'utf-8');
    });

    expect(await fs.readFile(lockPath, 'utf-8')).toBe(successor);
  });

  test('should time out while a live owner holds the lock', async () => {
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, JSON.stringify({ owner: 'monitor', pid: process.pid, timestamp: Date.now() }), 'utf-8');
    const lock = new FileLock(lockPath, { timeoutMs: 100, retryIntervalMs: 10 });

    await expect(lock.runExclusive('check', async () => 'never')).rejects.toBeInstanceOf(StateLockError);
  });

  test('isProcessAlive should report the current process', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });

  test('isProcessAlive should report a missing process', () => {
    expect(isProcessAlive(DEAD_PID)).toBe(false);
  });

  test('noLock should run the section directly', async () => {
    await expect(noLock.runExclusive('dry-run', async () => 'done')).resolves.toBe('done');
  });
});
