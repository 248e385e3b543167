/**
 * Shell command execution bounded by a timeout
 */

import { exec as execCallback } from 'child_process';
import { Exec } from '../core/types';

export function createShellExec(timeoutMs: number): Exec {
  return (command: string) =>
    new Promise<string>((resolve, reject) => {
      execCallback(command, { timeout: timeoutMs, killSignal: 'SIGKILL' }, (error, stdout, stderr) => {
        if (error) {
          const detail = stderr.trim() || error.message;
          const reason = error.killed ? `timed out after ${timeoutMs}ms` : detail;
          reject(new Error(`Command failed (${command}): ${reason}`));
          return;
        }
        resolve(stdout);
      });
    });
}

/**
 * Reject if the promise has not settled within timeoutMs
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
