/**
 * Build runtime dependencies from configuration
 */

import { AuditTrail, CommandNotifier, CsvAuditLog, LoggingAuditSink } from '../adapters/audit';
import { createShellExec } from '../adapters/exec';
import { FileMetricsSource, StarlinkMetricsSource } from '../adapters/metrics-source';
import { Mwan3RouteSwitch } from '../adapters/mwan3';
import { CommandScorer } from '../adapters/scorer';
import { MetricsSource } from '../core/collaborators';
import { createInitialState } from '../core/engine';
import { FileHistoryStore, MemoryHistoryStore } from '../core/history';
import { Logger } from '../core/logger';
import { FileStateStore, MemoryStateStore } from '../core/state-store';
import { Exec } from '../core/types';
import { EngineConfig, enginePaths } from './config';
import { Dependencies } from './cycle';
import { FileLock, noLock } from './lock';

export interface WiringOptions {
  dryRun: boolean;
  logger: Logger;
  /** Defaults to a shell exec bounded by apiTimeoutSeconds */
  exec?: Exec;
  getCurrentTime?: () => number;
}

export interface Runtime {
  deps: Dependencies;
  /** File-backed stores, for status and reset regardless of dry-run */
  stateFile: FileStateStore;
  historyFile: FileHistoryStore;
  auditLog: CsvAuditLog;
}

export function createMetricsSource(config: EngineConfig, exec: Exec, getCurrentTime: () => number): MetricsSource {
  if (config.metricsFile) {
    return new FileMetricsSource(config.metricsFile, getCurrentTime);
  }
  return new StarlinkMetricsSource(
    {
      host: config.starlinkIp,
      port: config.starlinkPort,
      grpcurlCommand: config.grpcurlCommand,
      timeoutSeconds: config.apiTimeoutSeconds
    },
    exec,
    getCurrentTime
  );
}

/**
 * Dry-run keeps state and history in memory, seeded from disk, and logs
 * events instead of writing them
 */
export async function createRuntime(config: EngineConfig, options: WiringOptions): Promise<Runtime> {
  const { logger, dryRun } = options;
  const exec = options.exec ?? createShellExec(config.apiTimeoutSeconds * 1000);
  const getCurrentTime = options.getCurrentTime ?? Date.now;
  const paths = enginePaths(config);

  const stateFile = new FileStateStore(paths.stateFile, () => createInitialState(config), logger);
  const historyFile = new FileHistoryStore(paths.historyFile, config.historyLength, logger);
  const auditLog = new CsvAuditLog(paths.auditFile);

  const notifiers = config.notifierCommand ? [new CommandNotifier(config.notifierCommand, exec)] : [];

  const deps: Dependencies = {
    config,
    metricsSource: createMetricsSource(config, exec, getCurrentTime),
    scorer: config.scoringCommand ? new CommandScorer(config.scoringCommand, exec) : undefined,
    routeSwitch: new Mwan3RouteSwitch(exec),
    stateStore: dryRun ? new MemoryStateStore(await stateFile.load()) : stateFile,
    historyStore: dryRun ? new MemoryHistoryStore(config.historyLength, await historyFile.load()) : historyFile,
    audit: dryRun ? new LoggingAuditSink(logger) : new AuditTrail(auditLog, notifiers, logger),
    lock: dryRun ? noLock : new FileLock(paths.lockFile, { timeoutMs: Math.max(15000, config.apiTimeoutSeconds * 3000) }),
    logger,
    getCurrentTime,
    dryRun
  };

  return { deps, stateFile, historyFile, auditLog };
}
