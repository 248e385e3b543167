/**
 * One load/evaluate/act/save cycle plus the operator-driven transitions
 */

import { withTimeout } from '../adapters/exec';
import { AuditSink, MetricsSource, RouteSwitch, Scorer, StepResult } from '../core/collaborators';
import { applyTransition, evaluate } from '../core/engine';
import { MetricsUnavailableError, ScorerUnavailableError, errorMessage } from '../core/errors';
import { HistoryStore, latest } from '../core/history';
import { Logger } from '../core/logger';
import { StateStore } from '../core/state-store';
import {
  Action,
  DecisionEvent,
  DecisionResult,
  FailoverState,
  LinkMetrics,
  ScoreRecommendation,
  Thresholds
} from '../core/types';
import { StateLock } from './lock';

/**
 * Dependencies injected into the runtime (for testing)
 */
export interface Dependencies {
  config: Thresholds & { apiTimeoutSeconds: number };
  metricsSource: MetricsSource;
  /** Omitted when no scoring command is configured */
  scorer?: Scorer;
  routeSwitch: RouteSwitch;
  stateStore: StateStore;
  historyStore: HistoryStore;
  audit: AuditSink;
  lock: StateLock;
  logger: Logger;
  /** Get current timestamp in milliseconds */
  getCurrentTime: () => number;
  /** Evaluate and log, but never call the route switch */
  dryRun: boolean;
}

export interface SwitchResult {
  ok: boolean;
  down: StepResult;
  up?: StepResult;
  /** Attempt to bring the original interface back after a failed step */
  restore?: StepResult;
}

export interface CycleReport {
  decision: DecisionResult;
  /** Present when the route switch was invoked */
  switchResult?: SwitchResult;
  state: FailoverState;
  events: DecisionEvent[];
}

export interface ManualResult {
  ok: boolean;
  changed: boolean;
  switchResult?: SwitchResult;
  state: FailoverState;
}

function timeoutMs(deps: Dependencies): number {
  return deps.config.apiTimeoutSeconds * 1000;
}

async function boundedStep(
  step: () => Promise<StepResult>,
  iface: string,
  limitMs: number
): Promise<StepResult> {
  try {
    return await withTimeout(step(), limitMs, () => new Error(`timed out after ${limitMs}ms`));
  } catch (error) {
    return { iface, ok: false, error: errorMessage(error) };
  }
}

/**
 * Bring `from` down and `to` up; on any failure try to restore `from`
 */
export async function switchRoute(
  routeSwitch: RouteSwitch,
  from: string,
  to: string,
  logger: Logger,
  limitMs: number
): Promise<SwitchResult> {
  const restore = async (): Promise<StepResult> => {
    logger.warn(`Attempting to restore original interface: ${from}`);
    const result = await boundedStep(() => routeSwitch.ifup(from), from, limitMs);
    if (!result.ok) {
      logger.error(`Failed to restore ${from}: ${result.error ?? 'unknown error'}`);
    }
    return result;
  };

  const down = await boundedStep(() => routeSwitch.ifdown(from), from, limitMs);
  if (!down.ok) {
    logger.error(`Failed to disable interface ${from}: ${down.error ?? 'unknown error'}`);
    return { ok: false, down, restore: await restore() };
  }

  const up = await boundedStep(() => routeSwitch.ifup(to), to, limitMs);
  if (!up.ok) {
    logger.error(`Failed to enable interface ${to}: ${up.error ?? 'unknown error'}`);
    return { ok: false, down, up, restore: await restore() };
  }

  return { ok: true, down, up };
}

export function describeFailure(result: SwitchResult): string {
  const failed = !result.down.ok ? result.down : result.up;
  const step = !result.down.ok ? 'ifdown' : 'ifup';
  const restored = result.restore?.ok ? 'restored' : 'restore failed';
  return `${step} ${failed?.iface ?? 'unknown'} failed: ${failed?.error ?? 'unknown error'}; ${result.down.iface} ${restored}`;
}

async function fetchMetrics(deps: Dependencies): Promise<LinkMetrics | undefined> {
  const limit = timeoutMs(deps);
  try {
    return await withTimeout(
      deps.metricsSource.fetch(),
      limit,
      () => new MetricsUnavailableError(`Metrics source timed out after ${limit}ms`)
    );
  } catch (error) {
    deps.logger.warn(`Metrics unavailable: ${errorMessage(error)}`);
    return undefined;
  }
}

async function fetchRecommendation(
  deps: Dependencies,
  currentPrimary: string
): Promise<ScoreRecommendation | undefined> {
  const scorer = deps.scorer;
  if (!scorer) {
    deps.logger.debug('No connection scorer configured');
    return undefined;
  }
  const limit = timeoutMs(deps);
  try {
    const recommendation = await withTimeout(
      scorer.recommend(currentPrimary),
      limit,
      () => new ScorerUnavailableError(`Connection scorer timed out after ${limit}ms`)
    );
    deps.logger.debug(`Scoring recommendation: ${recommendation.interface}`);
    return recommendation;
  } catch (error) {
    deps.logger.warn(`Scorer unavailable: ${errorMessage(error)}`);
    return undefined;
  }
}

function switchEvent(action: Exclude<Action, { type: 'NO_OP' }>, result: SwitchResult, timestamp: number): DecisionEvent {
  if (result.ok) {
    return {
      timestamp,
      eventType: action.type,
      fromInterface: action.from,
      toInterface: action.to,
      reason: action.reason,
      outcome: 'SUCCESS'
    };
  }
  return {
    timestamp,
    eventType: 'FAILOVER_FAILED',
    fromInterface: action.from,
    toInterface: action.to,
    reason: `${action.type === 'FAILBACK' ? 'Failback' : 'Failover'} failed (${describeFailure(result)}): ${action.reason}`,
    outcome: 'FAILED'
  };
}

async function recordAll(deps: Dependencies, events: DecisionEvent[]): Promise<void> {
  for (const event of events) {
    await deps.audit.record(event);
  }
}

/**
 * Run a single decision cycle. External queries happen before the state lock
 * is taken; only load/evaluate/act/save runs under it.
 */
export async function runCycle(deps: Dependencies): Promise<CycleReport> {
  const { logger } = deps;

  const metrics = await fetchMetrics(deps);
  if (metrics) {
    logger.debug(
      `Current metrics: SNR=${metrics.signalQuality}, Latency=${metrics.latencyMs}ms, ` +
        `Loss=${metrics.packetLoss}, Obstruction=${metrics.obstructionFraction}, ` +
        `NextWindow=${metrics.secondsToNextWindow ?? 'n/a'}s`
    );
  }
  const peeked = await deps.stateStore.load();
  const recommendation = await fetchRecommendation(deps, peeked.currentPrimary);

  // Filled under the lock and recorded even when a later step such as the save throws
  const events: DecisionEvent[] = [];
  const section = deps.lock.runExclusive('cycle', async (): Promise<CycleReport> => {
    const now = deps.getCurrentTime();
    const state = await deps.stateStore.load();
    const previousMetrics = latest(await deps.historyStore.load());

    const decision = evaluate({ now, metrics, previousMetrics, recommendation }, state, deps.config);
    logger.debug(`Reason codes: ${decision.reasonCodes.join(', ')}`);

    let finalState = decision.newState;
    let switchResult: SwitchResult | undefined;
    const action = decision.action;

    if (decision.blockedReason) {
      logger.info(decision.blockedReason);
      events.push({
        timestamp: now,
        eventType: 'EVALUATION',
        fromInterface: state.currentPrimary,
        toInterface: state.currentPrimary,
        reason: decision.blockedReason,
        outcome: 'SUCCESS'
      });
    }

    if (action.type === 'NO_OP') {
      logger.debug(action.reason);
    } else if (deps.dryRun) {
      logger.info(`Would execute ${action.type}: ${action.from} -> ${action.to} (${action.reason})`);
    } else {
      logger.info(`Executing ${action.type.toLowerCase()}: ${action.from} -> ${action.to}`);
      logger.info(`Reason: ${action.reason}`);
      switchResult = await switchRoute(deps.routeSwitch, action.from, action.to, logger, timeoutMs(deps));
      if (switchResult.ok) {
        finalState = applyTransition(decision.newState, action, now);
        logger.info(`${action.type === 'FAILBACK' ? 'Failback' : 'Failover'} completed successfully`);
      }
      events.push(switchEvent(action, switchResult, now));
    }

    await deps.stateStore.save(finalState);
    if (metrics) {
      await deps.historyStore.append(metrics);
    }

    return { decision, switchResult, state: finalState, events };
  });

  // Notifier hooks may reach the network; keep them outside the lock
  try {
    return await section;
  } finally {
    await recordAll(deps, events);
  }
}

/**
 * Operator-forced switch: bypasses cooldown and stability checks but still
 * goes through the route switch and the audit trail
 */
export async function manualFailover(deps: Dependencies, target: string): Promise<ManualResult> {
  const { logger } = deps;
  const events: DecisionEvent[] = [];

  const section = deps.lock.runExclusive('manual-failover', async (): Promise<ManualResult> => {
    const state = await deps.stateStore.load();
    if (target === state.currentPrimary) {
      logger.info(`Target interface ${target} is already the primary`);
      return { ok: true, changed: false, state };
    }

    const reason = 'Manual failover requested';
    const action: Exclude<Action, { type: 'NO_OP' }> =
      target === deps.config.primaryInterface
        ? { type: 'FAILBACK', from: state.currentPrimary, to: target, reason }
        : { type: 'FAILOVER', from: state.currentPrimary, to: target, trigger: 'MANUAL', reason };

    if (deps.dryRun) {
      logger.info(`Would execute ${action.type}: ${action.from} -> ${action.to} (${reason})`);
      return { ok: true, changed: false, state };
    }

    logger.info(`Executing manual ${action.type.toLowerCase()} to: ${target}`);
    const now = deps.getCurrentTime();
    const switchResult = await switchRoute(deps.routeSwitch, action.from, action.to, logger, timeoutMs(deps));
    events.push(switchEvent(action, switchResult, now));

    if (!switchResult.ok) {
      logger.error('Manual failover failed');
      return { ok: false, changed: false, switchResult, state };
    }

    const newState = applyTransition(state, action, now);
    await deps.stateStore.save(newState);
    logger.info('Manual failover completed');
    return { ok: true, changed: true, switchResult, state: newState };
  });

  try {
    return await section;
  } finally {
    await recordAll(deps, events);
  }
}

/**
 * Record a new primary without touching routing (recovery/bootstrapping)
 */
export async function setPrimary(deps: Dependencies, iface: string): Promise<FailoverState> {
  return deps.lock.runExclusive('set-primary', async () => {
    const state = await deps.stateStore.load();
    const newState: FailoverState = {
      ...state,
      currentPrimary: iface,
      failoverPending: false,
      stabilityCounter: 0,
      failbackCounter: 0
    };
    if (deps.dryRun) {
      deps.logger.info(`Would set primary interface to: ${iface}`);
      return state;
    }
    await deps.stateStore.save(newState);
    deps.logger.info(`Primary interface set to: ${iface}`);
    return newState;
  });
}
