/**
 * Pure decision engine for satellite/cellular failover
 * No side effects - all decisions based on input facts, state, and thresholds
 */

import { analyzeTrend } from './trend';
import {
  Action,
  CycleFacts,
  DecisionResult,
  FailoverState,
  FailoverTrigger,
  LinkMetrics,
  Phase,
  ReasonCode,
  Thresholds
} from './types';

interface Trigger {
  trigger: FailoverTrigger;
  reason: string;
}

/**
 * Derive the state-machine phase from persisted state
 */
export function phaseOf(state: FailoverState, config: Pick<Thresholds, 'primaryInterface'>): Phase {
  if (state.currentPrimary === config.primaryInterface) {
    return state.failoverPending ? 'PENDING_FAILOVER' : 'ACTIVE';
  }
  return state.failbackCounter > 0 ? 'PENDING_FAILBACK' : 'FAILED_OVER';
}

/**
 * Seconds of cooldown left, 0 when no cooldown applies
 */
export function cooldownRemaining(state: FailoverState, now: number, config: Thresholds): number {
  if (state.lastActionEpoch <= 0) {
    return 0;
  }
  const elapsed = (now - state.lastActionEpoch) / 1000;
  return elapsed < config.failoverCooldownSeconds
    ? Math.ceil(config.failoverCooldownSeconds - elapsed)
    : 0;
}

/**
 * Reactive spike check, first match in latency, loss, obstruction order
 */
export function detectSpike(metrics: LinkMetrics, config: Thresholds): Trigger | undefined {
  if (metrics.latencyMs > config.latencySpikeThreshold) {
    return {
      trigger: 'LATENCY_SPIKE',
      reason: `Latency spike: ${metrics.latencyMs}ms > ${config.latencySpikeThreshold}ms`
    };
  }
  if (metrics.packetLoss > config.packetLossSpikeThreshold) {
    return {
      trigger: 'PACKET_LOSS_SPIKE',
      reason: `Packet loss spike: ${metrics.packetLoss} > ${config.packetLossSpikeThreshold}`
    };
  }
  if (metrics.obstructionFraction > config.obstructionThreshold) {
    return {
      trigger: 'OBSTRUCTION_SPIKE',
      reason: `Obstruction spike: ${metrics.obstructionFraction} > ${config.obstructionThreshold}`
    };
  }
  return undefined;
}

/**
 * Whether the satellite link is good enough to count toward failback
 */
export function isLinkHealthy(metrics: LinkMetrics, config: Thresholds): boolean {
  return (
    detectSpike(metrics, config) === undefined &&
    metrics.packetLoss <= config.failbackPacketLossThreshold
  );
}

/**
 * Core decision function: evaluate one cycle's facts against persisted state.
 * This is a pure function with no side effects; the returned newState is what
 * gets persisted when the action is a no-op or its execution fails.
 */
export function evaluate(
  facts: CycleFacts,
  state: FailoverState,
  config: Thresholds
): DecisionResult {
  const reasonCodes: ReasonCode[] = [];
  const newState: FailoverState = { ...state };

  if (facts.recommendation) {
    newState.lastScorerRecommendation = facts.recommendation.interface;
  }

  const remaining = cooldownRemaining(state, facts.now, config);

  const fire = (found: Trigger, to: string, bypassCooldown: boolean): DecisionResult => {
    reasonCodes.push(found.trigger);
    if (remaining > 0 && !bypassCooldown) {
      return blocked(found.reason, remaining, reasonCodes, newState);
    }
    return {
      action: { type: 'FAILOVER', from: state.currentPrimary, to, trigger: found.trigger, reason: found.reason },
      reasonCodes,
      newState
    };
  };

  if (state.currentPrimary !== config.primaryInterface) {
    return evaluateFailback(facts.metrics, remaining, reasonCodes, newState, config);
  }

  // Rule 1: no telemetry at all - fail-safe, ignores cooldown
  if (!facts.metrics) {
    return fire(
      { trigger: 'METRICS_UNAVAILABLE', reason: 'Metrics source unreachable - assuming satellite link is down' },
      config.backupInterface,
      true
    );
  }

  // Rule 2: reactive spikes
  const spike = detectSpike(facts.metrics, config);
  if (spike) {
    return fire(spike, config.backupInterface, config.reactiveBypassesCooldown);
  }

  // Rule 3: degrading signal with a distant reacquisition window
  const trend = analyzeTrend(facts.previousMetrics, facts.metrics, config);
  if (trend.predictsOutage && facts.previousMetrics && facts.metrics.secondsToNextWindow !== undefined) {
    return fire(
      {
        trigger: 'PREDICTIVE_SNR_DROP',
        reason:
          `SNR drop + satellite handoff delay: SNR ${facts.previousMetrics.signalQuality} -> ` +
          `${facts.metrics.signalQuality} (drop ${trend.signalDelta} > ${config.snrDropThreshold}), ` +
          `next window in ${facts.metrics.secondsToNextWindow}s > ${config.satelliteHandoffThreshold}s`
      },
      config.backupInterface,
      false
    );
  }

  // Rule 4: score-based, debounced by the stability counter
  const recommendation = facts.recommendation;
  if (!recommendation) {
    reasonCodes.push('SCORER_UNAVAILABLE');
    return noOp('No scorer recommendation - score-based check skipped', reasonCodes, newState);
  }

  if (recommendation.interface === state.currentPrimary) {
    if (state.failoverPending) {
      reasonCodes.push('SCORE_CANCELLED');
      newState.failoverPending = false;
      newState.stabilityCounter = 0;
      return noOp(
        `Scorer reverted to ${state.currentPrimary} - pending failover cancelled`,
        reasonCodes,
        newState
      );
    }
    reasonCodes.push('SCORE_AGREES');
    return noOp(`Scorer recommends staying on ${state.currentPrimary}`, reasonCodes, newState);
  }

  newState.failoverPending = true;
  newState.stabilityCounter = state.failoverPending
    ? Math.min(state.stabilityCounter + 1, config.requiredStabilityChecks)
    : 1;

  if (newState.stabilityCounter < config.requiredStabilityChecks) {
    reasonCodes.push('SCORE_PENDING');
    return noOp(
      `Failover to ${recommendation.interface} pending - stability check ` +
        `${newState.stabilityCounter}/${config.requiredStabilityChecks}`,
      reasonCodes,
      newState
    );
  }

  return fire(
    {
      trigger: 'SCORE_CONFIRMED',
      reason:
        `Connection scoring recommends ${recommendation.interface} ` +
        `(${newState.stabilityCounter} consecutive checks)`
    },
    recommendation.interface,
    false
  );
}

/**
 * Rule 5: while failed over, count healthy cycles of the satellite link
 */
function evaluateFailback(
  metrics: LinkMetrics | undefined,
  remaining: number,
  reasonCodes: ReasonCode[],
  newState: FailoverState,
  config: Thresholds
): DecisionResult {
  reasonCodes.push('ALREADY_FAILED_OVER');

  if (!metrics) {
    reasonCodes.push('FAILBACK_RESET');
    newState.failbackCounter = 0;
    return noOp('Metrics unavailable - failback counter reset', reasonCodes, newState);
  }

  if (!isLinkHealthy(metrics, config)) {
    reasonCodes.push('FAILBACK_RESET');
    newState.failbackCounter = 0;
    return noOp(
      `${config.primaryInterface} still unstable - failback counter reset`,
      reasonCodes,
      newState
    );
  }

  reasonCodes.push('PRIMARY_HEALTHY');
  newState.failbackCounter = Math.min(newState.failbackCounter + 1, config.failbackStabilityChecks);

  if (newState.failbackCounter < config.failbackStabilityChecks) {
    reasonCodes.push('FAILBACK_PENDING');
    return noOp(
      `${config.primaryInterface} appears stable - failback counter ` +
        `${newState.failbackCounter}/${config.failbackStabilityChecks}`,
      reasonCodes,
      newState
    );
  }

  reasonCodes.push('FAILBACK_CONFIRMED');
  const reason = `Sustained stability achieved (${newState.failbackCounter} consecutive healthy checks)`;
  if (remaining > 0) {
    return blocked(reason, remaining, reasonCodes, newState);
  }

  return {
    action: { type: 'FAILBACK', from: newState.currentPrimary, to: config.primaryInterface, reason },
    reasonCodes,
    newState
  };
}

function noOp(reason: string, reasonCodes: ReasonCode[], newState: FailoverState): DecisionResult {
  return { action: { type: 'NO_OP', reason }, reasonCodes, newState };
}

function blocked(
  reason: string,
  remaining: number,
  reasonCodes: ReasonCode[],
  newState: FailoverState
): DecisionResult {
  reasonCodes.push('COOLDOWN_ACTIVE');
  const blockedReason = `${reason} - blocked by cooldown (${remaining}s remaining)`;
  return {
    action: { type: 'NO_OP', reason: blockedReason },
    reasonCodes,
    blockedReason,
    newState
  };
}

/**
 * State after a switch the route executor confirmed
 */
export function applyTransition(state: FailoverState, action: Action, now: number): FailoverState {
  if (action.type === 'NO_OP') {
    return state;
  }
  return {
    ...state,
    currentPrimary: action.to,
    failoverPending: false,
    stabilityCounter: 0,
    failbackCounter: 0,
    lastActionEpoch: now
  };
}

/**
 * Create initial state
 */
export function createInitialState(config: Pick<Thresholds, 'primaryInterface'>): FailoverState {
  return {
    currentPrimary: config.primaryInterface,
    failoverPending: false,
    stabilityCounter: 0,
    failbackCounter: 0,
    lastActionEpoch: 0
  };
}

/**
 * Create default thresholds
 */
export function createDefaultThresholds(primaryInterface: string, backupInterface: string): Thresholds {
  return {
    primaryInterface,
    backupInterface,
    latencySpikeThreshold: 100,
    packetLossSpikeThreshold: 0.02,
    obstructionThreshold: 0.001,
    snrDropThreshold: 0.5,
    satelliteHandoffThreshold: 0.5,
    failbackPacketLossThreshold: 0.01,
    requiredStabilityChecks: 3,
    failbackStabilityChecks: 120,
    failoverCooldownSeconds: 300,
    reactiveBypassesCooldown: false
  };
}
