/**
 * Core types for the WAN failover decision engine
 */

/**
 * Link telemetry snapshot from the satellite dish (pure data, no side effects)
 */
export interface LinkMetrics {
  /** Signal-to-noise ratio reported by the dish */
  signalQuality: number;
  /** POP ping latency in milliseconds (integer) */
  latencyMs: number;
  /** POP ping drop rate, 0..1 */
  packetLoss: number;
  /** Fraction of time obstructed, 0..1 */
  obstructionFraction: number;
  /** Seconds until the next satellite reacquisition window, if reported */
  secondsToNextWindow?: number;
  /** Capture timestamp in milliseconds */
  timestamp: number;
}

/**
 * Connection scorer output
 */
export interface ScoreRecommendation {
  interface: string;
  score?: number;
}

/**
 * Persistent engine memory, rewritten once per cycle
 */
export interface FailoverState {
  /** Interface currently carrying traffic */
  currentPrimary: string;
  /** Whether a score-based failover is accumulating confirmations */
  failoverPending: boolean;
  /** Consecutive cycles agreeing on the pending failover */
  stabilityCounter: number;
  /** Consecutive healthy cycles of the satellite link while failed over */
  failbackCounter: number;
  /** Timestamp (ms) of the most recent failover or failback, 0 if never */
  lastActionEpoch: number;
  /** Last interface recommended by the scorer */
  lastScorerRecommendation?: string;
}

/**
 * Engine thresholds and interface roles
 */
export interface Thresholds {
  /** Satellite interface, primary by default */
  primaryInterface: string;
  /** Cellular interface used for failover */
  backupInterface: string;
  latencySpikeThreshold: number;
  packetLossSpikeThreshold: number;
  obstructionThreshold: number;
  snrDropThreshold: number;
  satelliteHandoffThreshold: number;
  /** Maximum packet loss for the satellite link to count as healthy during failback */
  failbackPacketLossThreshold: number;
  requiredStabilityChecks: number;
  failbackStabilityChecks: number;
  failoverCooldownSeconds: number;
  /** Let latency/loss/obstruction spikes fire during cooldown */
  reactiveBypassesCooldown: boolean;
}

/**
 * Everything observed during one cycle
 */
export interface CycleFacts {
  /** Current timestamp in milliseconds */
  now: number;
  /** Absent when the metrics source failed or timed out */
  metrics?: LinkMetrics;
  /** Last metrics from the previous cycle, if any */
  previousMetrics?: LinkMetrics;
  /** Absent when the scorer is disabled or unavailable */
  recommendation?: ScoreRecommendation;
}

export type Phase = 'ACTIVE' | 'PENDING_FAILOVER' | 'FAILED_OVER' | 'PENDING_FAILBACK';

export type FailoverTrigger =
  | 'METRICS_UNAVAILABLE'
  | 'LATENCY_SPIKE'
  | 'PACKET_LOSS_SPIKE'
  | 'OBSTRUCTION_SPIKE'
  | 'PREDICTIVE_SNR_DROP'
  | 'SCORE_CONFIRMED'
  | 'MANUAL';

export type ReasonCode =
  | FailoverTrigger
  | 'SCORE_PENDING'
  | 'SCORE_CANCELLED'
  | 'SCORE_AGREES'
  | 'SCORER_UNAVAILABLE'
  | 'COOLDOWN_ACTIVE'
  | 'PRIMARY_HEALTHY'
  | 'FAILBACK_PENDING'
  | 'FAILBACK_CONFIRMED'
  | 'FAILBACK_RESET'
  | 'ALREADY_FAILED_OVER';

/**
 * Action to be performed (output of decision function)
 */
export type Action =
  | { type: 'FAILOVER'; from: string; to: string; trigger: FailoverTrigger; reason: string }
  | { type: 'FAILBACK'; from: string; to: string; reason: string }
  | { type: 'NO_OP'; reason: string };

/**
 * Result of the decision function
 */
export interface DecisionResult {
  action: Action;
  /** Reason codes explaining the decision, in evaluation order */
  reasonCodes: ReasonCode[];
  /** Set when a trigger matched but cooldown held it back */
  blockedReason?: string;
  /** Updated state to persist if the action is not executed or fails */
  newState: FailoverState;
}

export type DecisionEventType = 'EVALUATION' | 'FAILOVER' | 'FAILBACK' | 'FAILOVER_FAILED';

export type DecisionOutcome = 'SUCCESS' | 'FAILED';

/**
 * Append-only audit record
 */
export interface DecisionEvent {
  timestamp: number;
  eventType: DecisionEventType;
  fromInterface: string;
  toInterface: string;
  reason: string;
  outcome: DecisionOutcome;
}

/**
 * Execute a shell command and return its stdout
 */
export type Exec = (command: string) => Promise<string>;
