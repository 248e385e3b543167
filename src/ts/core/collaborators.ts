/**
 * Contracts the engine needs from its external collaborators
 */

import { DecisionEvent, LinkMetrics, ScoreRecommendation } from './types';

export interface MetricsSource {
  /** Rejects with MetricsUnavailableError when no usable telemetry is available */
  fetch(): Promise<LinkMetrics>;
}

export interface Scorer {
  /** Rejects with ScorerUnavailableError when no recommendation can be made */
  recommend(currentPrimary: string): Promise<ScoreRecommendation>;
}

/** Outcome of bringing one interface up or down */
export interface StepResult {
  iface: string;
  ok: boolean;
  error?: string;
}

export interface RouteSwitch {
  ifdown(iface: string): Promise<StepResult>;
  ifup(iface: string): Promise<StepResult>;
}

export interface AuditSink {
  record(event: DecisionEvent): Promise<void>;
}
