/**
 * Predictive SNR trend analysis
 */

import { LinkMetrics, Thresholds } from './types';

export interface TrendResult {
  /** Signal dropped by more than snrDropThreshold since the previous cycle */
  degrading: boolean;
  /** Next reacquisition window is further away than satelliteHandoffThreshold */
  handoffDelayed: boolean;
  /** Both of the above: an outage is expected before the link recovers */
  predictsOutage: boolean;
  /** previous - current signal; undefined when either sample is unusable */
  signalDelta?: number;
}

// Differences are snapped to micro-units so 7.7 - 7.2 compares as 0.5
const PRECISION = 1e6;

function usableSignal(value: number | undefined): value is number {
  // A zero SNR is what the dish reports when it has no reading
  return value !== undefined && Number.isFinite(value) && value !== 0;
}

export function signalDelta(previous: number, current: number): number {
  return Math.round((previous - current) * PRECISION) / PRECISION;
}

/**
 * Compare the previous and current samples against the predictive thresholds.
 * Pure: no state, no I/O.
 */
export function analyzeTrend(
  previous: LinkMetrics | undefined,
  current: LinkMetrics,
  thresholds: Pick<Thresholds, 'snrDropThreshold' | 'satelliteHandoffThreshold'>
): TrendResult {
  const handoffDelayed =
    current.secondsToNextWindow !== undefined &&
    current.secondsToNextWindow > thresholds.satelliteHandoffThreshold;

  if (!previous || !usableSignal(previous.signalQuality) || !usableSignal(current.signalQuality)) {
    return { degrading: false, handoffDelayed, predictsOutage: false };
  }

  const delta = signalDelta(previous.signalQuality, current.signalQuality);
  const degrading = delta > thresholds.snrDropThreshold;

  return {
    degrading,
    handoffDelayed,
    predictsOutage: degrading && handoffDelayed,
    signalDelta: delta
  };
}
