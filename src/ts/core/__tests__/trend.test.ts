/**
 * Unit tests for predictive SNR trend analysis
 */

import { analyzeTrend, signalDelta } from '../trend';
import { LinkMetrics } from '../types';

describe('Trend Analysis', () => {
  const thresholds = { snrDropThreshold: 0.5, satelliteHandoffThreshold: 0.5 };

  const sample = (signalQuality: number, secondsToNextWindow?: number): LinkMetrics => ({
    signalQuality,
    latencyMs: 45,
    packetLoss: 0,
    obstructionFraction: 0,
    secondsToNextWindow,
    timestamp: 1_700_000_000_000
  });

  test('should flag a drop above the threshold with a delayed window', () => {
    const result = analyzeTrend(sample(9.1), sample(8.3, 12), thresholds);

    expect(result).toEqual({ degrading: true, handoffDelayed: true, predictsOutage: true, signalDelta: 0.8 });
  });

  test('should treat a drop exactly at the threshold as stable', () => {
    const result = analyzeTrend(sample(7.7), sample(7.2, 30), thresholds);

    expect(result.signalDelta).toBe(0.5);
    expect(result.degrading).toBe(false);
    expect(result.predictsOutage).toBe(false);
  });

  test('should not predict an outage from a degrading signal alone', () => {
    const result = analyzeTrend(sample(9.0), sample(7.0, 0.2), thresholds);

    expect(result.degrading).toBe(true);
    expect(result.handoffDelayed).toBe(false);
    expect(result.predictsOutage).toBe(false);
  });

  test('should not predict an outage without a window estimate', () => {
    const result = analyzeTrend(sample(9.0), sample(7.0), thresholds);

    expect(result.handoffDelayed).toBe(false);
    expect(result.predictsOutage).toBe(false);
  });

  test('should ignore an improving signal', () => {
    const result = analyzeTrend(sample(7.0), sample(9.0, 60), thresholds);

    expect(result.signalDelta).toBe(-2);
    expect(result.degrading).toBe(false);
  });

  test('should report no delta when there is no previous sample', () => {
    const result = analyzeTrend(undefined, sample(8.0, 60), thresholds);

    expect(result).toEqual({ degrading: false, handoffDelayed: true, predictsOutage: false });
  });

  test('should treat a zero SNR reading as missing', () => {
    const result = analyzeTrend(sample(9.0), sample(0, 60), thresholds);

    expect(result.signalDelta).toBeUndefined();
    expect(result.predictsOutage).toBe(false);
  });

  test('signalDelta should snap to micro-units', () => {
    expect(signalDelta(8.0, 7.3)).toBe(0.7);
    expect(signalDelta(0.3, 0.1)).toBe(0.2);
  });
});
