/**
 * Unit tests for the monitoring loop
 */

import { createInitialState } from '../../core/engine';
import { CycleReport } from '../cycle';
import { Monitor } from '../monitor';

describe('Monitor', () => {
  const state = createInitialState({ primaryInterface: 'wan' });
  const report: CycleReport = {
    decision: { action: { type: 'NO_OP', reason: 'idle' }, reasonCodes: ['SCORE_AGREES'], newState: state },
    state,
    events: []
  };

  test('should run cycles until stopped', async () => {
    let runs = 0;
    const monitor = new Monitor(async () => {
      runs++;
      return report;
    }, 5);
    const lifecycle: string[] = [];
    monitor.on('started', () => lifecycle.push('started'));
    monitor.on('stopped', () => lifecycle.push('stopped'));

    let stopping: Promise<void> | undefined;
    monitor.on('cycle', () => {
      if (runs === 3) {
        stopping = monitor.stop();
      }
    });

    monitor.start();
    await monitor.finished();
    await stopping;

    expect(runs).toBe(3);
    expect(monitor.isRunning).toBe(false);
    expect(lifecycle).toEqual(['started', 'stopped']);
  });

  test('should keep running after a failed cycle', async () => {
    let runs = 0;
    const monitor = new Monitor(async () => {
      runs++;
      if (runs === 1) {
        throw new Error('lock timeout');
      }
      return report;
    }, 5);
    const errors: unknown[] = [];
    monitor.on('cycleError', (error: unknown) => errors.push(error));

    let stopping: Promise<void> | undefined;
    monitor.on('cycle', () => {
      stopping = monitor.stop();
    });

    monitor.start();
    await monitor.finished();
    await stopping;

    expect(runs).toBe(2);
    expect(errors).toEqual([new Error('lock timeout')]);
  });

  test('should cancel the pending wait on stop', async () => {
    const monitor = new Monitor(async () => report, 60_000);
    const firstCycle = new Promise<void>((resolve) => monitor.once('cycle', () => resolve()));

    monitor.start();
    await firstCycle;
    const startedAt = Date.now();
    await monitor.stop();

    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(monitor.isRunning).toBe(false);
  });

  test('should ignore a second start', async () => {
    let runs = 0;
    const monitor = new Monitor(async () => {
      runs++;
      return report;
    }, 60_000);
    const firstCycle = new Promise<void>((resolve) => monitor.once('cycle', () => resolve()));

    monitor.start();
    monitor.start();
    await firstCycle;
    await monitor.stop();

    expect(runs).toBe(1);
  });
});
