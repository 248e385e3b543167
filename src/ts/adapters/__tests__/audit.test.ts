/**
 * Unit tests for the audit trail
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { AuditSink } from '../../core/collaborators';
import { MemoryLogger } from '../../core/logger';
import { DecisionEvent } from '../../core/types';
import {
  AUDIT_HEADER,
  AuditTrail,
  CommandNotifier,
  CsvAuditLog,
  LoggingAuditSink,
  csvField,
  formatAuditRow,
  parseCsv,
  shellQuote
} from '../audit';

describe('Audit Trail', () => {
  const failover: DecisionEvent = {
    timestamp: Date.UTC(2024, 0, 15, 10, 30, 0),
    eventType: 'FAILOVER',
    fromInterface: 'wan',
    toInterface: 'mob1s1a1',
    reason: 'Latency spike: 550ms > 500ms',
    outcome: 'SUCCESS'
  };

  describe('CSV formatting', () => {
    test('should format an event as one row', () => {
      expect(formatAuditRow(failover)).toBe(
        '2024-01-15T10:30:00.000Z,FAILOVER,wan,mob1s1a1,SUCCESS,Latency spike: 550ms > 500ms'
      );
    });

    test('should quote fields with delimiters and quotes', () => {
      expect(csvField('plain')).toBe('plain');
      expect(csvField('a,b')).toBe('"a,b"');
      expect(csvField('say "hi"')).toBe('"say ""hi"""');
    });

    test('should parse quoted fields back', () => {
      expect(parseCsv('a,"b,c","d ""e"""\n"multi\nline",x\n')).toEqual([
        ['a', 'b,c', 'd "e"'],
        ['multi\nline', 'x']
      ]);
    });
  });

  describe('CsvAuditLog', () => {
    let testDir: string;
    let log: CsvAuditLog;

    beforeEach(async () => {
      testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wan-failover-audit-'));
      log = new CsvAuditLog(path.join(testDir, 'logs', 'failover_history.csv'));
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    test('should write a header when creating the file', async () => {
      await log.record(failover);
      await log.record({ ...failover, eventType: 'FAILBACK', fromInterface: 'mob1s1a1', toInterface: 'wan' });

      const lines = (await fs.readFile(log.filePath, 'utf-8')).split('\n');
      expect(lines[0]).toBe(AUDIT_HEADER);
      expect(lines).toHaveLength(4);
      expect(lines[3]).toBe('');
    });

    test('should read back recent events including quoted reasons', async () => {
      const failed: DecisionEvent = {
        ...failover,
        timestamp: failover.timestamp + 30_000,
        eventType: 'FAILOVER_FAILED',
        reason: 'Failover failed (ifup mob1s1a1 failed: no carrier; wan restored): Latency spike, "550ms"',
        outcome: 'FAILED'
      };
      await log.record(failover);
      await log.record(failed);

      expect(await log.recent(1)).toEqual([failed]);
      expect(await log.recent(10)).toEqual([failover, failed]);
    });

    test('should return nothing when the log does not exist', async () => {
      expect(await log.recent(10)).toEqual([]);
    });
  });

  describe('CommandNotifier', () => {
    let commands: string[];
    let notifier: CommandNotifier;

    beforeEach(() => {
      commands = [];
      notifier = new CommandNotifier('/usr/local/starlink/bin/notify', async (command) => {
        commands.push(command);
        return '';
      });
    });

    test('should pass the event type and a quoted summary', async () => {
      await notifier.record(failover);

      expect(commands).toEqual([
        `/usr/local/starlink/bin/notify FAILOVER 'wan -> mob1s1a1: Latency spike: 550ms > 500ms'`
      ]);
    });

    test('should skip evaluation events', async () => {
      await notifier.record({ ...failover, eventType: 'EVALUATION' });

      expect(commands).toEqual([]);
    });

    test('shellQuote should escape single quotes', () => {
      expect(shellQuote(`it's down`)).toBe(`'it'\\''s down'`);
    });
  });

  describe('AuditTrail', () => {
    test('should log notifier failures without failing', async () => {
      const recorded: DecisionEvent[] = [];
      const log: AuditSink = {
        record: async (event) => {
          recorded.push(event);
        }
      };
      const broken: AuditSink = {
        record: async () => {
          throw new Error('gateway unreachable');
        }
      };
      const logger = new MemoryLogger();

      await new AuditTrail(log, [broken], logger).record(failover);

      expect(recorded).toEqual([failover]);
      expect(logger.lines).toEqual(['WARN: Notification for FAILOVER failed: gateway unreachable']);
    });
  });

  describe('LoggingAuditSink', () => {
    test('should log the formatted row', async () => {
      const logger = new MemoryLogger();

      await new LoggingAuditSink(logger).record(failover);

      expect(logger.lines).toEqual([`LOG: EVENT: ${formatAuditRow(failover)}`]);
    });
  });
});
