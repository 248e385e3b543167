/**
 * Decision audit trail: append-only CSV plus optional notifier hook
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { AuditSink } from '../core/collaborators';
import { errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import { isNotFound } from '../core/state-store';
import { DecisionEvent, Exec } from '../core/types';

export const AUDIT_HEADER = 'timestamp,eventType,fromInterface,toInterface,result,reason';

const EventTypeSchema = z.enum(['EVALUATION', 'FAILOVER', 'FAILBACK', 'FAILOVER_FAILED']);
const OutcomeSchema = z.enum(['SUCCESS', 'FAILED']);

/**
 * Quote a CSV field when it contains a delimiter, quote, or line break
 */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatAuditRow(event: DecisionEvent): string {
  return [
    new Date(event.timestamp).toISOString(),
    event.eventType,
    event.fromInterface,
    event.toInterface,
    event.outcome,
    csvField(event.reason)
  ].join(',');
}

/**
 * Split CSV content into records, honouring quoted fields
 */
export function parseCsv(content: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (quoted) {
      if (ch === '"' && content[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\n') {
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else if (ch !== '\r') {
      field += ch;
    }
  }

  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }
  return records;
}

function toEvent(record: string[]): DecisionEvent | undefined {
  if (record.length !== 6) {
    return undefined;
  }
  const [stamp, eventType, fromInterface, toInterface, result, reason] = record;
  const timestamp = Date.parse(stamp);
  const type = EventTypeSchema.safeParse(eventType);
  const outcome = OutcomeSchema.safeParse(result);
  if (Number.isNaN(timestamp) || !type.success || !outcome.success) {
    return undefined;
  }
  return { timestamp, eventType: type.data, fromInterface, toInterface, outcome: outcome.data, reason };
}

export class CsvAuditLog implements AuditSink {
  constructor(readonly filePath: string) {}

  async record(event: DecisionEvent): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    let prefix = '';
    try {
      await fs.stat(this.filePath);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
      prefix = AUDIT_HEADER + '\n';
    }
    await fs.appendFile(this.filePath, `${prefix}${formatAuditRow(event)}\n`, 'utf-8');
  }

  /**
   * Most recent `count` events, oldest first; unreadable rows are skipped
   */
  async recent(count: number): Promise<DecisionEvent[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const events: DecisionEvent[] = [];
    for (const record of parseCsv(content)) {
      const event = toEvent(record);
      if (event) {
        events.push(event);
      }
    }
    return count > 0 ? events.slice(-count) : [];
  }
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Hands switch events to an external notification script
 */
export class CommandNotifier implements AuditSink {
  constructor(
    private readonly command: string,
    private readonly exec: Exec
  ) {}

  async record(event: DecisionEvent): Promise<void> {
    if (event.eventType === 'EVALUATION') {
      return;
    }
    const message = `${event.fromInterface} -> ${event.toInterface}: ${event.reason}`;
    await this.exec(`${this.command} ${event.eventType} ${shellQuote(message)}`);
  }
}

/**
 * Writes to the audit log first; notifier failures are logged, never raised
 */
export class AuditTrail implements AuditSink {
  constructor(
    private readonly log: AuditSink,
    private readonly notifiers: AuditSink[],
    private readonly logger: Logger
  ) {}

  async record(event: DecisionEvent): Promise<void> {
    await this.log.record(event);
    for (const notifier of this.notifiers) {
      try {
        await notifier.record(event);
      } catch (error) {
        this.logger.warn(`Notification for ${event.eventType} failed: ${errorMessage(error)}`);
      }
    }
  }
}

/**
 * Dry-run sink: events are logged, never written
 */
export class LoggingAuditSink implements AuditSink {
  constructor(private readonly logger: Logger) {}

  async record(event: DecisionEvent): Promise<void> {
    this.logger.info(`EVENT: ${formatAuditRow(event)}`);
  }
}
