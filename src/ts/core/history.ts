/**
 * Bounded ring of recent link metrics, persisted one JSON object per line
 */

import * as fs from 'fs/promises';
import { Logger } from './logger';
import { LinkMetricsSchema } from './schema';
import { isNotFound, writeFileAtomic } from './state-store';
import { LinkMetrics } from './types';

export interface HistoryStore {
  load(): Promise<LinkMetrics[]>;
  /** Append and trim to the retained length */
  append(metrics: LinkMetrics): Promise<void>;
}

/**
 * Keep the newest `limit` entries
 */
export function trimHistory(entries: LinkMetrics[], limit: number): LinkMetrics[] {
  return entries.length > limit ? entries.slice(entries.length - limit) : entries;
}

export function latest(entries: LinkMetrics[]): LinkMetrics | undefined {
  return entries.length > 0 ? entries[entries.length - 1] : undefined;
}

export class FileHistoryStore implements HistoryStore {
  constructor(
    readonly filePath: string,
    private readonly limit: number,
    private readonly logger: Logger
  ) {}

  async load(): Promise<LinkMetrics[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const entries: LinkMetrics[] = [];
    let dropped = 0;
    for (const line of content.split('\n')) {
      if (line.trim() === '') {
        continue;
      }
      const parsed = parseLine(line);
      if (parsed) {
        entries.push(parsed);
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} malformed line(s) from ${this.filePath}`);
    }
    return trimHistory(entries, this.limit);
  }

  async append(metrics: LinkMetrics): Promise<void> {
    const entries = trimHistory([...(await this.load()), metrics], this.limit);
    const content = entries.map((entry) => JSON.stringify(entry)).join('\n') + '\n';
    await writeFileAtomic(this.filePath, content);
  }

  async remove(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}

function parseLine(line: string): LinkMetrics | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = LinkMetricsSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export class MemoryHistoryStore implements HistoryStore {
  private entries: LinkMetrics[];

  constructor(
    private readonly limit: number,
    initial: LinkMetrics[] = []
  ) {
    this.entries = trimHistory([...initial], limit);
  }

  async load(): Promise<LinkMetrics[]> {
    return [...this.entries];
  }

  async append(metrics: LinkMetrics): Promise<void> {
    this.entries = trimHistory([...this.entries, metrics], this.limit);
  }
}
