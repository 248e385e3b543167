/**
 * Failover state persistence as newline-delimited key=value records
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { StateCorruptionError, errorMessage, hasErrorCode } from './errors';
import { Logger } from './logger';
import { InterfaceNameSchema } from './schema';
import { FailoverState } from './types';

export interface StateStore {
  /** Returns defaults when the state is absent or malformed */
  load(): Promise<FailoverState>;
  save(state: FailoverState): Promise<void>;
}

const Counter = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform(Number);

const StateRecordSchema = z
  .object({
    current_primary: InterfaceNameSchema,
    failover_pending: z.enum(['true', 'false']).transform((value) => value === 'true'),
    stability_counter: Counter,
    failback_counter: Counter,
    last_action_epoch: Counter,
    last_scorer_recommendation: InterfaceNameSchema.optional()
  })
  .strict()
  .refine(
    (record) => (record.failover_pending ? record.stability_counter >= 1 : record.stability_counter === 0),
    { message: 'stability_counter must be 0 unless a failover is pending' }
  );

export function serializeState(state: FailoverState): string {
  const lines = [
    `current_primary=${state.currentPrimary}`,
    `failover_pending=${state.failoverPending}`,
    `stability_counter=${state.stabilityCounter}`,
    `failback_counter=${state.failbackCounter}`,
    `last_action_epoch=${state.lastActionEpoch}`
  ];
  if (state.lastScorerRecommendation !== undefined) {
    lines.push(`last_scorer_recommendation=${state.lastScorerRecommendation}`);
  }
  return lines.join('\n') + '\n';
}

/**
 * Parse a state file; throws StateCorruptionError on any malformed content
 */
export function parseState(content: string): FailoverState {
  const record = new Map<string, string>();

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) {
      continue;
    }
    const eq = trimmed.indexOf('=');
    if (eq <= 0) {
      throw new StateCorruptionError(`Malformed state line: ${trimmed}`);
    }
    const key = trimmed.slice(0, eq);
    if (record.has(key)) {
      throw new StateCorruptionError(`Duplicate state key: ${key}`);
    }
    record.set(key, trimmed.slice(eq + 1));
  }

  const parsed = StateRecordSchema.safeParse(Object.fromEntries(record));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StateCorruptionError(`Invalid state: ${issue.path.join('.') || 'record'}: ${issue.message}`);
  }

  const state: FailoverState = {
    currentPrimary: parsed.data.current_primary,
    failoverPending: parsed.data.failover_pending,
    stabilityCounter: parsed.data.stability_counter,
    failbackCounter: parsed.data.failback_counter,
    lastActionEpoch: parsed.data.last_action_epoch
  };
  if (parsed.data.last_scorer_recommendation !== undefined) {
    state.lastScorerRecommendation = parsed.data.last_scorer_recommendation;
  }
  return state;
}

export function isNotFound(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT');
}

/**
 * Write to a sibling temp file, then rename over the target
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

export class FileStateStore implements StateStore {
  constructor(
    readonly filePath: string,
    private readonly defaults: () => FailoverState,
    private readonly logger: Logger
  ) {}

  async load(): Promise<FailoverState> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug(`No state file at ${this.filePath} - using defaults`);
        return this.defaults();
      }
      throw error;
    }

    try {
      return parseState(content);
    } catch (error) {
      if (error instanceof StateCorruptionError) {
        this.logger.warn(`State file ${this.filePath} is corrupt (${errorMessage(error)}) - using defaults`);
        return this.defaults();
      }
      throw error;
    }
  }

  async save(state: FailoverState): Promise<void> {
    await writeFileAtomic(this.filePath, serializeState(state));
  }

  /** Operator reset */
  async remove(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}

/**
 * In-memory store, used for dry-run loops
 */
export class MemoryStateStore implements StateStore {
  private state: FailoverState;

  constructor(initial: FailoverState) {
    this.state = { ...initial };
  }

  async load(): Promise<FailoverState> {
    return { ...this.state };
  }

  async save(state: FailoverState): Promise<void> {
    this.state = { ...state };
  }
}
