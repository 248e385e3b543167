/**
 * Link metrics sources: the Starlink dish gRPC API and JSON fixture files
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { MetricsSource } from '../core/collaborators';
import { MetricsUnavailableError, errorMessage } from '../core/errors';
import { LinkMetricsSchema } from '../core/schema';
import { Exec, LinkMetrics } from '../core/types';

const Fraction = z.number().min(0).max(1);

const DishStatusSchema = z.object({
  snr: z.number().optional(),
  popPingLatencyMs: z.number().nonnegative(),
  popPingDropRate: Fraction.optional(),
  obstructionStats: z
    .object({
      fractionObstructed: Fraction.optional()
    })
    .optional(),
  secondsToFirstNonemptySlot: z.number().nonnegative().optional()
});

const StatusResponseSchema = z.object({
  dishGetStatus: DishStatusSchema
});

export interface StarlinkOptions {
  host: string;
  port: number;
  grpcurlCommand: string;
  timeoutSeconds: number;
}

export function buildStatusCommand(options: StarlinkOptions): string {
  return (
    `${options.grpcurlCommand} -plaintext -max-time ${options.timeoutSeconds} ` +
    `-d '{"get_status":{}}' ${options.host}:${options.port} SpaceX.API.Device.Device/Handle`
  );
}

/**
 * Map a get_status response body to LinkMetrics
 */
export function parseDishStatus(output: string, timestamp: number): LinkMetrics {
  if (output.trim() === '') {
    throw new MetricsUnavailableError('Empty response from Starlink API');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch (error) {
    throw new MetricsUnavailableError(`Unparseable Starlink API response: ${errorMessage(error)}`);
  }

  const parsed = StatusResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MetricsUnavailableError(`Unexpected Starlink API response: ${issue.path.join('.')}: ${issue.message}`);
  }

  const status = parsed.data.dishGetStatus;
  const metrics: LinkMetrics = {
    signalQuality: status.snr ?? 0,
    latencyMs: Math.round(status.popPingLatencyMs),
    packetLoss: status.popPingDropRate ?? 0,
    obstructionFraction: status.obstructionStats?.fractionObstructed ?? 0,
    timestamp
  };
  if (status.secondsToFirstNonemptySlot !== undefined) {
    metrics.secondsToNextWindow = status.secondsToFirstNonemptySlot;
  }
  return metrics;
}

export class StarlinkMetricsSource implements MetricsSource {
  constructor(
    private readonly options: StarlinkOptions,
    private readonly exec: Exec,
    private readonly now: () => number = Date.now
  ) {}

  async fetch(): Promise<LinkMetrics> {
    let output: string;
    try {
      output = await this.exec(buildStatusCommand(this.options));
    } catch (error) {
      throw new MetricsUnavailableError(`Starlink API call failed: ${errorMessage(error)}`);
    }
    return parseDishStatus(output, this.now());
  }
}

const MetricsFileSchema = LinkMetricsSchema.omit({ timestamp: true }).extend({
  timestamp: z.number().int().nonnegative().optional()
});

/**
 * Reads metrics written by an external collector (or a test fixture)
 */
export class FileMetricsSource implements MetricsSource {
  constructor(
    readonly filePath: string,
    private readonly now: () => number = Date.now
  ) {}

  async fetch(): Promise<LinkMetrics> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(this.filePath, 'utf-8'));
    } catch (error) {
      throw new MetricsUnavailableError(`Cannot read metrics file ${this.filePath}: ${errorMessage(error)}`);
    }

    const parsed = MetricsFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MetricsUnavailableError(`Invalid metrics file ${this.filePath}: ${issue.path.join('.')}: ${issue.message}`);
    }

    const { timestamp, ...rest } = parsed.data;
    return { ...rest, timestamp: timestamp ?? this.now() };
  }
}
