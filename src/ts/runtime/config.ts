/**
 * Engine configuration from a JSON file or environment variables
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../core/errors';
import { InterfaceNameSchema } from '../core/schema';

const Fraction = z.number().min(0).max(1);

export const EngineConfigSchema = z
  .object({
    primaryInterface: InterfaceNameSchema.default('wan'),
    backupInterface: InterfaceNameSchema,
    latencySpikeThreshold: z.number().positive().default(100),
    packetLossSpikeThreshold: Fraction.default(0.02),
    obstructionThreshold: Fraction.default(0.001),
    snrDropThreshold: z.number().positive().default(0.5),
    satelliteHandoffThreshold: z.number().nonnegative().default(0.5),
    failbackPacketLossThreshold: Fraction.default(0.01),
    requiredStabilityChecks: z.number().int().min(1).default(3),
    failbackStabilityChecks: z.number().int().min(1).default(120),
    failoverCooldownSeconds: z.number().nonnegative().default(300),
    reactiveBypassesCooldown: z.boolean().default(false),
    checkIntervalSeconds: z.number().positive().default(30),
    apiTimeoutSeconds: z.number().positive().default(10),
    historyLength: z.number().int().min(2).default(100),
    stateDir: z.string().min(1).default('/usr/local/starlink/state'),
    logDir: z.string().min(1).default('/usr/local/starlink/logs'),
    starlinkIp: z.string().min(1).default('192.168.100.1'),
    starlinkPort: z.number().int().min(1).max(65535).default(9200),
    grpcurlCommand: z.string().min(1).default('grpcurl'),
    scoringCommand: z.string().min(1).optional(),
    notifierCommand: z.string().min(1).optional(),
    metricsFile: z.string().min(1).optional()
  })
  .strict()
  .refine((config) => config.primaryInterface !== config.backupInterface, {
    message: 'primaryInterface and backupInterface must differ',
    path: ['backupInterface']
  })
  .refine((config) => config.failbackStabilityChecks >= config.requiredStabilityChecks, {
    message: 'failbackStabilityChecks must be at least requiredStabilityChecks',
    path: ['failbackStabilityChecks']
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

const STRING_VARS = {
  PRIMARY_INTERFACE: 'primaryInterface',
  BACKUP_INTERFACE: 'backupInterface',
  STATE_DIR: 'stateDir',
  LOG_DIR: 'logDir',
  STARLINK_IP: 'starlinkIp',
  GRPCURL_CMD: 'grpcurlCommand',
  SCORING_COMMAND: 'scoringCommand',
  NOTIFIER_SCRIPT: 'notifierCommand',
  METRICS_FILE: 'metricsFile'
} as const;

const NUMBER_VARS = {
  LATENCY_SPIKE_THRESHOLD: 'latencySpikeThreshold',
  PACKET_LOSS_SPIKE_THRESHOLD: 'packetLossSpikeThreshold',
  OBSTRUCTION_THRESHOLD: 'obstructionThreshold',
  SNR_DROP_THRESHOLD: 'snrDropThreshold',
  SATELLITE_HANDOFF_THRESHOLD: 'satelliteHandoffThreshold',
  FAILBACK_PACKET_LOSS_THRESHOLD: 'failbackPacketLossThreshold',
  STABILITY_CHECKS: 'requiredStabilityChecks',
  FAILBACK_STABILITY_CHECKS: 'failbackStabilityChecks',
  FAILOVER_COOLDOWN_SECONDS: 'failoverCooldownSeconds',
  CHECK_INTERVAL: 'checkIntervalSeconds',
  API_TIMEOUT: 'apiTimeoutSeconds',
  HISTORY_LENGTH: 'historyLength',
  STARLINK_PORT: 'starlinkPort'
} as const;

const BOOLEAN_VARS = {
  REACTIVE_BYPASSES_COOLDOWN: 'reactiveBypassesCooldown'
} as const;

/**
 * Raw config object from environment variables; unset and empty values are omitted
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const raw: Record<string, unknown> = {};

  for (const [name, key] of Object.entries(STRING_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  for (const [name, key] of Object.entries(NUMBER_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      // NaN is rejected by the schema with the variable's field name
      raw[key] = Number(value);
    }
  }
  for (const [name, key] of Object.entries(BOOLEAN_VARS)) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      raw[key] = value === '1' || value.toLowerCase() === 'true';
    }
  }

  return raw;
}

export function parseConfig(raw: unknown, source: string): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration (${source}): ${details}`);
  }
  return parsed.data;
}

/**
 * Load config from a JSON file, or from environment variables when no file is given
 */
export async function loadConfig(
  configFile?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<EngineConfig> {
  if (configFile) {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(configFile, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read configuration file ${configFile}: ${errorMessage(error)}`);
    }
    return parseConfig(raw, configFile);
  }

  return parseConfig(configFromEnv(env), 'environment');
}

export interface EnginePaths {
  stateFile: string;
  historyFile: string;
  lockFile: string;
  auditFile: string;
}

export function enginePaths(config: Pick<EngineConfig, 'stateDir' | 'logDir'>): EnginePaths {
  return {
    stateFile: path.join(config.stateDir, 'failover_state.dat'),
    historyFile: path.join(config.stateDir, 'metric_history.jsonl'),
    lockFile: path.join(config.stateDir, 'failover_state.lock'),
    auditFile: path.join(config.logDir, 'failover_history.csv')
  };
}
