#!/usr/bin/env node
/**
 * CLI entry point for wan-failover
 * Runs the monitor loop, a single decision cycle, or an operator command
 * Outputs deterministic action lines (ACTION:/REASON:/RESULT:)
 */

import { formatAuditRow } from '../adapters/audit';
import { cooldownRemaining, phaseOf } from '../core/engine';
import { ConfigurationError, errorMessage } from '../core/errors';
import { createConsoleLogger } from '../core/logger';
import { isInterfaceName } from '../core/schema';
import { Action, DecisionEvent, FailoverState, Thresholds } from '../core/types';
import { EngineConfig, loadConfig } from '../runtime/config';
import { CycleReport, manualFailover, runCycle, setPrimary } from '../runtime/cycle';
import { Monitor } from '../runtime/monitor';
import { createRuntime } from '../runtime/wiring';

export type Command = 'monitor' | 'check' | 'status' | 'failover' | 'set-primary' | 'reset' | 'help';

const COMMANDS: readonly Command[] = ['monitor', 'check', 'status', 'failover', 'set-primary', 'reset', 'help'];

const RECENT_EVENTS = 10;

export interface CliArgs {
  command: Command;
  iface?: string;
  dryRun: boolean;
  debug: boolean;
  configFile?: string;
  stateDir?: string;
  metricsFile?: string;
  help: boolean;
}

function optionValue(argv: string[], index: number, name: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('-')) {
    throw new ConfigurationError(`Option ${name} requires a value`);
  }
  return value;
}

/**
 * Parse arguments (without the node and script entries)
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliArgs {
  const args: CliArgs = {
    command: 'monitor',
    dryRun: env.DRY_RUN === '1',
    debug: env.DEBUG === '1' || env.VERBOSE === '1',
    configFile: env.CONFIG_FILE || undefined,
    help: false
  };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--dry-run' || arg === '-d') {
      args.dryRun = true;
    } else if (arg === '--debug' || arg === '-v') {
      args.debug = true;
    } else if (arg === '--config-file' || arg === '-c') {
      args.configFile = optionValue(argv, ++i, arg);
    } else if (arg === '--state-dir' || arg === '-s') {
      args.stateDir = optionValue(argv, ++i, arg);
    } else if (arg === '--metrics-file' || arg === '-f') {
      args.metricsFile = optionValue(argv, ++i, arg);
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg.startsWith('-')) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [commandName, iface, ...extra] = positional;
  if (commandName !== undefined) {
    const command = COMMANDS.find((candidate) => candidate === commandName);
    if (!command) {
      throw new ConfigurationError(`Unknown command: ${commandName}`);
    }
    args.command = command;
  }
  if (extra.length > 0) {
    throw new ConfigurationError(`Unexpected arguments: ${extra.join(' ')}`);
  }
  if (iface !== undefined) {
    args.iface = iface;
  }
  if (args.command === 'help') {
    args.help = true;
  }

  return args;
}

function showHelp(): void {
  console.log(`
wan-failover CLI

Usage: wan-failover [command] [interface] [options]

Commands:
  monitor                Run decision cycles every CHECK_INTERVAL seconds (default)
  check                  Run a single decision cycle
  status                 Show current state and recent events
  failover <interface>   Switch to <interface> now, ignoring cooldown
  set-primary <interface>
                         Record <interface> as primary without touching routes
  reset                  Delete the state and metric history files
  help                   Show this help

Options:
  --dry-run, -d            Evaluate and log only (no route changes, nothing persisted)
  --debug, -v              Enable debug output
  --config-file, -c PATH   Load config from JSON file
  --state-dir, -s PATH     Directory for state, history and lock files
  --metrics-file, -f PATH  Read link metrics from a JSON file instead of the dish API
  --help, -h               Show this help

Environment Variables (used if no config file is given):
  DRY_RUN                       Set to '1' for dry-run mode
  DEBUG, VERBOSE                Set to '1' for debug output
  CONFIG_FILE                   Config file path

  PRIMARY_INTERFACE             Satellite interface (default: wan)
  BACKUP_INTERFACE              Cellular interface (required)
  LATENCY_SPIKE_THRESHOLD       Milliseconds (default: 100)
  PACKET_LOSS_SPIKE_THRESHOLD   Fraction (default: 0.02)
  OBSTRUCTION_THRESHOLD         Fraction (default: 0.001)
  SNR_DROP_THRESHOLD            SNR units (default: 0.5)
  SATELLITE_HANDOFF_THRESHOLD   Seconds (default: 0.5)
  FAILBACK_PACKET_LOSS_THRESHOLD
                                Fraction (default: 0.01)
  STABILITY_CHECKS              Score confirmations before failover (default: 3)
  FAILBACK_STABILITY_CHECKS     Healthy checks before failback (default: 120)
  FAILOVER_COOLDOWN_SECONDS     Minimum seconds between switches (default: 300)
  REACTIVE_BYPASSES_COOLDOWN    '1' to let spikes fire during cooldown
  CHECK_INTERVAL                Monitor interval in seconds (default: 30)
  API_TIMEOUT                   External call timeout in seconds (default: 10)
  HISTORY_LENGTH                Metric samples kept (default: 100)
  STATE_DIR, LOG_DIR            Storage directories
  STARLINK_IP, STARLINK_PORT    Dish API endpoint (default: 192.168.100.1:9200)
  GRPCURL_CMD                   grpcurl binary (default: grpcurl)
  SCORING_COMMAND               Connection scoring command (optional)
  NOTIFIER_SCRIPT               Notification command (optional)
  METRICS_FILE                  Metrics JSON file (optional)

Output Format:
  ACTION: <FAILOVER|FAILBACK> from=<interface> to=<interface>
  ACTION: NO_OP
  REASON: <reason_code>
  RESULT: <SUCCESS|FAILED>
  LOG: <message>

Examples:
  # Single cycle against the dish
  BACKUP_INTERFACE=mob1s1a1 wan-failover check

  # Replay a metrics fixture without touching routes
  BACKUP_INTERFACE=mob1s1a1 wan-failover check --dry-run --metrics-file metrics.json

  # Force a switch to cellular
  BACKUP_INTERFACE=mob1s1a1 wan-failover failover mob1s1a1
`);
}

export function formatAction(action: Action, dryRun: boolean): string {
  const prefix = dryRun ? '[DRY_RUN] ' : '';

  switch (action.type) {
    case 'FAILOVER':
      return `${prefix}ACTION: FAILOVER from=${action.from} to=${action.to}`;
    case 'FAILBACK':
      return `${prefix}ACTION: FAILBACK from=${action.from} to=${action.to}`;
    case 'NO_OP':
      return `${prefix}ACTION: NO_OP`;
  }
}

export function formatReport(report: CycleReport, dryRun: boolean): string[] {
  const lines = [formatAction(report.decision.action, dryRun)];
  for (const reason of report.decision.reasonCodes) {
    lines.push(`REASON: ${reason}`);
  }
  if (report.switchResult) {
    lines.push(`RESULT: ${report.switchResult.ok ? 'SUCCESS' : 'FAILED'}`);
  }
  return lines;
}

export function formatStatus(
  state: FailoverState,
  config: Thresholds,
  events: DecisionEvent[],
  now: number
): string[] {
  const lastAction =
    state.lastActionEpoch > 0
      ? `${new Date(state.lastActionEpoch).toISOString()} (${Math.max(0, Math.floor((now - state.lastActionEpoch) / 1000))}s ago)`
      : 'Never';

  const lines = [
    `Current Primary Interface: ${state.currentPrimary}`,
    `Phase: ${phaseOf(state, config)}`,
    `Failover Pending: ${state.failoverPending ? 'yes' : 'no'}`,
    `Stability Checks: ${state.stabilityCounter}/${config.requiredStabilityChecks}`,
    `Failback Checks: ${state.failbackCounter}/${config.failbackStabilityChecks}`,
    `Last Scorer Recommendation: ${state.lastScorerRecommendation ?? 'none'}`,
    `Last Action: ${lastAction}`,
    `Cooldown Remaining: ${cooldownRemaining(state, now, config)}s`,
    'Recent Events:'
  ];

  if (events.length === 0) {
    lines.push('  (none)');
  }
  for (const event of events) {
    lines.push(`  ${formatAuditRow(event)}`);
  }
  return lines;
}

function withOverrides(config: EngineConfig, args: CliArgs): EngineConfig {
  return {
    ...config,
    ...(args.stateDir ? { stateDir: args.stateDir } : {}),
    ...(args.metricsFile ? { metricsFile: args.metricsFile } : {})
  };
}

function requireInterface(args: CliArgs): string {
  if (!args.iface) {
    throw new ConfigurationError(`${args.command} requires an interface name`);
  }
  if (!isInterfaceName(args.iface)) {
    throw new ConfigurationError(`Invalid interface name: ${args.iface}`);
  }
  return args.iface;
}

/**
 * Run a command and resolve with the process exit status
 */
async function main(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const args = parseArgs(argv, env);

    if (args.help) {
      showHelp();
      return 0;
    }

    const logger = createConsoleLogger({ debug: args.debug, dryRun: args.dryRun });
    const config = withOverrides(await loadConfig(args.configFile, env), args);
    const runtime = await createRuntime(config, { dryRun: args.dryRun, logger });
    const { deps } = runtime;

    switch (args.command) {
      case 'status': {
        const state = await runtime.stateFile.load();
        const events = await runtime.auditLog.recent(RECENT_EVENTS);
        for (const line of formatStatus(state, config, events, deps.getCurrentTime())) {
          console.log(line);
        }
        return 0;
      }

      case 'reset': {
        if (args.dryRun) {
          logger.info(`Would remove ${runtime.stateFile.filePath} and ${runtime.historyFile.filePath}`);
          return 0;
        }
        await deps.lock.runExclusive('reset', async () => {
          await runtime.stateFile.remove();
          await runtime.historyFile.remove();
        });
        logger.info('Failover state and metric history reset');
        return 0;
      }

      case 'check': {
        const report = await runCycle(deps);
        for (const line of formatReport(report, args.dryRun)) {
          console.log(line);
        }
        return report.switchResult && !report.switchResult.ok ? 1 : 0;
      }

      case 'failover': {
        const result = await manualFailover(deps, requireInterface(args));
        return result.ok ? 0 : 1;
      }

      case 'set-primary': {
        await setPrimary(deps, requireInterface(args));
        return 0;
      }

      case 'monitor': {
        logger.info(
          `Starting failover monitor: primary=${config.primaryInterface} backup=${config.backupInterface} ` +
            `interval=${config.checkIntervalSeconds}s`
        );
        const monitor = new Monitor(() => runCycle(deps), config.checkIntervalSeconds * 1000);
        monitor.on('cycle', (report: CycleReport) => {
          if (report.decision.action.type !== 'NO_OP' || args.debug) {
            for (const line of formatReport(report, args.dryRun)) {
              console.log(line);
            }
          }
        });
        monitor.on('cycleError', (error: unknown) => {
          logger.error(`Cycle failed: ${errorMessage(error)}`);
        });

        const stop = (): void => {
          logger.info('Stopping failover monitor');
          monitor.stop().catch((error: unknown) => logger.error(`Stop failed: ${errorMessage(error)}`));
        };
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);

        monitor.start();
        await monitor.finished();
        process.removeListener('SIGINT', stop);
        process.removeListener('SIGTERM', stop);
        return 0;
      }

      case 'help':
        showHelp();
        return 0;
    }
  } catch (error) {
    console.error('Error:', errorMessage(error));
    return 1;
  }
}

// Only run if this is the main module
if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    }
  );
}

export { main };
