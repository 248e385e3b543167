/**
 * Unit tests for configuration loading
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '../../core/errors';
import { configFromEnv, enginePaths, loadConfig } from '../config';

describe('Configuration', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wan-failover-config-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('configFromEnv', () => {
    test('should map variables and skip empty values', () => {
      const raw = configFromEnv({
        BACKUP_INTERFACE: 'mob1s1a1',
        STABILITY_CHECKS: '4',
        REACTIVE_BYPASSES_COOLDOWN: '1',
        SCORING_COMMAND: '',
        UNRELATED: 'ignored'
      });

      expect(raw).toEqual({
        backupInterface: 'mob1s1a1',
        requiredStabilityChecks: 4,
        reactiveBypassesCooldown: true
      });
    });
  });

  describe('loadConfig from environment', () => {
    test('should apply defaults', async () => {
      const config = await loadConfig(undefined, { BACKUP_INTERFACE: 'mob1s1a1' });

      expect(config).toEqual({
        primaryInterface: 'wan',
        backupInterface: 'mob1s1a1',
        latencySpikeThreshold: 100,
        packetLossSpikeThreshold: 0.02,
        obstructionThreshold: 0.001,
        snrDropThreshold: 0.5,
        satelliteHandoffThreshold: 0.5,
        failbackPacketLossThreshold: 0.01,
        requiredStabilityChecks: 3,
        failbackStabilityChecks: 120,
        failoverCooldownSeconds: 300,
        reactiveBypassesCooldown: false,
        checkIntervalSeconds: 30,
        apiTimeoutSeconds: 10,
        historyLength: 100,
        stateDir: '/usr/local/starlink/state',
        logDir: '/usr/local/starlink/logs',
        starlinkIp: '192.168.100.1',
        starlinkPort: 9200,
        grpcurlCommand: 'grpcurl'
      });
    });

    test('should require a backup interface', async () => {
      await expect(loadConfig(undefined, {})).rejects.toThrow(
        'Invalid configuration (environment): backupInterface: Required'
      );
    });

    test('should reject identical primary and backup interfaces', async () => {
      await expect(loadConfig(undefined, { PRIMARY_INTERFACE: 'wan', BACKUP_INTERFACE: 'wan' })).rejects.toThrow(
        'backupInterface: primaryInterface and backupInterface must differ'
      );
    });

    test('should reject a failback window shorter than the failover window', async () => {
      const env = { BACKUP_INTERFACE: 'mob1s1a1', STABILITY_CHECKS: '5', FAILBACK_STABILITY_CHECKS: '2' };

      await expect(loadConfig(undefined, env)).rejects.toThrow(
        'failbackStabilityChecks: failbackStabilityChecks must be at least requiredStabilityChecks'
      );
    });

    test('should reject non-numeric thresholds', async () => {
      const env = { BACKUP_INTERFACE: 'mob1s1a1', LATENCY_SPIKE_THRESHOLD: 'fast' };

      await expect(loadConfig(undefined, env)).rejects.toBeInstanceOf(ConfigurationError);
    });

    test('should reject unsafe interface names', async () => {
      await expect(loadConfig(undefined, { BACKUP_INTERFACE: 'mob1 && reboot' })).rejects.toThrow(
        'backupInterface: interface name may only contain letters, digits, and _ . : -'
      );
    });
  });

  describe('loadConfig from file', () => {
    test('should load a JSON file', async () => {
      const file = path.join(testDir, 'config.json');
      await fs.writeFile(
        file,
        JSON.stringify({ primaryInterface: 'starlink', backupInterface: 'mob1s1a1', failoverCooldownSeconds: 120 }),
        'utf-8'
      );

      const config = await loadConfig(file, {});

      expect(config.primaryInterface).toBe('starlink');
      expect(config.failoverCooldownSeconds).toBe(120);
      expect(config.failbackStabilityChecks).toBe(120);
    });

    test('should reject unknown keys', async () => {
      const file = path.join(testDir, 'config.json');
      await fs.writeFile(file, JSON.stringify({ backupInterface: 'mob1s1a1', cooldown: 5 }), 'utf-8');

      await expect(loadConfig(file, {})).rejects.toThrow(
        `Invalid configuration (${file}): config: Unrecognized key(s) in object: 'cooldown'`
      );
    });

    test('should report an unreadable file', async () => {
      const file = path.join(testDir, 'absent.json');

      await expect(loadConfig(file, {})).rejects.toThrow(`Cannot read configuration file ${file}`);
    });
  });

  test('enginePaths should place files under the state and log directories', () => {
    expect(enginePaths({ stateDir: '/var/state', logDir: '/var/log/wan' })).toEqual({
      stateFile: '/var/state/failover_state.dat',
      historyFile: '/var/state/metric_history.jsonl',
      lockFile: '/var/state/failover_state.lock',
      auditFile: '/var/log/wan/failover_history.csv'
    });
  });
});
