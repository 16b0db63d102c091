import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { DEFAULT_CONFIG, createConfig, loadConfig, saveConfig, validateConfig } from '../../src/config/GuardConfig';

const TEST_DIR = join(__dirname, '..', 'tmp-config-test');
const CONFIG_PATH = join(TEST_DIR, 'playguard.json');

function cleanup(): void {
  if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
}

function writeRaw(content: string): void {
  mkdirSync(TEST_DIR, { recursive: true });
  writeFileSync(CONFIG_PATH, content, 'utf8');
}

describe('GuardConfig', () => {
  beforeEach(() => cleanup());
  afterEach(() => cleanup());

  test('defaults are valid', () => {
    expect(validateConfig(createConfig())).toEqual([]);
  });

  test('createConfig deep-merges overrides without touching the defaults', () => {
    const config = createConfig({ throttle: { escalationThreshold: 5 }, tiers: { CRITICAL: { maxRequests: 3 } } });
    expect(config.throttle.escalationThreshold).toBe(5);
    expect(config.throttle.escalationFactor).toBe(1.5);
    expect(config.tiers.CRITICAL).toEqual({ maxRequests: 3, windowSeconds: 60, burstLimit: 2, cooldownSeconds: 2 });
    expect(DEFAULT_CONFIG.throttle.escalationThreshold).toBe(3);
    expect(DEFAULT_CONFIG.tiers.CRITICAL.maxRequests).toBe(5);
  });

  test('arrays replace rather than merge', () => {
    const config = createConfig({ privilegedSubjects: ['mod-1'] });
    expect(config.privilegedSubjects).toEqual(['mod-1']);
    expect(DEFAULT_CONFIG.privilegedSubjects).toEqual([]);
  });

  test('writes defaults when the file is missing', () => {
    const config = loadConfig(CONFIG_PATH);
    expect(existsSync(CONFIG_PATH)).toBe(true);
    expect(config.tiers.STANDARD.cooldownSeconds).toBe(0.5);
    expect(JSON.parse(readFileSync(CONFIG_PATH, 'utf8'))).toEqual(createConfig());
  });

  test('loads a partial file over the defaults', () => {
    writeRaw(JSON.stringify({ endpoints: { DanceEmote: 'HIGH_FREQUENCY' }, cadence: { microSeconds: 2 } }));
    const config = loadConfig(CONFIG_PATH);
    expect(config.endpoints.DanceEmote).toBe('HIGH_FREQUENCY');
    expect(config.endpoints.PurchaseItem).toBe('CRITICAL');
    expect(config.cadence).toEqual({ microSeconds: 2, macroSeconds: 30, evictionSeconds: 120, idleEvictionSeconds: 900 });
  });

  test('saveConfig round-trips', () => {
    const config = createConfig({ violationRetentionSeconds: 120 });
    saveConfig(CONFIG_PATH, config);
    expect(loadConfig(CONFIG_PATH).violationRetentionSeconds).toBe(120);
  });

  test('rejects malformed JSON', () => {
    writeRaw('{ not json');
    expect(() => loadConfig(CONFIG_PATH)).toThrow(`Failed to parse config ${CONFIG_PATH}`);
  });

  test('rejects a non-object document', () => {
    writeRaw('[1, 2]');
    expect(() => loadConfig(CONFIG_PATH)).toThrow(`Config ${CONFIG_PATH} must contain a JSON object`);
  });

  test('rejects invalid values with every problem listed', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    writeRaw(JSON.stringify({
      tiers: { CRITICAL: { maxRequests: 0 } },
      endpoints: { PurchaseItem: 'PRIVILEGED' },
      throttle: { escalationFactor: 1 }
    }));
    expect(() => loadConfig(CONFIG_PATH)).toThrow(
      `Invalid config ${CONFIG_PATH}: tiers.CRITICAL.maxRequests must be a positive integer; ` +
      'endpoints.PurchaseItem has unknown tier "PRIVILEGED"; throttle.escalationFactor must be > 1'
    );
    jest.restoreAllMocks();
  });

  test('a null section is listed as a problem', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    writeRaw(JSON.stringify({ throttle: null }));
    expect(() => loadConfig(CONFIG_PATH)).toThrow(`Invalid config ${CONFIG_PATH}: throttle must be an object`);
    jest.restoreAllMocks();
  });

  test('validateConfig reports null nested weight tables', () => {
    const config = createConfig({ analysis: { featureWeights: null, categoryThresholds: null } });
    expect(validateConfig(config)).toEqual([
      'analysis.featureWeights must be an object',
      'analysis.categoryThresholds must be an object'
    ]);
  });

  test('validateConfig checks the recovery settings', () => {
    const config = createConfig({ throttle: { quietPeriodSeconds: -1, trustRecoveryRate: 2 } });
    expect(validateConfig(config)).toEqual([
      'throttle.quietPeriodSeconds must be >= 0',
      'throttle.trustRecoveryRate must be in [0,1]'
    ]);
  });

  test('validateConfig checks threshold ordering and cadences', () => {
    const config = createConfig({
      analysis: { categoryThresholds: { botLike: 0.1 } },
      cadence: { macroSeconds: 0 }
    });
    expect(validateConfig(config)).toEqual([
      'analysis.categoryThresholds must be strictly increasing',
      'cadence.macroSeconds must be > 0'
    ]);
  });
});
