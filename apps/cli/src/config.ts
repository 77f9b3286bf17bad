/**
 * Configuration loading for the bandshare CLI.
 *
 * The user config lives at ~/.bandshare/config.json (or wherever --config
 * points). It is deep-merged over the defaults below, `${VAR}` references are
 * replaced with environment values, and the result is validated field by
 * field into a BandshareConfig.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { ConfigError } from '@bandshare/core';
import type {
  BandshareConfig,
  LogLevel,
  RelayProcessConfig,
  SharerSeed,
} from '@bandshare/core';

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getBandshareDir(): string {
  return resolve(homedir(), '.bandshare');
}

export function getConfigPath(): string {
  return join(getBandshareDir(), 'config.json');
}

export function getLogsDir(): string {
  return join(getBandshareDir(), 'logs');
}

export function ensureConfigDir(): void {
  mkdirSync(getBandshareDir(), { recursive: true });
  mkdirSync(getLogsDir(), { recursive: true });
}

export function configExists(configPath: string = getConfigPath()): boolean {
  return existsSync(configPath);
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConfigLoadError extends ConfigError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, field === undefined ? undefined : { field });
    this.name = 'ConfigLoadError';
  }
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultConfig(): BandshareConfig {
  return {
    relay: {
      mode: 'http',
      controlUrl: 'http://127.0.0.1:7500',
      publicHost: '127.0.0.1',
      authToken: '${BANDSHARE_RELAY_TOKEN}',
      portRange: { start: 40000, end: 40999 },
      requestTimeoutMs: 2000,
      retry: { attempts: 3, baseDelayMs: 200, maxDelayMs: 2000 },
      process: null,
    },
    orchestrator: {
      tickIntervalMs: 5000,
      matchTimeoutMs: 60000,
      missedHeartbeatThreshold: 3,
      terminalRetentionMs: 60000,
    },
    health: {
      intervalMs: 15000,
      maxRestartAttempts: 3,
      restartBackoffBaseMs: 1000,
      restartBackoffMaxMs: 10000,
    },
    gateway: {
      port: 7480,
      host: '127.0.0.1',
    },
    persistence: {
      enabled: true,
      dbPath: join(getBandshareDir(), 'bandshare.db'),
    },
    observability: {
      observers: ['console'],
      logLevel: 'info',
      logPath: join(getLogsDir(), 'bandshare.jsonl'),
      maxLogSize: 10 * 1024 * 1024,
    },
    sharers: [],
  };
}

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given. */
  configPath?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): BandshareConfig {
  const explicit = options.configPath !== undefined;
  const configPath = options.configPath ?? getConfigPath();

  let user: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    user = readUserConfig(configPath);
  } else if (explicit) {
    throw new ConfigLoadError(`Config file not found: ${configPath}`);
  }

  const merged = deepMerge(toRecord(getDefaultConfig()), user);
  const resolved = resolveEnvVars(merged);
  if (!isRecord(resolved)) {
    throw new ConfigLoadError('Config must be a JSON object');
  }
  return validateConfig(resolved);
}

export function saveConfig(config: BandshareConfig, configPath: string = getConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf8');
}

function readUserConfig(configPath: string): Record<string, unknown> {
  const raw = readFileSync(configPath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigLoadError(`Failed to parse ${configPath}: ${message}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigLoadError(`${configPath} must contain a JSON object`);
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Merge and environment substitution
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(config: BandshareConfig): Record<string, unknown> {
  const plain: unknown = JSON.parse(JSON.stringify(config));
  return isRecord(plain) ? plain : {};
}

/** Objects merge key by key; arrays and scalars from `override` replace. */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return result;
}

/** Replace `${VAR}` in every string; unset variables become ''. */
export function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => process.env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = resolveEnvVars(v);
    }
    return out;
  }
  return value;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const RELAY_MODES = ['http', 'memory'] as const;

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

class Section {
  constructor(
    private readonly obj: Record<string, unknown>,
    private readonly path: string,
  ) {}

  field(key: string): string {
    return this.path === '' ? key : `${this.path}.${key}`;
  }

  private fail(key: string, expectation: string): never {
    const field = this.field(key);
    throw new ConfigLoadError(`Invalid config: ${field} ${expectation}`, field);
  }

  has(key: string): boolean {
    return this.obj[key] !== undefined;
  }

  isNull(key: string): boolean {
    return this.obj[key] === null;
  }

  section(key: string): Section {
    const value = this.obj[key];
    if (!isRecord(value)) this.fail(key, 'must be an object');
    return new Section(value, this.field(key));
  }

  string(key: string, allowEmpty = false): string {
    const value = this.obj[key];
    if (typeof value !== 'string') this.fail(key, 'must be a string');
    if (!allowEmpty && value.trim() === '') this.fail(key, 'must not be empty');
    return value;
  }

  optionalString(key: string): string | undefined {
    return this.has(key) ? this.string(key, true) : undefined;
  }

  number(key: string, rule: NumberRule = {}): number {
    const value = this.obj[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) this.fail(key, 'must be a number');
    if (rule.integer && !Number.isInteger(value)) this.fail(key, 'must be an integer');
    if (rule.min !== undefined && value < rule.min) this.fail(key, `must be at least ${rule.min}`);
    if (rule.max !== undefined && value > rule.max) this.fail(key, `must be at most ${rule.max}`);
    return value;
  }

  optionalNumber(key: string, rule: NumberRule = {}): number | undefined {
    return this.has(key) ? this.number(key, rule) : undefined;
  }

  boolean(key: string): boolean {
    const value = this.obj[key];
    if (typeof value !== 'boolean') this.fail(key, 'must be a boolean');
    return value;
  }

  optionalBoolean(key: string): boolean | undefined {
    return this.has(key) ? this.boolean(key) : undefined;
  }

  oneOf<T extends string>(key: string, values: readonly T[]): T {
    const value = this.obj[key];
    const match = values.find((v) => v === value);
    if (match === undefined) this.fail(key, `must be one of: ${values.join(', ')}`);
    return match;
  }

  stringArray(key: string): string[] {
    const value = this.obj[key];
    if (!Array.isArray(value)) this.fail(key, 'must be an array of strings');
    return value.map((item, i) => {
      if (typeof item !== 'string') this.fail(`${key}[${i}]`, 'must be a string');
      return item;
    });
  }

  sections(key: string): Section[] {
    const value = this.obj[key];
    if (!Array.isArray(value)) this.fail(key, 'must be an array');
    return value.map((item, i) => {
      if (!isRecord(item)) this.fail(`${key}[${i}]`, 'must be an object');
      return new Section(item, `${this.field(key)}[${i}]`);
    });
  }
}

const PORT: NumberRule = { min: 1, max: 65535, integer: true };
const POSITIVE_MS: NumberRule = { min: 1, integer: true };

export function validateConfig(raw: Record<string, unknown>): BandshareConfig {
  const root = new Section(raw, '');

  const relay = root.section('relay');
  const portRange = relay.section('portRange');
  const start = portRange.number('start', PORT);
  const end = portRange.number('end', PORT);
  if (end < start) {
    throw new ConfigLoadError(
      'Invalid config: relay.portRange.end must not be below relay.portRange.start',
      'relay.portRange.end',
    );
  }
  const retry = relay.section('retry');

  const orchestrator = root.section('orchestrator');
  const health = root.section('health');
  const gateway = root.section('gateway');
  const persistence = root.section('persistence');
  const observability = root.section('observability');

  return {
    relay: {
      mode: relay.oneOf('mode', RELAY_MODES),
      controlUrl: relay.string('controlUrl'),
      publicHost: relay.string('publicHost'),
      authToken: relay.optionalString('authToken'),
      portRange: { start, end },
      requestTimeoutMs: relay.number('requestTimeoutMs', POSITIVE_MS),
      retry: {
        attempts: retry.number('attempts', { min: 1, integer: true }),
        baseDelayMs: retry.number('baseDelayMs', { min: 0, integer: true }),
        maxDelayMs: retry.number('maxDelayMs', { min: 0, integer: true }),
      },
      process: relay.has('process') && !relay.isNull('process') ? readProcess(relay.section('process')) : null,
    },
    orchestrator: {
      tickIntervalMs: orchestrator.number('tickIntervalMs', POSITIVE_MS),
      matchTimeoutMs: orchestrator.number('matchTimeoutMs', POSITIVE_MS),
      missedHeartbeatThreshold: orchestrator.number('missedHeartbeatThreshold', { min: 1, integer: true }),
      terminalRetentionMs: orchestrator.number('terminalRetentionMs', { min: 0, integer: true }),
    },
    health: {
      intervalMs: health.number('intervalMs', POSITIVE_MS),
      maxRestartAttempts: health.number('maxRestartAttempts', { min: 0, integer: true }),
      restartBackoffBaseMs: health.number('restartBackoffBaseMs', { min: 0, integer: true }),
      restartBackoffMaxMs: health.number('restartBackoffMaxMs', { min: 0, integer: true }),
    },
    gateway: {
      port: gateway.number('port', { min: 0, max: 65535, integer: true }),
      host: gateway.string('host'),
    },
    persistence: {
      enabled: persistence.boolean('enabled'),
      dbPath: persistence.string('dbPath'),
    },
    observability: {
      observers: observability.stringArray('observers'),
      logLevel: observability.oneOf('logLevel', LOG_LEVELS),
      logPath: observability.optionalString('logPath'),
      maxLogSize: observability.optionalNumber('maxLogSize', { min: 1, integer: true }),
    },
    sharers: root.sections('sharers').map(readSharer),
  };
}

function readProcess(section: Section): RelayProcessConfig {
  return {
    command: section.string('command'),
    args: section.has('args') ? section.stringArray('args') : [],
  };
}

function readSharer(section: Section): SharerSeed {
  return {
    sharerId: section.string('sharerId'),
    dailyLimitBytes: section.number('dailyLimitBytes', { min: 1, integer: true }),
    sharingEnabled: section.optionalBoolean('sharingEnabled'),
    usedBytesToday: section.optionalNumber('usedBytesToday', { min: 0, integer: true }),
    qualityScore: section.optionalNumber('qualityScore', { min: 0, max: 1 }),
  };
}
