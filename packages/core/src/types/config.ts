/**
 * BandshareConfig — the full configuration tree loaded by the CLI from
 * ~/.bandshare/config.json and merged over defaults.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RetryConfig {
  /** Total attempts including the first one. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RelayProcessConfig {
  command: string;
  args: string[];
}

export interface RelayConfig {
  /** 'http' talks to a relay control API; 'memory' runs an in-process relay. */
  mode: 'http' | 'memory';
  controlUrl: string;
  /** Host clients dial to reach a tunnel's public port. */
  publicHost: string;
  authToken?: string;
  portRange: { start: number; end: number };
  requestTimeoutMs: number;
  retry: RetryConfig;
  /** Relay binary the Health Monitor may restart. Null when managed externally. */
  process: RelayProcessConfig | null;
}

export interface OrchestratorConfig {
  tickIntervalMs: number;
  matchTimeoutMs: number;
  missedHeartbeatThreshold: number;
  terminalRetentionMs: number;
}

export interface HealthConfig {
  intervalMs: number;
  maxRestartAttempts: number;
  restartBackoffBaseMs: number;
  restartBackoffMaxMs: number;
}

export interface GatewayConfig {
  port: number;
  host: string;
}

export interface PersistenceConfig {
  enabled: boolean;
  dbPath: string;
}

export interface ObservabilityConfig {
  observers: string[];
  logLevel: LogLevel;
  logPath?: string;
  maxLogSize?: number;
}

export interface SharerSeed {
  sharerId: string;
  sharingEnabled?: boolean;
  dailyLimitBytes: number;
  usedBytesToday?: number;
  qualityScore?: number;
}

export interface BandshareConfig {
  relay: RelayConfig;
  orchestrator: OrchestratorConfig;
  health: HealthConfig;
  gateway: GatewayConfig;
  persistence: PersistenceConfig;
  observability: ObservabilityConfig;
  sharers: SharerSeed[];
}
