/**
 * @bandshare/orchestrator — connection lifecycle, quota accounting and the
 * control loop.
 */

export { TRANSITIONS, RESERVING_STATES, canTransition } from './state-machine.js';
export { KeyedMutex } from './keyed-mutex.js';
export { ConnectionRegistry } from './registry.js';
export type { CreateConnectionInput, TransitionResult } from './registry.js';
export { QuotaLedger, utcDayStart } from './quota-ledger.js';
export type { QuotaLedgerOptions, SharerProfileInput } from './quota-ledger.js';
export { Matcher } from './matcher.js';
export type { MatchResult, RankedSharer } from './matcher.js';
export { Orchestrator, DEFAULT_ORCHESTRATOR_CONFIG } from './orchestrator.js';
export type { OrchestratorDeps, RecoverySummary, TickSummary } from './orchestrator.js';
export { BandshareService } from './service.js';
export type {
  AvailableSharer,
  BandshareServiceDeps,
  ConnectionStatus,
  ProxyEndpoint,
  StatusQuery,
} from './service.js';
export { createEngine } from './engine.js';
export type { Engine, EngineOptions } from './engine.js';
