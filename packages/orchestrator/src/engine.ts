/**
 * createEngine — wires Registry, Ledger, Matcher, Orchestrator and the
 * service facade around one clock.
 */

import type {
  IObserver,
  IRelayClient,
  ISnapshotStore,
  OrchestratorConfig,
  SharerSeed,
} from '@bandshare/core';
import { ConnectionRegistry } from './registry.js';
import { QuotaLedger } from './quota-ledger.js';
import { Matcher } from './matcher.js';
import { DEFAULT_ORCHESTRATOR_CONFIG, Orchestrator } from './orchestrator.js';
import { BandshareService } from './service.js';

export interface EngineOptions {
  relay: IRelayClient;
  observer: IObserver;
  store?: ISnapshotStore | null;
  config?: Partial<OrchestratorConfig>;
  publicHost?: string;
  sharers?: SharerSeed[];
  clock?: () => number;
}

export interface Engine {
  registry: ConnectionRegistry;
  ledger: QuotaLedger;
  matcher: Matcher;
  orchestrator: Orchestrator;
  service: BandshareService;
}

export function createEngine(options: EngineOptions): Engine {
  const clock = options.clock ?? Date.now;
  const registry = new ConnectionRegistry(clock);
  const ledger = new QuotaLedger({ clock });
  const matcher = new Matcher(ledger);

  for (const seed of options.sharers ?? []) {
    ledger.upsert(seed);
  }

  const orchestrator = new Orchestrator({
    registry,
    ledger,
    matcher,
    relay: options.relay,
    observer: options.observer,
    store: options.store,
    config: { ...DEFAULT_ORCHESTRATOR_CONFIG, ...options.config },
    clock,
  });

  const service = new BandshareService({
    registry,
    ledger,
    matcher,
    orchestrator,
    publicHost: options.publicHost ?? '127.0.0.1',
  });

  return { registry, ledger, matcher, orchestrator, service };
}
