/**
 * Runtime -- wires every subsystem from a BandshareConfig.
 *
 * Owns the lifetimes: observer, relay client (and the relay process when
 * one is configured), snapshot store, engine, health monitor, the two
 * periodic tasks and the gateway. `start()` recovers from the last snapshot
 * before the first tick; `stop()` tears down in reverse order.
 */

import type { BandshareConfig, IObserver, IRelayClient, ISnapshotStore } from '@bandshare/core';
import { createObserver } from '@bandshare/observability';
import { createRelayClient } from '@bandshare/relay';
import { createSnapshotStore } from '@bandshare/store';
import { createEngine } from '@bandshare/orchestrator';
import type { Engine, RecoverySummary } from '@bandshare/orchestrator';
import { PeriodicTask, RelayHealthMonitor, RelayProcessSupervisor } from '@bandshare/supervisor';
import { GatewayServer } from '@bandshare/gateway';
import type { GatewayAddress } from '@bandshare/gateway';

export interface RuntimeOverrides {
  observer?: IObserver;
  relay?: IRelayClient;
  store?: ISnapshotStore;
}

export interface RuntimeStartResult {
  recovery: RecoverySummary | null;
  address: GatewayAddress | null;
}

export class Runtime {
  readonly observer: IObserver;
  readonly relay: IRelayClient;
  readonly store: ISnapshotStore;
  readonly engine: Engine;
  readonly relayProcess: RelayProcessSupervisor | null;
  readonly monitor: RelayHealthMonitor;
  readonly gateway: GatewayServer;

  private readonly ticker: PeriodicTask;
  private readonly healthTask: PeriodicTask;
  private started = false;

  constructor(config: BandshareConfig, overrides: RuntimeOverrides = {}) {
    this.observer = overrides.observer ?? createObserver(config.observability);
    this.relay = overrides.relay ?? createRelayClient(config.relay, this.observer);
    this.store = overrides.store ?? createSnapshotStore(config.persistence);

    this.engine = createEngine({
      relay: this.relay,
      observer: this.observer,
      store: this.store,
      config: config.orchestrator,
      publicHost: config.relay.publicHost,
      sharers: config.sharers,
    });

    this.relayProcess = config.relay.process ? new RelayProcessSupervisor(config.relay.process) : null;
    this.relayProcess?.on('crashed', (err) => {
      this.observer.onError(err, { phase: 'relay-process' });
    });

    this.monitor = new RelayHealthMonitor({
      relay: this.relay,
      registry: this.engine.registry,
      process: this.relayProcess,
      observer: this.observer,
      config: config.health,
    });

    this.ticker = new PeriodicTask({
      name: 'orchestrator-tick',
      intervalMs: config.orchestrator.tickIntervalMs,
      run: async () => {
        await this.engine.orchestrator.tick();
      },
      observer: this.observer,
    });
    this.healthTask = new PeriodicTask({
      name: 'relay-health',
      intervalMs: this.monitor.intervalMs,
      run: async () => {
        await this.monitor.check();
      },
      observer: this.observer,
    });

    this.gateway = new GatewayServer({
      port: config.gateway.port,
      host: config.gateway.host,
      service: this.engine.service,
      observer: this.observer,
    });
  }

  async start(): Promise<RuntimeStartResult> {
    if (this.started) {
      return { recovery: null, address: this.gateway.address };
    }
    this.started = true;

    if (this.relayProcess) {
      await this.relayProcess.start();
    }

    const snapshot = this.store.load();
    const recovery = snapshot ? await this.engine.orchestrator.recover(snapshot) : null;

    await this.gateway.start();
    this.ticker.start();
    this.healthTask.start();

    return { recovery, address: this.gateway.address };
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;

    await this.ticker.stop();
    await this.healthTask.stop();
    this.monitor.dispose();
    await this.gateway.stop();
    if (this.relayProcess) {
      await this.relayProcess.stop();
    }
    this.store.close();
    await this.observer.flush?.();
  }
}
