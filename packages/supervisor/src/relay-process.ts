/**
 * RelayProcessSupervisor — owns the relay binary as a child process.
 *
 * Spawns it via child_process.spawn, forwards stdout/stderr to registered
 * handlers (and drains them when there are none), reports unexpected exits, and restarts it on request from the
 * health monitor within the restart policy's window.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { BandshareError } from '@bandshare/core';
import type { IRelayProcess, RelayProcessConfig } from '@bandshare/core';
import { DEFAULT_RESTART_POLICY, canRestart, pruneRestarts, type RestartPolicy } from './strategies.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface RelayProcessOptions extends RelayProcessConfig {
  spawnOptions?: SpawnOptions;
  restartPolicy?: Partial<RestartPolicy>;
  /** Grace period between SIGTERM and SIGKILL. Default 5 000. */
  killTimeoutMs?: number;
}

export type DataHandler = (data: Buffer) => void;

export interface RelayProcessEvents {
  started: [pid: number | undefined];
  exited: [code: number | null, signal: string | null];
  crashed: [error: Error];
}

// ── RelayProcessSupervisor ───────────────────────────────────────────────

export class RelayProcessSupervisor extends EventEmitter<RelayProcessEvents> implements IRelayProcess {
  readonly managed = true;

  private proc: ChildProcess | null = null;
  private stopping = false;
  private restartTimestamps: number[] = [];
  private readonly policy: RestartPolicy;
  private readonly killTimeoutMs: number;
  private readonly stdoutHandlers = new Set<DataHandler>();
  private readonly stderrHandlers = new Set<DataHandler>();

  constructor(private readonly options: RelayProcessOptions) {
    super();
    this.policy = { ...DEFAULT_RESTART_POLICY, ...options.restartPolicy };
    this.killTimeoutMs = options.killTimeoutMs ?? 5_000;
  }

  // ── Queries ──────────────────────────────────────────────────────────

  get pid(): number | undefined {
    return this.proc?.pid;
  }

  isAlive(): boolean {
    return this.proc !== null && this.proc.exitCode === null && this.proc.signalCode === null;
  }

  get restartCount(): number {
    return this.restartTimestamps.length;
  }

  // ── Lifecycle ────────────────────────────────────────────────────────

  async start(): Promise<void> {
    if (this.isAlive()) return;
    this.stopping = false;
    await this.spawnProcess();
  }

  /** Stop the current process and spawn a fresh one. */
  async restart(): Promise<void> {
    const now = Date.now();
    if (!canRestart(this.restartTimestamps, now, this.policy)) {
      throw new BandshareError(
        `Max restarts (${this.policy.maxRestarts}) exceeded for relay within ${this.policy.windowMs}ms window`,
        'RESTART_LIMIT',
        { maxRestarts: this.policy.maxRestarts, windowMs: this.policy.windowMs },
      );
    }
    this.restartTimestamps = [...pruneRestarts(this.restartTimestamps, now, this.policy.windowMs), now];

    await this.stop();
    this.stopping = false;
    await this.spawnProcess();
  }

  /** SIGTERM, then SIGKILL if the process is still alive after the grace period. */
  async stop(): Promise<void> {
    this.stopping = true;
    const proc = this.proc;
    if (!proc) return;

    if (proc.exitCode === null && proc.signalCode === null) {
      await new Promise<void>((resolve) => {
        const timeout = setTimeout(() => {
          proc.kill('SIGKILL');
          resolve();
        }, this.killTimeoutMs);
        timeout.unref();

        proc.once('exit', () => {
          clearTimeout(timeout);
          resolve();
        });
        proc.kill('SIGTERM');
      });
    }

    this.proc = null;
  }

  // ── Output ───────────────────────────────────────────────────────────

  /** Handlers persist across restarts. Returns an unsubscribe function. */
  onStdout(handler: DataHandler): () => void {
    this.stdoutHandlers.add(handler);
    this.proc?.stdout?.on('data', handler);
    return () => {
      this.stdoutHandlers.delete(handler);
      this.proc?.stdout?.off('data', handler);
    };
  }

  onStderr(handler: DataHandler): () => void {
    this.stderrHandlers.add(handler);
    this.proc?.stderr?.on('data', handler);
    return () => {
      this.stderrHandlers.delete(handler);
      this.proc?.stderr?.off('data', handler);
    };
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private async spawnProcess(): Promise<void> {
    const proc = spawn(this.options.command, this.options.args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      ...this.options.spawnOptions,
    });

    // Wait for the process to actually spawn before resolving.
    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        cleanup();
        resolve();
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };
      const cleanup = () => {
        proc.off('spawn', onSpawn);
        proc.off('error', onError);
      };
      proc.once('spawn', onSpawn);
      proc.once('error', onError);
    });

    this.proc = proc;
    for (const handler of this.stdoutHandlers) proc.stdout?.on('data', handler);
    for (const handler of this.stderrHandlers) proc.stderr?.on('data', handler);
    // Keep both pipes flowing with or without handlers; a full pipe would
    // block the relay on its next write.
    proc.stdout?.resume();
    proc.stderr?.resume();

    proc.on('error', (err) => {
      this.emit('crashed', err);
    });
    proc.on('exit', (code, signal) => {
      this.handleExit(proc, code, signal);
    });

    this.emit('started', proc.pid);
  }

  private handleExit(proc: ChildProcess, code: number | null, signal: string | null): void {
    if (this.proc === proc) this.proc = null;
    this.emit('exited', code, signal);

    // Exits we asked for, and clean ones, are not crashes.
    if (this.stopping || (code === 0 && !signal)) return;

    const reason = signal
      ? `Relay process killed by signal ${signal}`
      : `Relay process exited with code ${code ?? 'unknown'}`;
    this.emit('crashed', new Error(reason));
  }
}
