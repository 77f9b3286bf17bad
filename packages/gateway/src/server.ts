/**
 * GatewayServer -- lightweight HTTP control plane.
 *
 * Exposes the application-facing operations of the engine as a small JSON
 * API. Uses the Node.js built-in `http` module with zero external
 * dependencies.
 *
 * Routes:
 *   GET    /health                 - liveness probe
 *   POST   /connections            - request a connection for a client
 *   DELETE /connections/:id        - disconnect
 *   GET    /status                 - status by ?clientId= or ?sharerId=
 *   GET    /sharers/available      - ranked sharers with quota left
 *   PUT    /sharers/:id            - create or update a sharer profile
 *   PUT    /sharers/:id/sharing    - toggle sharing for a sharer
 *   GET    /sharers/:id/quota      - quota ledger entry for a sharer
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import {
  BandshareError,
  ConnectionNotFoundError,
  SharerNotFoundError,
  ValidationError,
} from '@bandshare/core';
import type { IObserver } from '@bandshare/core';
import type { BandshareService, StatusQuery } from '@bandshare/orchestrator';
import { Router } from './router.js';
import type { RouteRequest, RouteResponse } from './router.js';

export interface GatewayServerOptions {
  port: number;
  host?: string;
  service: BandshareService;
  observer?: IObserver;
}

export interface GatewayAddress {
  host: string;
  port: number;
}

class BadRequestError extends BandshareError {
  constructor(message: string) {
    super(message, 'BAD_REQUEST');
    this.name = 'BadRequestError';
  }
}

export class GatewayServer {
  private server: Server | null = null;
  private readonly port: number;
  private readonly host: string;
  private readonly service: BandshareService;
  private readonly observer: IObserver | undefined;
  private readonly router: Router;

  constructor(options: GatewayServerOptions) {
    this.port = options.port;
    this.host = options.host ?? '127.0.0.1';
    this.service = options.service;
    this.observer = options.observer;
    this.router = this.buildRouter();
  }

  /** Start listening on the configured port. */
  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.server = createServer((req, res) => {
        this.handleRequest(req, res).catch((err: unknown) => {
          this.sendJson(res, 500, { error: err instanceof Error ? err.message : 'Internal server error' });
        });
      });

      this.server.on('error', reject);

      this.server.listen(this.port, this.host, () => {
        resolve();
      });
    });
  }

  /** Gracefully close the server. */
  async stop(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        this.server = null;
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Bound address once listening; useful when started on port 0. */
  get address(): GatewayAddress | null {
    const addr = this.server?.address();
    if (!addr || typeof addr === 'string') return null;
    return { host: addr.address, port: addr.port };
  }

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  private buildRouter(): Router {
    const service = this.service;

    return new Router()
      .add('GET', '/health', () => ({
        status: 200,
        body: { status: 'ok', timestamp: new Date().toISOString() },
      }))
      .add('POST', '/connections', ({ body }) => {
        const conn = service.requestConnection(stringField(body, 'clientId'));
        return {
          status: 201,
          body: { connectionId: conn.id, state: conn.state, createdAt: conn.createdAt.toISOString() },
        };
      })
      .add('DELETE', '/connections/:id', async ({ params }) => {
        const id = params['id'] ?? '';
        const conn = await service.disconnect(id);
        if (!conn) throw new ConnectionNotFoundError(id);
        return { status: 200, body: { connectionId: conn.id, state: conn.state } };
      })
      .add('GET', '/status', ({ query }) => {
        const status = service.getStatus(statusQuery(query));
        if (!status) return { status: 404, body: { error: 'No connection found' } };
        return { status: 200, body: status };
      })
      .add('GET', '/sharers/available', () => ({
        status: 200,
        body: { sharers: service.listAvailableSharers() },
      }))
      .add('PUT', '/sharers/:id', ({ params, body }) => {
        const profile = service.upsertSharer({
          sharerId: params['id'] ?? '',
          dailyLimitBytes: numberField(body, 'dailyLimitBytes'),
          sharingEnabled: optionalBooleanField(body, 'sharingEnabled'),
          usedBytesToday: optionalNumberField(body, 'usedBytesToday'),
          qualityScore: optionalNumberField(body, 'qualityScore'),
        });
        return { status: 200, body: profile };
      })
      .add('PUT', '/sharers/:id/sharing', ({ params, body }) => {
        const enabled = optionalBooleanField(body, 'enabled');
        if (enabled === undefined) throw new ValidationError('enabled must be a boolean', 'enabled');
        return { status: 200, body: service.setSharingEnabled(params['id'] ?? '', enabled) };
      })
      .add('GET', '/sharers/:id/quota', ({ params }) => ({
        status: 200,
        body: service.getQuota(params['id'] ?? ''),
      }));
  }

  // ---------------------------------------------------------------------------
  // Request handling
  // ---------------------------------------------------------------------------

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://gateway.local');

    const match = this.router.match(method, url.pathname);
    if (match === null) {
      this.sendJson(res, 404, { error: 'Not found' });
      return;
    }
    if (match === 'method-not-allowed') {
      this.sendJson(res, 405, { error: `Method ${method} not allowed` });
      return;
    }

    let response: RouteResponse;
    try {
      const request: RouteRequest = {
        params: match.params,
        query: url.searchParams,
        body: await this.readJsonBody(req),
      };
      response = await match.handler(request);
    } catch (err) {
      response = this.errorResponse(err, method, url.pathname);
    }
    this.sendJson(res, response.status, response.body);
  }

  private errorResponse(err: unknown, method: string, path: string): RouteResponse {
    if (err instanceof ValidationError) {
      return { status: 400, body: { error: err.message, field: err.field } };
    }
    if (err instanceof BadRequestError) {
      return { status: 400, body: { error: err.message } };
    }
    if (err instanceof ConnectionNotFoundError || err instanceof SharerNotFoundError) {
      return { status: 404, body: { error: err.message } };
    }
    const error = err instanceof Error ? err : new Error(String(err));
    this.observer?.onError(error, { phase: 'gateway', method, path });
    return { status: 500, body: { error: 'Internal server error' } };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    const body = JSON.stringify(data);
    res.writeHead(status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(body),
    });
    res.end(body);
  }

  private async readJsonBody(req: IncomingMessage): Promise<unknown> {
    const raw = await this.readBody(req);
    if (raw.trim() === '') return undefined;
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      throw new BadRequestError('Request body is not valid JSON');
    }
  }

  private readBody(req: IncomingMessage): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
      req.on('error', reject);
    });
  }
}

// ---------------------------------------------------------------------------
// Body and query narrowing
// ---------------------------------------------------------------------------

function field(body: unknown, name: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  return Object.getOwnPropertyDescriptor(body, name)?.value;
}

function stringField(body: unknown, name: string): string {
  const value = field(body, name);
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${name} must be a non-empty string`, name);
  }
  return value;
}

function numberField(body: unknown, name: string): number {
  const value = field(body, name);
  if (typeof value !== 'number') {
    throw new ValidationError(`${name} must be a number`, name);
  }
  return value;
}

function optionalNumberField(body: unknown, name: string): number | undefined {
  const value = field(body, name);
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new ValidationError(`${name} must be a number`, name);
  }
  return value;
}

function optionalBooleanField(body: unknown, name: string): boolean | undefined {
  const value = field(body, name);
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${name} must be a boolean`, name);
  }
  return value;
}

function statusQuery(query: URLSearchParams): StatusQuery {
  const clientId = query.get('clientId');
  const sharerId = query.get('sharerId');
  if (clientId !== null && sharerId !== null) {
    throw new ValidationError('Pass either clientId or sharerId, not both', 'clientId');
  }
  if (clientId !== null) return { clientId };
  if (sharerId !== null) return { sharerId };
  throw new ValidationError('clientId or sharerId is required', 'clientId');
}
