/**
 * Status command -- query a running gateway.
 *
 *   bandshare status                    ranked available sharers
 *   bandshare status --client <id>      connection status for a client
 *   bandshare status --sharer <id>      connection status for a sharer
 *
 * `--json` prints the raw response body instead.
 */

import type { AvailableSharer, ConnectionStatus } from '@bandshare/orchestrator';
import { formatBytes } from '@bandshare/observability';
import { loadConfig } from '../config.js';
import { flagValue, hasFlag } from '../args.js';

// ---------------------------------------------------------------------------
// ANSI color helpers
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';

const STATE_COLOR: Record<ConnectionStatus['state'], string> = {
  PENDING: DIM,
  MATCHED: YELLOW,
  ACTIVE: GREEN,
  THROTTLED: YELLOW,
  UNHEALTHY: RED,
  EXPIRED: DIM,
  FAILED: RED,
  CLOSED: DIM,
};

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function renderStatus(status: ConnectionStatus): string[] {
  const lines = [
    `  ${BOLD}Connection${RESET}    ${status.connectionId}`,
    `  ${BOLD}State${RESET}         ${STATE_COLOR[status.state]}${status.state}${RESET}`,
    `  ${BOLD}Transferred${RESET}   ${formatBytes(status.bytesTransferred)}`,
  ];
  if (status.proxy) {
    const { host, port, username, password } = status.proxy;
    lines.push(`  ${BOLD}Proxy${RESET}         socks5://${username}:${password}@${host}:${port}`);
  } else {
    lines.push(`  ${BOLD}Proxy${RESET}         ${DIM}none${RESET}`);
  }
  return lines;
}

export function renderSharers(sharers: AvailableSharer[]): string[] {
  if (sharers.length === 0) {
    return [`  ${DIM}No sharers available.${RESET}`];
  }
  return sharers.map(
    (s) =>
      `  ${s.sharerId.padEnd(24)} ${formatBytes(s.availableBytes).padStart(10)} left` +
      `  ${DIM}quality ${s.qualityScore.toFixed(2)}${RESET}`,
  );
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

export async function status(args: string[]): Promise<void> {
  let config;
  try {
    config = loadConfig({ configPath: flagValue(args, '--config') });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to load config:${RESET} ${message}\n`);
    process.exitCode = 1;
    return;
  }

  const base = `http://${config.gateway.host}:${config.gateway.port}`;
  const clientId = flagValue(args, '--client');
  const sharerId = flagValue(args, '--sharer');
  const path =
    clientId !== undefined
      ? `/status?clientId=${encodeURIComponent(clientId)}`
      : sharerId !== undefined
        ? `/status?sharerId=${encodeURIComponent(sharerId)}`
        : '/sharers/available';

  let res: Response;
  try {
    res = await fetch(`${base}${path}`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Gateway not reachable at ${base}:${RESET} ${message}`);
    console.error(`  ${DIM}Is ${BOLD}bandshare start${RESET}${DIM} running?${RESET}\n`);
    process.exitCode = 1;
    return;
  }

  const body: unknown = await res.json();
  if (hasFlag(args, '--json')) {
    console.log(JSON.stringify(body, null, 2));
    return;
  }

  if (res.status === 404) {
    console.log(`\n  ${DIM}No connection found.${RESET}\n`);
    return;
  }
  if (!res.ok) {
    console.error(`\n  ${RED}Gateway answered ${res.status}:${RESET} ${JSON.stringify(body)}\n`);
    process.exitCode = 1;
    return;
  }

  console.log('');
  const lines = path === '/sharers/available' ? renderSharers(readSharers(body)) : renderStatus(readStatus(body));
  for (const line of lines) console.log(line);
  console.log('');
}

// ---------------------------------------------------------------------------
// Response narrowing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const STATES = Object.keys(STATE_COLOR);

function isState(value: unknown): value is ConnectionStatus['state'] {
  return typeof value === 'string' && STATES.includes(value);
}

function readStatus(body: unknown): ConnectionStatus {
  if (
    !isRecord(body) ||
    typeof body['connectionId'] !== 'string' ||
    !isState(body['state']) ||
    typeof body['bytesTransferred'] !== 'number'
  ) {
    throw new Error('Unexpected status response from gateway');
  }
  const proxy = body['proxy'];
  return {
    connectionId: body['connectionId'],
    state: body['state'],
    bytesTransferred: body['bytesTransferred'],
    relayEndpoint: typeof body['relayEndpoint'] === 'string' ? body['relayEndpoint'] : null,
    proxy:
      isRecord(proxy) &&
      typeof proxy['host'] === 'string' &&
      typeof proxy['port'] === 'number' &&
      typeof proxy['username'] === 'string' &&
      typeof proxy['password'] === 'string'
        ? {
            type: 'socks5',
            host: proxy['host'],
            port: proxy['port'],
            username: proxy['username'],
            password: proxy['password'],
          }
        : null,
  };
}

function readSharers(body: unknown): AvailableSharer[] {
  const list = isRecord(body) ? body['sharers'] : undefined;
  if (!Array.isArray(list)) {
    throw new Error('Unexpected sharer list from gateway');
  }
  return list.flatMap((item: unknown) =>
    isRecord(item) &&
    typeof item['sharerId'] === 'string' &&
    typeof item['availableBytes'] === 'number' &&
    typeof item['qualityScore'] === 'number'
      ? [{ sharerId: item['sharerId'], availableBytes: item['availableBytes'], qualityScore: item['qualityScore'] }]
      : [],
  );
}
