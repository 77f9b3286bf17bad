/**
 * @bandshare/relay — clients for the reverse-proxy relay that carries tunnel
 * traffic between clients and sharers.
 *
 * All clients implement the IRelayClient interface from @bandshare/core.
 */

export { HttpRelayClient } from './http-relay-client.js';
export type { HttpRelayClientOptions } from './http-relay-client.js';

export { MemoryRelay } from './memory-relay.js';
export type { MemoryRelayOptions } from './memory-relay.js';

export { PortAllocator } from './port-allocator.js';
export { UsageCounter } from './usage-counter.js';
export { generateCredentials } from './credentials.js';

// Re-export relay types from core for convenience
export type { IRelayClient, IRelayProcess, TunnelRegistration, RelayTunnelInfo } from '@bandshare/core';

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

import type { IObserver, IRelayClient, RelayConfig } from '@bandshare/core';
import { HttpRelayClient } from './http-relay-client.js';
import { MemoryRelay } from './memory-relay.js';

/**
 * Create a relay client from the `relay` config section.
 */
export function createRelayClient(config: RelayConfig, observer?: IObserver): IRelayClient {
  switch (config.mode) {
    case 'memory':
      return new MemoryRelay({ portRange: config.portRange });
    case 'http':
      return new HttpRelayClient({
        controlUrl: config.controlUrl,
        authToken: config.authToken,
        portRange: config.portRange,
        requestTimeoutMs: config.requestTimeoutMs,
        retry: config.retry,
        observer,
      });
  }
}
