/**
 * @bandshare/gateway -- HTTP control plane over the engine's service API.
 */

export { Router } from './router.js';
export type { RouteHandler, RouteRequest, RouteResponse, RouteMatch, HttpMethod } from './router.js';

export { GatewayServer } from './server.js';
export type { GatewayServerOptions, GatewayAddress } from './server.js';
