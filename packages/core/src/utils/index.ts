export { backoffDelay, sleep } from './backoff.js';
export { generateId } from './id.js';
