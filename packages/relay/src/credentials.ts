import { randomInt } from 'node:crypto';
import type { ProxyCredentials } from '@bandshare/core';

const LOWER_DIGITS = 'abcdefghijklmnopqrstuvwxyz0123456789';
const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

function randomString(alphabet: string, length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += alphabet.charAt(randomInt(alphabet.length));
  }
  return out;
}

/** Per-tunnel SOCKS5 credentials: 8-char username, 12-char password. */
export function generateCredentials(): ProxyCredentials {
  return {
    username: randomString(LOWER_DIGITS, 8),
    password: randomString(ALPHANUMERIC, 12),
  };
}
