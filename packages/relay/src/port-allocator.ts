/**
 * PortAllocator — hands out public relay ports from a fixed inclusive range.
 *
 * Always returns the lowest free port so assignments are predictable.
 */

import { PortExhaustedError, ConfigError } from '@bandshare/core';

export class PortAllocator {
  private readonly inUse = new Set<number>();

  constructor(
    readonly start: number,
    readonly end: number,
  ) {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end > 65_535 || start > end) {
      throw new ConfigError(`Invalid relay port range ${start}-${end}`, { start, end });
    }
  }

  /** Take the lowest free port. Throws PortExhaustedError when none remain. */
  allocate(): number {
    for (let port = this.start; port <= this.end; port++) {
      if (!this.inUse.has(port)) {
        this.inUse.add(port);
        return port;
      }
    }
    throw new PortExhaustedError(this.start, this.end);
  }

  release(port: number): void {
    this.inUse.delete(port);
  }
}
