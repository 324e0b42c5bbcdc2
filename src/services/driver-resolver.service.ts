/**
 * Driver Resolver
 *
 * Maps driver ids to display names for speeding alerts. Same caching rules
 * as UnitResolver: process-lifetime entries, one in-flight lookup per id,
 * failures not cached. Unknown drivers are labelled "Driver #<id>".
 */

import { errorMessage } from '../models/errors/api-error';
import { logger } from '../utils/logger';
import type { DriverDirectory } from './driver-directory.service';

export function fallbackDriverLabel(driverId: number): string {
  return `Driver #${driverId}`;
}

export class DriverResolver {
  private readonly cache = new Map<number, Promise<string>>();

  constructor(private readonly directory?: DriverDirectory) {}

  resolve(driverId: number): Promise<string> {
    const cached = this.cache.get(driverId);
    if (cached) {
      return cached;
    }

    const pending = this.lookup(driverId).then(({ name, cacheable }) => {
      if (!cacheable) {
        this.cache.delete(driverId);
      }
      return name;
    });

    this.cache.set(driverId, pending);
    return pending;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async lookup(driverId: number): Promise<{ name: string; cacheable: boolean }> {
    if (!this.directory) {
      return { name: fallbackDriverLabel(driverId), cacheable: true };
    }

    try {
      const name = await this.directory.lookupDriverName(driverId);
      return { name: name ?? fallbackDriverLabel(driverId), cacheable: true };
    } catch (error) {
      logger.warn('Driver lookup failed', { driverId, error: errorMessage(error) });
      return { name: fallbackDriverLabel(driverId), cacheable: false };
    }
  }
}
