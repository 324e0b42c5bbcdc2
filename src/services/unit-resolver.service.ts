/**
 * Unit Resolver
 *
 * Maps vehicle ids to unit labels for alerts and stored records. Results
 * live for the lifetime of the process; concurrent lookups for the same id
 * share a single in-flight request.
 *
 * resolve() never rejects. Unknown vehicles resolve to UNIT_UNKNOWN and are
 * cached; lookup failures resolve to UNIT_UNKNOWN but are not cached, so a
 * later delivery retries the directory.
 */

import { UNIT_UNKNOWN } from '../models/dtos/event.dto';
import { errorMessage } from '../models/errors/api-error';
import { logger } from '../utils/logger';
import type { UnitDirectory } from './unit-directory.service';

interface LookupResult {
  unit: string;
  cacheable: boolean;
}

export class UnitResolver {
  private readonly cache = new Map<number, Promise<string>>();

  constructor(private readonly directory?: UnitDirectory) {}

  resolve(vehicleId: number): Promise<string> {
    const cached = this.cache.get(vehicleId);
    if (cached) {
      return cached;
    }

    const pending = this.lookup(vehicleId).then(({ unit, cacheable }) => {
      if (!cacheable) {
        this.cache.delete(vehicleId);
      }
      return unit;
    });

    this.cache.set(vehicleId, pending);
    return pending;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async lookup(vehicleId: number): Promise<LookupResult> {
    if (!this.directory) {
      return { unit: UNIT_UNKNOWN, cacheable: true };
    }

    try {
      const unit = await this.directory.lookupUnit(vehicleId);
      if (unit === null) {
        logger.debug('Vehicle not found in directory', { vehicleId });
        return { unit: UNIT_UNKNOWN, cacheable: true };
      }
      return { unit, cacheable: true };
    } catch (error) {
      logger.warn('Unit lookup failed', { vehicleId, error: errorMessage(error) });
      return { unit: UNIT_UNKNOWN, cacheable: false };
    }
  }
}
