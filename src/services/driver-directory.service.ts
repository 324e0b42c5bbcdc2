/**
 * Fleet API Driver Directory
 *
 * Looks up a driver's display name from the fleet provider's REST API
 * (GET /v1/users/:id).
 */

import { fetch } from 'undici';
import { z } from 'zod';
import { ExternalServiceError } from '../models/errors/api-error';
import { logger } from '../utils/logger';
import type { FleetApiDirectoryOptions } from './unit-directory.service';

/**
 * Resolves null when the driver is unknown; rejects on transport failures.
 */
export interface DriverDirectory {
  lookupDriverName(driverId: number): Promise<string | null>;
}

const UserResponseSchema = z.object({
  user: z
    .object({
      first_name: z.string().nullable().optional(),
      last_name: z.string().nullable().optional(),
    })
    .passthrough(),
});

export class FleetApiDriverDirectory implements DriverDirectory {
  constructor(private readonly options: FleetApiDirectoryOptions) {}

  async lookupDriverName(driverId: number): Promise<string | null> {
    const url = new URL(`/v1/users/${driverId}`, this.options.baseUrl);
    const startTime = Date.now();

    const response = await fetch(url, {
      headers: {
        accept: 'application/json',
        'x-api-key': this.options.apiKey,
      },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    logger.debug('Fleet API driver lookup', {
      driverId,
      status: response.status,
      duration: `${Date.now() - startTime}ms`,
    });

    if (response.status === 404) {
      return null;
    }

    if (!response.ok) {
      throw new ExternalServiceError('fleet-api', `Driver lookup failed with HTTP ${response.status}`);
    }

    const parsed = UserResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      return null;
    }

    const { first_name: first, last_name: last } = parsed.data.user;
    const name = [first, last]
      .map((part) => part?.trim() ?? '')
      .filter((part) => part !== '')
      .join(' ');
    return name || null;
  }
}
