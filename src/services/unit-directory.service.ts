/**
 * Fleet API Unit Directory
 *
 * Looks up a vehicle's human-readable unit number from the fleet provider's
 * REST API (GET /v1/vehicles/:id).
 */

import { fetch } from 'undici';
import { z } from 'zod';
import { ExternalServiceError } from '../models/errors/api-error';
import { logger } from '../utils/logger';

/**
 * External system of record for vehicle labels.
 * Resolves null when the vehicle is unknown; rejects on transport failures.
 */
export interface UnitDirectory {
  lookupUnit(vehicleId: number): Promise<string | null>;
}

const VehicleResponseSchema = z.object({
  vehicle: z
    .object({
      id: z.number().int().optional(),
      number: z.string().nullable().optional(),
    })
    .passthrough(),
});

export interface FleetApiDirectoryOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

export class FleetApiUnitDirectory implements UnitDirectory {
  constructor(private readonly options: FleetApiDirectoryOptions) {}

  async lookupUnit(vehicleId: number): Promise<string | null> {
    const url = new URL(`/v1/vehicles/${vehicleId}`, this.options.baseUrl);
    const startTime = Date.now();

    const response = await fetch(url, {
      headers: {
        accept: 'application/json',
        'x-api-key': this.options.apiKey,
      },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    logger.debug('Fleet API vehicle lookup', {
      vehicleId,
      status: response.status,
      duration: `${Date.now() - startTime}ms`,
    });

    if (response.status === 404) {
      return null;
    }

    if (!response.ok) {
      throw new ExternalServiceError('fleet-api', `Vehicle lookup failed with HTTP ${response.status}`);
    }

    const parsed = VehicleResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      return null;
    }

    const unit = parsed.data.vehicle.number?.trim();
    return unit ? unit : null;
  }
}
