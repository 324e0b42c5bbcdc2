/**
 * Event Repository
 *
 * Append-only store for accepted webhook events.
 *
 * A delivery's events are written inside one transaction (withBatch). Each
 * append runs under its own SAVEPOINT so that a failed INSERT rolls back
 * only that event; PostgreSQL would otherwise abort the whole transaction
 * and every sibling write after it.
 */

import type { Pool, PoolClient } from 'pg';
import { withTransaction } from '../config/database';
import type { EventType, NewEventRecord, PersistedEvent } from '../models/dtos/event.dto';
import { PersistenceError, errorMessage } from '../models/errors/api-error';
import { logHelpers, logger } from '../utils/logger';

export interface EventBatchWriter {
  /** Throws PersistenceError; the surrounding batch stays usable */
  append(record: NewEventRecord): Promise<PersistedEvent>;
}

export interface EventStore {
  /** Runs fn in one transaction scope and commits when it resolves */
  withBatch<T>(fn: (writer: EventBatchWriter) => Promise<T>): Promise<T>;
  /** Newest first */
  listRecent(limit: number): Promise<PersistedEvent[]>;
  ping(): Promise<void>;
}

interface EventRow {
  id: number;
  event_type: EventType;
  // BIGINT arrives as a string
  provider_event_id: string | null;
  vehicle_unit: string;
  timestamp: Date;
  lat: number | null;
  lon: number | null;
  speed: number | null;
  limit: number | null;
  maps_link: string | null;
  received_at: Date;
}

const COLUMNS =
  'id, event_type, provider_event_id, vehicle_unit, "timestamp", lat, lon, speed, "limit", maps_link, received_at';

function mapEventRow(row: EventRow): PersistedEvent {
  return {
    id: row.id,
    eventType: row.event_type,
    providerEventId: row.provider_event_id === null ? null : Number(row.provider_event_id),
    vehicleUnit: row.vehicle_unit,
    timestamp: row.timestamp,
    lat: row.lat,
    lon: row.lon,
    speed: row.speed,
    limit: row.limit,
    mapLink: row.maps_link,
    receivedAt: row.received_at,
  };
}

class PgEventBatchWriter implements EventBatchWriter {
  constructor(private readonly client: PoolClient) {}

  async append(record: NewEventRecord): Promise<PersistedEvent> {
    const startTime = Date.now();
    await this.client.query('SAVEPOINT event_append');

    try {
      const { rows } = await this.client.query<EventRow>(
        `INSERT INTO events
           (event_type, provider_event_id, vehicle_unit, "timestamp", lat, lon, speed, "limit", maps_link)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING ${COLUMNS}`,
        [
          record.eventType,
          record.providerEventId,
          record.vehicleUnit,
          record.timestamp,
          record.lat,
          record.lon,
          record.speed,
          record.limit,
          record.mapLink,
        ]
      );

      const [row] = rows;
      if (!row) {
        throw new PersistenceError('Event insert returned no rows');
      }

      await this.client.query('RELEASE SAVEPOINT event_append');
      logHelpers.dbQuery('INSERT', 'events', Date.now() - startTime);
      return mapEventRow(row);
    } catch (error) {
      await this.client.query('ROLLBACK TO SAVEPOINT event_append');
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(`Failed to insert event: ${errorMessage(error)}`);
    }
  }
}

export class PgEventRepository implements EventStore {
  constructor(private readonly pool: Pool) {}

  withBatch<T>(fn: (writer: EventBatchWriter) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, (client) => fn(new PgEventBatchWriter(client)));
  }

  async listRecent(limit: number): Promise<PersistedEvent[]> {
    const startTime = Date.now();
    try {
      const { rows } = await this.pool.query<EventRow>(
        `SELECT ${COLUMNS} FROM events ORDER BY "timestamp" DESC, id DESC LIMIT $1`,
        [limit]
      );
      logHelpers.dbQuery('SELECT', 'events', Date.now() - startTime);
      return rows.map(mapEventRow);
    } catch (error) {
      logger.error('Failed to list recent events', { limit, error: errorMessage(error) });
      throw new PersistenceError('Failed to query events');
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
