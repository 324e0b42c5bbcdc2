/**
 * Alert Dispatcher
 *
 * Formats accepted events into chat alerts and sends them through the
 * injected ChatClient. Delivery is best-effort: failures are logged by
 * dispatchAll() and never retried.
 *
 * Speeding alerts below the mph threshold are suppressed to keep GPS jitter
 * out of the channel.
 */

import type { ChatClient } from '../config/telegram';
import type { EnrichedEvent, EnrichedSafetyEvent, EnrichedSpeedingEvent } from '../models/dtos/webhook.dto';
import { UNIT_UNKNOWN, type SafetyEventType } from '../models/dtos/event.dto';
import { DispatchError, errorMessage } from '../models/errors/api-error';
import { kphToMph } from '../utils/units';
import { withTimeout } from '../utils/timeout';
import { logHelpers, logger } from '../utils/logger';
import { DriverResolver } from './driver-resolver.service';

export const DEFAULT_SPEEDING_THRESHOLD_MPH = 5;

export type DispatchOutcome = 'sent' | 'suppressed';

export interface AlertDispatcherOptions {
  chatId: string;
  sendTimeoutMs: number;
  speedingThresholdMph?: number;
  driverResolver?: DriverResolver;
}

const SAFETY_LABELS: Record<SafetyEventType, string> = {
  hard_brake: 'Hard Brake',
  acceleration: 'Hard Acceleration',
  cornering: 'Harsh Cornering',
  safety: 'Safety Event',
};

/**
 * True when an over-limit value is too small to alert on (strictly below threshold)
 */
export function shouldSuppressSpeeding(overMph: number, thresholdMph = DEFAULT_SPEEDING_THRESHOLD_MPH): boolean {
  return overMph < thresholdMph;
}

/**
 * Escapes the characters legacy Telegram Markdown treats as entity markers
 */
export function escapeMarkdown(value: string): string {
  return value.replace(/[_*`[]/g, '\\$&');
}

export function unitLabel(vehicleUnit: string, vehicleId: number): string {
  return vehicleUnit === UNIT_UNKNOWN || vehicleUnit.trim() === '' ? `Unknown (ID: ${vehicleId})` : vehicleUnit;
}

function withMapLink(lines: string[], mapLink: string | null): string {
  if (mapLink) {
    lines.push(`[View on map](${mapLink})`);
  }
  return lines.join('\n');
}

export function formatSpeedingAlert(alert: EnrichedSpeedingEvent, driverName: string): string {
  const { event } = alert;
  const lines = [
    '🚨 *Speeding Alert*',
    `Driver: ${escapeMarkdown(driverName)}`,
    `Unit: ${escapeMarkdown(unitLabel(alert.vehicleUnit, alert.vehicleId))}`,
    `Vehicle ID: ${alert.vehicleId}`,
    `Event ID: ${event.id}`,
    `Limit: ${kphToMph(event.maxPostedSpeedLimitKph).toFixed(1)} mph`,
    `Speed: ${kphToMph(event.maxVehicleSpeedKph).toFixed(1)} mph`,
    `Over: +${kphToMph(event.maxOverSpeedKph).toFixed(1)} mph`,
  ];
  if (event.status) {
    lines.push(`Status: ${escapeMarkdown(event.status)}`);
  }
  return withMapLink(lines, alert.mapLink);
}

export function formatSafetyAlert(alert: EnrichedSafetyEvent): string {
  return withMapLink(
    [
      `⚠️ *${SAFETY_LABELS[alert.eventType]}*`,
      `Unit: ${escapeMarkdown(unitLabel(alert.vehicleUnit, alert.vehicleId))}`,
    ],
    alert.mapLink
  );
}

export class AlertDispatcher {
  private readonly thresholdMph: number;
  private readonly drivers: DriverResolver;

  constructor(
    private readonly client: ChatClient,
    private readonly options: AlertDispatcherOptions
  ) {
    this.thresholdMph = options.speedingThresholdMph ?? DEFAULT_SPEEDING_THRESHOLD_MPH;
    this.drivers = options.driverResolver ?? new DriverResolver();
  }

  async dispatchSpeeding(alert: EnrichedSpeedingEvent): Promise<DispatchOutcome> {
    const overMph = kphToMph(alert.event.maxOverSpeedKph);

    if (shouldSuppressSpeeding(overMph, this.thresholdMph)) {
      logHelpers.business('speeding alert suppressed', {
        recordId: alert.recordId,
        eventId: alert.event.id,
        overMph: Number(overMph.toFixed(2)),
        thresholdMph: this.thresholdMph,
      });
      return 'suppressed';
    }

    const driverName = await this.drivers.resolve(alert.event.driverId);
    await this.send(formatSpeedingAlert(alert, driverName));
    return 'sent';
  }

  async dispatchSafety(alert: EnrichedSafetyEvent): Promise<'sent'> {
    await this.send(formatSafetyAlert(alert));
    return 'sent';
  }

  dispatch(alert: EnrichedEvent): Promise<DispatchOutcome> {
    return alert.kind === 'speeding' ? this.dispatchSpeeding(alert) : this.dispatchSafety(alert);
  }

  /**
   * Dispatch every alert in order. Never rejects: each failure is logged and
   * the remaining alerts are still attempted.
   */
  async dispatchAll(alerts: EnrichedEvent[]): Promise<DispatchOutcome[]> {
    const outcomes: DispatchOutcome[] = [];

    for (const alert of alerts) {
      try {
        const outcome = await this.dispatch(alert);
        outcomes.push(outcome);
        if (outcome === 'sent') {
          logHelpers.business('alert sent', { recordId: alert.recordId, eventType: alert.eventType });
        }
      } catch (error) {
        logger.error('Failed to deliver alert', {
          recordId: alert.recordId,
          eventType: alert.eventType,
          error: errorMessage(error),
        });
      }
    }

    return outcomes;
  }

  /**
   * A send that outlives sendTimeoutMs is rejected and its request aborted.
   */
  private async send(text: string): Promise<void> {
    const controller = new AbortController();
    try {
      await withTimeout(
        this.client.sendMessage(this.options.chatId, text, controller.signal),
        this.options.sendTimeoutMs,
        () => new DispatchError(`Alert delivery timed out after ${this.options.sendTimeoutMs}ms`)
      );
    } catch (error) {
      if (error instanceof DispatchError) {
        controller.abort(error);
        throw error;
      }
      throw new DispatchError(`Alert delivery failed: ${errorMessage(error)}`);
    }
  }
}
