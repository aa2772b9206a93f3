/**
 * Notification tracker.
 *
 * Persists, per instance, when its owner was last told the instance will be stopped,
 * so owners are not emailed on every run.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { InstanceSummary } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('power-control:tracker');

const HOUR_MS = 60 * 60 * 1000;

/**
 * Raised when the tracking file exists but cannot be read or parsed.
 */
export class TrackingFileError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TrackingFileError';
  }
}

export type NotificationTimes = Map<string, Date>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class NotificationTracker {
  private readonly filePath: string;
  private readonly waitHours: number;

  /**
   * @param filePath - JSON file holding `{ instanceId: ISO timestamp }`
   * @param waitHours - Hours before the same instance may be notified again
   */
  constructor(filePath: string, waitHours: number) {
    this.filePath = filePath;
    this.waitHours = waitHours;
  }

  /**
   * Read notification times from disk. A missing file means nothing was notified yet.
   *
   * @throws {TrackingFileError} If the file is unreadable or not a JSON object
   */
  async load(): Promise<NotificationTimes> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.debug({ trackingFile: this.filePath }, 'Tracking file not found, starting empty');
        return new Map();
      }
      throw new TrackingFileError(`Failed to read tracking file ${this.filePath}`, {
        cause: error,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new TrackingFileError(`Tracking file ${this.filePath} is not valid JSON`, {
        cause: error,
      });
    }

    if (!isRecord(data)) {
      throw new TrackingFileError(`Tracking file ${this.filePath} must contain a JSON object`);
    }

    const times: NotificationTimes = new Map();
    for (const [instanceId, value] of Object.entries(data)) {
      const time = typeof value === 'string' ? new Date(value) : null;
      if (!time || isNaN(time.getTime())) {
        logger.warn({ instanceId, value }, 'Dropping tracking entry with invalid timestamp');
        continue;
      }
      times.set(instanceId, time);
    }

    return times;
  }

  /**
   * Write notification times to disk, keys sorted.
   */
  async save(times: NotificationTimes): Promise<void> {
    const data: Record<string, string> = {};
    for (const instanceId of [...times.keys()].sort()) {
      const time = times.get(instanceId);
      if (time) {
        data[instanceId] = time.toISOString();
      }
    }

    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.writeFile(this.filePath, JSON.stringify(data, null, 1) + '\n', 'utf-8');
    logger.debug({ trackingFile: this.filePath, entries: times.size }, 'Tracking file saved');
  }

  /**
   * Filter out instances whose owner was notified within the wait period and
   * record the rest as notified at `now`.
   *
   * Records older than the wait period are pruned before filtering.
   *
   * @param instances - Instances about to be stopped
   * @param now - Current instant
   * @returns Instances whose owners should be notified on this run
   */
  async filterNotifiable(instances: InstanceSummary[], now: Date): Promise<InstanceSummary[]> {
    const times = await this.load();
    const waitMs = this.waitHours * HOUR_MS;

    const pruned: NotificationTimes = new Map();
    for (const [instanceId, time] of times) {
      if (time.getTime() + waitMs > now.getTime()) {
        pruned.set(instanceId, time);
      }
    }

    const notifiable: InstanceSummary[] = [];
    for (const instance of instances) {
      if (pruned.has(instance.id)) {
        logger.warn({ instanceId: instance.id }, 'will be stopped but not notified');
      } else {
        pruned.set(instance.id, now);
        notifiable.push(instance);
      }
    }

    await this.save(pruned);
    return notifiable;
  }
}
