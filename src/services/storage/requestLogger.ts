import logger from '../../utils/logger';
import type { Telemetry } from '../telemetry/types';
import { describeStorageError } from './blobLogStore';
import type { LogEntry, LogStore } from './types';

export const LOG_PREFIX = 'logs';
export const LOG_FAILURE_METRIC = 'request_log_failures';

/** YYYYMMDD in UTC */
export function formatDatePrefix(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

export function buildLogKey(requestId: string, at: Date): string {
  return `${LOG_PREFIX}/${formatDatePrefix(at)}/${requestId}.json`;
}

/**
 * Writes request/response pairs to the log store. Best effort: every failure
 * is logged and counted, none is thrown.
 */
export class RequestLogger {
  constructor(
    private readonly store: LogStore | null,
    private readonly telemetry: Telemetry
  ) {}

  get enabled(): boolean {
    return this.store !== null;
  }

  async log(entry: LogEntry): Promise<boolean> {
    if (!this.store) {
      logger.debug({ requestId: entry.request_id }, 'Log store not configured, skipping request log');
      return false;
    }

    const handledAt = new Date(entry.timestamp);
    const key = buildLogKey(entry.request_id, Number.isNaN(handledAt.getTime()) ? new Date() : handledAt);

    try {
      const document = JSON.stringify({ ...entry, logged_at: new Date().toISOString() }, null, 2);
      await this.store.put(key, document);
      logger.debug({ key }, 'Saved request log');
      return true;
    } catch (err) {
      const reason = describeStorageError(err);
      logger.warn({ err: reason, key }, 'Failed to save request log');
      this.telemetry.record({
        type: 'counter',
        name: LOG_FAILURE_METRIC,
        value: 1,
        properties: { endpoint: entry.endpoint, status: reason.statusCode, code: reason.code }
      });
      return false;
    }
  }
}
