import crypto from 'crypto';
import { describe, it, expect } from 'vitest';
import {
  buildLogKey,
  formatDatePrefix,
  LOG_FAILURE_METRIC,
  RequestLogger
} from '../../../src/services/storage/requestLogger';
import type { LogEntry } from '../../../src/services/storage/types';
import { MemoryLogStore, RecordingTelemetry } from '../../helpers/fakes';

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    request_id: '3f1c9a52-7d4e-4b8a-9c61-2e5f0a7b8d90',
    timestamp: '2024-03-05T23:59:59.000Z',
    endpoint: 'sentiment_analysis',
    request: { text: 'I love this product', language: 'en' },
    response: { sentiment: 'positive', confidence: 0.9 },
    ...overrides
  };
}

describe('log keys', () => {
  it('formats the UTC date as YYYYMMDD', () => {
    expect(formatDatePrefix(new Date('2024-03-05T23:59:59Z'))).toBe('20240305');
    expect(formatDatePrefix(new Date('2024-12-31T00:00:00Z'))).toBe('20241231');
  });

  it('puts the request id under the date prefix', () => {
    expect(buildLogKey('abc-123', new Date('2024-03-05T10:00:00Z'))).toBe('logs/20240305/abc-123.json');
  });

  it('never collides for distinct ids within the same millisecond', () => {
    const at = new Date('2024-03-05T10:00:00.123Z');
    const keys = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      keys.add(buildLogKey(crypto.randomUUID(), at));
    }
    expect(keys.size).toBe(1000);
  });
});

describe('RequestLogger', () => {
  it('writes the entry as JSON under its dated key', async () => {
    const store = new MemoryLogStore();
    const logger = new RequestLogger(store, new RecordingTelemetry());

    const saved = await logger.log(entry());

    expect(saved).toBe(true);
    expect([...store.documents.keys()]).toEqual(['logs/20240305/3f1c9a52-7d4e-4b8a-9c61-2e5f0a7b8d90.json']);

    const document = JSON.parse(store.documents.get('logs/20240305/3f1c9a52-7d4e-4b8a-9c61-2e5f0a7b8d90.json') ?? '{}');
    expect(document).toMatchObject({
      request_id: '3f1c9a52-7d4e-4b8a-9c61-2e5f0a7b8d90',
      endpoint: 'sentiment_analysis',
      request: { text: 'I love this product', language: 'en' },
      response: { sentiment: 'positive', confidence: 0.9 }
    });
    expect(typeof document.logged_at).toBe('string');
  });

  it('contains store failures and counts them', async () => {
    const store = new MemoryLogStore();
    store.failWith = Object.assign(new Error('This request is not authorized'), {
      statusCode: 403,
      code: 'AuthorizationFailure'
    });
    const telemetry = new RecordingTelemetry();
    const logger = new RequestLogger(store, telemetry);

    await expect(logger.log(entry())).resolves.toBe(false);

    expect(store.documents.size).toBe(0);
    expect(telemetry.events).toEqual([
      {
        type: 'counter',
        name: LOG_FAILURE_METRIC,
        value: 1,
        properties: { endpoint: 'sentiment_analysis', status: 403, code: 'AuthorizationFailure' }
      }
    ]);
  });

  it('does nothing without a store', async () => {
    const telemetry = new RecordingTelemetry();
    const logger = new RequestLogger(null, telemetry);

    await expect(logger.log(entry())).resolves.toBe(false);
    expect(logger.enabled).toBe(false);
    expect(telemetry.events).toEqual([]);
  });
});
