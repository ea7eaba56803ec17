import { TelemetryClient } from 'applicationinsights';
import logger from '../../utils/logger';
import type { Telemetry, TelemetryEvent, TelemetryProperties } from './types';

const FLUSH_TIMEOUT_MS = 5000;

function toProperties(properties: TelemetryProperties | undefined): Record<string, string> | undefined {
  if (!properties) {
    return undefined;
  }
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(properties)) {
    if (value !== undefined) {
      out[key] = String(value);
    }
  }
  return out;
}

/**
 * Application Insights backed telemetry. The SDK batches and sends on its own
 * schedule; this class only translates events.
 */
export class AppInsightsTelemetry implements Telemetry {
  readonly enabled = true;
  private readonly client: TelemetryClient;

  constructor(connectionString: string) {
    this.client = new TelemetryClient(connectionString);
  }

  record(event: TelemetryEvent): void {
    try {
      this.dispatch(event);
    } catch (err) {
      logger.warn({ err, eventType: event.type }, 'Failed to record telemetry');
    }
  }

  flush(): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, FLUSH_TIMEOUT_MS).unref();
      this.client.flush({ callback: () => resolve() });
    });
  }

  private dispatch(event: TelemetryEvent): void {
    switch (event.type) {
      case 'request':
        this.client.trackRequest({
          name: event.name,
          url: event.url,
          duration: event.durationMs,
          resultCode: event.statusCode,
          success: event.statusCode < 400
        });
        return;
      case 'exception': {
        const exception = new Error(event.message);
        exception.name = event.kind;
        this.client.trackException({ exception, properties: toProperties(event.properties) });
        return;
      }
      case 'counter':
        this.client.trackMetric({
          name: event.name,
          value: event.value,
          properties: toProperties(event.properties)
        });
        return;
      case 'event':
        this.client.trackEvent({ name: event.name, properties: toProperties(event.properties) });
        return;
    }
  }
}
