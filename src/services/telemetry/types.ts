export type TelemetryProperties = Record<string, string | number | boolean | undefined>;

export type TelemetryEvent =
  | { type: 'request'; name: string; url: string; statusCode: number; durationMs: number }
  | { type: 'exception'; kind: string; message: string; properties?: TelemetryProperties }
  | { type: 'counter'; name: string; value: number; properties?: TelemetryProperties }
  | { type: 'event'; name: string; properties?: TelemetryProperties };

/**
 * Fire-and-forget sink for monitoring data. `record` never throws and never
 * blocks on delivery.
 */
export interface Telemetry {
  readonly enabled: boolean;
  record(event: TelemetryEvent): void;
  flush(): Promise<void>;
}

export const noopTelemetry: Telemetry = {
  enabled: false,
  record: () => undefined,
  flush: async () => undefined
};
