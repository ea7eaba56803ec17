import type { Server } from 'http';
import { createServer } from '../../src/server';
import { BackgroundTasks } from '../../src/services/background';
import { InferenceClient } from '../../src/services/inference/inferenceClient';
import type {
  CompletionRequest,
  CompletionResponse,
  CompletionTransport,
  Inference
} from '../../src/services/inference/types';
import { RequestLogger } from '../../src/services/storage/requestLogger';
import type { LogStore } from '../../src/services/storage/types';
import type { Telemetry, TelemetryEvent } from '../../src/services/telemetry/types';

/**
 * Transport that answers every completion with a fixed reply (or error) and
 * keeps the requests it received.
 */
export class StubTransport implements CompletionTransport {
  readonly requests: CompletionRequest[] = [];

  constructor(private reply: CompletionResponse | Error = { content: '', model: 'test-deployment' }) {}

  respondWith(reply: CompletionResponse | Error): void {
    this.reply = reply;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

export function textReply(content: string | null, extra: Partial<CompletionResponse> = {}): CompletionResponse {
  return { content, model: 'test-deployment', ...extra };
}

export class MemoryLogStore implements LogStore {
  readonly documents = new Map<string, string>();
  failWith: Error | null = null;

  async put(key: string, document: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.documents.set(key, document);
  }

  async ping(): Promise<boolean> {
    return this.failWith === null;
  }
}

export class RecordingTelemetry implements Telemetry {
  readonly enabled = true;
  readonly events: TelemetryEvent[] = [];
  flushed = 0;

  record(event: TelemetryEvent): void {
    this.events.push(event);
  }

  async flush(): Promise<void> {
    this.flushed += 1;
  }

  ofType<T extends TelemetryEvent['type']>(type: T): Extract<TelemetryEvent, { type: T }>[] {
    return this.events.filter((event): event is Extract<TelemetryEvent, { type: T }> => event.type === type);
  }
}

export interface TestApp {
  baseUrl: string;
  transport: StubTransport;
  inference: Inference;
  store: MemoryLogStore;
  telemetry: RecordingTelemetry;
  background: BackgroundTasks;
  close: () => Promise<void>;
}

export async function startTestApp(options: { inference?: Inference; transport?: StubTransport } = {}): Promise<TestApp> {
  const transport = options.transport ?? new StubTransport();
  const inference = options.inference ?? new InferenceClient(transport);
  const store = new MemoryLogStore();
  const telemetry = new RecordingTelemetry();
  const background = new BackgroundTasks();

  const app = createServer({
    config: { ALLOWED_ORIGINS: ['*'] },
    inference,
    logStore: store,
    requestLogger: new RequestLogger(store, telemetry),
    telemetry,
    background
  });

  const server: Server = await new Promise((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    transport,
    inference,
    store,
    telemetry,
    background,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
}
