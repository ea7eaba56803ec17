import http from 'http';
import axios from 'axios';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { AzureOpenAIClient } from '../../src/services/inference/azureOpenAIClient';
import { InferenceClient } from '../../src/services/inference/inferenceClient';
import { startTestApp, type TestApp } from '../helpers/fakes';

const API_KEY = 'test-secret-key';

describe('upstream timeout', () => {
  let upstream: http.Server;
  let upstreamHost: string;
  let app: TestApp;

  beforeAll(async () => {
    // accepts requests and never answers
    upstream = http.createServer(() => undefined);
    await new Promise<void>((resolve) => upstream.listen(0, '127.0.0.1', resolve));
    const address = upstream.address();
    if (!address || typeof address === 'string') {
      throw new Error('upstream is not listening');
    }
    upstreamHost = `127.0.0.1:${address.port}`;

    const transport = new AzureOpenAIClient({
      endpoint: `http://${upstreamHost}`,
      apiKey: API_KEY,
      deployment: 'test-deployment',
      apiVersion: '2024-02-15-preview',
      timeoutMs: 200
    });
    app = await startTestApp({ inference: new InferenceClient(transport) });
  });

  afterAll(async () => {
    await app.background.drain();
    await app.close();
    upstream.closeAllConnections();
    await new Promise<void>((resolve) => upstream.close(() => resolve()));
  });

  it('answers 502 promptly without leaking upstream details', async () => {
    const startedAt = Date.now();
    const res = await axios.post(
      `${app.baseUrl}/api/v1/chat`,
      { prompt: 'Hello' },
      { validateStatus: () => true }
    );

    expect(Date.now() - startedAt).toBeLessThan(5000);
    expect(res.status).toBe(502);
    expect(res.data.error.code).toBe('INFERENCE_UNAVAILABLE');

    const body = JSON.stringify(res.data);
    expect(body).not.toContain(API_KEY);
    expect(body).not.toContain(upstreamHost);

    await app.background.drain();
    expect(app.store.documents.size).toBe(0);
  });
});
