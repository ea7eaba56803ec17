import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../../config/env';
import { InferenceUnavailableError } from '../../errors';
import type { CompletionRequest, CompletionResponse, CompletionTransport } from './types';

export interface AzureOpenAIOptions {
  endpoint: string;
  apiKey: string;
  deployment: string;
  apiVersion: string;
  timeoutMs: number;
}

const usageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number()
});

const completionBodySchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullable().optional()
          })
          .optional()
      })
    )
    .min(1),
  // a usage block we cannot read drops only the usage
  usage: usageSchema.nullish().catch(undefined)
});

export function azureOptionsFromConfig(config: AppConfig): AzureOpenAIOptions {
  return {
    endpoint: config.AZURE_OPENAI_ENDPOINT,
    apiKey: config.AZURE_OPENAI_API_KEY,
    deployment: config.AZURE_OPENAI_DEPLOYMENT,
    apiVersion: config.AZURE_OPENAI_API_VERSION,
    timeoutMs: config.REQUEST_TIMEOUT_MS
  };
}

/**
 * Summarizes a failed call without the request config, which holds the api key.
 */
export function describeUpstreamError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.response) {
      return `upstream responded with status ${err.response.status}`;
    }
    return `${err.code ?? 'ERR_NETWORK'}: ${err.message}`;
  }
  return err instanceof Error ? err.message : 'unknown error';
}

/**
 * Chat-completions transport for an Azure OpenAI deployment.
 */
export class AzureOpenAIClient implements CompletionTransport {
  private readonly http: AxiosInstance;
  private readonly deployment: string;
  private readonly apiVersion: string;

  constructor(options: AzureOpenAIOptions) {
    this.deployment = options.deployment;
    this.apiVersion = options.apiVersion;
    this.http = axios.create({
      baseURL: options.endpoint.replace(/\/+$/, ''),
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        'api-key': options.apiKey
      }
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    let body: unknown;

    try {
      const res = await this.http.post(
        `/openai/deployments/${encodeURIComponent(this.deployment)}/chat/completions`,
        {
          messages: request.messages,
          max_tokens: request.maxTokens,
          temperature: request.temperature
        },
        { params: { 'api-version': this.apiVersion } }
      );
      body = res.data;
    } catch (err) {
      throw new InferenceUnavailableError({ cause: new Error(describeUpstreamError(err)) });
    }

    const parsed = completionBodySchema.safeParse(body);
    if (!parsed.success) {
      return { content: null, model: this.deployment };
    }

    const content = parsed.data.choices[0]?.message?.content;
    return {
      content: typeof content === 'string' ? content : null,
      model: parsed.data.model ?? this.deployment,
      usage: parsed.data.usage ?? undefined
    };
  }
}
