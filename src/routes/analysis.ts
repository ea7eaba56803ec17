import { Router, RequestHandler } from 'express';
import { z } from 'zod';
import { getRequestId } from '../middleware/requestContext';
import {
  chatRequestSchema,
  classifyRequestSchema,
  parseBody,
  sentimentRequestSchema
} from '../schemas/requests';
import type { BackgroundTasks } from '../services/background';
import type { Inference, SentimentScores, TokenUsage } from '../services/inference/types';
import type { RequestLogger } from '../services/storage/requestLogger';
import type { Telemetry, TelemetryProperties } from '../services/telemetry/types';

export interface AnalysisDeps {
  inference: Inference;
  requestLogger: RequestLogger;
  telemetry: Telemetry;
  background: BackgroundTasks;
}

export interface SentimentResponse {
  text: string;
  sentiment: string;
  confidence: number;
  scores: SentimentScores;
  processing_time: number;
  request_id: string;
}

export interface ClassifyResponse {
  text: string;
  category: string;
  confidence: number;
  all_scores: Record<string, number>;
  processing_time: number;
  request_id: string;
}

export interface ChatResponse {
  prompt: string;
  completion: string;
  model: string;
  token_usage?: TokenUsage;
  processing_time: number;
  request_id: string;
}

interface RequestScope {
  requestId: string;
  /** seconds since the inference call started */
  elapsed: () => number;
}

interface EndpointDefinition<S extends z.ZodTypeAny, R> {
  /** name stored with the request log */
  endpoint: string;
  /** custom telemetry event recorded per successful request */
  event: string;
  schema: S;
  describe: (input: z.output<S>) => TelemetryProperties;
  execute: (input: z.output<S>, scope: RequestScope) => Promise<R>;
}

function secondsSince(startedAt: bigint): number {
  const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
  return Number((elapsedMs / 1000).toFixed(4));
}

/**
 * validate → infer → respond, then log and emit telemetry in the background.
 * Any error goes to the error middleware, which owns the HTTP mapping.
 */
function inferenceEndpoint<S extends z.ZodTypeAny, R>(
  deps: AnalysisDeps,
  definition: EndpointDefinition<S, R>
): RequestHandler {
  return async (req, res, next) => {
    const requestId = getRequestId(res);
    const timestamp = new Date().toISOString();

    try {
      const input = parseBody(definition.schema, req.body);
      const startedAt = process.hrtime.bigint();
      const response = await definition.execute(input, {
        requestId,
        elapsed: () => secondsSince(startedAt)
      });

      res.json(response);

      deps.background.schedule(`log:${definition.endpoint}`, () =>
        deps.requestLogger.log({
          request_id: requestId,
          timestamp,
          endpoint: definition.endpoint,
          request: input,
          response
        })
      );
      deps.background.schedule(`telemetry:${definition.event}`, () =>
        deps.telemetry.record({
          type: 'event',
          name: definition.event,
          properties: { request_id: requestId, ...definition.describe(input) }
        })
      );
    } catch (err) {
      next(err);
    }
  };
}

export function createAnalysisRouter(deps: AnalysisDeps): Router {
  const router = Router();

  /**
   * POST /api/v1/sentiment
   * Body: { text, language? }
   */
  router.post(
    '/sentiment',
    inferenceEndpoint(deps, {
      endpoint: 'sentiment_analysis',
      event: 'sentiment_analysis_request',
      schema: sentimentRequestSchema,
      describe: (input) => ({ text_length: input.text.length, language: input.language }),
      execute: async (input, scope): Promise<SentimentResponse> => {
        const result = await deps.inference.infer('sentiment', {
          text: input.text,
          language: input.language
        });
        return {
          text: input.text,
          sentiment: result.sentiment,
          confidence: result.confidence,
          scores: result.scores,
          processing_time: scope.elapsed(),
          request_id: scope.requestId
        };
      }
    })
  );

  /**
   * POST /api/v1/classify
   * Body: { text, categories? }
   */
  router.post(
    '/classify',
    inferenceEndpoint(deps, {
      endpoint: 'text_classification',
      event: 'text_classification_request',
      schema: classifyRequestSchema,
      describe: (input) => ({
        text_length: input.text.length,
        has_custom_categories: input.categories !== undefined
      }),
      execute: async (input, scope): Promise<ClassifyResponse> => {
        const result = await deps.inference.infer('classify', {
          text: input.text,
          categories: input.categories
        });
        return {
          text: input.text,
          category: result.category,
          confidence: result.confidence,
          all_scores: result.allScores,
          processing_time: scope.elapsed(),
          request_id: scope.requestId
        };
      }
    })
  );

  /**
   * POST /api/v1/chat
   * Body: { prompt, max_tokens?, temperature? }
   */
  router.post(
    '/chat',
    inferenceEndpoint(deps, {
      endpoint: 'chat_completion',
      event: 'chat_completion_request',
      schema: chatRequestSchema,
      describe: (input) => ({
        prompt_length: input.prompt.length,
        max_tokens: input.max_tokens,
        temperature: input.temperature
      }),
      execute: async (input, scope): Promise<ChatResponse> => {
        const result = await deps.inference.infer('chat', {
          prompt: input.prompt,
          maxTokens: input.max_tokens,
          temperature: input.temperature
        });
        return {
          prompt: input.prompt,
          completion: result.completion,
          model: result.model,
          token_usage: result.tokenUsage,
          processing_time: scope.elapsed(),
          request_id: scope.requestId
        };
      }
    })
  );

  return router;
}
