import { DEFAULT_CATEGORIES } from '../../schemas/requests';
import { parseClassificationOutput, parseSentimentOutput } from './parsers';
import { buildChatMessages, buildClassificationMessages, buildSentimentMessages } from './prompts';
import type {
  CompletionTransport,
  Inference,
  InferenceKind,
  InferencePayloads,
  InferenceResults
} from './types';

const ANALYSIS_TEMPERATURE = 0.3;
const SENTIMENT_MAX_TOKENS = 200;
const CLASSIFY_MAX_TOKENS = 300;

type InferenceHandlers = {
  [K in InferenceKind]: (payload: InferencePayloads[K]) => Promise<InferenceResults[K]>;
};

/**
 * Turns sentiment, classification and chat requests into one completion call
 * each and shapes the model's text into a typed result. Transport failures
 * propagate as InferenceUnavailableError; unusable output degrades to the
 * parser fallbacks.
 */
export class InferenceClient implements Inference {
  private readonly handlers: InferenceHandlers;

  constructor(private readonly transport: CompletionTransport) {
    this.handlers = {
      sentiment: (payload) => this.analyzeSentiment(payload),
      classify: (payload) => this.classify(payload),
      chat: (payload) => this.chat(payload)
    };
  }

  infer<K extends InferenceKind>(kind: K, payload: InferencePayloads[K]): Promise<InferenceResults[K]> {
    const handler: InferenceHandlers[K] = this.handlers[kind];
    return handler(payload);
  }

  private async analyzeSentiment({ text, language }: InferencePayloads['sentiment']) {
    const res = await this.transport.complete({
      messages: buildSentimentMessages(text, language),
      maxTokens: SENTIMENT_MAX_TOKENS,
      temperature: ANALYSIS_TEMPERATURE
    });
    return parseSentimentOutput(res.content ?? '');
  }

  private async classify({ text, categories }: InferencePayloads['classify']) {
    const candidates = categories && categories.length > 0 ? categories : DEFAULT_CATEGORIES;
    const res = await this.transport.complete({
      messages: buildClassificationMessages(text, candidates),
      maxTokens: CLASSIFY_MAX_TOKENS,
      temperature: ANALYSIS_TEMPERATURE
    });
    return parseClassificationOutput(res.content ?? '', candidates);
  }

  private async chat({ prompt, maxTokens, temperature }: InferencePayloads['chat']) {
    const res = await this.transport.complete({
      messages: buildChatMessages(prompt),
      maxTokens,
      temperature
    });
    return {
      completion: res.content?.trim() ?? '',
      model: res.model,
      tokenUsage: res.usage
    };
  }
}
