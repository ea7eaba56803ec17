export type Sentiment = 'positive' | 'negative' | 'neutral';

export const SENTIMENTS: readonly Sentiment[] = ['positive', 'negative', 'neutral'];

export type SentimentScores = Record<Sentiment, number>;

export interface SentimentResult {
  sentiment: Sentiment;
  confidence: number;
  scores: SentimentScores;
}

export interface ClassificationResult {
  category: string;
  confidence: number;
  allScores: Record<string, number>;
}

export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatResult {
  completion: string;
  model: string;
  tokenUsage?: TokenUsage;
}

export interface InferencePayloads {
  sentiment: { text: string; language: string };
  classify: { text: string; categories?: readonly string[] };
  chat: { prompt: string; maxTokens: number; temperature: number };
}

export interface InferenceResults {
  sentiment: SentimentResult;
  classify: ClassificationResult;
  chat: ChatResult;
}

export type InferenceKind = keyof InferencePayloads;

export interface Inference {
  infer<K extends InferenceKind>(kind: K, payload: InferencePayloads[K]): Promise<InferenceResults[K]>;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
}

export interface CompletionResponse {
  /** null when the endpoint answered but the body carried no usable text */
  content: string | null;
  model: string;
  usage?: TokenUsage;
}

export interface CompletionTransport {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
