import { z } from 'zod';
import {
  SENTIMENTS,
  type ClassificationResult,
  type Sentiment,
  type SentimentResult,
  type SentimentScores
} from './types';

// Model output is parsed in two strict forms only: a JSON object, or a single
// "label, confidence" line. Anything else yields the fallback result.

export const UNKNOWN_CATEGORY = 'unknown';

/** Lowest score a synthesized dominant label gets, so it always beats the other two. */
const MIN_DOMINANT_SCORE = 0.34;

const unitInterval = z.number().min(0).max(1);

const sentimentJsonSchema = z.object({
  sentiment: z.string(),
  confidence: unitInterval,
  scores: z.record(z.unknown()).optional()
});

const classificationJsonSchema = z.object({
  category: z.string(),
  confidence: unitInterval,
  all_scores: z.record(z.unknown()).optional()
});

const LABEL_LINE = /^\s*["']?([^,:\n"']+?)["']?\s*[,:]\s*([0-9]*\.?[0-9]+)\s*\.?\s*$/;

export function sentimentFallback(): SentimentResult {
  return {
    sentiment: 'neutral',
    confidence: 0,
    scores: { positive: 0, negative: 0, neutral: 1 }
  };
}

export function classificationFallback(categories: readonly string[]): ClassificationResult {
  return {
    category: UNKNOWN_CATEGORY,
    confidence: 0,
    allScores: Object.fromEntries(categories.map((category) => [category, 0]))
  };
}

/**
 * Returns the parsed JSON object found in the text, if any.
 * Accepts a bare object or one wrapped in a markdown code fence.
 */
export function extractJsonObject(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const candidate = (fenced?.[1] ?? text).trim();
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return undefined;
  }

  try {
    return JSON.parse(candidate.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

export function parseLabelLine(text: string): { label: string; confidence: number } | undefined {
  const match = LABEL_LINE.exec(text.trim());
  if (!match?.[1] || !match[2]) {
    return undefined;
  }

  const confidence = Number(match[2]);
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    return undefined;
  }
  return { label: match[1].trim(), confidence };
}

function toSentiment(label: string): Sentiment | undefined {
  const normalized = label.trim().toLowerCase();
  return SENTIMENTS.find((sentiment) => sentiment === normalized);
}

function isDominant(scores: SentimentScores, label: Sentiment): boolean {
  return SENTIMENTS.every((key) => key === label || scores[key] < scores[label]);
}

function normalizeScores(raw: Record<string, unknown> | undefined): SentimentScores | undefined {
  if (!raw) {
    return undefined;
  }

  const values = SENTIMENTS.map((key) => raw[key]);
  if (!values.every((value): value is number => typeof value === 'number' && Number.isFinite(value) && value >= 0)) {
    return undefined;
  }

  const total = values.reduce((sum, value) => sum + value, 0);
  if (total <= 0) {
    return undefined;
  }

  const [positive, negative, neutral] = values.map((value) => value / total);
  return { positive, negative, neutral };
}

export function synthesizeScores(label: Sentiment, confidence: number): SentimentScores {
  const top = Math.max(confidence, MIN_DOMINANT_SCORE);
  const rest = (1 - top) / 2;
  return {
    positive: label === 'positive' ? top : rest,
    negative: label === 'negative' ? top : rest,
    neutral: label === 'neutral' ? top : rest
  };
}

function buildSentiment(
  label: Sentiment,
  confidence: number,
  rawScores?: Record<string, unknown>
): SentimentResult {
  const normalized = normalizeScores(rawScores);
  const scores = normalized && isDominant(normalized, label) ? normalized : synthesizeScores(label, confidence);
  return { sentiment: label, confidence, scores };
}

export function parseSentimentOutput(text: string): SentimentResult {
  const json = sentimentJsonSchema.safeParse(extractJsonObject(text));
  if (json.success) {
    const label = toSentiment(json.data.sentiment);
    return label ? buildSentiment(label, json.data.confidence, json.data.scores) : sentimentFallback();
  }

  const line = parseLabelLine(text);
  const label = line ? toSentiment(line.label) : undefined;
  if (line && label) {
    return buildSentiment(label, line.confidence);
  }

  return sentimentFallback();
}

function matchCategory(label: string, categories: readonly string[]): string | undefined {
  const normalized = label.trim().toLowerCase();
  return categories.find((category) => category.toLowerCase() === normalized);
}

function buildClassification(
  category: string,
  confidence: number,
  categories: readonly string[],
  rawScores?: Record<string, unknown>
): ClassificationResult {
  const allScores: Record<string, number> = {};
  for (const candidate of categories) {
    const raw = rawScores?.[candidate];
    if (typeof raw === 'number' && raw >= 0 && raw <= 1) {
      allScores[candidate] = raw;
    } else {
      allScores[candidate] = candidate === category ? confidence : 0;
    }
  }
  return { category, confidence, allScores };
}

export function parseClassificationOutput(text: string, categories: readonly string[]): ClassificationResult {
  const json = classificationJsonSchema.safeParse(extractJsonObject(text));
  if (json.success) {
    const category = matchCategory(json.data.category, categories);
    return category
      ? buildClassification(category, json.data.confidence, categories, json.data.all_scores)
      : classificationFallback(categories);
  }

  const line = parseLabelLine(text);
  const category = line ? matchCategory(line.label, categories) : undefined;
  if (line && category) {
    return buildClassification(category, line.confidence, categories);
  }

  return classificationFallback(categories);
}
