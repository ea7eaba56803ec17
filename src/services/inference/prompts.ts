import type { ChatMessage } from './types';

export const SENTIMENT_SYSTEM_PROMPT = 'You are a sentiment analysis AI. Respond only with JSON.';
export const CLASSIFY_SYSTEM_PROMPT = 'You are a text classification AI. Respond only with JSON.';
export const CHAT_SYSTEM_PROMPT = 'You are a helpful AI assistant.';

export function buildSentimentMessages(text: string, language: string): ChatMessage[] {
  const prompt = `Analyze the sentiment of the following text (language: ${language}) and respond with a JSON object containing:
- sentiment: one of "positive", "negative", or "neutral"
- confidence: a number between 0 and 1
- scores: an object with scores for positive, negative, and neutral that sum to 1

Text: ${text}

Respond only with the JSON object, no additional text.`;

  return [
    { role: 'system', content: SENTIMENT_SYSTEM_PROMPT },
    { role: 'user', content: prompt }
  ];
}

export function buildClassificationMessages(text: string, categories: readonly string[]): ChatMessage[] {
  const prompt = `Classify the following text into one of these categories: ${categories.join(', ')}

Text: ${text}

Respond with a JSON object containing:
- category: the best matching category, spelled exactly as listed
- confidence: a number between 0 and 1
- all_scores: an object with a score between 0 and 1 for each category

Respond only with the JSON object.`;

  return [
    { role: 'system', content: CLASSIFY_SYSTEM_PROMPT },
    { role: 'user', content: prompt }
  ];
}

export function buildChatMessages(prompt: string): ChatMessage[] {
  return [
    { role: 'system', content: CHAT_SYSTEM_PROMPT },
    { role: 'user', content: prompt }
  ];
}
