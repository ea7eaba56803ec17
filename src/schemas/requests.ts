import { z } from 'zod';
import { ValidationError } from '../errors';

export const MAX_TEXT_LENGTH = 5000;

export const DEFAULT_CATEGORIES = [
  'Technology',
  'Business',
  'Sports',
  'Entertainment',
  'Politics',
  'Health'
] as const;

const inputText = z
  .string()
  .min(1, 'must not be empty')
  .max(MAX_TEXT_LENGTH, `must be at most ${MAX_TEXT_LENGTH} characters`)
  .refine((value) => value.trim().length > 0, 'must not be blank');

export const sentimentRequestSchema = z.object({
  text: inputText,
  language: z.string().min(1).max(35).default('en')
});

export const classifyRequestSchema = z.object({
  text: inputText,
  categories: z.array(z.string().trim().min(1).max(100)).min(1).max(20).optional()
});

export const chatRequestSchema = z.object({
  prompt: inputText,
  max_tokens: z.number().int().min(1).max(4000).default(150),
  temperature: z.number().min(0).max(2).default(0.7)
});

export type SentimentRequest = z.infer<typeof sentimentRequestSchema>;
export type ClassifyRequest = z.infer<typeof classifyRequestSchema>;
export type ChatRequest = z.infer<typeof chatRequestSchema>;

/**
 * Validates an untrusted request body, turning zod issues into a
 * ValidationError with one entry per offending field.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body ?? {});
  if (result.success) {
    return result.data;
  }

  throw new ValidationError(
    result.error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join('.') : 'body',
      message: issue.message
    }))
  );
}
