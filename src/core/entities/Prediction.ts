import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { UuidSchema } from './Identifiers.js';

/**
 * Classification result tied to a message/dialog pair.
 * Transient: owned by the request that produced it, never persisted.
 */
export const PredictionSchema = z.object({
  id: UuidSchema,
  message_id: UuidSchema,
  dialog_id: UuidSchema,
  participant_index: z.number().int(),
  is_bot_probability: z.number().finite().min(0).max(1),
});

export type Prediction = z.infer<typeof PredictionSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
}

export function createPrediction(input: unknown): Prediction {
  const result = PredictionSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid prediction', formatIssues(result.error));
  }
  return result.data;
}
