import { z } from 'zod';
import { formatIssues } from '../../core/entities/Prediction.js';
import { UuidSchema } from '../../core/entities/Identifiers.js';
import { ValidationError } from '../../core/errors.js';

export const ReplyRequestSchema = z.object({
  dialog_id: UuidSchema,
  last_msg_text: z.string().min(1, 'Text must not be empty'),
  last_message_id: UuidSchema.optional(),
});

export const PredictionRequestSchema = z.object({
  id: UuidSchema,
  dialog_id: UuidSchema,
  text: z.string().min(1, 'Text must not be empty'),
  participant_index: z.number().int(),
});

export const DialogIdSchema = UuidSchema;

/**
 * Parse a request payload, raising ValidationError before anything reaches the core
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.infer<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError('Invalid request', formatIssues(result.error));
  }
  return result.data;
}
