import { z } from 'zod';

const UUID_V4_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/**
 * Version 4 UUID, stored in lowercase so one identifier has exactly one spelling
 */
export const UuidSchema = z
  .string()
  .regex(UUID_V4_PATTERN, 'Invalid uuid')
  .transform((value) => value.toLowerCase());
