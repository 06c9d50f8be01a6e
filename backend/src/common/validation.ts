import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from './errors.js';

export function parseOrThrow<Out, In>(schema: ZodType<Out, ZodTypeDef, In>, input: unknown): Out {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ValidationError(message);
  }
  return parsed.data;
}
