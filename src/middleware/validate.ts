import { z } from 'zod';
import { ValidationError } from './errorHandler';

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Invalid request body', parsed.error.flatten());
  }
  return parsed.data;
}

const idSchema = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(z.number().int().positive());

export function parseId(raw: string): number {
  const parsed = idSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid id "${raw}"`);
  }
  return parsed.data;
}
