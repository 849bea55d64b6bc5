import type { ZodType, ZodTypeDef } from 'zod';

import { badRequestError } from '../utils/errors';

/** Parses a request body against `schema`, throwing a 400 HttpError carrying the zod issues. */
export const parseBody = <T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T => {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw badRequestError('Request validation failed', parsed.error.flatten());
  }

  return parsed.data;
};
