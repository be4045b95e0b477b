import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { HttpVerb, RequestDescriptor } from '../types/request.js';

/**
 * Validate caller input against a zod schema
 * @throws {ValidationError} if validation fails
 */
export function validateInput<Output, Input>(
  data: Input,
  schema: ZodType<Output, ZodTypeDef, Input>,
  description: string,
): Output {
  const result = schema.safeParse(data);

  if (!result.success) {
    throw new ValidationError(`Invalid input for ${description}`, result.error);
  }

  return result.data;
}

/**
 * Build a frozen request descriptor
 */
export function createDescriptor(
  verb: HttpVerb,
  path: string,
  description: string,
  body?: unknown,
): RequestDescriptor {
  return Object.freeze({
    verb,
    path,
    description,
    ...(body !== undefined ? { body } : {}),
  });
}

/**
 * Append a query string built from the defined parameters
 */
export function withQuery(
  path: string,
  params: Record<string, string | number | undefined>,
): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  }
  const query = search.toString();
  return query ? `${path}?${query}` : path;
}
