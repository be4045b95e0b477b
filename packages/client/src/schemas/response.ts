import { z } from 'zod';

/**
 * Normalized result returned to every caller regardless of endpoint
 */
export const normalizedResultSchema = z
  .object({
    success: z.boolean(),
    status_code: z.number().int().min(100).max(599),
    message: z.string(),
    data: z.unknown(),
  })
  .strict();

const diagnosticText = z.string().optional().catch(undefined);

/**
 * Diagnostic fields the controller puts in a response body. Each field is
 * read on its own; a field of another type counts as absent.
 */
export const diagnosticBodySchema = z.object({
  message: diagnosticText,
  error: diagnosticText,
  description: diagnosticText,
  errors: z.array(z.unknown()).optional().catch(undefined),
});

/**
 * Entry of a diagnostic `errors` list
 */
export const diagnosticEntrySchema = z.union([
  z.string(),
  z.object({ message: z.string() }).passthrough(),
]);
