import type { z } from 'zod';
import type { normalizedResultSchema } from '../schemas/response.js';

/**
 * NormalizedResult - uniform success/failure/data structure for all endpoints
 */
export type NormalizedResult = z.infer<typeof normalizedResultSchema>;
