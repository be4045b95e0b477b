import { z } from 'zod';

/**
 * Login response - the controller returns the session token as `jwttoken`,
 * some releases as `token`
 */
export const loginResponseSchema = z
  .object({
    jwttoken: z.string().min(1).optional(),
    token: z.string().min(1).optional(),
  })
  .passthrough();
