import { z } from 'zod';

const requiredString = z.string().trim().min(1);

/**
 * Secrets must not be blank but are sent exactly as given
 */
const secretString = z
  .string()
  .min(1)
  .refine((value) => value.trim() !== '', {
    message: 'String must contain at least one non-whitespace character',
  });

/**
 * Fabric name - the controller limits these to 64 characters
 */
export const fabricNameSchema = requiredString.max(64);

/**
 * Switch credential input for default and robot switch credential saves
 */
export const switchCredentialInputSchema = z
  .object({
    switch_username: requiredString,
    switch_password: secretString,
  })
  .strict();

/**
 * User switch credential save input - switches are addressed by serial number
 */
export const userSwitchSaveInputSchema = switchCredentialInputSchema.extend({
  switch_ids: z.array(requiredString).min(1),
});

/**
 * User switch credential delete input
 */
export const userSwitchDeleteInputSchema = z
  .object({
    switch_ids: z.array(requiredString).min(1),
  })
  .strict();

/**
 * Generic query filter accepted by list endpoints
 */
export const queryFilterSchema = z
  .object({
    filter: requiredString.optional(),
    limit: z.number().int().positive().optional(),
    max: z.number().int().positive().optional(),
    offset: z.number().int().nonnegative().optional(),
    sort: requiredString.optional(),
  })
  .strict();

/**
 * Switch inventory query input
 */
export const inventoryGetInputSchema = z
  .object({
    fabric_name: fabricNameSchema,
  })
  .strict();
