import { z } from 'zod';

const vaultValue = z.union([z.string(), z.number()]).transform(String);

/**
 * Decrypted vault contents - extra keys are kept but ignored
 */
export const vaultContentsSchema = z
  .object({
    nd_ip4: vaultValue.optional(),
    nd_username: vaultValue.optional(),
    nd_password: vaultValue.optional(),
    nd_domain: vaultValue.optional(),
    nxos_username: vaultValue.optional(),
    nxos_password: vaultValue.optional(),
  })
  .passthrough();
