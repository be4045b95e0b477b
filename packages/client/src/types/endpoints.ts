import type { z } from 'zod';
import type {
  inventoryGetInputSchema,
  queryFilterSchema,
  switchCredentialInputSchema,
  userSwitchDeleteInputSchema,
  userSwitchSaveInputSchema,
} from '../schemas/endpoints.js';

export type SwitchCredentialInput = z.input<typeof switchCredentialInputSchema>;

export type UserSwitchSaveInput = z.input<typeof userSwitchSaveInputSchema>;

export type UserSwitchDeleteInput = z.input<typeof userSwitchDeleteInputSchema>;

/**
 * QueryFilter - Lucene style `filter`, paging and `sort` (prefix `-` for descending)
 */
export type QueryFilter = z.input<typeof queryFilterSchema>;

export type InventoryGetInput = z.input<typeof inventoryGetInputSchema>;
