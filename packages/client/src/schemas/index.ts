export { loginResponseSchema } from './auth.js';
export {
  logLevelSchema,
  loggingConfigSchema,
  sendConfigSchema,
} from './config.js';
export { vaultContentsSchema } from './credentials.js';
export {
  fabricNameSchema,
  inventoryGetInputSchema,
  queryFilterSchema,
  switchCredentialInputSchema,
  userSwitchDeleteInputSchema,
  userSwitchSaveInputSchema,
} from './endpoints.js';
export {
  diagnosticBodySchema,
  diagnosticEntrySchema,
  normalizedResultSchema,
} from './response.js';
