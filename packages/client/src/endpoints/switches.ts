import { inventoryGetInputSchema } from '../schemas/endpoints.js';
import type { InventoryGetInput } from '../types/endpoints.js';
import type { RequestDescriptor } from '../types/request.js';
import { createDescriptor, validateInput, withQuery } from './descriptor.js';
import { SWITCHES } from './paths.js';

export function switchesInventoryGet(input: InventoryGetInput): RequestDescriptor {
  const description = 'Get Switches Inventory';
  const { fabric_name } = validateInput(input, inventoryGetInputSchema, description);
  return createDescriptor('GET', withQuery(SWITCHES, { fabricName: fabric_name }), description);
}
