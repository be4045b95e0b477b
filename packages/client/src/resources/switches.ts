import { switchesInventoryGet } from '../endpoints/index.js';
import type { NormalizedResult } from '../types/response.js';
import { BaseResource } from './base.js';

/**
 * Switches API resource
 */
export class SwitchesResource extends BaseResource {
  /**
   * Get the switch inventory of a fabric
   */
  async inventory(fabricName: string): Promise<NormalizedResult> {
    return this.dispatch(switchesInventoryGet({ fabric_name: fabricName }));
  }
}
