import { fabricGet, fabricsGet } from '../endpoints/index.js';
import type { QueryFilter } from '../types/endpoints.js';
import type { NormalizedResult } from '../types/response.js';
import { BaseResource } from './base.js';

/**
 * Fabrics API resource
 */
export class FabricsResource extends BaseResource {
  /**
   * List fabrics, optionally filtered, paged and sorted
   */
  async list(query?: QueryFilter): Promise<NormalizedResult> {
    return this.dispatch(fabricsGet(query));
  }

  /**
   * Get a single fabric by name
   */
  async get(fabricName: string): Promise<NormalizedResult> {
    return this.dispatch(fabricGet(fabricName));
  }
}
