import type { NormalizedResult } from '../types/response.js';
import type { RequestDescriptor } from '../types/request.js';

/**
 * Sends a descriptor for the current session and normalizes the outcome
 */
export type Dispatch = (descriptor: RequestDescriptor) => Promise<NormalizedResult>;

/**
 * Base resource class - resources only build descriptors and hand them to the client
 */
export abstract class BaseResource {
  protected readonly dispatch: Dispatch;

  constructor(dispatch: Dispatch) {
    this.dispatch = dispatch;
  }
}
