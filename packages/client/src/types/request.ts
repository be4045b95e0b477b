/**
 * HTTP verbs the controller API uses
 */
export type HttpVerb = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/**
 * RequestDescriptor - one pre-validated controller call
 */
export interface RequestDescriptor {
  readonly verb: HttpVerb;
  /** Absolute API path, query string included, e.g. `/api/v1/manage/fabrics?category=fabric` */
  readonly path: string;
  readonly body?: unknown;
  /** Human readable name of the operation, used in logs */
  readonly description?: string;
}

/**
 * RawResponse - what the sender got back on its final attempt
 */
export interface RawResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  /** Body text exactly as received */
  readonly body: string;
  readonly verb: HttpVerb;
  readonly path: string;
  readonly attempts: number;
}
