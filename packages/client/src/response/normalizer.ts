import { ResponseFormatError } from '../errors/index.js';
import {
  diagnosticBodySchema,
  diagnosticEntrySchema,
  normalizedResultSchema,
} from '../schemas/response.js';
import type { RawResponse } from '../types/request.js';
import type { NormalizedResult } from '../types/response.js';
import { parseJsonBody } from '../utils/http.js';

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * Pull the controller's diagnostic message out of a response body.
 * Checks `message`, `error`, `description`, then the first entry of `errors`.
 */
export function extractDiagnosticMessage(body: unknown): string | undefined {
  const result = diagnosticBodySchema.safeParse(body);
  if (!result.success) {
    return undefined;
  }

  const { message, error, description, errors } = result.data;
  const first = diagnosticEntrySchema.safeParse(errors?.[0]);
  let fromErrors: string | undefined;
  if (first.success) {
    fromErrors = typeof first.data === 'string' ? first.data : first.data.message;
  }

  return [message, error, description, fromErrors].find(
    (candidate): candidate is string =>
      candidate !== undefined && candidate.trim() !== '',
  );
}

function isNormalizedResult(input: RawResponse | NormalizedResult): input is NormalizedResult {
  return normalizedResultSchema.safeParse(input).success;
}

/**
 * Map a raw controller response into a NormalizedResult.
 *
 * - any 2xx is success, everything else is failure
 * - `message` comes from the controller's diagnostic field, else a generic
 *   description of the status
 * - failures are returned, not thrown; an input already normalized is
 *   returned unchanged
 *
 * @throws {ResponseFormatError} if a 2xx response carries a body that is not JSON
 */
export function normalize(input: RawResponse | NormalizedResult): NormalizedResult {
  if (isNormalizedResult(input)) {
    return input;
  }

  const { status, body } = input;
  const success = isSuccessStatus(status);
  const parsed = parseJsonBody(body);

  if (!parsed.ok) {
    if (success) {
      throw new ResponseFormatError(
        `Unparseable response body for ${input.verb} ${input.path} (HTTP ${status})`,
        body,
        status,
      );
    }
    return {
      success,
      status_code: status,
      message: `HTTP ${status} error`,
      data: null,
    };
  }

  const diagnostic = extractDiagnosticMessage(parsed.value);
  return {
    success,
    status_code: status,
    message: diagnostic ?? (success ? `HTTP ${status} OK` : `HTTP ${status} error`),
    data: parsed.value,
  };
}
