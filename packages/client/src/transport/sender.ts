import type { KyInstance } from 'ky';
import type { Logger } from 'pino';
import {
  NdError,
  NetworkError,
  ServerError,
  TransportError,
  ValidationError,
} from '../errors/index.js';
import { extractDiagnosticMessage } from '../response/normalizer.js';
import { sendConfigSchema } from '../schemas/config.js';
import type { SendConfig, SendConfigInput } from '../types/config.js';
import type { RawResponse, RequestDescriptor } from '../types/request.js';
import type { Session } from '../types/session.js';
import {
  createKyInstance,
  type FetchLike,
  headersToRecord,
  parseJsonBody,
  sessionHeaders,
  toNetworkError,
  toRelativePath,
} from '../utils/http.js';
import { sleep } from '../utils/sleep.js';

export interface RequestSenderOptions {
  /** Send configuration; omitted fields take their defaults */
  config?: SendConfigInput;
  /** Transport override, mainly for tests */
  fetch?: FetchLike;
  /** Wait between attempts; defaults to a timer based sleep */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

type AttemptOutcome =
  | { ok: true; response: Omit<RawResponse, 'attempts'> }
  | { ok: false; error: NetworkError };

/**
 * Parse send configuration, filling defaults
 * @throws {ValidationError} if a value is out of range
 */
export function parseSendConfig(input: SendConfigInput): SendConfig {
  const result = sendConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid send configuration', result.error);
  }
  return result.data;
}

/**
 * Dispatches requests for an authenticated session.
 *
 * Every attempt carries the session token and its own timeout. Network
 * errors, timeouts and transient statuses (any 5xx unless
 * `retryStatusCodes` says otherwise) are retried after `sendInterval`, up to
 * `maxAttempts` attempts in total. Any other status is returned as-is for the
 * normalizer to interpret.
 *
 * The configuration can be changed until the first send; the sender keeps no
 * other state between calls, so concurrent sends sharing a session are fine.
 */
export class RequestSender {
  private http: KyInstance;
  private currentConfig: SendConfig;
  private started = false;
  private readonly fetch?: FetchLike;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly log?: Logger;

  constructor(options: RequestSenderOptions = {}) {
    this.currentConfig = parseSendConfig(options.config ?? {});
    this.fetch = options.fetch;
    this.wait = options.sleep ?? sleep;
    this.log = options.logger?.child({ component: 'RequestSender' });
    this.http = createKyInstance({
      timeout: this.currentConfig.timeout,
      fetch: this.fetch,
    });
  }

  /**
   * Effective send configuration
   */
  get config(): Readonly<SendConfig> {
    return this.currentConfig;
  }

  /**
   * Update the send configuration
   * @throws {NdError} once the first request has been sent
   * @throws {ValidationError} if a value is out of range
   */
  configure(update: SendConfigInput): void {
    if (this.started) {
      throw new NdError('Send configuration is read-only after the first send');
    }
    this.currentConfig = parseSendConfig({ ...this.currentConfig, ...update });
    this.http = createKyInstance({
      timeout: this.currentConfig.timeout,
      fetch: this.fetch,
    });
  }

  /**
   * Whether a status is retried
   */
  isTransientStatus(status: number): boolean {
    const { retryStatusCodes } = this.currentConfig;
    return retryStatusCodes ? retryStatusCodes.includes(status) : status >= 500;
  }

  /**
   * Send one request, retrying transient failures
   * @throws {TransportError} when every attempt failed transiently
   */
  async send(session: Session, descriptor: RequestDescriptor): Promise<RawResponse> {
    this.started = true;
    const { maxAttempts, sendInterval } = this.currentConfig;
    const { verb, path } = descriptor;

    for (let attempt = 1; ; attempt += 1) {
      this.log?.debug(
        { verb, path, attempt, description: descriptor.description },
        'Sending request',
      );

      const outcome = await this.attempt(session, descriptor);
      let failure: NetworkError | ServerError;

      if (outcome.ok) {
        const { status } = outcome.response;
        if (!this.isTransientStatus(status)) {
          this.log?.debug({ verb, path, status, attempt }, 'Received response');
          return { ...outcome.response, attempts: attempt };
        }
        const parsed = parseJsonBody(outcome.response.body);
        const diagnostic = parsed.ok ? extractDiagnosticMessage(parsed.value) : undefined;
        failure = new ServerError(diagnostic ?? `HTTP ${status} error`, status);
      } else {
        failure = outcome.error;
      }

      if (attempt >= maxAttempts) {
        this.log?.error(
          { verb, path, attempts: attempt, err: failure },
          'Retries exhausted',
        );
        throw new TransportError(
          `${verb} ${path} failed after ${attempt} attempt(s): ${failure.message}`,
          { attempts: attempt, cause: failure, statusCode: failure.statusCode },
        );
      }

      this.log?.warn(
        { verb, path, attempt, reason: failure.message, sendInterval },
        'Transient failure, retrying',
      );
      await this.wait(sendInterval);
    }
  }

  private async attempt(
    session: Session,
    descriptor: RequestDescriptor,
  ): Promise<AttemptOutcome> {
    const { verb, path, body } = descriptor;
    try {
      const response = await this.http(toRelativePath(path), {
        prefixUrl: session.baseUrl,
        method: verb,
        headers: sessionHeaders(session),
        ...(body !== undefined ? { json: body } : {}),
      });
      return {
        ok: true,
        response: {
          status: response.status,
          headers: headersToRecord(response.headers),
          body: await response.text(),
          verb,
          path,
        },
      };
    } catch (error) {
      return { ok: false, error: toNetworkError(error, this.currentConfig.timeout) };
    }
  }
}
