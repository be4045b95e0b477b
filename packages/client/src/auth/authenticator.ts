import type { Logger } from 'pino';
import { AuthenticationError, TransportError } from '../errors/index.js';
import { extractDiagnosticMessage } from '../response/normalizer.js';
import { loginResponseSchema } from '../schemas/auth.js';
import type { Credentials } from '../types/credentials.js';
import type { LoginRequest, Session } from '../types/session.js';
import {
  controllerBaseUrl,
  createKyInstance,
  type FetchLike,
  parseJsonBody,
  toNetworkError,
} from '../utils/http.js';

/**
 * Controller login endpoint, relative to the controller origin
 */
export const LOGIN_PATH = 'login';

/**
 * Login domain used when none was resolved
 */
export const DEFAULT_DOMAIN = 'local';

export interface AuthenticateOptions {
  /**
   * Login request timeout in milliseconds
   * @default 30000
   */
  timeout?: number;
  /** Transport override, mainly for tests */
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Exchange credentials for a session with a single login call.
 *
 * @throws {AuthenticationError} if the controller rejects the login, or
 * answers with a body that is not JSON or carries no token
 * @throws {TransportError} if the controller cannot be reached
 */
export async function authenticate(
  credentials: Credentials,
  options: AuthenticateOptions = {},
): Promise<Session> {
  const baseUrl = controllerBaseUrl(credentials.address);
  const domain = credentials.domain ?? DEFAULT_DOMAIN;
  const timeout = options.timeout ?? 30_000;
  const log = options.logger?.child({ component: 'SessionAuthenticator' });
  const http = createKyInstance({ timeout, fetch: options.fetch });

  const body: LoginRequest = {
    userName: credentials.username,
    userPasswd: credentials.password,
    domain,
  };

  log?.debug({ baseUrl, domain, username: credentials.username }, 'Logging in');

  let status: number;
  let text: string;
  let cookies: string[];
  try {
    const response = await http.post(LOGIN_PATH, {
      prefixUrl: baseUrl,
      json: body,
    });
    status = response.status;
    cookies = response.headers.getSetCookie();
    text = await response.text();
  } catch (error) {
    const cause = toNetworkError(error, timeout);
    log?.error({ err: cause }, 'Login request failed');
    throw new TransportError(`Login request to ${baseUrl} failed: ${cause.message}`, {
      attempts: 1,
      cause,
    });
  }

  const parsed = parseJsonBody(text);

  if (status < 200 || status > 299) {
    const diagnostic = parsed.ok ? extractDiagnosticMessage(parsed.value) : undefined;
    log?.warn({ status }, 'Login rejected');
    throw new AuthenticationError(
      diagnostic ?? `Login rejected with HTTP ${status}`,
      status,
    );
  }

  if (!parsed.ok) {
    throw new AuthenticationError('Login response is not valid JSON', status);
  }

  const result = loginResponseSchema.safeParse(parsed.value);
  const token = result.success
    ? (result.data.jwttoken ?? result.data.token)
    : undefined;
  if (token === undefined) {
    throw new AuthenticationError('Login response carries no session token', status);
  }

  log?.info({ baseUrl, domain }, 'Session established');

  return Object.freeze({
    token,
    address: credentials.address,
    domain,
    baseUrl,
    cookies: Object.freeze(cookies),
    createdAt: new Date(),
  });
}
