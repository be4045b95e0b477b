import type { Logger } from 'pino';
import { authenticate } from './auth/authenticator.js';
import type { ClientConfig } from './config.js';
import { resolveCredentials } from './credentials/resolver.js';
import {
  CredentialsResource,
  FabricsResource,
  SwitchesResource,
} from './resources/index.js';
import { normalize } from './response/normalizer.js';
import { RequestSender } from './transport/sender.js';
import type { RequestDescriptor } from './types/request.js';
import type { NormalizedResult } from './types/response.js';
import type { Session } from './types/session.js';
import { createLogger } from './utils/logger.js';

export interface NdClientOptions {
  session: Session;
  sender: RequestSender;
  logger?: Logger;
}

/**
 * Main Nexus Dashboard API client
 *
 * @example
 * ```typescript
 * // ND_IP4, ND_USERNAME and ND_PASSWORD set in the environment
 * const client = await NdClient.connect({ send: { sendInterval: 2000 } });
 *
 * const result = await client.credentials.saveDefaultSwitch({
 *   switch_username: 'admin',
 *   switch_password: 'password',
 * });
 * if (!result.success) {
 *   console.error(result.message);
 * }
 * ```
 */
export class NdClient {
  /**
   * Authenticated session every request is sent with
   */
  public readonly session: Session;

  /**
   * Switch credentials API resource
   */
  public readonly credentials: CredentialsResource;

  /**
   * Fabrics API resource
   */
  public readonly fabrics: FabricsResource;

  /**
   * Switches API resource
   */
  public readonly switches: SwitchesResource;

  private readonly sender: RequestSender;
  private readonly log?: Logger;

  /**
   * Create a client for an existing session
   */
  constructor(options: NdClientOptions) {
    this.session = options.session;
    this.sender = options.sender;
    this.log = options.logger?.child({ component: 'NdClient' });

    const dispatch = (descriptor: RequestDescriptor) => this.request(descriptor);
    this.credentials = new CredentialsResource(dispatch);
    this.fabrics = new FabricsResource(dispatch);
    this.switches = new SwitchesResource(dispatch);
  }

  /**
   * Resolve credentials, log in and return a ready client.
   *
   * @throws {CredentialError} if credentials are incomplete
   * @throws {AuthenticationError} if the controller rejects the login
   * @throws {TransportError} if the controller cannot be reached
   */
  static async connect(config: ClientConfig = {}): Promise<NdClient> {
    const logger = config.logger ?? createLogger({ env: config.env });
    const sender = new RequestSender({
      config: config.send,
      fetch: config.fetch,
      sleep: config.sleep,
      logger,
    });

    const credentials = await resolveCredentials(config.credentials, {
      env: config.env,
      vault: config.vault,
      logger,
    });
    const session = await authenticate(credentials, {
      timeout: sender.config.timeout,
      fetch: config.fetch,
      logger,
    });

    return new NdClient({ session, sender, logger });
  }

  /**
   * Send a descriptor and normalize the response.
   * Failed statuses come back as `success: false`, they are not thrown.
   *
   * @throws {TransportError} when every attempt failed transiently
   * @throws {ResponseFormatError} if a successful response cannot be parsed
   */
  async request(descriptor: RequestDescriptor): Promise<NormalizedResult> {
    const raw = await this.sender.send(this.session, descriptor);
    const result = normalize(raw);
    this.log?.debug(
      { verb: descriptor.verb, path: descriptor.path, success: result.success },
      result.message,
    );
    return result;
  }
}
