import type { z } from 'zod';
import type { loginResponseSchema } from '../schemas/auth.js';

/**
 * LoginRequest - body of the controller login call
 */
export interface LoginRequest {
  userName: string;
  userPasswd: string;
  domain: string;
}

/**
 * LoginResponse - body returned by a successful login
 */
export type LoginResponse = z.infer<typeof loginResponseSchema>;

/**
 * Session - server-issued proof of authentication, read-only once created
 */
export interface Session {
  readonly token: string;
  readonly address: string;
  readonly domain: string;
  /** Origin every request of this session is sent to, e.g. `https://10.1.1.1` */
  readonly baseUrl: string;
  /** Raw Set-Cookie values returned by the login call, replayed on every request */
  readonly cookies: readonly string[];
  readonly createdAt: Date;
}
