import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import {
  NdError,
  NetworkError,
  ServerError,
  TransportError,
  ValidationError,
} from '../../src/errors/index.js';
import { RequestSender } from '../../src/transport/sender.js';
import type {
  RequestDescriptor,
  SendConfigInput,
  Session,
} from '../../src/types/index.js';
import type { FetchLike } from '../../src/utils/http.js';

const session: Session = Object.freeze({
  token: 'test-token',
  address: '10.1.1.1',
  domain: 'local',
  baseUrl: 'https://10.1.1.1',
  cookies: [],
  createdAt: new Date('2026-01-20T10:00:00.000Z'),
});

const descriptor: RequestDescriptor = Object.freeze({
  verb: 'GET',
  path: '/api/v1/manage/fabrics?category=fabric',
  description: 'Get Fabric Details',
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestOf(fetchMock: Mock<FetchLike>, call = 0): Request {
  const input = fetchMock.mock.calls[call]?.[0];
  if (!(input instanceof Request)) {
    throw new Error('expected a Request');
  }
  return input;
}

describe('RequestSender', () => {
  let fetchMock: Mock<FetchLike>;
  let sleepMock: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    fetchMock = vi.fn<FetchLike>();
    sleepMock = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  });

  function createSender(config: SendConfigInput = {}): RequestSender {
    return new RequestSender({ config, fetch: fetchMock, sleep: sleepMock });
  }

  describe('config', () => {
    it('should apply defaults', () => {
      expect(createSender().config).toEqual({
        timeout: 30_000,
        sendInterval: 5_000,
        maxAttempts: 3,
      });
    });

    it('should reject invalid configuration', () => {
      expect(() => createSender({ maxAttempts: 0 })).toThrow(ValidationError);
      expect(() => createSender({ maxAttempts: 0 })).toThrow('Invalid send configuration');
    });

    it('should allow changes before the first send', () => {
      const sender = createSender();
      sender.configure({ sendInterval: 100 });

      expect(sender.config.sendInterval).toBe(100);
      expect(sender.config.maxAttempts).toBe(3);
    });

    it('should be read-only after the first send', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ fabrics: [] }));
      const sender = createSender();
      await sender.send(session, descriptor);

      expect(() => sender.configure({ sendInterval: 100 })).toThrow(NdError);
      expect(() => sender.configure({ sendInterval: 100 })).toThrow(
        'Send configuration is read-only after the first send',
      );
      expect(sender.config.sendInterval).toBe(5_000);
    });
  });

  describe('send()', () => {
    it('should attach the session to the request', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ fabrics: [] }));

      await createSender().send(session, descriptor);

      const request = requestOf(fetchMock);
      expect(request.method).toBe('GET');
      expect(request.url).toBe('https://10.1.1.1/api/v1/manage/fabrics?category=fabric');
      expect(request.headers.get('authorization')).toBe('Bearer test-token');
      expect(request.headers.get('cookie')).toBe('AuthCookie=test-token');
      expect(request.headers.get('accept')).toBe('application/json');
    });

    it('should send the descriptor body as JSON', async () => {
      let received: unknown;
      fetchMock.mockImplementationOnce(async (input) => {
        if (input instanceof Request) {
          received = await input.clone().json();
        }
        return jsonResponse({ message: 'saved' });
      });

      await createSender().send(session, {
        verb: 'POST',
        path: '/api/v1/manage/credentials/defaultSwitchCredentials',
        body: { switchUsername: 'admin', switchPassword: 'pw' },
      });

      const request = requestOf(fetchMock);
      expect(request.method).toBe('POST');
      expect(request.headers.get('content-type')).toBe('application/json');
      expect(received).toEqual({ switchUsername: 'admin', switchPassword: 'pw' });
    });

    it('should replay login cookies after the session cookie', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ fabrics: [] }));

      await createSender().send(
        {
          ...session,
          cookies: [
            'SESSION=abc123; Path=/; HttpOnly; Secure',
            'AuthCookie=stale-token; Path=/',
          ],
        },
        descriptor,
      );

      expect(requestOf(fetchMock).headers.get('cookie')).toBe(
        'AuthCookie=test-token; SESSION=abc123',
      );
    });

    it('should return the raw response', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ fabrics: [] }));

      const response = await createSender().send(session, descriptor);

      expect(response).toEqual({
        status: 200,
        headers: { 'content-type': 'application/json' },
        body: '{"fabrics":[]}',
        verb: 'GET',
        path: '/api/v1/manage/fabrics?category=fabric',
        attempts: 1,
      });
      expect(sleepMock).not.toHaveBeenCalled();
    });

    it('should retry server errors and wait between attempts', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ message: 'Unavailable' }, 503))
        .mockResolvedValueOnce(jsonResponse({ message: 'Unavailable' }, 503))
        .mockResolvedValueOnce(jsonResponse({ fabrics: [] }));

      const response = await createSender({ sendInterval: 250 }).send(session, descriptor);

      expect(response.status).toBe(200);
      expect(response.attempts).toBe(3);
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(sleepMock).toHaveBeenCalledTimes(2);
      expect(sleepMock).toHaveBeenNthCalledWith(1, 250);
      expect(sleepMock).toHaveBeenNthCalledWith(2, 250);
    });

    it('should retry network errors', async () => {
      fetchMock
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(jsonResponse({ fabrics: [] }));

      const response = await createSender().send(session, descriptor);

      expect(response.attempts).toBe(2);
      expect(sleepMock).toHaveBeenCalledWith(5_000);
    });

    it('should not retry client errors', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'Not found' }, 404));

      const response = await createSender().send(session, descriptor);

      expect(response.status).toBe(404);
      expect(response.attempts).toBe(1);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(sleepMock).not.toHaveBeenCalled();
    });

    it('should throw TransportError once attempts are exhausted', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ message: 'Service unavailable' }, 503),
      );

      try {
        await createSender({ maxAttempts: 2 }).send(session, descriptor);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TransportError);
        if (error instanceof TransportError) {
          expect(error.message).toBe(
            'GET /api/v1/manage/fabrics?category=fabric failed after 2 attempt(s): Service unavailable',
          );
          expect(error.attempts).toBe(2);
          expect(error.statusCode).toBe(503);
          expect(error.cause).toBeInstanceOf(ServerError);
        }
      }
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(sleepMock).toHaveBeenCalledTimes(1);
    });

    it('should keep the last network error as cause', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      try {
        await createSender({ maxAttempts: 1 }).send(session, descriptor);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TransportError);
        if (error instanceof TransportError) {
          expect(error.attempts).toBe(1);
          expect(error.statusCode).toBeUndefined();
          expect(error.cause).toBeInstanceOf(NetworkError);
          expect(error.cause?.message).toBe('fetch failed');
        }
      }
      expect(sleepMock).not.toHaveBeenCalled();
    });

    it('should treat timeouts as transient', async () => {
      fetchMock
        .mockImplementationOnce(() => new Promise<Response>(() => {}))
        .mockResolvedValueOnce(jsonResponse({ fabrics: [] }));

      const response = await createSender({ timeout: 20 }).send(session, descriptor);

      expect(response.attempts).toBe(2);
    });

    it('should retry only the configured statuses', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ message: 'Slow down' }, 429))
        .mockResolvedValueOnce(jsonResponse({ message: 'Internal error' }, 500));

      const sender = createSender({ retryStatusCodes: [429] });
      const response = await sender.send(session, descriptor);

      expect(sender.isTransientStatus(429)).toBe(true);
      expect(sender.isTransientStatus(503)).toBe(false);
      expect(response.status).toBe(500);
      expect(response.attempts).toBe(2);
    });

    it('should describe a server error without a message', async () => {
      fetchMock.mockResolvedValue(new Response('', { status: 502 }));

      await expect(
        createSender({ maxAttempts: 1 }).send(session, descriptor),
      ).rejects.toThrow(
        'GET /api/v1/manage/fabrics?category=fabric failed after 1 attempt(s): HTTP 502 error',
      );
    });
  });
});
