import { describe, expect, it } from 'vitest';
import { ResponseFormatError } from '../../src/errors/index.js';
import {
  extractDiagnosticMessage,
  normalize,
} from '../../src/response/normalizer.js';
import type { RawResponse } from '../../src/types/index.js';

function raw(status: number, body: string): RawResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body,
    verb: 'POST',
    path: '/api/v1/manage/credentials/defaultSwitchCredentials',
    attempts: 1,
  };
}

describe('extractDiagnosticMessage()', () => {
  it('should prefer message over the other fields', () => {
    expect(
      extractDiagnosticMessage({ message: 'saved', error: 'x', description: 'y' }),
    ).toBe('saved');
  });

  it('should fall back through error, description and errors', () => {
    expect(extractDiagnosticMessage({ error: 'Bad switch id' })).toBe('Bad switch id');
    expect(extractDiagnosticMessage({ description: 'Fabric locked' })).toBe('Fabric locked');
    expect(extractDiagnosticMessage({ errors: ['first', 'second'] })).toBe('first');
    expect(extractDiagnosticMessage({ errors: [{ message: 'from object' }] })).toBe(
      'from object',
    );
  });

  it('should ignore fields of another type', () => {
    expect(
      extractDiagnosticMessage({ error: { code: 'E1' }, message: 'Fabric name invalid' }),
    ).toBe('Fabric name invalid');
    expect(extractDiagnosticMessage({ message: 42, description: 'Fabric locked' })).toBe(
      'Fabric locked',
    );
    expect(extractDiagnosticMessage({ errors: 'not a list', error: 'Bad switch id' })).toBe(
      'Bad switch id',
    );
    expect(extractDiagnosticMessage({ errors: [{ code: 'E1' }] })).toBeUndefined();
  });

  it('should skip blank fields', () => {
    expect(extractDiagnosticMessage({ message: '  ', error: 'boom' })).toBe('boom');
  });

  it('should return undefined for bodies without diagnostics', () => {
    expect(extractDiagnosticMessage({ fabrics: [] })).toBeUndefined();
    expect(extractDiagnosticMessage([1, 2])).toBeUndefined();
    expect(extractDiagnosticMessage(null)).toBeUndefined();
  });
});

describe('normalize()', () => {
  it('should use the controller message on success', () => {
    expect(normalize(raw(200, '{"message":"saved"}'))).toEqual({
      success: true,
      status_code: 200,
      message: 'saved',
      data: { message: 'saved' },
    });
  });

  it('should use a generic message when the body has none', () => {
    expect(normalize(raw(200, '{"switchUsername":"admin"}'))).toEqual({
      success: true,
      status_code: 200,
      message: 'HTTP 200 OK',
      data: { switchUsername: 'admin' },
    });
  });

  it('should map an empty body to null data', () => {
    expect(normalize(raw(204, ''))).toEqual({
      success: true,
      status_code: 204,
      message: 'HTTP 204 OK',
      data: null,
    });
  });

  it('should report client errors as failures', () => {
    expect(normalize(raw(404, '{"code":404,"error":"Fabric fabric-9 not found"}'))).toEqual({
      success: false,
      status_code: 404,
      message: 'Fabric fabric-9 not found',
      data: { code: 404, error: 'Fabric fabric-9 not found' },
    });
  });

  it('should keep the message when another diagnostic field is an object', () => {
    expect(normalize(raw(400, '{"error":{"code":"E1"},"message":"Fabric name invalid"}'))).toEqual({
      success: false,
      status_code: 400,
      message: 'Fabric name invalid',
      data: { error: { code: 'E1' }, message: 'Fabric name invalid' },
    });
  });

  it('should use a generic message for failures without diagnostics', () => {
    expect(normalize(raw(400, '{}'))).toEqual({
      success: false,
      status_code: 400,
      message: 'HTTP 400 error',
      data: {},
    });
  });

  it('should normalize an unparseable failure body', () => {
    expect(normalize(raw(502, '<html>Bad Gateway</html>'))).toEqual({
      success: false,
      status_code: 502,
      message: 'HTTP 502 error',
      data: null,
    });
  });

  it('should throw ResponseFormatError for an unparseable success body', () => {
    const response = raw(200, '<html>ok</html>');

    expect(() => normalize(response)).toThrow(ResponseFormatError);
    expect(() => normalize(response)).toThrow(
      'Unparseable response body for POST /api/v1/manage/credentials/defaultSwitchCredentials (HTTP 200)',
    );
  });

  it('should attach the raw body to ResponseFormatError', () => {
    try {
      normalize(raw(201, 'not json'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ResponseFormatError);
      if (error instanceof ResponseFormatError) {
        expect(error.body).toBe('not json');
        expect(error.statusCode).toBe(201);
      }
    }
  });

  it('should return a normalized result unchanged', () => {
    const first = normalize(raw(500, '{"message":"Internal error"}'));
    const second = normalize(first);

    expect(second).toBe(first);
    expect(second).toEqual({
      success: false,
      status_code: 500,
      message: 'Internal error',
      data: { message: 'Internal error' },
    });
  });
});
