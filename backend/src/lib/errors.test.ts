import { describe, test, expect } from 'vitest';
import {
  ConfigurationError,
  MeshNotConfiguredError,
  MeshNotSupportedError,
  NotFoundError,
  StatusError,
  errorMessage,
  getStatusCode,
  isNotFoundError,
} from './errors';

describe('status errors', () => {
  test('carry the status code the API answers with', () => {
    expect(new StatusError('x').statusCode).toBe(500);
    expect(new ConfigurationError('x').statusCode).toBe(400);
    expect(new NotFoundError('x').statusCode).toBe(404);
    expect(new MeshNotSupportedError('flink').statusCode).toBe(405);
    expect(new MeshNotConfiguredError('web', 'main').statusCode).toBe(405);
  });

  test('describe mesh refusals', () => {
    expect(new MeshNotSupportedError('flink').message).toBe("Mesh status not supported for instance type 'flink'");
    expect(new MeshNotConfiguredError('web', 'main').message).toBe('web.main is not configured for the service mesh');
  });

  test('are instances of StatusError', () => {
    expect(new ConfigurationError('x')).toBeInstanceOf(StatusError);
    expect(new ConfigurationError('x').name).toBe('ConfigurationError');
  });
});

describe('getStatusCode', () => {
  test('reads our own errors', () => {
    expect(getStatusCode(new NotFoundError('gone'))).toBe(404);
  });

  test('reads kubernetes client errors from the response', () => {
    const httpError = Object.assign(new Error('HTTP request failed'), { response: { statusCode: 409 } });
    expect(getStatusCode(httpError)).toBe(409);
    expect(isNotFoundError(Object.assign(new Error('nope'), { statusCode: 404 }))).toBe(true);
  });

  test('is undefined for anything else', () => {
    expect(getStatusCode(new Error('plain'))).toBeUndefined();
    expect(getStatusCode('text')).toBeUndefined();
    expect(getStatusCode({ statusCode: '500' })).toBeUndefined();
  });
});

describe('errorMessage', () => {
  test('uses the message of errors and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
