import { describe, it, expect } from 'vitest';
import {
  GeoLookupError,
  NetworkError,
  ParseError,
  FileWriteError,
  errorMessage,
} from '../../src/core/errors';

describe('errors', () => {
  it('should build a NetworkError with status and url', () => {
    const cause = new Error('socket hang up');
    const error = new NetworkError('Error fetching data', 'https://ipinfo.io/json', 503, { cause });

    expect(error).toBeInstanceOf(GeoLookupError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('NetworkError');
    expect(error.kind).toBe('network');
    expect(error.status).toBe(503);
    expect(error.url).toBe('https://ipinfo.io/json');
    expect(error.cause).toBe(cause);
  });

  it('should keep the raw body on a ParseError', () => {
    const error = new ParseError('Invalid JSON', '<html>');
    expect(error.name).toBe('ParseError');
    expect(error.kind).toBe('parse');
    expect(error.body).toBe('<html>');
  });

  it('should keep the target path on a FileWriteError', () => {
    const error = new FileWriteError('Error saving JSON file', '/tmp/out.json');
    expect(error.name).toBe('FileWriteError');
    expect(error.kind).toBe('file-write');
    expect(error.path).toBe('/tmp/out.json');
  });

  describe('errorMessage', () => {
    it('should return the message of an Error', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
    });

    it('should describe anything else as unknown', () => {
      expect(errorMessage('boom')).toBe('Unknown error');
    });
  });
});
