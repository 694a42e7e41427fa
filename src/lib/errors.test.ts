import { describe, it, expect } from 'vitest';
import {
  AdminError,
  ConfigurationError,
  DendriteCliError,
  EXIT_CODES,
  TransportError,
  ValidationError,
  describeError,
} from './errors';

describe('errors', () => {
  describe('AdminError', () => {
    it('should keep the server errcode and error verbatim', () => {
      const error = new AdminError(404, 'M_NOT_FOUND', 'not found', 'GET', '/_matrix/client/v3/admin/whois/x');

      expect(error.status).toBe(404);
      expect(error.errcode).toBe('M_NOT_FOUND');
      expect(error.error).toBe('not found');
      expect(error.message).toBe('GET /_matrix/client/v3/admin/whois/x failed (404): M_NOT_FOUND: not found');
      expect(error.name).toBe('AdminError');
      expect(error).toBeInstanceOf(DendriteCliError);
    });

    it('should omit the errcode from the message when there is none', () => {
      const error = new AdminError(502, null, '502 Bad Gateway', 'POST', '/_dendrite/admin/fulltext/reindex');

      expect(error.message).toBe('POST /_dendrite/admin/fulltext/reindex failed (502): 502 Bad Gateway');
    });
  });

  describe('TransportError', () => {
    it('should describe the failure kind', () => {
      const error = new TransportError('read_timeout', 'GET', '/x', 'after 1s');

      expect(error.kind).toBe('read_timeout');
      expect(error.message).toBe('GET /x failed: read timeout (after 1s)');
    });
  });

  describe('describeError', () => {
    it('should map configuration errors to exit code 2', () => {
      expect(describeError(new ConfigurationError('bad'))).toEqual({
        exitCode: EXIT_CODES.configuration,
        title: 'Configuration error',
        message: 'bad',
      });
      expect(EXIT_CODES.configuration).toBe(2);
    });

    it('should map validation errors to exit code 3', () => {
      expect(describeError(new ValidationError('too long', 'password')).exitCode).toBe(3);
    });

    it('should use the errcode as title for admin errors', () => {
      const report = describeError(new AdminError(403, 'M_FORBIDDEN', 'not an admin', 'GET', '/x'));

      expect(report).toEqual({ exitCode: 4, title: 'M_FORBIDDEN', message: 'not an admin' });
    });

    it('should fall back to the HTTP status as title', () => {
      const report = describeError(new AdminError(500, null, '500 Internal Server Error', 'GET', '/x'));

      expect(report.title).toBe('HTTP 500');
    });

    it('should map transport errors to exit code 5', () => {
      expect(describeError(new TransportError('dns', 'GET', '/x')).exitCode).toBe(5);
    });

    it('should map anything else to exit code 1', () => {
      expect(describeError(new Error('boom'))).toEqual({ exitCode: 1, title: 'Error', message: 'boom' });
      expect(describeError('plain string')).toEqual({ exitCode: 1, title: 'Error', message: 'plain string' });
    });
  });
});
