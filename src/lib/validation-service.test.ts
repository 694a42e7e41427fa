import { describe, it, expect } from 'vitest';
import { ValidationService } from './validation-service';
import { ValidationError } from './errors';

describe('ValidationService', () => {
  const strict = new ValidationService({ overridePasswordLengthCheck: false, passwordMaxBytes: 72 });
  const overridden = new ValidationService({ overridePasswordLengthCheck: true, passwordMaxBytes: 72 });

  describe('validatePassword', () => {
    it('should accept passwords up to 72 bytes with or without the override', () => {
      for (const password of ['a', 'x'.repeat(72), 'é'.repeat(36)]) {
        expect(() => strict.validatePassword(password)).not.toThrow();
        expect(() => overridden.validatePassword(password)).not.toThrow();
      }
    });

    it('should reject passwords over 72 bytes', () => {
      expect(() => strict.validatePassword('x'.repeat(73))).toThrow(ValidationError);
      expect(() => strict.validatePassword('x'.repeat(73))).toThrow(
        'Passwords cannot be more than 72 bytes (got 73).'
      );
    });

    it('should count bytes rather than characters', () => {
      // 37 two-byte characters = 74 bytes
      expect(() => strict.validatePassword('é'.repeat(37))).toThrow('(got 74)');
    });

    it('should allow long passwords when the check is overridden', () => {
      expect(() => overridden.validatePassword('x'.repeat(500))).not.toThrow();
    });

    it('should honour a configured limit', () => {
      const custom = new ValidationService({ overridePasswordLengthCheck: false, passwordMaxBytes: 8 });

      expect(() => custom.validatePassword('12345678')).not.toThrow();
      expect(() => custom.validatePassword('123456789')).toThrow('more than 8 bytes');
    });

    it('should always reject empty passwords', () => {
      expect(() => overridden.validatePassword('')).toThrow('Password cannot be empty');
    });
  });

  describe('validateUserId', () => {
    it('should accept fully qualified user IDs', () => {
      expect(() => strict.validateUserId('@alice:example.org')).not.toThrow();
      expect(() => strict.validateUserId('@bob:localhost:8448')).not.toThrow();
    });

    it('should reject bare or malformed IDs', () => {
      for (const userId of ['alice', '@alice', 'alice:example.org', '@ali ce:example.org', '']) {
        expect(() => strict.validateUserId(userId)).toThrow(ValidationError);
      }
    });
  });

  describe('validateRoomReference', () => {
    it('should accept room IDs and aliases', () => {
      expect(() => strict.validateRoomReference('!abc123:example.org')).not.toThrow();
      expect(() => strict.validateRoomReference('#general:example.org')).not.toThrow();
    });

    it('should reject anything else', () => {
      expect(() => strict.validateRoomReference('general')).toThrow(ValidationError);
      expect(() => strict.validateRoomReference('@alice:example.org')).toThrow(ValidationError);
    });
  });

  describe('validateLocalpart', () => {
    it('should accept lowercase localparts', () => {
      expect(() => strict.validateLocalpart('alice.smith_01')).not.toThrow();
    });

    it('should reject uppercase letters and colons', () => {
      expect(() => strict.validateLocalpart('Alice')).toThrow(ValidationError);
      expect(() => strict.validateLocalpart('alice:example.org')).toThrow(ValidationError);
    });

    it('should reject empty and overlong localparts', () => {
      expect(() => strict.validateLocalpart('')).toThrow('between 1 and 255');
      expect(() => strict.validateLocalpart('a'.repeat(256))).toThrow('between 1 and 255');
    });
  });

  describe('validatePageSize', () => {
    it('should only accept positive integers', () => {
      expect(() => strict.validatePageSize(1)).not.toThrow();
      expect(() => strict.validatePageSize(0)).toThrow(ValidationError);
      expect(() => strict.validatePageSize(2.5)).toThrow(ValidationError);
      expect(() => strict.validatePageSize(Number.NaN)).toThrow(ValidationError);
    });
  });
});
