import { Settings } from '../types/settings';
import { ValidationError } from './errors';

export type PasswordPolicy = Pick<Settings, 'overridePasswordLengthCheck' | 'passwordMaxBytes'>;

const USER_ID_PATTERN = /^@[^\s:]+:\S+$/;
const ROOM_REFERENCE_PATTERN = /^[!#][^\s:]+:\S+$/;
const LOCALPART_PATTERN = /^[a-z0-9._=\/+-]+$/;
const MAX_LOCALPART_LENGTH = 255;

/**
 * Local input checks run before any request is built
 */
export class ValidationService {
  constructor(private readonly policy: PasswordPolicy) {}

  /**
   * Fully qualified user ID, e.g. @alice:example.org
   * @throws ValidationError if the ID is malformed
   */
  validateUserId(userId: string): void {
    if (!USER_ID_PATTERN.test(userId)) {
      throw new ValidationError(
        `Invalid user ID: "${userId}". Expected a fully qualified ID like @username:example.org`,
        'userId'
      );
    }
  }

  /**
   * Room ID (!abc:example.org) or alias (#room:example.org)
   * @throws ValidationError if the reference is malformed
   */
  validateRoomReference(room: string): void {
    if (!ROOM_REFERENCE_PATTERN.test(room)) {
      throw new ValidationError(
        `Invalid room: "${room}". Expected a room ID like !abc:example.org or an alias like #room:example.org`,
        'roomId'
      );
    }
  }

  /**
   * Username to register (the part between @ and :)
   * @throws ValidationError if the localpart has characters Matrix does not allow
   */
  validateLocalpart(username: string): void {
    if (username.length === 0 || username.length > MAX_LOCALPART_LENGTH) {
      throw new ValidationError(
        `Invalid username: must be between 1 and ${MAX_LOCALPART_LENGTH} characters`,
        'username'
      );
    }
    if (!LOCALPART_PATTERN.test(username)) {
      throw new ValidationError(
        `Invalid username: "${username}". Only lowercase letters, digits and ._=-/+ are allowed`,
        'username'
      );
    }
  }

  /**
   * Reject empty passwords, and passwords longer than the configured byte
   * limit unless the length check is overridden
   */
  validatePassword(password: string): void {
    if (password.length === 0) {
      throw new ValidationError('Password cannot be empty', 'password');
    }

    if (this.policy.overridePasswordLengthCheck) {
      return;
    }

    const bytes = Buffer.byteLength(password, 'utf-8');
    if (bytes > this.policy.passwordMaxBytes) {
      throw new ValidationError(
        `Passwords cannot be more than ${this.policy.passwordMaxBytes} bytes (got ${bytes}). ` +
          'Set override-password-length-check = true to send it anyway.',
        'password'
      );
    }
  }

  validatePageSize(pageSize: number): void {
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new ValidationError(`Invalid page size: ${pageSize}. Must be a positive integer.`, 'pageSize');
    }
  }
}
