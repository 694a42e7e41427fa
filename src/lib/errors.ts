/**
 * Base class for every failure the client raises on purpose
 */
export class DendriteCliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed or incomplete configuration. Raised before any network activity.
 */
export class ConfigurationError extends DendriteCliError {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(message);
  }
}

/**
 * Locally rejected input. Raised before the request is sent.
 */
export class ValidationError extends DendriteCliError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
  }
}

/**
 * The server answered, but not with what we asked for
 */
export class AdminError extends DendriteCliError {
  constructor(
    public readonly status: number,
    public readonly errcode: string | null,
    public readonly error: string,
    public readonly method: string,
    public readonly path: string
  ) {
    super(`${method} ${path} failed (${status}): ${errcode ? `${errcode}: ` : ''}${error}`);
  }
}

export type TransportErrorKind =
  | 'connect_timeout'
  | 'write_timeout'
  | 'read_timeout'
  | 'dns'
  | 'tls'
  | 'connection'
  | 'network';

/**
 * The request never produced a response. Never retried automatically.
 */
export class TransportError extends DendriteCliError {
  constructor(
    public readonly kind: TransportErrorKind,
    public readonly method: string,
    public readonly path: string,
    public readonly detail?: string
  ) {
    super(`${method} ${path} failed: ${kind.replace('_', ' ')}${detail ? ` (${detail})` : ''}`);
  }
}

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  configuration: 2,
  validation: 3,
  admin: 4,
  transport: 5,
} as const;

export interface ErrorReport {
  exitCode: number;
  title: string;
  message: string;
}

/**
 * Map an error to the exit code and text the CLI prints for it
 */
export function describeError(error: unknown): ErrorReport {
  if (error instanceof ConfigurationError) {
    return { exitCode: EXIT_CODES.configuration, title: 'Configuration error', message: error.message };
  }
  if (error instanceof ValidationError) {
    return { exitCode: EXIT_CODES.validation, title: 'Invalid input', message: error.message };
  }
  if (error instanceof AdminError) {
    const code = error.errcode ?? `HTTP ${error.status}`;
    return { exitCode: EXIT_CODES.admin, title: code, message: error.error };
  }
  if (error instanceof TransportError) {
    return { exitCode: EXIT_CODES.transport, title: 'Transport error', message: error.message };
  }
  if (error instanceof Error) {
    return { exitCode: EXIT_CODES.unexpected, title: 'Error', message: error.message };
  }
  return { exitCode: EXIT_CODES.unexpected, title: 'Error', message: String(error) };
}
