export const CLI_VERSION = '0.1.0';

export interface TimeoutSettings {
  connect: number;   // seconds to establish the TCP/TLS connection
  read: number;      // seconds of socket inactivity once the request is sent
  write: number;     // seconds to finish sending the request
}

export type ProxyScheme = 'http' | 'https' | 'socks5';

export type ProxyMap = Partial<Record<ProxyScheme, string>>;

export interface Settings {
  readonly accessToken: string;
  readonly server: string;
  readonly timeout: Readonly<TimeoutSettings>;
  readonly proxies: Readonly<ProxyMap> | null;   // null = honour *_PROXY env vars
  readonly headers: Readonly<Record<string, string>>;
  readonly overridePasswordLengthCheck: boolean;
  readonly passwordMaxBytes: number;
  readonly databaseUri: string | null;           // forwarded, never interpreted
}

/**
 * Everything but the token, as accepted from callers and config layers
 */
export interface SettingsInput {
  server?: string;
  timeout?: number | Partial<TimeoutSettings>;
  proxies?: ProxyMap | null;
  headers?: Record<string, string>;
  overridePasswordLengthCheck?: boolean;
  passwordMaxBytes?: number;
  databaseUri?: string | null;
}

export const DEFAULT_SERVER = 'http://localhost:8008';

export const DEFAULT_TIMEOUT: Readonly<TimeoutSettings> = {
  connect: 10,
  read: 180,
  write: 60,
};

/**
 * Dendrite hashes passwords with bcrypt, which only looks at the first 72 bytes
 */
export const DEFAULT_PASSWORD_MAX_BYTES = 72;

export const RESERVED_HEADERS = ['Accept', 'Content-Type', 'User-Agent'] as const;

export const USER_AGENT = `dendritecli/${CLI_VERSION} node/${process.versions.node}`;
