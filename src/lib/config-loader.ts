import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as TOML from '@iarna/toml';
import { z } from 'zod';
import {
  DEFAULT_PASSWORD_MAX_BYTES,
  DEFAULT_SERVER,
  DEFAULT_TIMEOUT,
  ProxyMap,
  ProxyScheme,
  RESERVED_HEADERS,
  Settings,
  SettingsInput,
  TimeoutSettings,
} from '../types/settings';
import { ConfigurationError } from './errors';
import {
  ensureDir,
  expandHome,
  fileExists,
  getDefaultConfigPath,
  writeFileAtomic,
} from '../utils/file-utils';

const PositiveSeconds = z.number().positive().finite();

const ConfigFileSchema = z.object({
  access_token: z.string().optional(),
  server: z.string().optional(),
  database_uri: z.string().optional(),
  'override-password-length-check': z.boolean().optional(),
  'password-max-bytes': z.number().int().positive().optional(),
  timeout: z.union([
    PositiveSeconds,
    z.object({
      connect: PositiveSeconds.optional(),
      read: PositiveSeconds.optional(),
      write: PositiveSeconds.optional(),
    }).strict(),
  ]).optional(),
  proxies: z.object({
    http: z.string().optional(),
    https: z.string().optional(),
    socks5: z.string().optional(),
  }).strict().optional(),
  headers: z.record(z.string()).optional(),
}).passthrough();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

type TomlDocument = ReturnType<typeof TOML.parse>;

/**
 * Keys `config set` / `config unset` understand. Table entries are written
 * as `headers.<Name>` and `proxies.<scheme>`.
 */
export const SETTABLE_KEYS = [
  'access_token',
  'server',
  'database_uri',
  'override-password-length-check',
  'password-max-bytes',
  'timeout',
] as const;

export type SettableKey = (typeof SETTABLE_KEYS)[number];

const PROXY_SCHEMES: readonly ProxyScheme[] = ['http', 'https', 'socks5'];

const PROXY_PROTOCOLS = ['http:', 'https:', 'socks:', 'socks4:', 'socks4a:', 'socks5:', 'socks5h:'];

const ENV = {
  accessToken: 'DENDRITECLI_ACCESS_TOKEN',
  server: 'DENDRITECLI_SERVER',
  timeout: 'DENDRITECLI_TIMEOUT',
  databaseUri: 'DENDRITECLI_DATABASE_URI',
  overridePasswordLengthCheck: 'DENDRITECLI_OVERRIDE_PASSWORD_LENGTH_CHECK',
  configPath: 'DENDRITECLI_CONFIG',
} as const;

/**
 * One configuration layer. Later layers win key by key.
 */
export interface SettingsOverrides extends SettingsInput {
  accessToken?: string;
}

export interface LoadOptions {
  configPath?: string;                       // --config
  overrides?: SettingsOverrides;             // explicit CLI flags
  promptForToken?: () => Promise<string>;    // asked only when no layer has a token
}

export interface ConfigLocation {
  path: string;
  explicit: boolean;
}

export interface ResolvedConfig {
  location: ConfigLocation;
  merged: SettingsOverrides;
}

export interface ConfigLoaderOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/**
 * Builds Settings from defaults, the TOML config file, DENDRITECLI_*
 * environment variables and explicit overrides, in that order.
 */
export class ConfigLoader {
  private readonly env: NodeJS.ProcessEnv;
  private readonly homeDir: string;

  constructor(options: ConfigLoaderOptions = {}) {
    this.env = options.env ?? process.env;
    this.homeDir = options.homeDir ?? os.homedir();
  }

  async load(options: LoadOptions = {}): Promise<Settings> {
    const { merged } = await this.resolve(options);

    let accessToken = merged.accessToken;
    if (!accessToken && options.promptForToken) {
      accessToken = await options.promptForToken();
    }

    return createSettings(accessToken ?? '', merged);
  }

  /**
   * Merge every layer without building Settings, so nothing is required yet
   */
  async resolve(options: Pick<LoadOptions, 'configPath' | 'overrides'> = {}): Promise<ResolvedConfig> {
    const location = await this.resolveConfigPath(options.configPath);
    const file = await this.readConfigFile(location.path, location.explicit);

    const merged = mergeLayers([
      this.fromFile(file),
      this.fromEnv(),
      options.overrides ?? {},
    ]);
    return { location, merged };
  }

  /**
   * Explicit path, then DENDRITECLI_CONFIG, then the default location
   */
  async resolveConfigPath(explicitPath?: string): Promise<ConfigLocation> {
    const fromFlag = nonEmpty(explicitPath);
    if (fromFlag) {
      return { path: path.resolve(expandHome(fromFlag, this.homeDir)), explicit: true };
    }
    const fromEnv = nonEmpty(this.env[ENV.configPath]);
    if (fromEnv) {
      return { path: path.resolve(expandHome(fromEnv, this.homeDir)), explicit: true };
    }
    return { path: await getDefaultConfigPath(this.homeDir), explicit: false };
  }

  /**
   * Read and validate the config file. A missing file yields an empty config
   * unless it was named explicitly.
   */
  async readConfigFile(filePath: string, required = false): Promise<ConfigFile> {
    const document = await this.readDocument(filePath, required);
    return parseConfigFile(document, filePath);
  }

  /**
   * Set one key (or `headers.<Name>` / `proxies.<scheme>` entry) and write the
   * file back. The result is validated before anything is written.
   */
  async setValue(filePath: string, key: string, rawValue: string): Promise<ConfigFile> {
    const document = await this.readDocument(filePath, false);
    const [section, entry] = splitTableKey(key);

    if (entry !== undefined) {
      const existing = document[section];
      const table: TomlDocument = isTomlTable(existing) ? existing : {};
      table[entry] = rawValue;
      document[section] = table;
    } else if (isSettableKey(key)) {
      document[key] = coerceValue(key, rawValue);
    } else {
      throw new ConfigurationError(
        `Unknown configuration key "${key}". Known keys: ${SETTABLE_KEYS.join(', ')}, headers.<Name>, proxies.<scheme>`,
        key
      );
    }

    const validated = parseConfigFile(document, filePath);
    await this.writeDocument(filePath, document);
    return validated;
  }

  async unsetValue(filePath: string, key: string): Promise<ConfigFile> {
    const document = await this.readDocument(filePath, false);
    const [section, entry] = splitTableKey(key);

    if (entry !== undefined) {
      const table = document[section];
      if (isTomlTable(table)) {
        delete table[entry];
      }
    } else {
      delete document[key];
    }

    const validated = parseConfigFile(document, filePath);
    await this.writeDocument(filePath, document);
    return validated;
  }

  fromFile(file: ConfigFile): SettingsOverrides {
    return {
      accessToken: nonEmpty(file.access_token),
      server: nonEmpty(file.server),
      databaseUri: nonEmpty(file.database_uri),
      overridePasswordLengthCheck: file['override-password-length-check'],
      passwordMaxBytes: file['password-max-bytes'],
      timeout: file.timeout,
      proxies: file.proxies,
      headers: file.headers,
    };
  }

  fromEnv(): SettingsOverrides {
    const timeout = nonEmpty(this.env[ENV.timeout]);
    const override = nonEmpty(this.env[ENV.overridePasswordLengthCheck]);

    return {
      accessToken: nonEmpty(this.env[ENV.accessToken]),
      server: nonEmpty(this.env[ENV.server]),
      databaseUri: nonEmpty(this.env[ENV.databaseUri]),
      timeout: timeout === undefined ? undefined : parseSeconds(timeout, ENV.timeout),
      overridePasswordLengthCheck:
        override === undefined ? undefined : parseBooleanFlag(override, ENV.overridePasswordLengthCheck),
    };
  }

  private async readDocument(filePath: string, required: boolean): Promise<TomlDocument> {
    if (!(await fileExists(filePath))) {
      if (required) {
        throw new ConfigurationError(`Config file not found: ${filePath}`, 'config');
      }
      return {};
    }

    const content = await fs.readFile(filePath, 'utf-8');
    try {
      return TOML.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        'config'
      );
    }
  }

  private async writeDocument(filePath: string, document: TomlDocument): Promise<void> {
    await ensureDir(path.dirname(filePath));
    await writeFileAtomic(filePath, TOML.stringify(document));
  }
}

/**
 * Validate a parsed TOML document against the known keys
 */
export function parseConfigFile(document: unknown, source = 'config file'): ConfigFile {
  const result = ConfigFileSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.join('.');
    throw new ConfigurationError(`Invalid value for "${key}" in ${source}: ${issue.message}`, key);
  }

  if (result.data.headers) {
    assertHeadersAllowed(result.data.headers);
  }
  return result.data;
}

/**
 * Build the immutable Settings value. This is the only place Settings are
 * constructed, so every entry point gets the same checks.
 */
export function createSettings(accessToken: string, input: SettingsInput = {}): Settings {
  const token = accessToken.trim();
  if (!token) {
    throw new ConfigurationError(
      'An access token is required. Set access_token in the config file, DENDRITECLI_ACCESS_TOKEN, or pass --access-token.',
      'access_token'
    );
  }

  const passwordMaxBytes = input.passwordMaxBytes ?? DEFAULT_PASSWORD_MAX_BYTES;
  if (!Number.isInteger(passwordMaxBytes) || passwordMaxBytes < 1) {
    throw new ConfigurationError(
      `Invalid password-max-bytes: ${passwordMaxBytes}. Must be a positive integer.`,
      'password-max-bytes'
    );
  }

  const headers = { ...(input.headers ?? {}) };
  assertHeadersAllowed(headers);

  const settings: Settings = {
    accessToken: token,
    server: normalizeServerUrl(input.server ?? DEFAULT_SERVER),
    timeout: Object.freeze(resolveTimeout(input.timeout)),
    proxies: input.proxies ? Object.freeze(validateProxies(input.proxies)) : null,
    headers: Object.freeze(headers),
    overridePasswordLengthCheck: input.overridePasswordLengthCheck ?? false,
    passwordMaxBytes,
    databaseUri: nonEmpty(input.databaseUri ?? undefined) ?? null,
  };

  return Object.freeze(settings);
}

/**
 * Reject header names the client always sets itself (case-insensitive)
 */
export function assertHeadersAllowed(headers: Record<string, string>): void {
  const reserved = RESERVED_HEADERS.map((name) => name.toLowerCase());

  for (const [name, value] of Object.entries(headers)) {
    if (reserved.includes(name.toLowerCase())) {
      throw new ConfigurationError(
        `Header "${name}" is reserved and cannot be set in configuration`,
        `headers.${name}`
      );
    }
    if (/[\r\n]/.test(value)) {
      throw new ConfigurationError(`Header "${name}" contains a line break`, `headers.${name}`);
    }
  }
}

export function normalizeServerUrl(server: string): string {
  let url: URL;
  try {
    url = new URL(server.trim());
  } catch {
    throw new ConfigurationError(`Invalid server URL: ${server}`, 'server');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`Invalid server URL: ${server}. Must start with http:// or https://`, 'server');
  }
  return url.toString().replace(/\/+$/, '');
}

export function resolveTimeout(timeout?: number | Partial<TimeoutSettings>): TimeoutSettings {
  const resolved: TimeoutSettings = { ...DEFAULT_TIMEOUT, ...toTimeoutParts(timeout) };

  for (const [phase, seconds] of Object.entries(resolved)) {
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new ConfigurationError(`Invalid ${phase} timeout: ${seconds}. Must be a positive number of seconds.`, 'timeout');
    }
  }
  return resolved;
}

function toTimeoutParts(timeout?: number | Partial<TimeoutSettings>): Partial<TimeoutSettings> {
  if (timeout === undefined) {
    return {};
  }
  if (typeof timeout === 'number') {
    return { connect: timeout, read: timeout, write: timeout };
  }
  const parts: Partial<TimeoutSettings> = {};
  if (timeout.connect !== undefined) parts.connect = timeout.connect;
  if (timeout.read !== undefined) parts.read = timeout.read;
  if (timeout.write !== undefined) parts.write = timeout.write;
  return parts;
}

function validateProxies(proxies: ProxyMap): ProxyMap {
  const validated: ProxyMap = {};
  for (const scheme of PROXY_SCHEMES) {
    const value = nonEmpty(proxies[scheme]);
    if (value === undefined) continue;
    let protocol: string;
    try {
      protocol = new URL(value).protocol;
    } catch {
      throw new ConfigurationError(`Invalid ${scheme} proxy URL: ${value}`, `proxies.${scheme}`);
    }
    if (!PROXY_PROTOCOLS.includes(protocol)) {
      throw new ConfigurationError(
        `Invalid ${scheme} proxy URL: ${value}. Supported schemes: ${PROXY_PROTOCOLS.join(' ')}`,
        `proxies.${scheme}`
      );
    }
    validated[scheme] = value;
  }
  return validated;
}

export function mergeLayers(layers: SettingsOverrides[]): SettingsOverrides {
  const merged: SettingsOverrides = {};
  let timeout: Partial<TimeoutSettings> | undefined;

  for (const layer of layers) {
    merged.accessToken = layer.accessToken ?? merged.accessToken;
    merged.server = layer.server ?? merged.server;
    merged.databaseUri = layer.databaseUri ?? merged.databaseUri;
    merged.overridePasswordLengthCheck = layer.overridePasswordLengthCheck ?? merged.overridePasswordLengthCheck;
    merged.passwordMaxBytes = layer.passwordMaxBytes ?? merged.passwordMaxBytes;
    merged.proxies = layer.proxies ?? merged.proxies;
    if (layer.headers) {
      merged.headers = { ...merged.headers, ...layer.headers };
    }
    if (layer.timeout !== undefined) {
      timeout = { ...timeout, ...toTimeoutParts(layer.timeout) };
    }
  }

  if (timeout) {
    merged.timeout = timeout;
  }
  return merged;
}

export function parseBooleanFlag(value: string, key: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(`Invalid boolean for ${key}: "${value}"`, key);
}

export function parseSeconds(value: string, key: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`Invalid timeout for ${key}: "${value}". Must be a positive number of seconds.`, key);
  }
  return seconds;
}

function coerceValue(key: SettableKey, rawValue: string): string | number | boolean {
  switch (key) {
    case 'override-password-length-check':
      return parseBooleanFlag(rawValue, key);
    case 'password-max-bytes':
    case 'timeout':
      return parseSeconds(rawValue, key);
    default:
      return rawValue;
  }
}

function isSettableKey(key: string): key is SettableKey {
  return SETTABLE_KEYS.some((known) => known === key);
}

function splitTableKey(key: string): [string, string | undefined] {
  const match = /^(headers|proxies)\.(.+)$/.exec(key);
  return match ? [match[1], match[2]] : [key, undefined];
}

function isTomlTable(value: unknown): value is TomlDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}
