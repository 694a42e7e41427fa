import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  ConfigLoader,
  assertHeadersAllowed,
  createSettings,
  mergeLayers,
  normalizeServerUrl,
  parseBooleanFlag,
  resolveTimeout,
} from './config-loader';
import { ConfigurationError } from './errors';

describe('ConfigLoader', () => {
  let homeDir: string;
  let configPath: string;

  beforeEach(async () => {
    homeDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dendritecli-test-'));
    await fs.mkdir(path.join(homeDir, '.config'));
    configPath = path.join(homeDir, '.config', 'dendritecli.toml');
  });

  afterEach(async () => {
    await fs.rm(homeDir, { recursive: true, force: true });
  });

  const writeConfig = (content: string) => fs.writeFile(configPath, content, 'utf-8');

  describe('resolveConfigPath', () => {
    it('should use ~/.config/dendritecli.toml when ~/.config exists', async () => {
      const loader = new ConfigLoader({ env: {}, homeDir });

      expect(await loader.resolveConfigPath()).toEqual({ path: configPath, explicit: false });
    });

    it('should fall back to ~/.dendritecli.toml', async () => {
      await fs.rm(path.join(homeDir, '.config'), { recursive: true });
      const loader = new ConfigLoader({ env: {}, homeDir });

      expect(await loader.resolveConfigPath()).toEqual({
        path: path.join(homeDir, '.dendritecli.toml'),
        explicit: false,
      });
    });

    it('should prefer the flag over DENDRITECLI_CONFIG', async () => {
      const loader = new ConfigLoader({ env: { DENDRITECLI_CONFIG: '/etc/from-env.toml' }, homeDir });

      expect((await loader.resolveConfigPath('~/flag.toml')).path).toBe(path.join(homeDir, 'flag.toml'));
      expect(await loader.resolveConfigPath()).toEqual({ path: '/etc/from-env.toml', explicit: true });
    });
  });

  describe('load', () => {
    it('should use defaults when there is no config file', async () => {
      const loader = new ConfigLoader({ env: { DENDRITECLI_ACCESS_TOKEN: 'test-token' }, homeDir });

      const settings = await loader.load();

      expect(settings.accessToken).toBe('test-token');
      expect(settings.server).toBe('http://localhost:8008');
      expect(settings.timeout).toEqual({ connect: 10, read: 180, write: 60 });
      expect(settings.proxies).toBeNull();
      expect(settings.headers).toEqual({});
      expect(settings.overridePasswordLengthCheck).toBe(false);
      expect(settings.passwordMaxBytes).toBe(72);
      expect(settings.databaseUri).toBeNull();
    });

    it('should apply file, then environment, then flags', async () => {
      await writeConfig('access_token = "test-token"\nserver = "https://file.example.org"\n');

      const fileOnly = await new ConfigLoader({ env: {}, homeDir }).load();
      expect(fileOnly.server).toBe('https://file.example.org');

      const env = { DENDRITECLI_SERVER: 'https://env.example.org' };
      const withEnv = await new ConfigLoader({ env, homeDir }).load();
      expect(withEnv.server).toBe('https://env.example.org');

      const withFlag = await new ConfigLoader({ env, homeDir }).load({
        overrides: { server: 'https://flag.example.org' },
      });
      expect(withFlag.server).toBe('https://flag.example.org');
    });

    it('should merge timeout phases across layers', async () => {
      await writeConfig('access_token = "test-token"\n[timeout]\nconnect = 5\nread = 30\n');
      const loader = new ConfigLoader({ env: { DENDRITECLI_TIMEOUT: '' }, homeDir });

      const settings = await loader.load({ overrides: { timeout: { read: 2 } } });

      expect(settings.timeout).toEqual({ connect: 5, read: 2, write: 60 });
    });

    it('should read every documented key', async () => {
      await writeConfig([
        'access_token = "test-token"',
        'database_uri = "postgres://dendrite@localhost/dendrite"',
        'override-password-length-check = true',
        'password-max-bytes = 64',
        'timeout = 15',
        '[proxies]',
        'https = "http://proxy.internal:3128"',
        '[headers]',
        'X-Admin-Tool = "dendritecli"',
        '',
      ].join('\n'));

      const settings = await new ConfigLoader({ env: {}, homeDir }).load();

      expect(settings.databaseUri).toBe('postgres://dendrite@localhost/dendrite');
      expect(settings.overridePasswordLengthCheck).toBe(true);
      expect(settings.passwordMaxBytes).toBe(64);
      expect(settings.timeout).toEqual({ connect: 15, read: 15, write: 15 });
      expect(settings.proxies).toEqual({ https: 'http://proxy.internal:3128' });
      expect(settings.headers).toEqual({ 'X-Admin-Tool': 'dendritecli' });
    });

    it('should read the override flag from the environment', async () => {
      const loader = new ConfigLoader({
        env: { DENDRITECLI_ACCESS_TOKEN: 'test-token', DENDRITECLI_OVERRIDE_PASSWORD_LENGTH_CHECK: 'yes' },
        homeDir,
      });

      expect((await loader.load()).overridePasswordLengthCheck).toBe(true);
    });

    it.each(['Accept', 'Content-Type', 'User-Agent', 'user-agent'])(
      'should reject the reserved header %s',
      async (name) => {
        await writeConfig(`access_token = "test-token"\n[headers]\n"${name}" = "anything"\n`);
        const loader = new ConfigLoader({ env: {}, homeDir });

        await expect(loader.load()).rejects.toThrow(ConfigurationError);
        await expect(loader.load()).rejects.toMatchObject({ key: `headers.${name}` });
      }
    );

    it('should reject malformed TOML', async () => {
      await writeConfig('access_token = "unterminated\n');

      await expect(new ConfigLoader({ env: {}, homeDir }).load()).rejects.toThrow(`Failed to parse ${configPath}`);
    });

    it('should reject a wrong value type and name the key', async () => {
      await writeConfig('access_token = "test-token"\ntimeout = "soon"\n');

      await expect(new ConfigLoader({ env: {}, homeDir }).load()).rejects.toMatchObject({
        name: 'ConfigurationError',
        key: 'timeout',
      });
    });

    it('should reject unknown proxy schemes', async () => {
      await writeConfig('access_token = "test-token"\n[proxies]\nftp = "http://proxy:1"\n');

      await expect(new ConfigLoader({ env: {}, homeDir }).load()).rejects.toThrow(ConfigurationError);
    });

    it('should fail when a named config file is missing', async () => {
      const loader = new ConfigLoader({ env: { DENDRITECLI_ACCESS_TOKEN: 'test-token' }, homeDir });

      await expect(loader.load({ configPath: path.join(homeDir, 'missing.toml') })).rejects.toThrow(
        'Config file not found'
      );
    });

    it('should fail without a token when there is nobody to ask', async () => {
      await expect(new ConfigLoader({ env: {}, homeDir }).load()).rejects.toThrow('An access token is required');
    });

    it('should prompt for the token when no layer has one', async () => {
      const loader = new ConfigLoader({ env: {}, homeDir });

      const settings = await loader.load({ promptForToken: async () => 'test-prompted' });

      expect(settings.accessToken).toBe('test-prompted');
    });
  });

  describe('setValue / unsetValue', () => {
    it('should write a key and keep the rest of the file', async () => {
      await writeConfig('access_token = "test-token"\ncustom = "kept"\n');
      const loader = new ConfigLoader({ env: {}, homeDir });

      await loader.setValue(configPath, 'timeout', '30');
      await loader.setValue(configPath, 'headers.X-Trace', 'on');

      const file = await loader.readConfigFile(configPath);
      expect(file.timeout).toBe(30);
      expect(file.headers).toEqual({ 'X-Trace': 'on' });
      expect(file.access_token).toBe('test-token');
      expect(file.custom).toBe('kept');
    });

    it('should create the file with owner-only permissions', async () => {
      const loader = new ConfigLoader({ env: {}, homeDir });

      await loader.setValue(configPath, 'server', 'https://matrix.example.org');

      const stats = await fs.stat(configPath);
      expect(stats.mode & 0o777).toBe(0o600);
    });

    it('should refuse reserved headers without touching the file', async () => {
      await writeConfig('server = "https://matrix.example.org"\n');
      const loader = new ConfigLoader({ env: {}, homeDir });

      await expect(loader.setValue(configPath, 'headers.Accept', 'text/html')).rejects.toThrow(ConfigurationError);
      expect(await fs.readFile(configPath, 'utf-8')).toBe('server = "https://matrix.example.org"\n');
    });

    it('should refuse unknown keys', async () => {
      const loader = new ConfigLoader({ env: {}, homeDir });

      await expect(loader.setValue(configPath, 'colour', 'blue')).rejects.toThrow('Unknown configuration key "colour"');
    });

    it('should remove keys and table entries', async () => {
      await writeConfig('server = "https://matrix.example.org"\n[headers]\nX-One = "1"\nX-Two = "2"\n');
      const loader = new ConfigLoader({ env: {}, homeDir });

      await loader.unsetValue(configPath, 'server');
      await loader.unsetValue(configPath, 'headers.X-One');

      const file = await loader.readConfigFile(configPath);
      expect(file.server).toBeUndefined();
      expect(file.headers).toEqual({ 'X-Two': '2' });
    });
  });
});

describe('createSettings', () => {
  it('should fail fast on an empty token', () => {
    expect(() => createSettings('')).toThrow(ConfigurationError);
    expect(() => createSettings('   ')).toThrow(ConfigurationError);
  });

  it('should return a frozen value', () => {
    const settings = createSettings('test-token');

    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.timeout)).toBe(true);
  });
});

describe('normalizeServerUrl', () => {
  it('should strip trailing slashes', () => {
    expect(normalizeServerUrl('https://matrix.example.org/')).toBe('https://matrix.example.org');
    expect(normalizeServerUrl('http://localhost:8008')).toBe('http://localhost:8008');
  });

  it('should reject other schemes and garbage', () => {
    expect(() => normalizeServerUrl('ftp://example.org')).toThrow(ConfigurationError);
    expect(() => normalizeServerUrl('not a url')).toThrow(ConfigurationError);
  });
});

describe('assertHeadersAllowed', () => {
  it('should accept unknown header names verbatim', () => {
    expect(() => assertHeadersAllowed({ 'X-Anything': 'value', Authorization: 'x' })).not.toThrow();
  });

  it('should reject line breaks in values', () => {
    expect(() => assertHeadersAllowed({ 'X-Bad': 'a\r\nInjected: 1' })).toThrow('contains a line break');
  });
});

describe('helpers', () => {
  it('resolveTimeout should expand a single number to every phase', () => {
    expect(resolveTimeout(3)).toEqual({ connect: 3, read: 3, write: 3 });
    expect(() => resolveTimeout({ read: -1 })).toThrow('Invalid read timeout');
  });

  it('mergeLayers should let later layers win key by key', () => {
    expect(mergeLayers([
      { server: 'https://a.example.org', headers: { 'X-A': '1' } },
      { headers: { 'X-B': '2' } },
      { server: 'https://c.example.org' },
    ])).toEqual({
      server: 'https://c.example.org',
      headers: { 'X-A': '1', 'X-B': '2' },
    });
  });

  it('parseBooleanFlag should reject anything but the usual spellings', () => {
    expect(parseBooleanFlag('On', 'x')).toBe(true);
    expect(parseBooleanFlag('0', 'x')).toBe(false);
    expect(() => parseBooleanFlag('maybe', 'x')).toThrow(ConfigurationError);
  });
});
