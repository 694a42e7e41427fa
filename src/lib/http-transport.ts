import * as http from 'http';
import * as https from 'https';
import { HttpProxyAgent } from 'http-proxy-agent';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { AdminRequest, AdminResponse, HttpMethod } from '../types/admin-types';
import { ProxyMap, Settings, USER_AGENT } from '../types/settings';
import { TransportError, TransportErrorKind } from './errors';
import { Logger, silentLogger } from './logger';

/**
 * Sends one AdminRequest and returns the raw response, whatever its status.
 * Failures to get a response at all surface as TransportError.
 */
export interface AdminTransport {
  send(request: AdminRequest): Promise<AdminResponse>;
  close(): void;
}

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '::1', '[::1]']);

const TLS_ERROR_CODES = new Set([
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'CERT_HAS_EXPIRED',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'EPROTO',
]);

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
]);

/**
 * node:http(s) transport with keep-alive connection reuse, per-phase
 * timeouts and optional proxies. One instance per manager.
 */
export class NodeHttpTransport implements AdminTransport {
  private readonly agents = new Map<string, http.Agent>();

  constructor(
    private readonly settings: Settings,
    private readonly logger: Logger = silentLogger,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  send(request: AdminRequest): Promise<AdminResponse> {
    const url = this.buildUrl(request);
    const payload = request.body === undefined ? undefined : JSON.stringify(request.body);
    const headers = this.buildHeaders(request.accessToken ?? this.settings.accessToken, payload);
    const client = url.protocol === 'https:' ? https : http;
    const { connect, read, write } = this.settings.timeout;
    const { method, path } = request;
    const startedAt = Date.now();

    this.logger.debug(`→ ${method} ${path}`);

    return new Promise<AdminResponse>((resolve, reject) => {
      const timers = new Set<NodeJS.Timeout>();
      let settled = false;
      let finished = false;

      const startTimer = (seconds: number, kind: TransportErrorKind): NodeJS.Timeout => {
        const timer = setTimeout(() => fail(new TransportError(kind, method, path, `after ${seconds}s`)), seconds * 1000);
        timers.add(timer);
        return timer;
      };

      const stopTimer = (timer: NodeJS.Timeout): void => {
        clearTimeout(timer);
        timers.delete(timer);
      };

      const clearTimers = (): void => {
        for (const timer of timers) {
          clearTimeout(timer);
        }
        timers.clear();
      };

      // Also covers proxy tunnels: agents emit 'socket' only once one is up
      const connectTimer = startTimer(connect, 'connect_timeout');

      const fail = (error: TransportError): void => {
        if (settled) return;
        settled = true;
        clearTimers();
        req.destroy();
        this.logger.debug(`✗ ${method} ${path}: ${error.kind} (${Date.now() - startedAt}ms)`);
        reject(error);
      };

      const req = client.request(url, { method, headers, agent: this.agentFor(url) }, (res) => {
        const chunks: Buffer[] = [];

        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });

        res.on('end', () => {
          if (settled) return;
          settled = true;
          clearTimers();
          const status = res.statusCode ?? 0;
          this.logger.debug(`← ${status} ${method} ${path} (${Date.now() - startedAt}ms)`);
          resolve({
            status,
            statusMessage: res.statusMessage ?? http.STATUS_CODES[status] ?? '',
            body: Buffer.concat(chunks).toString('utf-8'),
            method,
            path,
          });
        });

        res.on('error', (error) => fail(classifyError(error, method, path)));
      });

      req.on('socket', (socket) => {
        // Pooled and tunnelled sockets arrive already connected
        if (!socket.connecting) {
          stopTimer(connectTimer);
          if (!finished) {
            startTimer(write, 'write_timeout');
          }
          return;
        }
        socket.once(url.protocol === 'https:' ? 'secureConnect' : 'connect', () => {
          stopTimer(connectTimer);
          if (!settled && !finished) {
            startTimer(write, 'write_timeout');
          }
        });
      });

      req.on('finish', () => {
        finished = true;
        clearTimers();
        req.setTimeout(read * 1000, () => {
          fail(new TransportError('read_timeout', method, path, `after ${read}s`));
        });
      });

      req.on('error', (error) => fail(classifyError(error, method, path)));

      req.end(payload);
    });
  }

  /**
   * Drop pooled connections so the process can exit
   */
  close(): void {
    for (const agent of this.agents.values()) {
      agent.destroy();
    }
    this.agents.clear();
  }

  private buildUrl(request: AdminRequest): URL {
    const url = new URL(`${this.settings.server}${request.path}`);
    for (const [name, value] of Object.entries(request.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(name, String(value));
      }
    }
    return url;
  }

  /**
   * Custom headers first, then the fixed ones so they always win
   */
  private buildHeaders(accessToken: string, payload: string | undefined): http.OutgoingHttpHeaders {
    const headers: http.OutgoingHttpHeaders = {};

    for (const [name, value] of Object.entries(this.settings.headers)) {
      if (name.toLowerCase() === 'authorization') {
        continue;
      }
      headers[name] = value;
    }

    headers['Accept'] = 'application/json';
    headers['User-Agent'] = USER_AGENT;
    headers['Authorization'] = `Bearer ${accessToken}`;

    if (payload !== undefined) {
      headers['Content-Type'] = 'application/json';
      headers['Content-Length'] = Buffer.byteLength(payload);
    }

    return headers;
  }

  private agentFor(url: URL): http.Agent {
    const isHttps = url.protocol === 'https:';
    const proxy = selectProxy(url, this.settings.proxies, this.env);
    const key = `${isHttps ? 'https' : 'http'}|${proxy ?? 'direct'}`;

    const existing = this.agents.get(key);
    if (existing) {
      return existing;
    }

    const agent = createAgent(isHttps, proxy);
    this.logger.debug(`Using ${proxy ? `proxy ${redactCredentials(proxy)}` : 'direct connection'} for ${url.protocol}//${url.host}`);
    this.agents.set(key, agent);
    return agent;
  }
}

/**
 * Proxy for a request URL, or null for a direct connection. Configured
 * proxies win per scheme, with `socks5` covering both; otherwise the usual
 * *_PROXY environment variables apply, minus NO_PROXY matches and loopback
 * hosts.
 */
export function selectProxy(url: URL, proxies: Readonly<ProxyMap> | null, env: NodeJS.ProcessEnv): string | null {
  const isHttps = url.protocol === 'https:';
  const configured = proxies ?? {};
  const fromConfig = (isHttps ? configured.https : configured.http) ?? configured.socks5;
  if (fromConfig) {
    return fromConfig;
  }

  const fromEnv = isHttps
    ? readEnv(env, 'HTTPS_PROXY') ?? readEnv(env, 'ALL_PROXY')
    : readEnv(env, 'HTTP_PROXY') ?? readEnv(env, 'ALL_PROXY');
  if (!fromEnv || bypassesProxy(url.hostname, readEnv(env, 'NO_PROXY'))) {
    return null;
  }
  return fromEnv;
}

export function createAgent(isHttps: boolean, proxy: string | null): http.Agent {
  if (proxy === null) {
    return isHttps ? new https.Agent({ keepAlive: true }) : new http.Agent({ keepAlive: true });
  }
  if (proxy.startsWith('socks')) {
    return new SocksProxyAgent(proxy, { keepAlive: true });
  }
  return isHttps ? new HttpsProxyAgent(proxy, { keepAlive: true }) : new HttpProxyAgent(proxy, { keepAlive: true });
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name] ?? env[name.toLowerCase()];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

export function bypassesProxy(hostname: string, noProxy: string | undefined): boolean {
  const host = hostname.toLowerCase();
  if (LOOPBACK_HOSTS.has(host)) {
    return true;
  }
  if (!noProxy) {
    return false;
  }

  return noProxy
    .split(',')
    .map((entry) => entry.trim().toLowerCase().replace(/:\d+$/, ''))
    .filter((entry) => entry !== '')
    .some((entry) => {
      if (entry === '*') return true;
      const suffix = entry.startsWith('.') ? entry : `.${entry}`;
      return host === entry.replace(/^\./, '') || host.endsWith(suffix);
    });
}

export function classifyError(error: Error, method: HttpMethod, path: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  let kind: TransportErrorKind = 'network';

  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
    kind = 'dns';
  } else if (TLS_ERROR_CODES.has(code) || code.startsWith('ERR_TLS') || code.startsWith('ERR_SSL') || code.startsWith('CERT_')) {
    kind = 'tls';
  } else if (code === 'ETIMEDOUT') {
    kind = 'connect_timeout';
  } else if (CONNECTION_ERROR_CODES.has(code)) {
    kind = 'connection';
  }

  return new TransportError(kind, method, path, code || error.message);
}

function redactCredentials(proxyUrl: string): string {
  return proxyUrl.replace(/\/\/[^@/]*@/, '//***@');
}
