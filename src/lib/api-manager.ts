import { createHmac } from 'crypto';
import { z } from 'zod';
import {
  Account,
  AdminApi,
  AdminRequest,
  AffectedResult,
  AffectedResultSchema,
  AnyObject,
  AnyObjectSchema,
  ListOptions,
  NonceResultSchema,
  PasswordResetResult,
  PasswordResetResultSchema,
  PublicRoom,
  RegisterOptions,
  RegisterResult,
  RegisterResultSchema,
  ResetPasswordOptions,
  ServerNoticeResult,
  ServerNoticeResultSchema,
  WhoisResult,
  WhoisResultSchema,
} from '../types/admin-types';
import { Settings, SettingsInput } from '../types/settings';
import { createSettings } from './config-loader';
import { ValidationError } from './errors';
import { AdminTransport, NodeHttpTransport } from './http-transport';
import { Logger } from './logger';
import { parseResponse } from './response-decoder';
import { ValidationService } from './validation-service';
import {
  AdminOperation,
  AdminUserListStrategy,
  DEFAULT_ACCOUNT_PAGE_SIZE,
  DEFAULT_ROOM_PAGE_SIZE,
  DeactivateAccountInput,
  InteractiveDeactivationStrategy,
  ListAccountsInput,
  ListRoomsInput,
  OperationContext,
  PublicRoomsDirectoryStrategy,
} from './workarounds';

/**
 * Implementations of the operations Dendrite has no admin endpoint for
 */
export interface ManagerStrategies {
  listAccounts: AdminOperation<ListAccountsInput, Account[]>;
  listRooms: AdminOperation<ListRoomsInput, PublicRoom[]>;
  deactivateAccount: AdminOperation<DeactivateAccountInput, AnyObject>;
}

export interface ManagerDependencies {
  logger?: Logger;
  transport?: AdminTransport;               // defaults to NodeHttpTransport
  strategies?: Partial<ManagerStrategies>;
}

export interface ManagerOptions extends SettingsInput, ManagerDependencies {}

/**
 * HMAC-SHA1 over `nonce\0username\0password\0admin|notadmin`, keyed with the
 * registration shared secret, hex encoded
 */
export function computeRegistrationMac(
  sharedSecret: string,
  nonce: string,
  username: string,
  password: string,
  admin: boolean
): string {
  return createHmac('sha1', sharedSecret)
    .update(nonce)
    .update('\x00')
    .update(username)
    .update('\x00')
    .update(password)
    .update('\x00')
    .update(admin ? 'admin' : 'notadmin')
    .digest('hex');
}

/**
 * Client for the Dendrite admin API. One method per operation; each validates
 * its input, sends a single request (or a documented sequence of them) and
 * returns the decoded body.
 *
 * @example
 * const manager = new HttpApiManager('my-token', { server: 'https://matrix.example.org' });
 * const info = await manager.whois('@alice:example.org');
 * manager.close();
 */
export class HttpApiManager implements AdminApi {
  readonly settings: Settings;
  private readonly logger: Logger;
  private readonly transport: AdminTransport;
  private readonly validation: ValidationService;
  private readonly strategies: ManagerStrategies;
  private readonly context: OperationContext;

  constructor(accessToken: string, options: ManagerOptions = {}) {
    const { logger, transport, strategies, ...input } = options;

    this.settings = createSettings(accessToken, input);
    this.logger = logger ?? new Logger('warn');
    this.transport = transport ?? new NodeHttpTransport(this.settings, this.logger);
    this.validation = new ValidationService(this.settings);
    this.strategies = {
      listAccounts: strategies?.listAccounts ?? new AdminUserListStrategy(),
      listRooms: strategies?.listRooms ?? new PublicRoomsDirectoryStrategy(),
      deactivateAccount: strategies?.deactivateAccount ?? new InteractiveDeactivationStrategy(),
    };
    this.context = {
      settings: this.settings,
      logger: this.logger,
      send: (request) => this.transport.send(request),
      call: <S extends z.ZodTypeAny>(request: AdminRequest, schema: S): Promise<z.infer<S>> =>
        this.call(request, schema),
    };
  }

  /**
   * Build a manager from already loaded Settings
   */
  static fromSettings(settings: Settings, dependencies: ManagerDependencies = {}): HttpApiManager {
    return new HttpApiManager(settings.accessToken, {
      server: settings.server,
      timeout: settings.timeout,
      proxies: settings.proxies,
      headers: settings.headers,
      overridePasswordLengthCheck: settings.overridePasswordLengthCheck,
      passwordMaxBytes: settings.passwordMaxBytes,
      databaseUri: settings.databaseUri,
      ...dependencies,
    });
  }

  /**
   * Fetch a nonce for shared-secret registration
   */
  async registerNonce(): Promise<string> {
    const result = await this.call({ method: 'GET', path: '/_synapse/admin/v1/register' }, NonceResultSchema);
    return result.nonce;
  }

  /**
   * Register a user with the registration shared secret. The display name
   * defaults to the username.
   */
  async register(options: RegisterOptions): Promise<RegisterResult> {
    const { sharedSecret, username, password, displayName, admin = false } = options;

    if (sharedSecret.length === 0) {
      throw new ValidationError('Shared secret cannot be empty', 'sharedSecret');
    }
    this.validation.validateLocalpart(username);
    this.validation.validatePassword(password);

    const nonce = await this.registerNonce();
    this.logger.debug(`Registering ${username}${admin ? ' as admin' : ''}`);

    return this.call(
      {
        method: 'POST',
        path: '/_synapse/admin/v1/register',
        body: {
          nonce,
          username,
          displayname: displayName ?? username,
          password,
          admin,
          mac: computeRegistrationMac(sharedSecret, nonce, username, password, admin),
        },
      },
      RegisterResultSchema
    );
  }

  /**
   * Make every local user leave the room. Can take a while on large rooms.
   */
  async evacuateRoom(roomId: string): Promise<AffectedResult> {
    this.validation.validateRoomReference(roomId);
    return this.call({ method: 'POST', path: `/_dendrite/admin/evacuateRoom/${encodeURIComponent(roomId)}` }, AffectedResultSchema);
  }

  /**
   * Make a local user leave every room they are in
   */
  async evacuateUser(userId: string): Promise<AffectedResult> {
    this.validation.validateUserId(userId);
    return this.call({ method: 'POST', path: `/_dendrite/admin/evacuateUser/${encodeURIComponent(userId)}` }, AffectedResultSchema);
  }

  /**
   * Delete every stored event of a room. Irreversible.
   */
  async purgeRoom(roomId: string): Promise<AnyObject> {
    this.validation.validateRoomReference(roomId);
    return this.call({ method: 'POST', path: `/_dendrite/admin/purgeRoom/${encodeURIComponent(roomId)}` }, AnyObjectSchema);
  }

  /**
   * Re-query a remote user's devices and keys from their homeserver
   */
  async refreshDevices(userId: string): Promise<AnyObject> {
    this.validation.validateUserId(userId);
    return this.call({ method: 'POST', path: `/_dendrite/admin/refreshDevices/${encodeURIComponent(userId)}` }, AnyObjectSchema);
  }

  /**
   * Start rebuilding the full-text search index. Returns immediately; the
   * server indexes in the background.
   */
  async reindexEvents(): Promise<AnyObject> {
    return this.call({ method: 'POST', path: '/_dendrite/admin/fulltext/reindex' }, AnyObjectSchema);
  }

  async whois(userId: string): Promise<WhoisResult> {
    this.validation.validateUserId(userId);
    return this.call({ method: 'GET', path: `/_matrix/client/v3/admin/whois/${encodeURIComponent(userId)}` }, WhoisResultSchema);
  }

  async resetPassword(userId: string, options: ResetPasswordOptions): Promise<PasswordResetResult> {
    this.validation.validateUserId(userId);
    this.validation.validatePassword(options.password);

    return this.call(
      {
        method: 'POST',
        path: `/_dendrite/admin/resetPassword/${encodeURIComponent(userId)}`,
        body: { password: options.password, logout_devices: options.logoutDevices ?? false },
      },
      PasswordResetResultSchema
    );
  }

  /**
   * Send a server notice. `content` is the event content, e.g.
   * `{ msgtype: 'm.text', body: 'Maintenance tonight' }`.
   */
  async sendServerNotice(userId: string, content: Record<string, unknown>): Promise<ServerNoticeResult> {
    this.validation.validateUserId(userId);
    return this.call(
      {
        method: 'POST',
        path: '/_synapse/admin/v1/send_server_notice',
        body: { user_id: userId, content },
      },
      ServerNoticeResultSchema
    );
  }

  async listAccounts(options: ListOptions = {}): Promise<Account[]> {
    const pageSize = options.pageSize ?? DEFAULT_ACCOUNT_PAGE_SIZE;
    this.validation.validatePageSize(pageSize);
    return this.strategies.listAccounts.execute(this.context, { pageSize });
  }

  async listRooms(options: ListOptions = {}): Promise<PublicRoom[]> {
    const pageSize = options.pageSize ?? DEFAULT_ROOM_PAGE_SIZE;
    this.validation.validatePageSize(pageSize);
    return this.strategies.listRooms.execute(this.context, { pageSize });
  }

  /**
   * Deactivate and erase an account. Evacuate the user first.
   */
  async deactivateAccount(userId: string): Promise<AnyObject> {
    this.validation.validateUserId(userId);
    return this.strategies.deactivateAccount.execute(this.context, { userId });
  }

  /**
   * Release pooled connections
   */
  close(): void {
    this.transport.close();
  }

  private async call<S extends z.ZodTypeAny>(request: AdminRequest, schema: S): Promise<z.infer<S>> {
    const response = await this.transport.send(request);
    return parseResponse(response, schema);
  }
}
