import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAdminServer } from '../../../tests/mocks';
import { HttpApiManager } from '../api-manager';
import { AdminError } from '../errors';
import { Logger } from '../logger';
import { InteractiveDeactivationStrategy } from './deactivate-account';

const RESET = '/_dendrite/admin/resetPassword/%40mallory%3Aexample.org';
const LOGIN = '/_matrix/client/v3/login';
const DEACTIVATE = '/_matrix/client/v3/account/deactivate';

function passwordOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'password' in body && typeof body.password === 'string') {
    return body.password;
  }
  throw new Error('request body has no password');
}

describe('InteractiveDeactivationStrategy', () => {
  let server: MockAdminServer;
  let manager: HttpApiManager;

  beforeEach(async () => {
    server = new MockAdminServer();
    await server.start();
    manager = new HttpApiManager('test-admin-token', { server: server.url, logger: new Logger('silent') });
  });

  afterEach(async () => {
    manager.close();
    await server.stop();
  });

  it('should list its steps in order', () => {
    expect(new InteractiveDeactivationStrategy().steps).toEqual([
      'POST /_dendrite/admin/resetPassword/{userId}',
      'POST /_matrix/client/v3/login',
      'POST /_matrix/client/v3/account/deactivate (expects 401)',
      'POST /_matrix/client/v3/account/deactivate (m.login.password, erase)',
    ]);
  });

  it('should reset, log in, then deactivate through interactive auth', async () => {
    server
      .reply('POST', RESET, { body: { password_updated: true } })
      .reply('POST', LOGIN, { body: { access_token: 'test-user-token', user_id: '@mallory:example.org' } })
      .reply(
        'POST',
        DEACTIVATE,
        { status: 401, body: { session: 'test-session', flows: [{ stages: ['m.login.password'] }], params: {} } },
        { status: 200, body: { id_server_unbind_result: 'no-support' } }
      );

    const result = await manager.deactivateAccount('@mallory:example.org');

    expect(result).toEqual({ id_server_unbind_result: 'no-support' });
    expect(server.requests.map((request) => request.path)).toEqual([RESET, LOGIN, DEACTIVATE, DEACTIVATE]);

    const [reset, login, challenge, final] = server.requests;
    expect(reset.headers['authorization']).toBe('Bearer test-admin-token');
    expect(reset.body).toMatchObject({ logout_devices: false });
    expect(reset.body).toHaveProperty('password', expect.stringMatching(/^[0-9a-f]{64}$/));

    expect(login.body).toMatchObject({
      type: 'm.login.password',
      identifier: { type: 'm.id.user', user: '@mallory:example.org' },
      password: passwordOf(reset.body),
    });

    expect(challenge.headers['authorization']).toBe('Bearer test-user-token');
    expect(challenge.body).toEqual({});

    expect(final.headers['authorization']).toBe('Bearer test-user-token');
    expect(final.body).toEqual({
      auth: {
        type: 'm.login.password',
        identifier: { type: 'm.id.user', user: '@mallory:example.org' },
        password: passwordOf(reset.body),
        session: 'test-session',
        user: '@mallory:example.org',
      },
      erase: true,
    });
  });

  it('should stop after the challenge when the server needs no auth', async () => {
    server
      .reply('POST', RESET, { body: { password_updated: true } })
      .reply('POST', LOGIN, { body: { access_token: 'test-user-token' } })
      .reply('POST', DEACTIVATE, { status: 200, body: {} });

    expect(await manager.deactivateAccount('@mallory:example.org')).toEqual({});
    expect(server.requestsTo('POST', DEACTIVATE)).toHaveLength(1);
  });

  it('should fail when the password was not updated', async () => {
    server.reply('POST', RESET, { body: { password_updated: false } });

    await expect(manager.deactivateAccount('@mallory:example.org')).rejects.toThrow(
      'Password for @mallory:example.org was not updated'
    );
    expect(server.requests).toHaveLength(1);
  });

  it('should fail when no flow starts with a password stage', async () => {
    server
      .reply('POST', RESET, { body: { password_updated: true } })
      .reply('POST', LOGIN, { body: { access_token: 'test-user-token' } })
      .reply('POST', DEACTIVATE, {
        status: 401,
        body: { session: 's', flows: ['junk', { stages: ['m.login.sso'] }] },
      });

    await expect(manager.deactivateAccount('@mallory:example.org')).rejects.toThrow('No supported flows found');
    expect(server.requestsTo('POST', DEACTIVATE)).toHaveLength(1);
  });

  it('should surface other challenge statuses as AdminError', async () => {
    server
      .reply('POST', RESET, { body: { password_updated: true } })
      .reply('POST', LOGIN, { body: { access_token: 'test-user-token' } })
      .reply('POST', DEACTIVATE, { status: 403, body: { errcode: 'M_FORBIDDEN', error: 'nope' } });

    const error = await manager.deactivateAccount('@mallory:example.org').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AdminError);
    expect(error).toMatchObject({ status: 403, errcode: 'M_FORBIDDEN' });
  });
});
