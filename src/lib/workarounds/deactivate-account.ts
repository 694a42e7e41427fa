import { randomBytes } from 'crypto';
import { z } from 'zod';
import {
  AnyObject,
  AnyObjectSchema,
  InteractiveAuthSchema,
  LoginResultSchema,
  PasswordResetResultSchema,
} from '../../types/admin-types';
import { AdminError } from '../errors';
import { decodeBody, isSuccess, parseResponse, toAdminError } from '../response-decoder';
import { AdminOperation, OperationContext, logStep } from './types';

export interface DeactivateAccountInput {
  userId: string;
}

const FlowSchema = z.object({
  stages: z.array(z.string()),
}).passthrough();

const PASSWORD_STAGE = 'm.login.password';
const DEACTIVATE_PATH = '/_matrix/client/v3/account/deactivate';

/**
 * Dendrite has no admin endpoint for deactivation, so this takes over the
 * account and deactivates it through the client API as the user:
 *
 * 1. reset the password to a random value
 * 2. log in with it
 * 3. ask to deactivate, which answers 401 with the interactive auth flows
 * 4. deactivate again, authenticating with the password, with `erase: true`
 *
 * The user should be evacuated from their rooms first.
 */
export class InteractiveDeactivationStrategy implements AdminOperation<DeactivateAccountInput, AnyObject> {
  readonly name = 'deactivate-account';
  readonly steps = [
    'POST /_dendrite/admin/resetPassword/{userId}',
    'POST /_matrix/client/v3/login',
    `POST ${DEACTIVATE_PATH} (expects 401)`,
    `POST ${DEACTIVATE_PATH} (m.login.password, erase)`,
  ];

  async execute(context: OperationContext, input: DeactivateAccountInput): Promise<AnyObject> {
    const { userId } = input;
    const password = randomBytes(32).toString('hex');

    logStep(context, this, 0);
    const resetPath = `/_dendrite/admin/resetPassword/${encodeURIComponent(userId)}`;
    const reset = await context.call(
      { method: 'POST', path: resetPath, body: { password, logout_devices: false } },
      PasswordResetResultSchema
    );
    if (reset.password_updated !== true) {
      throw new AdminError(200, null, `Password for ${userId} was not updated`, 'POST', resetPath);
    }

    logStep(context, this, 1);
    const login = await context.call(
      {
        method: 'POST',
        path: '/_matrix/client/v3/login',
        body: {
          type: PASSWORD_STAGE,
          identifier: { type: 'm.id.user', user: userId },
          password,
          initial_device_display_name: 'dendritecli',
        },
      },
      LoginResultSchema
    );
    const userToken = login.access_token;

    logStep(context, this, 2);
    const challenge = await context.send({
      method: 'POST',
      path: DEACTIVATE_PATH,
      body: {},
      accessToken: userToken,
    });

    if (isSuccess(challenge)) {
      context.logger.debug('Server deactivated the account without interactive auth');
      return parseResponse(challenge, AnyObjectSchema);
    }
    if (challenge.status !== 401) {
      throw toAdminError(challenge);
    }

    const auth = InteractiveAuthSchema.safeParse(decodeBody(challenge));
    if (!auth.success) {
      throw new AdminError(401, null, 'Deactivation challenge has no flows or session', 'POST', DEACTIVATE_PATH);
    }
    if (!startsWithPasswordStage(auth.data.flows)) {
      throw new AdminError(401, null, `No supported flows found: first stage is not ${PASSWORD_STAGE}`, 'POST', DEACTIVATE_PATH);
    }

    logStep(context, this, 3);
    return context.call(
      {
        method: 'POST',
        path: DEACTIVATE_PATH,
        accessToken: userToken,
        body: {
          auth: {
            type: PASSWORD_STAGE,
            identifier: { type: 'm.id.user', user: userId },
            password,
            session: auth.data.session,
            user: userId,
          },
          erase: true,
        },
      },
      AnyObjectSchema
    );
  }
}

/**
 * Only the first well-formed flow is considered
 */
function startsWithPasswordStage(flows: unknown[]): boolean {
  for (const flow of flows) {
    const parsed = FlowSchema.safeParse(flow);
    if (parsed.success) {
      return parsed.data.stages[0] === PASSWORD_STAGE;
    }
  }
  return false;
}
