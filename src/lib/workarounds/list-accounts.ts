import { Account, AccountPageSchema } from '../../types/admin-types';
import { collectPages, toPageToken } from '../pagination';
import { AdminOperation, OperationContext, logStep } from './types';

export const DEFAULT_ACCOUNT_PAGE_SIZE = 100;

export interface ListAccountsInput {
  pageSize: number;
}

/**
 * Lists every account through the Synapse-compatible user listing, following
 * `next_token` until the server stops returning one.
 */
export class AdminUserListStrategy implements AdminOperation<ListAccountsInput, Account[]> {
  readonly name = 'list-accounts';
  readonly steps = ['GET /_synapse/admin/v2/users (repeated with from=<next_token>)'];

  async execute(context: OperationContext, input: ListAccountsInput): Promise<Account[]> {
    logStep(context, this, 0);

    return collectPages(async (token) => {
      const page = await context.call(
        {
          method: 'GET',
          path: '/_synapse/admin/v2/users',
          query: {
            limit: input.pageSize,
            guests: true,
            deactivated: true,
            from: token ?? undefined,
          },
        },
        AccountPageSchema
      );
      return { items: page.users, nextToken: toPageToken(page.next_token) };
    }, context.logger);
  }
}
