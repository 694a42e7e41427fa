import Table from 'cli-table3';
import { Account } from '../types/admin-types';
import { formatFlag, formatJson, formatTimestamp, truncate } from '../utils/format-utils';
import { CommandContext, ListCommandOptions, rememberDatabaseUri } from './context';

export async function listAccountsCommand(context: CommandContext, options: ListCommandOptions): Promise<void> {
  if (options.databaseUri) {
    await rememberDatabaseUri(context, options.databaseUri);
  }

  const manager = await context.manager();
  const accounts = await manager.listAccounts({ pageSize: options.pageSize });

  if (options.json) {
    context.print(formatJson(accounts));
    return;
  }

  if (accounts.length === 0) {
    context.logger.warn('No accounts found');
    return;
  }

  context.print(renderAccountTable(accounts));
  context.logger.info(`Total: ${accounts.length} account(s)`);
}

export function renderAccountTable(accounts: Account[]): string {
  const table = new Table({
    head: ['USER ID', 'DISPLAY NAME', 'CREATED', 'ADMIN', 'DEACTIVATED', 'TYPE'],
  });

  for (const account of accounts) {
    table.push([
      account.name,
      truncate(account.displayname ?? '', 30),
      formatTimestamp(account.creation_ts),
      formatFlag(account.admin),
      formatFlag(account.deactivated),
      account.user_type ?? (formatFlag(account.is_guest) === 'yes' ? 'guest' : 'user'),
    ]);
  }

  return table.toString();
}
