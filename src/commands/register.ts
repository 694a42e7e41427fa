import { formatJson } from '../utils/format-utils';
import { CommandContext } from './context';

export interface RegisterCommandOptions {
  displayName?: string;
  admin?: boolean;
  password?: string;
}

export async function registerCommand(
  context: CommandContext,
  sharedSecret: string,
  username: string,
  options: RegisterCommandOptions
): Promise<void> {
  const password = options.password ?? (await context.prompter.secret('Password'));
  const manager = await context.manager();

  context.logger.info(`👤 Registering ${username}${options.admin ? ' (admin)' : ''}...`);
  const result = await manager.register({
    sharedSecret,
    username,
    password,
    displayName: options.displayName,
    admin: options.admin ?? false,
  });

  context.logger.success(`✅ Registered ${username} (${result.user_id})`);
  context.print(formatJson(result));
}
