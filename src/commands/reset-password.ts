import { randomBytes } from 'crypto';
import { formatJson } from '../utils/format-utils';
import { CommandContext, confirmAll } from './context';

export interface ResetPasswordCommandOptions {
  password?: string;
  logoutDevices?: boolean;
  yes?: boolean;
}

/**
 * Reset a password. Leaving the prompt blank generates a random one, which
 * is included in the printed result.
 */
export async function resetPasswordCommand(
  context: CommandContext,
  userId: string,
  options: ResetPasswordCommandOptions
): Promise<void> {
  const confirmed = await confirmAll(context, [`This resets the password of ${userId}. Are you sure?`], options.yes);
  if (!confirmed) return;

  let password = options.password ?? (await context.prompter.secret('New password (blank for random)'));
  let generated = false;
  if (password === '') {
    password = randomBytes(32).toString('hex');
    generated = true;
  }

  const manager = await context.manager();
  context.logger.info(`🔑 Resetting password for ${userId}...`);
  const result = await manager.resetPassword(userId, {
    password,
    logoutDevices: options.logoutDevices ?? false,
  });
  context.logger.success('✅ Password reset');

  context.print(formatJson(generated ? { ...result, generated_password: password } : result));
}
