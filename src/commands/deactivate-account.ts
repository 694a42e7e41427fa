import { formatJson } from '../utils/format-utils';
import { CommandContext, confirmAll, ensureEvacuated } from './context';
import { runUserEvacuation } from './evacuate';

export interface DeactivateAccountOptions {
  yes?: boolean;
  iHaveEvacuated?: boolean;
}

export async function deactivateAccountCommand(
  context: CommandContext,
  userId: string,
  options: DeactivateAccountOptions
): Promise<void> {
  const confirmed = await confirmAll(
    context,
    [`This deactivates ${userId} and erases their data. Are you sure?`],
    options.yes
  );
  if (!confirmed) return;

  const evacuated = await ensureEvacuated(context, userId, options.iHaveEvacuated ?? false, async () => {
    await runUserEvacuation(context, userId);
  });
  if (!evacuated) return;

  const manager = await context.manager();
  context.logger.info(`🔒 Deactivating ${userId}...`);
  const result = await manager.deactivateAccount(userId);
  context.logger.success(`✅ Deactivated ${userId}`);
  context.print(formatJson(result));
}
