import { formatJson } from '../utils/format-utils';
import { CommandContext } from './context';

export async function refreshDevicesCommand(context: CommandContext, userId: string): Promise<void> {
  const manager = await context.manager();
  context.logger.info(`🔄 Refreshing devices for ${userId}...`);
  const result = await manager.refreshDevices(userId);
  context.logger.success('✅ Devices refreshed');
  context.print(formatJson(result));
}
