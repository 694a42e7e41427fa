import { formatJson } from '../utils/format-utils';
import { CommandContext } from './context';

export async function serverNoticeCommand(context: CommandContext, userId: string, message: string): Promise<void> {
  const manager = await context.manager();
  context.logger.info(`📣 Sending server notice to ${userId}...`);
  const result = await manager.sendServerNotice(userId, { msgtype: 'm.text', body: message });
  context.logger.success(`✅ Sent ${result.event_id}`);
  context.print(formatJson(result));
}
