import { formatJson } from '../utils/format-utils';
import { CommandContext } from './context';

export async function whoisCommand(context: CommandContext, userId: string): Promise<void> {
  const manager = await context.manager();
  const result = await manager.whois(userId);
  context.print(formatJson(result));
}
