import { formatJson } from '../utils/format-utils';
import { CommandContext } from './context';

export async function reindexEventsCommand(context: CommandContext): Promise<void> {
  const manager = await context.manager();
  const result = await manager.reindexEvents();
  context.logger.success('✅ Events are being re-indexed. Progress shows up in the Dendrite logs.');
  context.print(formatJson(result));
}
