import { formatJson } from '../utils/format-utils';
import { CommandContext, confirmAll, ensureEvacuated } from './context';
import { runRoomEvacuation } from './evacuate';

export interface PurgeRoomOptions {
  yes?: boolean;
  iAmSure?: boolean;
  iHaveEvacuated?: boolean;
}

/**
 * Purge every event of a room. Irreversible, so it asks twice.
 */
export async function purgeRoomCommand(context: CommandContext, roomId: string, options: PurgeRoomOptions): Promise<void> {
  const confirmed = await confirmAll(
    context,
    [`This removes every event from ${roomId}. Are you sure?`, 'This cannot be undone. Are you really sure?'],
    options.yes || options.iAmSure
  );
  if (!confirmed) return;

  const evacuated = await ensureEvacuated(context, roomId, options.iHaveEvacuated ?? false, async () => {
    await runRoomEvacuation(context, roomId);
  });
  if (!evacuated) return;

  const manager = await context.manager();
  context.logger.info(`🗑️  Purging room ${roomId}...`);
  const result = await manager.purgeRoom(roomId);
  context.logger.success('✅ Purged room');
  context.print(formatJson(result));
}
