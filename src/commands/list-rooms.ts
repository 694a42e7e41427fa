import Table from 'cli-table3';
import { PublicRoom } from '../types/admin-types';
import { formatJson, truncate } from '../utils/format-utils';
import { CommandContext, ListCommandOptions, rememberDatabaseUri } from './context';

export async function listRoomsCommand(context: CommandContext, options: ListCommandOptions): Promise<void> {
  if (options.databaseUri) {
    await rememberDatabaseUri(context, options.databaseUri);
  }

  const manager = await context.manager();
  const rooms = await manager.listRooms({ pageSize: options.pageSize });

  if (options.json) {
    context.print(formatJson(rooms));
    return;
  }

  if (rooms.length === 0) {
    context.logger.warn('No public rooms found');
    return;
  }

  context.print(renderRoomTable(rooms));
  context.logger.info(`Total: ${rooms.length} room(s) published in the room directory`);
}

export function renderRoomTable(rooms: PublicRoom[]): string {
  const table = new Table({
    head: ['ALIAS', 'ROOM ID', 'NAME', 'MEMBERS'],
  });

  for (const room of rooms) {
    table.push([
      room.canonical_alias ?? '-',
      room.room_id,
      truncate(room.name ?? '', 30),
      String(room.num_joined_members ?? 0),
    ]);
  }

  return table.toString();
}
