import { AffectedResult } from '../types/admin-types';
import { formatJson } from '../utils/format-utils';
import { CommandContext, confirmAll } from './context';

export interface EvacuateOptions {
  yes?: boolean;
}

export async function evacuateRoomCommand(context: CommandContext, roomId: string, options: EvacuateOptions): Promise<void> {
  const confirmed = await confirmAll(
    context,
    [`This removes every local user from ${roomId}. Are you sure?`],
    options.yes
  );
  if (!confirmed) return;

  const result = await runRoomEvacuation(context, roomId);
  context.print(formatJson(result));
}

export async function evacuateUserCommand(context: CommandContext, userId: string, options: EvacuateOptions): Promise<void> {
  const confirmed = await confirmAll(
    context,
    [`This removes ${userId} from every room they are in. Are you sure?`],
    options.yes
  );
  if (!confirmed) return;

  const result = await runUserEvacuation(context, userId);
  context.print(formatJson(result));
}

/**
 * Evacuate a room and report the affected users on stderr
 */
export async function runRoomEvacuation(context: CommandContext, roomId: string): Promise<AffectedResult> {
  const manager = await context.manager();
  context.logger.info(`🚪 Evacuating room ${roomId}...`);
  const result = await manager.evacuateRoom(roomId);
  context.logger.success('✅ Evacuated room');
  reportAffected(context, result, 'users');
  return result;
}

/**
 * Evacuate a user and report the affected rooms on stderr
 */
export async function runUserEvacuation(context: CommandContext, userId: string): Promise<AffectedResult> {
  const manager = await context.manager();
  context.logger.info(`🚪 Evacuating user ${userId}...`);
  const result = await manager.evacuateUser(userId);
  context.logger.success('✅ Evacuated user');
  reportAffected(context, result, 'rooms');
  return result;
}

function reportAffected(context: CommandContext, result: AffectedResult, noun: string): void {
  if (result.affected.length === 0) {
    context.logger.warn(`No ${noun} were affected`);
    return;
  }
  context.logger.info(`Affected ${noun}: ${result.affected.length}`);
}
