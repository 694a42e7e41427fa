import { PublicRoom, PublicRoomsPageSchema } from '../../types/admin-types';
import { collectPages, toPageToken } from '../pagination';
import { AdminOperation, OperationContext, logStep } from './types';

export const DEFAULT_ROOM_PAGE_SIZE = 100;

export interface ListRoomsInput {
  pageSize: number;
}

/**
 * Lists rooms from the public room directory. Rooms that are not published
 * to the directory do not appear.
 */
export class PublicRoomsDirectoryStrategy implements AdminOperation<ListRoomsInput, PublicRoom[]> {
  readonly name = 'list-rooms';
  readonly steps = ['GET /_matrix/client/v3/publicRooms (repeated with since=<next_batch>)'];

  async execute(context: OperationContext, input: ListRoomsInput): Promise<PublicRoom[]> {
    logStep(context, this, 0);

    return collectPages(async (token) => {
      const page = await context.call(
        {
          method: 'GET',
          path: '/_matrix/client/v3/publicRooms',
          query: { limit: input.pageSize, since: token ?? undefined },
        },
        PublicRoomsPageSchema
      );
      return { items: page.chunk, nextToken: toPageToken(page.next_batch) };
    }, context.logger);
  }
}
