import { z } from 'zod';
import { frame } from '../frame';
import { BoardSchema, UserSummarySchema } from '../models';

export const BOARD_CREATED = 'BoardCreated' as const;
export const BOARD_UPDATED = 'BoardUpdated' as const;
export const BOARD_DELETED = 'BoardDeleted' as const;

export const BoardEventPayload = z.object({
  board: BoardSchema,
  project_id: z.string().uuid(),
  user: UserSummarySchema,
});

export const BoardDeletedPayload = z.object({
  board_id: z.string().uuid(),
  project_id: z.string().uuid(),
});

export const BoardCreatedFrame = frame(BOARD_CREATED, BoardEventPayload);
export const BoardUpdatedFrame = frame(BOARD_UPDATED, BoardEventPayload);
export const BoardDeletedFrame = frame(BOARD_DELETED, BoardDeletedPayload);

export type BoardEventData = z.infer<typeof BoardEventPayload>;
export type BoardDeletedData = z.infer<typeof BoardDeletedPayload>;

export type BoardCreatedEvent = z.infer<typeof BoardCreatedFrame>;
export type BoardUpdatedEvent = z.infer<typeof BoardUpdatedFrame>;
export type BoardDeletedEvent = z.infer<typeof BoardDeletedFrame>;

export function boardCreated(data: BoardEventData): BoardCreatedEvent {
  return { type: BOARD_CREATED, data };
}

export function boardUpdated(data: BoardEventData): BoardUpdatedEvent {
  return { type: BOARD_UPDATED, data };
}

export function boardDeleted(data: BoardDeletedData): BoardDeletedEvent {
  return { type: BOARD_DELETED, data };
}
