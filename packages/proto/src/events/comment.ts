import { z } from 'zod';
import { frame } from '../frame';
import { TaskCommentSchema, UserSummarySchema } from '../models';

export const COMMENT_CREATED = 'CommentCreated' as const;
export const COMMENT_DELETED = 'CommentDeleted' as const;

export const CommentCreatedPayload = z.object({
  comment: TaskCommentSchema,
  task_id: z.string().uuid(),
  project_id: z.string().uuid(),
  user: UserSummarySchema,
});

export const CommentDeletedPayload = z.object({
  comment_id: z.string().uuid(),
  task_id: z.string().uuid(),
  project_id: z.string().uuid(),
});

export const CommentCreatedFrame = frame(COMMENT_CREATED, CommentCreatedPayload);
export const CommentDeletedFrame = frame(COMMENT_DELETED, CommentDeletedPayload);

export type CommentCreatedData = z.infer<typeof CommentCreatedPayload>;
export type CommentDeletedData = z.infer<typeof CommentDeletedPayload>;

export type CommentCreatedEvent = z.infer<typeof CommentCreatedFrame>;
export type CommentDeletedEvent = z.infer<typeof CommentDeletedFrame>;

export function commentCreated(data: CommentCreatedData): CommentCreatedEvent {
  return { type: COMMENT_CREATED, data };
}

export function commentDeleted(data: CommentDeletedData): CommentDeletedEvent {
  return { type: COMMENT_DELETED, data };
}
