import { z } from 'zod';
import { frame } from '../frame';
import { TaskSchema, TaskStatusSchema, UserSummarySchema } from '../models';

export const TASK_CREATED = 'TaskCreated' as const;
export const TASK_UPDATED = 'TaskUpdated' as const;
export const TASK_DELETED = 'TaskDeleted' as const;
export const TASK_MOVED = 'TaskMoved' as const;

export const TaskEventPayload = z.object({
  task: TaskSchema,
  project_id: z.string().uuid(),
  user: UserSummarySchema,
});

export const TaskDeletedPayload = z.object({
  task_id: z.string().uuid(),
  project_id: z.string().uuid(),
});

export const TaskMovedPayload = z.object({
  task_id: z.string().uuid(),
  from_status: TaskStatusSchema,
  to_status: TaskStatusSchema,
  position: z.number().int(),
  project_id: z.string().uuid(),
  user: UserSummarySchema,
});

export const TaskCreatedFrame = frame(TASK_CREATED, TaskEventPayload);
export const TaskUpdatedFrame = frame(TASK_UPDATED, TaskEventPayload);
export const TaskDeletedFrame = frame(TASK_DELETED, TaskDeletedPayload);
export const TaskMovedFrame = frame(TASK_MOVED, TaskMovedPayload);

export type TaskEventData = z.infer<typeof TaskEventPayload>;
export type TaskDeletedData = z.infer<typeof TaskDeletedPayload>;
export type TaskMovedData = z.infer<typeof TaskMovedPayload>;

export type TaskCreatedEvent = z.infer<typeof TaskCreatedFrame>;
export type TaskUpdatedEvent = z.infer<typeof TaskUpdatedFrame>;
export type TaskDeletedEvent = z.infer<typeof TaskDeletedFrame>;
export type TaskMovedEvent = z.infer<typeof TaskMovedFrame>;

export function taskCreated(data: TaskEventData): TaskCreatedEvent {
  return { type: TASK_CREATED, data };
}

export function taskUpdated(data: TaskEventData): TaskUpdatedEvent {
  return { type: TASK_UPDATED, data };
}

export function taskDeleted(data: TaskDeletedData): TaskDeletedEvent {
  return { type: TASK_DELETED, data };
}

export function taskMoved(data: TaskMovedData): TaskMovedEvent {
  return { type: TASK_MOVED, data };
}
