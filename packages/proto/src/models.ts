import { z } from 'zod';

export const TaskStatusSchema = z.enum(['todo', 'inprogress', 'review', 'done']);
export const TaskPrioritySchema = z.enum(['low', 'medium', 'high', 'critical']);

const Timestamp = z.string().datetime({ offset: true });

export const UserSummarySchema = z.object({
  id: z.string().uuid(),
  username: z.string().min(1),
  display_name: z.string(),
  avatar_url: z.string().nullable().default(null),
});

export const TaskSchema = z.object({
  id: z.string().uuid(),
  title: z.string().min(1).max(255),
  description: z.string().nullable(),
  project_id: z.string().uuid(),
  created_by: z.string().uuid(),
  assigned_to: z.string().uuid().nullable(),
  status: TaskStatusSchema,
  priority: TaskPrioritySchema,
  due_date: Timestamp.nullable(),
  tags: z.array(z.string()).default([]),
  position: z.number().int(),
  created_at: Timestamp,
  updated_at: Timestamp,
});

export const BoardSchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1).max(255),
  description: z.string().nullable(),
  project_id: z.string().uuid(),
  created_by: z.string().uuid(),
  columns: z.array(z.string()),
  is_default: z.boolean(),
  created_at: Timestamp,
  updated_at: Timestamp,
});

export const TaskCommentSchema = z.object({
  id: z.string().uuid(),
  task_id: z.string().uuid(),
  user_id: z.string().uuid(),
  content: z.string(),
  created_at: Timestamp,
  updated_at: Timestamp,
});

export type TaskStatus = z.infer<typeof TaskStatusSchema>;
export type TaskPriority = z.infer<typeof TaskPrioritySchema>;
export type UserSummary = z.infer<typeof UserSummarySchema>;
export type Task = z.infer<typeof TaskSchema>;
export type Board = z.infer<typeof BoardSchema>;
export type TaskComment = z.infer<typeof TaskCommentSchema>;
