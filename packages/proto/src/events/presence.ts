import { z } from 'zod';
import { frame } from '../frame';
import { UserSummarySchema, type UserSummary } from '../models';

export const USER_JOINED = 'UserJoined' as const;
export const USER_LEFT = 'UserLeft' as const;
export const USER_TYPING = 'UserTyping' as const;
export const USER_STOPPED_TYPING = 'UserStoppedTyping' as const;

export const UserPresencePayload = z.object({
  user: UserSummarySchema,
  project_id: z.string().uuid(),
  timestamp: z.string().datetime({ offset: true }),
});

export const TypingPayload = z.object({
  user: UserSummarySchema,
  task_id: z.string().uuid(),
  project_id: z.string().uuid(),
  timestamp: z.string().datetime({ offset: true }),
});

export const UserJoinedFrame = frame(USER_JOINED, UserPresencePayload);
export const UserLeftFrame = frame(USER_LEFT, UserPresencePayload);
export const UserTypingFrame = frame(USER_TYPING, TypingPayload);
export const UserStoppedTypingFrame = frame(USER_STOPPED_TYPING, TypingPayload);

export type UserPresence = z.infer<typeof UserPresencePayload>;
export type Typing = z.infer<typeof TypingPayload>;

export type UserJoinedEvent = z.infer<typeof UserJoinedFrame>;
export type UserLeftEvent = z.infer<typeof UserLeftFrame>;
export type UserTypingEvent = z.infer<typeof UserTypingFrame>;
export type UserStoppedTypingEvent = z.infer<typeof UserStoppedTypingFrame>;

export type PresenceKind = typeof USER_JOINED | typeof USER_LEFT;

export function presenceEvent(
  kind: PresenceKind,
  user: UserSummary,
  projectId: string,
  at: Date = new Date(),
): UserJoinedEvent | UserLeftEvent {
  return { type: kind, data: { user, project_id: projectId, timestamp: at.toISOString() } };
}
