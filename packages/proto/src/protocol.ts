import { z } from 'zod';
import {
  AuthenticationSuccessFrame, AuthenticationErrorFrame,
  SubscribeFrame, UnsubscribeFrame, SubscriptionSuccessFrame, SubscriptionErrorFrame,
  TaskCreatedFrame, TaskUpdatedFrame, TaskDeletedFrame, TaskMovedFrame,
  BoardCreatedFrame, BoardUpdatedFrame, BoardDeletedFrame,
  CommentCreatedFrame, CommentDeletedFrame,
  UserJoinedFrame, UserLeftFrame, UserTypingFrame, UserStoppedTypingFrame,
  ErrorFrame, PongFrame,
  SUBSCRIBE, UNSUBSCRIBE, USER_TYPING, USER_STOPPED_TYPING, PONG,
} from './events';

export const ClientCommandSchema = z.discriminatedUnion('type', [
  SubscribeFrame,
  UnsubscribeFrame,
  UserTypingFrame,
  UserStoppedTypingFrame,
  PongFrame,
]);

export const ServerEventSchema = z.discriminatedUnion('type', [
  AuthenticationSuccessFrame,
  AuthenticationErrorFrame,
  SubscriptionSuccessFrame,
  SubscriptionErrorFrame,
  TaskCreatedFrame,
  TaskUpdatedFrame,
  TaskDeletedFrame,
  TaskMovedFrame,
  BoardCreatedFrame,
  BoardUpdatedFrame,
  BoardDeletedFrame,
  CommentCreatedFrame,
  CommentDeletedFrame,
  UserJoinedFrame,
  UserLeftFrame,
  UserTypingFrame,
  UserStoppedTypingFrame,
  ErrorFrame,
  PongFrame,
]);

export type ClientCommand = z.infer<typeof ClientCommandSchema>;
export type ClientCommandType = ClientCommand['type'];
export type ServerEvent = z.infer<typeof ServerEventSchema>;
export type ServerEventType = ServerEvent['type'];

const CLIENT_COMMAND_TYPES: ReadonlySet<string> = new Set<ClientCommandType>([
  SUBSCRIBE,
  UNSUBSCRIBE,
  USER_TYPING,
  USER_STOPPED_TYPING,
  PONG,
]);

export const INVALID_MESSAGE_FORMAT = 'Invalid message format';

const MAX_ECHOED_TYPE_LENGTH = 64;

const TaggedFrameSchema = z.object({ type: z.string() });

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; type?: string };

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

/**
 * Decodes one inbound text frame. Unknown tags and server-only tags are
 * rejected rather than ignored.
 */
export function decodeClientCommand(raw: string): DecodeResult<ClientCommand> {
  const json = parseJson(raw);
  if (!json.ok) {
    return { ok: false, error: INVALID_MESSAGE_FORMAT };
  }

  const tagged = TaggedFrameSchema.safeParse(json.value);
  if (!tagged.success) {
    return { ok: false, error: INVALID_MESSAGE_FORMAT };
  }

  const { type } = tagged.data;
  if (!CLIENT_COMMAND_TYPES.has(type)) {
    return {
      ok: false,
      error: `Unsupported message type: ${type.slice(0, MAX_ECHOED_TYPE_LENGTH)}`,
      type,
    };
  }

  const command = ClientCommandSchema.safeParse(json.value);
  if (!command.success) {
    return { ok: false, error: INVALID_MESSAGE_FORMAT, type };
  }
  return { ok: true, value: command.data };
}

export function decodeServerEvent(raw: string): DecodeResult<ServerEvent> {
  const json = parseJson(raw);
  if (!json.ok) {
    return { ok: false, error: INVALID_MESSAGE_FORMAT };
  }
  const event = ServerEventSchema.safeParse(json.value);
  return event.success ? { ok: true, value: event.data } : { ok: false, error: INVALID_MESSAGE_FORMAT };
}

export function encodeEvent(event: ServerEvent): string {
  return JSON.stringify(event);
}
