export {
  TaskStatusSchema,
  TaskPrioritySchema,
  UserSummarySchema,
  TaskSchema,
  BoardSchema,
  TaskCommentSchema,
  type TaskStatus,
  type TaskPriority,
  type UserSummary,
  type Task,
  type Board,
  type TaskComment,
} from './models';
export {
  ClientCommandSchema,
  ServerEventSchema,
  INVALID_MESSAGE_FORMAT,
  decodeClientCommand,
  decodeServerEvent,
  encodeEvent,
  type ClientCommand,
  type ClientCommandType,
  type ServerEvent,
  type ServerEventType,
  type DecodeResult,
} from './protocol';
export * from './events';
