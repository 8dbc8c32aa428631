import { z } from 'zod';
import { bareFrame, frame } from '../frame';

export const ERROR = 'Error' as const;
export const PONG = 'Pong' as const;

export const ErrorPayload = z.object({
  message: z.string(),
});

export const ErrorFrame = frame(ERROR, ErrorPayload);
export const PongFrame = bareFrame(PONG);

export type ErrorEvent = z.infer<typeof ErrorFrame>;
export type PongEvent = z.infer<typeof PongFrame>;

export function errorEvent(message: string): ErrorEvent {
  return { type: ERROR, data: { message } };
}

export const PONG_EVENT: PongEvent = { type: PONG };
