import { z } from 'zod';

/** Every frame on the socket is `{ "type": <kind>, "data": <payload> }`. */
export function frame<T extends string, S extends z.ZodTypeAny>(type: T, data: S) {
  return z.object({ type: z.literal(type), data });
}

/** Payload-less kinds are encoded as `{ "type": <kind> }`. */
export function bareFrame<T extends string>(type: T) {
  return z.object({ type: z.literal(type) });
}
