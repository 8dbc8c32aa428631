import { z } from 'zod';
import { frame } from '../frame';

export const AUTHENTICATION_SUCCESS = 'AuthenticationSuccess' as const;
export const AUTHENTICATION_ERROR = 'AuthenticationError' as const;

export const AuthenticationSuccessPayload = z.object({
  user_id: z.string().uuid(),
});

export const AuthenticationErrorPayload = z.object({
  message: z.string(),
});

export const AuthenticationSuccessFrame = frame(AUTHENTICATION_SUCCESS, AuthenticationSuccessPayload);
export const AuthenticationErrorFrame = frame(AUTHENTICATION_ERROR, AuthenticationErrorPayload);

export type AuthenticationSuccessEvent = z.infer<typeof AuthenticationSuccessFrame>;
export type AuthenticationErrorEvent = z.infer<typeof AuthenticationErrorFrame>;

export function authenticationSuccess(userId: string): AuthenticationSuccessEvent {
  return { type: AUTHENTICATION_SUCCESS, data: { user_id: userId } };
}

export function authenticationError(message: string): AuthenticationErrorEvent {
  return { type: AUTHENTICATION_ERROR, data: { message } };
}
