import { z } from 'zod';
import { frame } from '../frame';

export const SUBSCRIBE = 'Subscribe' as const;
export const UNSUBSCRIBE = 'Unsubscribe' as const;
export const SUBSCRIPTION_SUCCESS = 'SubscriptionSuccess' as const;
export const SUBSCRIPTION_ERROR = 'SubscriptionError' as const;

export const ProjectRefPayload = z.object({
  project_id: z.string().uuid(),
});

export const SubscriptionErrorPayload = z.object({
  message: z.string(),
});

export const SubscribeFrame = frame(SUBSCRIBE, ProjectRefPayload);
export const UnsubscribeFrame = frame(UNSUBSCRIBE, ProjectRefPayload);
export const SubscriptionSuccessFrame = frame(SUBSCRIPTION_SUCCESS, ProjectRefPayload);
export const SubscriptionErrorFrame = frame(SUBSCRIPTION_ERROR, SubscriptionErrorPayload);

export type SubscribeCommand = z.infer<typeof SubscribeFrame>;
export type UnsubscribeCommand = z.infer<typeof UnsubscribeFrame>;
export type SubscriptionSuccessEvent = z.infer<typeof SubscriptionSuccessFrame>;
export type SubscriptionErrorEvent = z.infer<typeof SubscriptionErrorFrame>;

export function subscriptionSuccess(projectId: string): SubscriptionSuccessEvent {
  return { type: SUBSCRIPTION_SUCCESS, data: { project_id: projectId } };
}

export function subscriptionError(message: string): SubscriptionErrorEvent {
  return { type: SUBSCRIPTION_ERROR, data: { message } };
}
