import { createLogger, type SafeLogger } from '@tandem/shared';
import { presenceEvent, type PresenceKind, type ServerEvent, type UserSummary } from '@tandem/proto';
import { type ConnectionRegistry } from './connection-registry';
import { type SubscriptionStore } from './subscription-store';

export interface BroadcastRouterDeps {
  registry: ConnectionRegistry;
  subscriptions: SubscriptionStore;
  logger?: SafeLogger;
  now?: () => number;
}

export class BroadcastRouter {
  private readonly registry: ConnectionRegistry;
  private readonly subscriptions: SubscriptionStore;
  private readonly logger: SafeLogger;
  private readonly now: () => number;

  constructor(deps: BroadcastRouterDeps) {
    this.registry = deps.registry;
    this.subscriptions = deps.subscriptions;
    this.logger = deps.logger ?? createLogger({ name: 'gateway:router' });
    this.now = deps.now ?? Date.now;
  }

  /** Fans an event out to the project's subscribers. Returns how many channels accepted it. */
  broadcastToProject(projectId: string, event: ServerEvent, excludeUserId?: string): number {
    let delivered = 0;
    for (const userId of this.subscriptions.subscribersOf(projectId)) {
      if (userId === excludeUserId) continue;
      if (this.registry.send(userId, event) === 'delivered') delivered++;
    }
    this.logger.debug({ projectId, type: event.type, delivered }, 'Broadcast to project');
    return delivered;
  }

  sendToUser(userId: string, event: ServerEvent): boolean {
    return this.registry.send(userId, event) === 'delivered';
  }

  notifyPresence(kind: PresenceKind, user: UserSummary, projectId: string): number {
    return this.broadcastToProject(
      projectId,
      presenceEvent(kind, user, projectId, new Date(this.now())),
      user.id,
    );
  }
}
