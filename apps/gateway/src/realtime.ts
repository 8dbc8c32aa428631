import { createLogger, type SafeLogger } from '@tandem/shared';
import { type IdentityVerifier, type MembershipOracle } from '@tandem/domain';
import { type ServerEvent } from '@tandem/proto';
import { ConnectionRegistry } from './connection-registry';
import { SubscriptionStore } from './subscription-store';
import { BroadcastRouter } from './broadcast-router';
import { RateLimiter } from './rate-limiter';
import { HeartbeatMonitor } from './heartbeat';
import { Session, type SessionSocket } from './session';

export interface RealtimeGatewayOptions {
  identityVerifier: IdentityVerifier;
  membershipOracle: MembershipOracle;
  outboundCapacity: number;
  inboundCapacity: number;
  rateLimitPerSecond: number;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
  now?: () => number;
  logger?: SafeLogger;
}

/**
 * Server-scoped owner of the registry, the subscription store and every live
 * session. The CRUD layer publishes through `broadcastToProject` and `sendToUser`.
 */
export class RealtimeGateway {
  readonly registry: ConnectionRegistry;
  readonly subscriptions: SubscriptionStore;
  readonly router: BroadcastRouter;
  readonly heartbeat: HeartbeatMonitor;
  private readonly sessions = new Set<Session>();
  private readonly rateLimiter: RateLimiter;
  private readonly logger: SafeLogger;

  constructor(private readonly options: RealtimeGatewayOptions) {
    const now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ name: 'gateway:realtime' });
    this.registry = new ConnectionRegistry({ capacity: options.outboundCapacity, logger: this.logger });
    this.subscriptions = new SubscriptionStore(now);
    this.router = new BroadcastRouter({
      registry: this.registry,
      subscriptions: this.subscriptions,
      logger: this.logger,
      now,
    });
    this.rateLimiter = new RateLimiter(options.rateLimitPerSecond, now);
    this.heartbeat = new HeartbeatMonitor({
      sessions: () => this.sessions,
      intervalMs: options.heartbeatIntervalMs,
      idleTimeoutMs: options.idleTimeoutMs,
      now,
      logger: this.logger,
    });
  }

  accept(socket: SessionSocket, credential: string | null | undefined): Session {
    const { options } = this;
    const session = new Session(socket, {
      registry: this.registry,
      subscriptions: this.subscriptions,
      router: this.router,
      identityVerifier: options.identityVerifier,
      membershipOracle: options.membershipOracle,
      rateLimiter: this.rateLimiter,
      inboundCapacity: options.inboundCapacity,
      logger: this.logger,
      now: options.now,
      onClosed: (closed) => this.sessions.delete(closed),
    });
    this.sessions.add(session);
    this.logger.info({ sessionId: session.id }, 'WebSocket connection opened');

    session.authenticate(credential).catch((err: unknown) => {
      this.logger.error(
        { sessionId: session.id, err: err instanceof Error ? err.message : String(err) },
        'Session handshake failed',
      );
      session.close('internal_error');
    });
    return session;
  }

  broadcastToProject(projectId: string, event: ServerEvent, excludeUserId?: string): number {
    return this.router.broadcastToProject(projectId, event, excludeUserId);
  }

  sendToUser(userId: string, event: ServerEvent): boolean {
    return this.router.sendToUser(userId, event);
  }

  get connectionCount(): number {
    return this.registry.size;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  start(): void {
    this.heartbeat.start();
  }

  async shutdown(): Promise<void> {
    this.heartbeat.stop();
    const sessions = [...this.sessions];
    for (const session of sessions) {
      session.close('shutdown');
    }
    await Promise.all(sessions.map((session) => session.closed()));
    this.logger.info({ sessions: sessions.length }, 'Realtime gateway stopped');
  }
}
