import { randomUUID } from 'node:crypto';
import { type RawData } from 'ws';
import { ErrorCode, wsCloseCodeFor, type SafeLogger } from '@tandem/shared';
import { type Identity, type IdentityVerifier, type MembershipOracle } from '@tandem/domain';
import {
  PONG,
  SUBSCRIBE,
  UNSUBSCRIBE,
  USER_JOINED,
  USER_LEFT,
  USER_STOPPED_TYPING,
  USER_TYPING,
  INVALID_MESSAGE_FORMAT,
  authenticationError,
  authenticationSuccess,
  decodeClientCommand,
  encodeEvent,
  errorEvent,
  subscriptionError,
  subscriptionSuccess,
  type ServerEvent,
  type UserSummary,
} from '@tandem/proto';
import { type ConnectionRegistry } from './connection-registry';
import { type SubscriptionStore } from './subscription-store';
import { type BroadcastRouter } from './broadcast-router';
import { EventChannel } from './event-channel';
import { createRateWindow, type RateLimiter, type RateWindow } from './rate-limiter';
import { RealtimeError, authenticationFailure, describeCause } from './errors';

/** The subset of `ws`'s WebSocket a session drives. */
export interface SessionSocket {
  send(data: string, cb: (err?: Error) => void): void;
  ping(): void;
  close(code: number, reason: string): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: 'pong', listener: () => void): unknown;
  on(event: 'close', listener: (code: number) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type SessionState = 'connecting' | 'authenticated' | 'closed';

export type CloseReason =
  | 'client_closed'
  | 'socket_error'
  | 'write_failed'
  | 'internal_error'
  | 'auth_failed'
  | 'displaced'
  | 'idle_timeout'
  | 'rate_limited'
  | 'inbound_overflow'
  | 'shutdown';

const CLOSE_FRAMES: Record<CloseReason, { code: number; message: string }> = {
  client_closed: { code: 1000, message: 'Connection closed' },
  socket_error: { code: 1011, message: 'Socket error' },
  write_failed: { code: 1011, message: 'Write failed' },
  internal_error: { code: 1011, message: 'Internal error' },
  auth_failed: { code: wsCloseCodeFor(ErrorCode.UNAUTHORIZED), message: 'Authentication failed' },
  displaced: { code: wsCloseCodeFor(ErrorCode.SESSION_REPLACED), message: 'Session replaced' },
  idle_timeout: { code: wsCloseCodeFor(ErrorCode.IDLE_TIMEOUT), message: 'Idle timeout' },
  rate_limited: { code: wsCloseCodeFor(ErrorCode.RATE_LIMITED), message: 'Rate limited' },
  inbound_overflow: { code: wsCloseCodeFor(ErrorCode.RATE_LIMITED), message: 'Rate limited' },
  shutdown: { code: 1001, message: 'Server shutting down' },
};

export function closeFrameFor(reason: CloseReason): { code: number; message: string } {
  return CLOSE_FRAMES[reason];
}

export const NOT_A_PROJECT_MEMBER = 'Not a project member';
export const SUBSCRIPTION_FAILED = 'Subscription failed';
export const NOT_SUBSCRIBED = 'Not subscribed to project';

export function toUserSummary(identity: Identity): UserSummary {
  return {
    id: identity.userId,
    username: identity.username,
    display_name: identity.displayName,
    avatar_url: identity.avatarUrl,
  };
}

export interface SessionDeps {
  registry: ConnectionRegistry;
  subscriptions: SubscriptionStore;
  router: BroadcastRouter;
  identityVerifier: IdentityVerifier;
  membershipOracle: MembershipOracle;
  rateLimiter: RateLimiter;
  inboundCapacity: number;
  logger: SafeLogger;
  now?: () => number;
  onClosed?: (session: Session) => void;
}

interface InboundFrame {
  data: RawData;
  isBinary: boolean;
}

interface Owner {
  identity: Identity;
  summary: UserSummary;
  channel: EventChannel<ServerEvent>;
}

function toText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * One WebSocket connection: `connecting` until the credential is verified,
 * then `authenticated` with an inbound loop (client frames, strictly in order)
 * and an outbound loop (the registry channel, one socket write at a time).
 * Every way a session can end goes through `close`, which runs once.
 */
export class Session {
  readonly id: string = randomUUID();
  private state: SessionState = 'connecting';
  private owner: Owner | null = null;
  private closeReason: CloseReason | null = null;
  private readonly inbound: EventChannel<InboundFrame>;
  private readonly controller = new AbortController();
  private readonly rateWindow: RateWindow;
  private readonly openedAt: number;
  private readonly now: () => number;
  private logger: SafeLogger;
  private loops: Promise<void> = Promise.resolve();
  private resolveClosed: () => void = () => undefined;
  private readonly closedSignal = new Promise<void>((resolve) => {
    this.resolveClosed = resolve;
  });

  constructor(
    private readonly socket: SessionSocket,
    private readonly deps: SessionDeps,
  ) {
    this.now = deps.now ?? Date.now;
    this.openedAt = this.now();
    this.rateWindow = createRateWindow(this.openedAt);
    this.inbound = new EventChannel<InboundFrame>(deps.inboundCapacity);
    this.logger = deps.logger.child({ sessionId: this.id });

    // Listeners go on before authentication so frames sent during the
    // handshake are queued, then either processed in order or discarded.
    socket.on('message', (data, isBinary) => this.receive({ data, isBinary }));
    socket.on('pong', () => this.touch());
    socket.on('close', (code) => {
      this.logger.debug({ code }, 'Socket closed by peer');
      this.close('client_closed');
    });
    socket.on('error', (err) => {
      this.logger.warn({ err: err.message }, 'Socket error');
      this.close('socket_error');
    });
  }

  get currentState(): SessionState {
    return this.state;
  }

  get userId(): string | undefined {
    return this.owner?.identity.userId;
  }

  get reason(): CloseReason | null {
    return this.closeReason;
  }

  /** Timestamp of the last sign of life, used by the heartbeat sweep. */
  lastActivity(): number {
    const userId = this.userId;
    if (userId && this.isOwner()) {
      return this.deps.subscriptions.lastSeenOf(userId) ?? this.openedAt;
    }
    return this.openedAt;
  }

  async authenticate(credential: string | null | undefined): Promise<void> {
    let identity: Identity;
    try {
      identity = await this.deps.identityVerifier.verify(credential);
    } catch (err) {
      await this.rejectHandshake(authenticationFailure(err));
      return;
    }

    // The peer may have gone away while the credential was being checked.
    if (this.state !== 'connecting') return;

    const { registry, subscriptions, router } = this.deps;
    const summary = toUserSummary(identity);
    const channel = registry.register(identity.userId);
    this.owner = { identity, summary, channel };
    this.state = 'authenticated';
    this.logger = this.logger.child({ userId: identity.userId });

    channel.offer(authenticationSuccess(identity.userId));

    for (const projectId of subscriptions.open(identity.userId)) {
      router.notifyPresence(USER_LEFT, summary, projectId);
    }

    this.logger.info({}, 'Session authenticated');

    this.loops = Promise.all([
      this.runOutbound(channel).catch((err: unknown) => this.fail('write_failed', err)),
      this.runInbound().catch((err: unknown) => this.fail('internal_error', err)),
    ]).then(() => undefined);
  }

  ping(): void {
    if (this.state === 'closed') return;
    try {
      this.socket.ping();
    } catch (err) {
      this.fail('socket_error', err);
    }
  }

  close(reason: CloseReason): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.closeReason = reason;
    this.controller.abort();
    this.inbound.close();

    const owner = this.owner;
    if (owner) {
      const { registry, subscriptions, router } = this.deps;
      const userId = owner.identity.userId;
      if (registry.isCurrent(userId, owner.channel)) {
        for (const projectId of subscriptions.close(userId)) {
          router.notifyPresence(USER_LEFT, owner.summary, projectId);
        }
        registry.unregister(userId, owner.channel);
      }
      owner.channel.close();
    }

    const { code, message } = CLOSE_FRAMES[reason];
    try {
      this.socket.close(code, message);
    } catch (err) {
      this.logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Socket close failed');
    }

    this.logger.info({ reason, code }, 'Session closed');
    this.deps.onClosed?.(this);
    this.resolveClosed();
  }

  /** Resolves after `close` has run and both loops have stopped. */
  async closed(): Promise<void> {
    await this.closedSignal;
    await this.loops;
  }

  private receive(frame: InboundFrame): void {
    if (this.state === 'closed') return;

    if (!this.deps.rateLimiter.allow(this.rateWindow)) {
      this.logger.warn({ count: this.rateWindow.messageCount }, 'Rate limited, closing connection');
      this.close('rate_limited');
      return;
    }

    if (this.inbound.offer(frame) !== 'accepted') {
      this.logger.warn({ capacity: this.inbound.capacity }, 'Inbound queue full, closing connection');
      this.close('inbound_overflow');
    }
  }

  private async rejectHandshake(error: RealtimeError): Promise<void> {
    if (error.kind === 'UPSTREAM') {
      this.logger.error({ kind: error.kind, err: describeCause(error) }, 'Identity verification failed');
    } else {
      this.logger.warn({ kind: error.kind, reason: error.message }, 'Authentication rejected');
    }

    if (this.state !== 'connecting') return;
    try {
      await this.write(encodeEvent(authenticationError(error.message)));
    } catch (err) {
      this.logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'Could not deliver authentication error');
    }
    this.close('auth_failed');
  }

  private async runOutbound(channel: EventChannel<ServerEvent>): Promise<void> {
    for await (const event of channel) {
      if (this.controller.signal.aborted) return;
      await this.write(encodeEvent(event));
    }
    // Drained and closed: either a newer session took over or the server is stopping.
    const userId = this.userId;
    const displaced = userId !== undefined && !this.deps.registry.isCurrent(userId, channel);
    this.close(displaced ? 'displaced' : 'shutdown');
  }

  private async runInbound(): Promise<void> {
    for await (const frame of this.inbound) {
      if (this.controller.signal.aborted) return;
      await this.handleFrame(frame);
    }
  }

  private async handleFrame(frame: InboundFrame): Promise<void> {
    if (frame.isBinary) {
      this.reportProtocolError(new RealtimeError('PROTOCOL', INVALID_MESSAGE_FORMAT));
      return;
    }

    const decoded = decodeClientCommand(toText(frame.data));
    if (!decoded.ok) {
      this.reportProtocolError(new RealtimeError('PROTOCOL', decoded.error), decoded.type);
      return;
    }

    this.touch();
    const command = decoded.value;
    switch (command.type) {
      case SUBSCRIBE:
        await this.subscribe(command.data.project_id);
        return;
      case UNSUBSCRIBE:
        this.unsubscribe(command.data.project_id);
        return;
      case USER_TYPING:
      case USER_STOPPED_TYPING:
        this.relayTyping(command.data.project_id, command);
        return;
      case PONG:
        return;
    }
  }

  private async subscribe(projectId: string): Promise<void> {
    const owner = this.owner;
    if (!owner) return;
    const userId = owner.identity.userId;

    let member: boolean;
    try {
      member = await this.deps.membershipOracle.isProjectMember(projectId, userId);
    } catch (err) {
      const error = new RealtimeError('UPSTREAM', SUBSCRIPTION_FAILED, { cause: err });
      this.logger.error({ kind: error.kind, projectId, err: describeCause(error) }, 'Membership check failed');
      this.enqueue(subscriptionError(error.message));
      return;
    }

    if (!member) {
      this.logger.warn({ kind: 'AUTHORIZATION', projectId }, 'Subscription refused');
      this.enqueue(subscriptionError(NOT_A_PROJECT_MEMBER));
      return;
    }

    // The oracle is asynchronous; the session may have been closed or displaced meanwhile.
    if (!this.isOwner()) return;

    if (this.deps.subscriptions.subscribe(userId, projectId)) {
      this.deps.router.notifyPresence(USER_JOINED, owner.summary, projectId);
    }
    this.logger.debug({ projectId }, 'Subscribed to project');
    this.enqueue(subscriptionSuccess(projectId));
  }

  private unsubscribe(projectId: string): void {
    const owner = this.owner;
    if (!owner || !this.isOwner()) return;

    if (this.deps.subscriptions.unsubscribe(owner.identity.userId, projectId)) {
      this.deps.router.notifyPresence(USER_LEFT, owner.summary, projectId);
    }
    this.logger.debug({ projectId }, 'Unsubscribed from project');
  }

  private relayTyping(projectId: string, event: ServerEvent): void {
    const userId = this.userId;
    if (!userId || !this.isOwner()) return;

    if (!this.deps.subscriptions.isSubscribed(userId, projectId)) {
      this.reportProtocolError(new RealtimeError('PROTOCOL', NOT_SUBSCRIBED), event.type);
      return;
    }
    this.deps.router.broadcastToProject(projectId, event, userId);
  }

  private touch(): void {
    const userId = this.userId;
    if (userId && this.isOwner()) this.deps.subscriptions.touch(userId);
  }

  private reportProtocolError(error: RealtimeError, type?: string): void {
    this.logger.warn({ kind: error.kind, type, reason: error.message }, 'Protocol violation');
    this.enqueue(errorEvent(error.message));
  }

  /** Queues an event for this session only, never for a session that displaced it. */
  private enqueue(event: ServerEvent): void {
    const channel = this.owner?.channel;
    if (!channel) return;
    const result = channel.offer(event);
    if (result !== 'accepted') {
      this.logger.warn({ kind: 'DELIVERY', type: event.type, reason: result }, 'Event dropped');
    }
  }

  private isOwner(): boolean {
    const owner = this.owner;
    return (
      owner !== null &&
      this.state === 'authenticated' &&
      this.deps.registry.isCurrent(owner.identity.userId, owner.channel)
    );
  }

  private write(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  private fail(reason: CloseReason, err: unknown): void {
    if (this.state !== 'closed') {
      this.logger.warn({ reason, err: err instanceof Error ? err.message : String(err) }, 'Session failed');
    }
    this.close(reason);
  }
}
