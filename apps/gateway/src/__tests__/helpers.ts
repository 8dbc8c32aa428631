import { EventEmitter } from 'node:events';
import { vi } from 'vitest';
import { IdentityError, type Identity } from '@tandem/domain';
import { decodeServerEvent, type ServerEvent } from '@tandem/proto';
import { RealtimeGateway, type RealtimeGatewayOptions } from '../realtime';
import { type Session, type SessionSocket } from '../session';

export const PROJECT_A = '0b8e4a5c-3f1d-4d2a-8c6b-5e7f9a1b2c3d';
export const PROJECT_B = '1c9f5b6d-4a2e-4e3b-9d7c-6f8a0b2c3d4e';
export const TASK_ID = '2d0a6c7e-5b3f-4f4c-8e8d-7a9b1c3d4e5f';

export const ALICE: Identity = {
  userId: '6f1c2a9e-1b7d-4c1e-9a55-0d3c2b1a0e01',
  username: 'alice',
  displayName: 'Alice Example',
  avatarUrl: null,
};
export const BOB: Identity = {
  userId: '7a2d3b0f-2c8e-4d2f-8b66-1e4d3c2b1f02',
  username: 'bob',
  displayName: 'Bob Example',
  avatarUrl: 'https://cdn.example.test/bob.png',
};
export const CAROL: Identity = {
  userId: '8b3e4c1a-3d9f-4e3a-9c77-2f5e4d3c2a03',
  username: 'carol',
  displayName: 'Carol Example',
  avatarUrl: null,
};

const TOKENS = new Map<string, Identity>([
  ['alice-token', ALICE],
  ['bob-token', BOB],
  ['carol-token', CAROL],
]);

/** Alice and Bob belong to both projects, Carol to none. */
const MEMBERS = new Set<string>([
  `${PROJECT_A}:${ALICE.userId}`,
  `${PROJECT_A}:${BOB.userId}`,
  `${PROJECT_B}:${ALICE.userId}`,
  `${PROJECT_B}:${BOB.userId}`,
]);

export function createCollaborators() {
  return {
    identityVerifier: {
      verify: vi.fn(async (credential: string | null | undefined): Promise<Identity> => {
        if (!credential) throw new IdentityError('MISSING_CREDENTIAL', 'No token provided');
        const identity = TOKENS.get(credential);
        if (!identity) throw new IdentityError('INVALID_CREDENTIAL', 'Invalid token');
        return identity;
      }),
    },
    membershipOracle: {
      isProjectMember: vi.fn(async (projectId: string, userId: string) => MEMBERS.has(`${projectId}:${userId}`)),
    },
  };
}

export function createTestRealtime(overrides: Partial<RealtimeGatewayOptions> = {}) {
  const collaborators = createCollaborators();
  const realtime = new RealtimeGateway({
    ...collaborators,
    outboundCapacity: 16,
    inboundCapacity: 16,
    rateLimitPerSecond: 100,
    heartbeatIntervalMs: 1000,
    idleTimeoutMs: 5000,
    ...overrides,
  });
  return { realtime, ...collaborators };
}

/** Stands in for a `ws` WebSocket on the server side of a connection. */
export class FakeSocket extends EventEmitter implements SessionSocket {
  readonly sent: string[] = [];
  closeFrame: { code: number; reason: string } | null = null;
  closeCalls = 0;
  pings = 0;
  failWrites = false;
  private holding = false;
  private readonly held: Array<() => void> = [];

  send(data: string, cb: (err?: Error) => void): void {
    if (this.failWrites) {
      queueMicrotask(() => cb(new Error('write EPIPE')));
      return;
    }
    this.sent.push(data);
    if (this.holding) {
      this.held.push(() => cb());
      return;
    }
    queueMicrotask(() => cb());
  }

  ping(): void {
    this.pings++;
  }

  close(code: number, reason: string): void {
    this.closeCalls++;
    if (!this.closeFrame) this.closeFrame = { code, reason };
  }

  /** Leaves every write pending until `releaseWrites` is called. */
  holdWrites(): void {
    this.holding = true;
  }

  releaseWrites(): void {
    this.holding = false;
    for (const complete of this.held.splice(0)) complete();
  }

  receive(frame: unknown): void {
    const text = typeof frame === 'string' ? frame : JSON.stringify(frame);
    this.emit('message', Buffer.from(text), false);
  }

  peerClose(code = 1000): void {
    this.emit('close', code);
  }

  events(): ServerEvent[] {
    return this.sent.map((raw) => {
      const decoded = decodeServerEvent(raw);
      if (!decoded.ok) throw new Error(`Server sent an invalid frame: ${raw}`);
      return decoded.value;
    });
  }

  types(): string[] {
    return this.events().map((event) => event.type);
  }

  eventsOfType<T extends ServerEvent['type']>(type: T): Array<Extract<ServerEvent, { type: T }>> {
    return this.events().filter((event): event is Extract<ServerEvent, { type: T }> => event.type === type);
  }
}

/** Lets queued microtasks and socket callbacks run to completion. */
export async function flush(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export async function connect(
  realtime: RealtimeGateway,
  token: string | undefined,
): Promise<{ socket: FakeSocket; session: Session }> {
  const socket = new FakeSocket();
  const session = realtime.accept(socket, token);
  await flush();
  return { socket, session };
}

export async function subscribe(socket: FakeSocket, projectId: string): Promise<void> {
  socket.receive({ type: 'Subscribe', data: { project_id: projectId } });
  await flush();
}

export function summaryOf(identity: Identity) {
  return {
    id: identity.userId,
    username: identity.username,
    display_name: identity.displayName,
    avatar_url: identity.avatarUrl,
  };
}
