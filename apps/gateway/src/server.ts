import { type IncomingMessage } from 'node:http';
import { type Duplex } from 'node:stream';
import Fastify, { type FastifyInstance } from 'fastify';
import { WebSocketServer } from 'ws';
import { createLogger } from '@tandem/shared';
import { type IdentityVerifier, type MembershipOracle } from '@tandem/domain';
import { RealtimeGateway } from './realtime';
import { registerErrorHandler } from './plugins/error-handler';

const logger = createLogger({ name: 'gateway' });

export interface GatewayOptions {
  host: string;
  port: number;
  wsPath: string;
  maxPayloadBytes: number;
  rateLimitPerSecond: number;
  outboundChannelCapacity: number;
  inboundQueueCapacity: number;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
  identityVerifier: IdentityVerifier;
  membershipOracle: MembershipOracle;
}

export interface Gateway {
  app: FastifyInstance;
  realtime: RealtimeGateway;
  start: () => Promise<string>;
  close: () => Promise<void>;
}

/** Reads the bearer credential from `?token=` or, failing that, the Authorization header. */
export function extractCredential(url: URL, authorization: string | undefined): string | undefined {
  const fromQuery = url.searchParams.get('token');
  if (fromQuery) return fromQuery;

  const match = authorization?.match(/^Bearer\s+(.+)$/i);
  return match?.[1]?.trim() || undefined;
}

function rejectUpgrade(socket: Duplex, status: string): void {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

export function createGateway(options: GatewayOptions): Gateway {
  const app = Fastify({
    logger: false,
    bodyLimit: options.maxPayloadBytes,
  });

  registerErrorHandler(app);

  const realtime = new RealtimeGateway({
    identityVerifier: options.identityVerifier,
    membershipOracle: options.membershipOracle,
    outboundCapacity: options.outboundChannelCapacity,
    inboundCapacity: options.inboundQueueCapacity,
    rateLimitPerSecond: options.rateLimitPerSecond,
    heartbeatIntervalMs: options.heartbeatIntervalMs,
    idleTimeoutMs: options.idleTimeoutMs,
  });

  const wss = new WebSocketServer({ noServer: true, maxPayload: options.maxPayloadBytes });

  app.get('/health', async () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    connections: realtime.connectionCount,
  }));

  app.server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = new URL(request.url ?? '/', 'http://localhost');
    if (url.pathname !== options.wsPath) {
      logger.debug({ path: url.pathname }, 'Upgrade rejected: unknown path');
      rejectUpgrade(socket, '404 Not Found');
      return;
    }

    const credential = extractCredential(url, request.headers.authorization);
    wss.handleUpgrade(request, socket, head, (ws) => {
      realtime.accept(ws, credential);
    });
  });

  return {
    app,
    realtime,
    start: async () => {
      realtime.start();
      const address = await app.listen({ host: options.host, port: options.port });
      logger.info({ host: options.host, port: options.port, path: options.wsPath }, 'Gateway listening');
      return address;
    },
    close: async () => {
      await realtime.shutdown();
      wss.close();
      await app.close();
      logger.info({}, 'Gateway closed');
    },
  };
}
