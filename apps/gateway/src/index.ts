import { loadConfig, GatewayConfigSchema, createLogger, JoseTokenService } from '@tandem/shared';
import { IdentityService, MembershipService } from '@tandem/domain';
import {
  initPool, closePool, withTransaction, PgUserRepository, PgProjectMemberRepository,
} from '@tandem/db';
import { createGateway } from './server';

const logger = createLogger({ name: 'gateway' });

async function main() {
  const config = loadConfig(GatewayConfigSchema);

  const tokenService = new JoseTokenService({
    activeKid: config.JWT_ACTIVE_KID,
    keys: config.JWT_KEYS,
    issuer: config.JWT_ISSUER,
  });

  initPool({ connectionString: config.DATABASE_URL });

  const identityVerifier = new IdentityService({
    tokenService,
    userRepo: new PgUserRepository(),
    withTransaction,
  });
  const membershipOracle = new MembershipService({
    memberRepo: new PgProjectMemberRepository(),
    withTransaction,
  });

  const gateway = createGateway({
    host: config.GATEWAY_HOST,
    port: config.GATEWAY_PORT,
    wsPath: config.WS_PATH,
    maxPayloadBytes: config.MAX_PAYLOAD_BYTES,
    rateLimitPerSecond: config.RATE_LIMIT_PER_SECOND,
    outboundChannelCapacity: config.OUTBOUND_CHANNEL_CAPACITY,
    inboundQueueCapacity: config.INBOUND_QUEUE_CAPACITY,
    heartbeatIntervalMs: config.HEARTBEAT_INTERVAL_MS,
    idleTimeoutMs: config.IDLE_TIMEOUT_MS,
    identityVerifier,
    membershipOracle,
  });

  await gateway.start();

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    logger.info({}, 'Shutting down gateway');
    await gateway.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start gateway');
  process.exit(1);
});
