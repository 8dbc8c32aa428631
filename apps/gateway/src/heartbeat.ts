import { createLogger, type SafeLogger } from '@tandem/shared';
import { type Session } from './session';

export type MonitoredSession = Pick<Session, 'id' | 'userId' | 'lastActivity' | 'ping' | 'close'>;

export interface HeartbeatOptions {
  sessions: () => Iterable<MonitoredSession>;
  intervalMs: number;
  idleTimeoutMs: number;
  now?: () => number;
  logger?: SafeLogger;
}

/**
 * Pings every live session on a fixed interval and closes the ones that have
 * shown no sign of life for longer than the idle timeout.
 */
export class HeartbeatMonitor {
  private timer: NodeJS.Timeout | null = null;
  private readonly now: () => number;
  private readonly logger: SafeLogger;

  constructor(private readonly options: HeartbeatOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ name: 'gateway:heartbeat' });
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweep(), this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Returns the number of sessions reaped. */
  sweep(): number {
    const cutoff = this.now() - this.options.idleTimeoutMs;
    let reaped = 0;
    for (const session of [...this.options.sessions()]) {
      if (session.lastActivity() < cutoff) {
        this.logger.info({ sessionId: session.id, userId: session.userId }, 'Reaping idle session');
        session.close('idle_timeout');
        reaped++;
      } else {
        session.ping();
      }
    }
    return reaped;
  }
}
