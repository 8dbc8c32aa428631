import { createLogger, type SafeLogger } from '@tandem/shared';
import { type ServerEvent } from '@tandem/proto';
import { EventChannel } from './event-channel';

export type DeliveryResult = 'delivered' | 'no_connection' | 'full' | 'closed';

export interface ConnectionRegistryOptions {
  capacity: number;
  logger?: SafeLogger;
}

/**
 * Maps each user to the outbound channel of their live session. A user has at
 * most one channel; registering again replaces and closes the previous one.
 */
export class ConnectionRegistry {
  private readonly channels = new Map<string, EventChannel<ServerEvent>>();
  private readonly capacity: number;
  private readonly logger: SafeLogger;

  constructor(options: ConnectionRegistryOptions) {
    this.capacity = options.capacity;
    this.logger = options.logger ?? createLogger({ name: 'gateway:registry' });
  }

  register(userId: string): EventChannel<ServerEvent> {
    const channel = new EventChannel<ServerEvent>(this.capacity);
    const previous = this.channels.get(userId);
    this.channels.set(userId, channel);

    if (previous) {
      previous.close();
      this.logger.info({ userId }, 'Previous connection displaced');
    }
    return channel;
  }

  /** With `channel` given, removes the entry only while that channel is still the current one. */
  unregister(userId: string, channel?: EventChannel<ServerEvent>): boolean {
    const current = this.channels.get(userId);
    if (!current) return false;
    if (channel && current !== channel) return false;
    return this.channels.delete(userId);
  }

  isCurrent(userId: string, channel: EventChannel<ServerEvent>): boolean {
    return this.channels.get(userId) === channel;
  }

  send(userId: string, event: ServerEvent): DeliveryResult {
    const channel = this.channels.get(userId);
    if (!channel) {
      this.logger.warn({ userId, type: event.type, reason: 'no_connection' }, 'Event dropped');
      return 'no_connection';
    }

    const result = channel.offer(event);
    if (result !== 'accepted') {
      this.logger.warn(
        { userId, type: event.type, reason: result, capacity: channel.capacity },
        'Event dropped',
      );
      return result;
    }
    return 'delivered';
  }

  has(userId: string): boolean {
    return this.channels.has(userId);
  }

  get size(): number {
    return this.channels.size;
  }
}
