import { randomUUID } from 'node:crypto';
import { SinkTransportError, SinkUnavailableError } from '../mapping/errors.js';
import { toEventBody } from '../mapping/event-body.js';
import { createLogger, type ComponentLogger } from '../observability/logger.js';
import type { MutationCall } from '../types/mutation.js';
import type { MutationSink, SinkReceipt } from '../types/sink.js';
import { KurrentEventStoreClient, type EventStoreClient } from './kurrent-client.js';
import { StreamQueue } from './stream-queue.js';

export const DEFAULT_CONNECTION_STRING = 'kurrentdb://localhost:2113?tls=false';

export interface EventStoreConfig {
  /** KurrentDB connection string (default: 'kurrentdb://localhost:2113?tls=false') */
  connectionString?: string;
}

export interface EventStoreSinkOptions {
  client: EventStoreClient;
  logger?: ComponentLogger;
  /** Record id factory (default: UUID v4) */
  generateId?: () => string;
}

/**
 * Appends every submitted call as one JSON event to its stream.
 *
 * Appends to the same stream are serialized in submission order; different
 * streams proceed concurrently. Failures are reported through the returned
 * promise and never retried.
 */
export class EventStoreSink implements MutationSink {
  private readonly client: EventStoreClient;
  private readonly logger: ComponentLogger;
  private readonly generateId: () => string;
  private readonly queue = new StreamQueue();
  private closed = false;

  constructor(options: EventStoreSinkOptions) {
    this.client = options.client;
    this.logger = options.logger ?? createLogger({ name: 'event-store-sink' });
    this.generateId = options.generateId ?? randomUUID;
  }

  static fromConfig(config: EventStoreConfig = {}, logger?: ComponentLogger): EventStoreSink {
    const client = KurrentEventStoreClient.fromConnectionString(
      config.connectionString ?? DEFAULT_CONNECTION_STRING,
    );
    return new EventStoreSink({ client, ...(logger && { logger }) });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  submit(call: MutationCall): Promise<SinkReceipt> {
    if (this.closed) {
      return Promise.reject(new SinkUnavailableError('Event store sink is closed'));
    }
    return this.queue.enqueue(call.streamName, () => this.append(call));
  }

  /** Stops accepting submissions, waits for queued appends, then closes the client */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.queue.drain();
    await this.client.close();
  }

  private async append(call: MutationCall): Promise<SinkReceipt> {
    const body = toEventBody(call);
    const eventId = this.generateId();

    try {
      await this.client.append({
        streamName: call.streamName,
        eventType: call.eventType,
        eventId,
        body,
      });
    } catch (err) {
      throw new SinkTransportError(call.streamName, err);
    }

    this.logger.info(
      { stream: call.streamName, eventType: call.eventType, eventId },
      'Persisted GraphQL mutation event',
    );

    return { streamName: call.streamName, eventType: call.eventType, eventId };
  }
}
