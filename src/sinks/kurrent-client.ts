import { KurrentDBClient, jsonEvent } from '@kurrent/kurrentdb-client';
import type { JsonObject } from '../types/json.js';

/** One record to append */
export interface EventRecord {
  streamName: string;
  eventType: string;
  eventId: string;
  body: JsonObject;
}

/**
 * The slice of an event store client the sink needs. Tests substitute an
 * in-process implementation.
 */
export interface EventStoreClient {
  append(record: EventRecord): Promise<void>;
  close(): Promise<void>;
}

/**
 * {@link EventStoreClient} over the KurrentDB gRPC client. Appends are made
 * with any expected revision; the stream is created on first append.
 */
export class KurrentEventStoreClient implements EventStoreClient {
  private readonly client: KurrentDBClient;

  constructor(client: KurrentDBClient) {
    this.client = client;
  }

  /** e.g. `kurrentdb://localhost:2113?tls=false` */
  static fromConnectionString(connectionString: string): KurrentEventStoreClient {
    return new KurrentEventStoreClient(KurrentDBClient.connectionString(connectionString));
  }

  async append(record: EventRecord): Promise<void> {
    const event = jsonEvent({
      id: record.eventId,
      type: record.eventType,
      data: record.body,
    });
    await this.client.appendToStream(record.streamName, event);
  }

  async close(): Promise<void> {
    await this.client.dispose();
  }
}
