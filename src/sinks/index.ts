export {
  EventStoreSink,
  DEFAULT_CONNECTION_STRING,
  type EventStoreConfig,
  type EventStoreSinkOptions,
} from './event-store-sink.js';
export {
  KurrentEventStoreClient,
  type EventStoreClient,
  type EventRecord,
} from './kurrent-client.js';
export { RecordingSink } from './recording-sink.js';
export { StreamQueue } from './stream-queue.js';
