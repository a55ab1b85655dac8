import type { TrackingUpdate } from '../../entities/tracking-update.js';
import type {
  PublisherCounters,
  PublisherState,
  PublisherStatusEvent,
  PublishResult,
  SinkKind,
} from '../../entities/publisher-status.js';

export type PublisherStatusListener = (event: PublisherStatusEvent) => void;

export interface TrackingPublisherPort {
  readonly kind: SinkKind;
  /** Sink identity used in logs and status events, e.g. "amqp:broker.local/tracking". */
  readonly name: string;
  readonly state: PublisherState;
  connect(): Promise<void>;
  /** Never rejects: connectivity problems are reported through the result. */
  publish(update: TrackingUpdate): Promise<PublishResult>;
  close(): Promise<void>;
  counters(): PublisherCounters;
  onStatus(listener: PublisherStatusListener): () => void;
}
