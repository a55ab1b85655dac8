export type SinkKind = 'amqp' | 'mqtt';

export type PublisherState = 'DISCONNECTED' | 'CONNECTING' | 'CONNECTED' | 'CLOSED';

export type PublishOutcome = 'delivered' | 'skipped' | 'failed';

export interface PublishResult {
  readonly sink: string;
  readonly outcome: PublishOutcome;
  readonly error?: string;
}

export type PublisherStatusEvent =
  | {
      readonly type: 'state';
      readonly sink: string;
      readonly state: PublisherState;
      readonly previous: PublisherState;
      readonly attempt: number;
      readonly error?: string;
    }
  | {
      readonly type: 'publish';
      readonly sink: string;
      readonly result: PublishResult;
    };

export interface PublisherCounters {
  readonly delivered: number;
  readonly skipped: number;
  readonly failed: number;
  readonly reconnects: number;
}
