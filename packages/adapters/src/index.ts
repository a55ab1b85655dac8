// ─── Logging ──────────────────────────────────────────────────────────────────
export {
  createLogger,
  errorMessage,
  getLogLevel,
  setLogLevel,
  silentLogger,
} from './logging/console-logger.js';

// ─── Resilience ───────────────────────────────────────────────────────────────
export { backoffDelay, sleep } from './resilience/backoff.js';
export { TimeoutError, withTimeout } from './resilience/timeout.js';

// ─── Serialization ────────────────────────────────────────────────────────────
export {
  serializeTrackingUpdate,
  toTrackingPayload,
  toUdveoPayload,
  UDVEO_FLIGHT_OPERATION_ID,
  type TrackingPayload,
  type UdveoTrackingPayload,
} from './serialization/tracking-payload.js';

// ─── MAVLink Source ───────────────────────────────────────────────────────────
export {
  describeEndpoint,
  parseConnectionString,
  type MavlinkEndpoint,
} from './mavlink/connection-string.js';
export {
  decodePositionPacket,
  FrameDecodeError,
  fromGlobalPositionInt,
  fromUtmGlobalPosition,
  POSITION_MESSAGE_IDS,
} from './mavlink/position-decoder.js';
export {
  openMavlinkTransport,
  type MavlinkTransport,
  type MavlinkTransportFactory,
  type TransportOpenOptions,
} from './mavlink/transports.js';
export {
  MavlinkTelemetrySource,
  type MavlinkSourceOptions,
} from './mavlink/mavlink-telemetry-source.adapter.js';

// ─── Broker Publishers ────────────────────────────────────────────────────────
export {
  BrokerPublisher,
  DeliveryRejectedError,
  type BrokerPublisherOptions,
} from './publishers/broker-publisher.js';
export {
  openAmqpSession,
  type AmqpSession,
  type AmqpSessionEvents,
  type AmqpSessionFactory,
} from './amqp/amqp-session.js';
export {
  AmqpTrackingPublisher,
  amqpConnectParams,
  amqpSocketOptions,
} from './amqp/amqp-tracking.publisher.js';
export {
  openMqttSession,
  type MqttSession,
  type MqttSessionEvents,
  type MqttSessionFactory,
} from './mqtt/mqtt-session.js';
export {
  MqttTrackingPublisher,
  mqttBrokerUrl,
  mqttClientOptions,
} from './mqtt/mqtt-tracking.publisher.js';
