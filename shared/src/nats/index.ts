// NATS client utilities
export {
  createNATSClient,
  parseNatsEndpoint,
  resolveAuth,
  encodeMessage,
  decodeMessage,
  tryDecodeMessage,
  type ConnectedClient,
  type NatsEndpoint,
  type NatsAuth,
  type NatsTransport,
} from './client.js';

// Subject patterns
export {
  buildSubject,
  ActivitySubjects,
} from './subjects.js';
