import { readFileSync } from 'fs';
import { connect, credsAuthenticator, JSONCodec } from 'nats';
import type { NatsConnection, ConnectionOptions } from 'nats';
import { ConfigurationError } from '../errors.js';
import type { NATSConfiguration } from '../types/config.js';

/**
 * Connected NATS client
 */
export interface ConnectedClient {
  /** Raw NATS connection */
  nc: NatsConnection;

  /** Drain and close the connection */
  close: () => Promise<void>;
}

export type NatsTransport = 'tcp' | 'websocket';

/**
 * Where to connect, with any credentials the URL carried split out
 */
export interface NatsEndpoint {
  /** Server URL without credentials, as handed to the client library */
  server: string;
  transport: NatsTransport;
  user?: string;
  pass?: string;
}

/**
 * How the client authenticates
 */
export type NatsAuth =
  | { kind: 'none' }
  | { kind: 'password'; user: string; pass?: string }
  | { kind: 'creds'; file: string };

const SCHEMES: Record<string, { transport: NatsTransport; serverScheme: string }> = {
  'nats:': { transport: 'tcp', serverScheme: 'nats:' },
  'tls:': { transport: 'tcp', serverScheme: 'nats:' },
  'ws:': { transport: 'websocket', serverScheme: 'ws:' },
  'wss:': { transport: 'websocket', serverScheme: 'wss:' },
};

/**
 * Parse NATS_URL into an endpoint
 *
 * Accepts nats://, tls://, ws:// and wss:// URLs, optionally with user:pass@,
 * and a bare host:port (taken as nats://). WebSocket URLs keep their path.
 */
export function parseNatsEndpoint(url: string): NatsEndpoint {
  const withScheme = url.includes('://') ? url : `nats://${url}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new ConfigurationError('NATS_URL', `not a valid URL: "${url}"`);
  }

  const scheme = SCHEMES[parsed.protocol];
  if (!scheme) {
    throw new ConfigurationError('NATS_URL', `unsupported scheme "${parsed.protocol}"`);
  }
  if (!parsed.host) {
    throw new ConfigurationError('NATS_URL', `missing host in "${url}"`);
  }

  const path = scheme.transport === 'websocket' ? `${parsed.pathname}${parsed.search}` : '';
  const endpoint: NatsEndpoint = {
    server: `${scheme.serverScheme}//${parsed.host}${path}`,
    transport: scheme.transport,
  };
  if (parsed.username) {
    endpoint.user = decodeURIComponent(parsed.username);
  }
  if (parsed.password) {
    endpoint.pass = decodeURIComponent(parsed.password);
  }
  return endpoint;
}

/**
 * Pick the authentication method: URL user, then NATS_USER/NATS_PASS, then a
 * credentials file
 */
export function resolveAuth(
  endpoint: NatsEndpoint,
  credentials: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): NatsAuth {
  const user = endpoint.user ?? env.NATS_USER;
  if (user) {
    const pass = endpoint.pass ?? env.NATS_PASS;
    return pass ? { kind: 'password', user, pass } : { kind: 'password', user };
  }
  if (credentials) {
    return { kind: 'creds', file: credentials };
  }
  return { kind: 'none' };
}

function authOptions(auth: NatsAuth): Partial<ConnectionOptions> {
  switch (auth.kind) {
    case 'password':
      return { user: auth.user, pass: auth.pass };
    case 'creds':
      return { authenticator: credsAuthenticator(readFileSync(auth.file)) };
    case 'none':
      return {};
  }
}

const connectors: Record<NatsTransport, (opts: ConnectionOptions) => Promise<NatsConnection>> = {
  tcp: (opts) => connect(opts),
  websocket: async (opts) => {
    // nats.ws needs a global WebSocket, which Node 20 does not provide
    const { default: WebSocket } = await import('ws');
    Object.assign(globalThis, { WebSocket });
    const natsWs = await import('nats.ws');
    return natsWs.connect(opts);
  },
};

/**
 * Connect to NATS over TCP or WebSocket, chosen by the URL scheme
 *
 * Without any credentials the connection is anonymous.
 */
export async function createNATSClient(
  config: NATSConfiguration,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ConnectedClient> {
  const endpoint = parseNatsEndpoint(config.url);

  const nc = await connectors[endpoint.transport]({
    servers: endpoint.server,
    name: config.name ?? 'idlestop-client',
    reconnect: true,
    maxReconnectAttempts: config.reconnect?.maxAttempts ?? 10,
    reconnectTimeWait: config.reconnect?.delayMs ?? 1000,
    ...authOptions(resolveAuth(endpoint, config.credentials, env)),
  });

  return {
    nc,
    // drain flushes pending messages, then closes the connection
    close: () => nc.drain(),
  };
}

export function encodeMessage(data: unknown): Uint8Array {
  return JSONCodec().encode(data);
}

export function decodeMessage<T>(data: Uint8Array): T {
  return JSONCodec<T>().decode(data);
}

/**
 * Decode a payload, returning null when it is empty or not JSON
 */
export function tryDecodeMessage<T>(data: Uint8Array): T | null {
  if (data.length === 0) {
    return null;
  }
  try {
    return decodeMessage<T>(data);
  } catch {
    return null;
  }
}
