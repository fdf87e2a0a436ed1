import type { Logger } from './logger';
import type { OffsetPolicy } from './model';

export interface ConsumerSessionOptions {
  readonly address: string;
  readonly port: number;
  readonly topic: string;
  readonly offsetPolicy: OffsetPolicy;
}

export interface PollOptions {
  readonly maxRecords: number;
  readonly timeoutMs: number;
}

/** A message as it came off the wire, before decoding. */
export interface StreamMessage {
  readonly partition: number;
  readonly offset: string;
  readonly value: Buffer | null;
}

/**
 * One connected, subscribed consumer. Never shared between reads.
 */
export interface ConsumerSession {
  /**
   * Resolve with the first non-empty batch, capped at `maxRecords`, or with
   * nothing once `timeoutMs` elapsed without a message.
   * @throws TransportError when reading from the broker fails
   */
  poll(options: PollOptions): Promise<StreamMessage[]>;
  close(): Promise<void>;
}

/**
 * Opens consumer sessions against a broker endpoint.
 */
export interface StreamConsumerFactory {
  /**
   * Connect to `address:port` and subscribe to `topic`.
   * @throws TransportError when the broker cannot be reached
   */
  open(options: ConsumerSessionOptions): Promise<ConsumerSession>;
}

/**
 * `host:port`, with IPv6 literals in brackets.
 */
export function formatEndpoint(address: string, port: number): string {
  return address.includes(':') ? `[${address}]:${port}` : `${address}:${port}`;
}

/**
 * Open a session, hand it to `fn`, and close it however `fn` exits.
 * A failing close is logged and does not replace `fn`'s outcome.
 */
export async function withConsumerSession<T>(
  factory: StreamConsumerFactory,
  options: ConsumerSessionOptions,
  log: Logger,
  fn: (session: ConsumerSession) => Promise<T>
): Promise<T> {
  const session = await factory.open(options);
  log.debug({ topic: options.topic }, 'consumer session opened');
  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
      log.debug({ topic: options.topic }, 'consumer session closed');
    } catch (error) {
      log.warn({ err: error, topic: options.topic }, 'failed to close consumer session');
    }
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode a UTF-8 JSON payload. An empty payload (tombstone) decodes to null.
 * @throws TypeError on malformed UTF-8, SyntaxError on malformed JSON
 */
export function decodeJson(value: Buffer | null): unknown {
  if (value === null || value.length === 0) {
    return null;
  }
  return JSON.parse(utf8.decode(value));
}
