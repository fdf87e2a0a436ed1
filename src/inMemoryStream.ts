import { TransportError } from './errors';
import {
  formatEndpoint,
  type ConsumerSession,
  type ConsumerSessionOptions,
  type PollOptions,
  type StreamConsumerFactory,
  type StreamMessage,
} from './streamConsumer';

type Listener = () => void;

interface TopicLog {
  readonly messages: StreamMessage[];
  readonly listeners: Set<Listener>;
}

/**
 * In-process stand-in for a set of brokers. Endpoints must be started
 * before sessions can open against them.
 */
export class InMemoryStreamBroker implements StreamConsumerFactory {
  private readonly _endpoints = new Map<string, Map<string, TopicLog>>();
  private _openSessions = 0;
  private _opened = 0;

  /** Sessions currently open. */
  get openSessions(): number {
    return this._openSessions;
  }

  /** Sessions opened since creation. */
  get openedSessions(): number {
    return this._opened;
  }

  start(address: string, port: number): this {
    const endpoint = formatEndpoint(address, port);
    if (!this._endpoints.has(endpoint)) {
      this._endpoints.set(endpoint, new Map());
    }
    return this;
  }

  /**
   * Append a message. Objects are JSON encoded, buffers are stored as-is.
   */
  publish(address: string, port: number, topic: string, value: unknown): void {
    const log = this._topic(formatEndpoint(address, port), topic);
    const payload = Buffer.isBuffer(value) ? value : Buffer.from(JSON.stringify(value), 'utf-8');
    log.messages.push({ partition: 0, offset: String(log.messages.length), value: payload });
    for (const listener of [...log.listeners]) {
      listener();
    }
  }

  async open(options: ConsumerSessionOptions): Promise<ConsumerSession> {
    const endpoint = formatEndpoint(options.address, options.port);
    if (!this._endpoints.has(endpoint)) {
      throw new TransportError(endpoint, new Error('Connection refused'));
    }
    const log = this._topic(endpoint, options.topic);
    const start = options.offsetPolicy === 'earliest' ? 0 : log.messages.length;

    this._openSessions++;
    this._opened++;
    return new InMemorySession(log, start, () => {
      this._openSessions--;
    });
  }

  private _topic(endpoint: string, topic: string): TopicLog {
    const topics = this._endpoints.get(endpoint);
    if (!topics) {
      throw new Error(`Endpoint ${endpoint} is not started`);
    }
    let log = topics.get(topic);
    if (!log) {
      log = { messages: [], listeners: new Set() };
      topics.set(topic, log);
    }
    return log;
  }
}

class InMemorySession implements ConsumerSession {
  private _closed = false;

  constructor(
    private readonly _log: TopicLog,
    private _position: number,
    private readonly _onClose: () => void
  ) { }

  poll({ maxRecords, timeoutMs }: PollOptions): Promise<StreamMessage[]> {
    const collected: StreamMessage[] = [];
    const drain = (): boolean => {
      while (collected.length < maxRecords && this._position < this._log.messages.length) {
        collected.push(this._log.messages[this._position++]);
      }
      return collected.length > 0;
    };

    if (drain()) {
      return Promise.resolve(collected);
    }

    return new Promise((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        this._log.listeners.delete(onMessage);
        resolve(collected);
      };
      const onMessage = (): void => {
        if (drain()) {
          finish();
        }
      };
      const timer = setTimeout(finish, timeoutMs);
      this._log.listeners.add(onMessage);
    });
  }

  async close(): Promise<void> {
    if (!this._closed) {
      this._closed = true;
      this._onClose();
    }
  }
}
