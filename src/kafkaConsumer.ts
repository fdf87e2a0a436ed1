import { randomUUID } from 'node:crypto';
import { Kafka, logLevel, type Consumer } from 'kafkajs';
import { TransportError } from './errors';
import { silentLogger, type Logger } from './logger';
import {
  formatEndpoint,
  type ConsumerSession,
  type ConsumerSessionOptions,
  type PollOptions,
  type StreamConsumerFactory,
  type StreamMessage,
} from './streamConsumer';

export interface KafkaConsumerFactoryOptions {
  readonly clientId: string;
  /** Each session joins a fresh group named `<groupPrefix>-<uuid>` */
  readonly groupPrefix: string;
  readonly connectionTimeoutMs: number;
  readonly logger?: Logger;
}

/**
 * Consumer sessions over kafkajs. Every session gets its own client and
 * consumer group, commits no offsets, and does not retry.
 */
export class KafkaConsumerFactory implements StreamConsumerFactory {
  private readonly _log: Logger;

  constructor(private readonly _options: KafkaConsumerFactoryOptions) {
    this._log = (_options.logger ?? silentLogger).child({ component: 'kafka-consumer' });
  }

  async open(options: ConsumerSessionOptions): Promise<ConsumerSession> {
    const endpoint = formatEndpoint(options.address, options.port);
    const kafka = new Kafka({
      clientId: this._options.clientId,
      brokers: [endpoint],
      connectionTimeout: this._options.connectionTimeoutMs,
      retry: { retries: 0 },
      logLevel: logLevel.NOTHING,
    });
    const consumer = kafka.consumer({
      groupId: `${this._options.groupPrefix}-${randomUUID()}`,
      allowAutoTopicCreation: false,
      retry: { retries: 0 },
    });

    try {
      await consumer.connect();
      await consumer.subscribe({
        topics: [options.topic],
        fromBeginning: options.offsetPolicy === 'earliest',
      });
    } catch (error) {
      await this._disconnect(consumer, endpoint);
      throw new TransportError(endpoint, error);
    }

    this._log.debug({ endpoint, topic: options.topic, offsetPolicy: options.offsetPolicy }, 'subscribed');
    return new KafkaConsumerSession(consumer, endpoint, this._log);
  }

  private async _disconnect(consumer: Consumer, endpoint: string): Promise<void> {
    try {
      await consumer.disconnect();
    } catch (error) {
      this._log.warn({ err: error, endpoint }, 'disconnect after failed subscribe failed');
    }
  }
}

export class KafkaConsumerSession implements ConsumerSession {
  constructor(
    private readonly _consumer: Consumer,
    private readonly _endpoint: string,
    private readonly _log: Logger
  ) { }

  poll({ maxRecords, timeoutMs }: PollOptions): Promise<StreamMessage[]> {
    const consumer = this._consumer;
    const endpoint = this._endpoint;

    return new Promise<StreamMessage[]>((resolve, reject) => {
      const messages: StreamMessage[] = [];
      let settled = false;
      let timer: NodeJS.Timeout | undefined;
      let removeCrashListener: (() => void) | undefined;

      const settle = (): boolean => {
        if (settled) {
          return false;
        }
        settled = true;
        clearTimeout(timer);
        removeCrashListener?.();
        return true;
      };
      const done = (): void => {
        if (settle()) {
          resolve(messages);
        }
      };
      const fail = (error: unknown): void => {
        if (settle()) {
          reject(new TransportError(endpoint, error));
        }
      };

      timer = setTimeout(done, timeoutMs);
      removeCrashListener = consumer.on(consumer.events.CRASH, (event) => fail(event.payload.error));

      // The first batch that carries messages ends the poll; the timer only bounds an idle wait.
      consumer
        .run({
          autoCommit: false,
          eachBatch: async ({ batch }) => {
            if (settled) {
              return;
            }
            for (const message of batch.messages) {
              if (messages.length >= maxRecords) {
                break;
              }
              messages.push({ partition: batch.partition, offset: message.offset, value: message.value });
            }
            if (messages.length > 0) {
              done();
            }
          },
        })
        .catch(fail);
    });
  }

  async close(): Promise<void> {
    await this._consumer.disconnect();
    this._log.debug({ endpoint: this._endpoint }, 'disconnected');
  }
}
