import type { DecodeErrorPolicy } from './config';
import type { DatasetTopicLinker } from './datasetTopicLinker';
import { DecodeError, NoMessagesFoundError, TransportError, isCatalogError } from './errors';
import { silentLogger, type Logger } from './logger';
import type { StreamSource, StreamWindow } from './model';
import {
  decodeJson,
  formatEndpoint,
  withConsumerSession,
  type StreamConsumerFactory,
  type StreamMessage,
} from './streamConsumer';
import { validate, type StreamWindowOptions } from './validation';

/** Records returned when the caller does not ask for a count. */
export const DEFAULT_MAX_RECORDS = 200;

/** How long one read waits for messages. */
export const POLL_TIMEOUT_MS = 10_000;

export interface StreamReaderOptions {
  readonly logger?: Logger;
  /** Deployment-wide poll window; not settable per read. */
  readonly pollTimeoutMs?: number;
  readonly defaultMaxRecords?: number;
  /**
   * `fail` rejects the read at the first undecodable message;
   * `skip` drops such messages and counts them.
   */
  readonly decodeErrorPolicy?: DecodeErrorPolicy;
}

interface DecodedBatch {
  readonly records: unknown[];
  readonly skipped: number;
}

/**
 * Reads a bounded window of live messages for a dataset.
 *
 * Each read resolves the dataset's topic, opens a fresh consumer session,
 * polls once within the poll window and closes the session on every exit path.
 */
export class StreamReader {
  private readonly _log: Logger;
  private readonly _pollTimeoutMs: number;
  private readonly _defaultMaxRecords: number;
  private readonly _decodeErrorPolicy: DecodeErrorPolicy;

  constructor(
    private readonly _linker: DatasetTopicLinker,
    private readonly _consumers: StreamConsumerFactory,
    options: StreamReaderOptions = {}
  ) {
    this._log = (options.logger ?? silentLogger).child({ component: 'stream-reader' });
    this._pollTimeoutMs = options.pollTimeoutMs ?? POLL_TIMEOUT_MS;
    this._defaultMaxRecords = options.defaultMaxRecords ?? DEFAULT_MAX_RECORDS;
    this._decodeErrorPolicy = options.decodeErrorPolicy ?? 'fail';
  }

  /**
   * @throws NotFoundError when the dataset has no resolvable broker/topic
   * @throws TransportError when the broker cannot be reached or read
   * @throws NoMessagesFoundError when nothing arrived within the poll window
   * @throws DecodeError on an undecodable message under the `fail` policy
   */
  async fetchStreamWindow(datasetId: number, options: StreamWindowOptions): Promise<StreamWindow> {
    const { maxRecords = this._defaultMaxRecords, offsetPolicy } = validate.streamWindowOptions(options);
    const source = await this._linker.resolveStreamSource(datasetId);
    const endpoint = formatEndpoint(source.brokerAddress, source.brokerPort);
    const log = this._log.child({ datasetId, topic: source.topicName, endpoint });

    try {
      const batch = await withConsumerSession(
        this._consumers,
        { address: source.brokerAddress, port: source.brokerPort, topic: source.topicName, offsetPolicy },
        log,
        async (session) => {
          const messages = await session.poll({ maxRecords, timeoutMs: this._pollTimeoutMs });
          return this._decode(source, messages, log);
        }
      );

      if (batch.records.length === 0) {
        throw new NoMessagesFoundError(source.topicName);
      }

      log.info({ recordCount: batch.records.length, skipped: batch.skipped, offsetPolicy }, 'stream window read');
      return {
        datasetId,
        records: batch.records,
        recordCount: batch.records.length,
        topicName: source.topicName,
        skippedCount: batch.skipped,
      };
    } catch (error) {
      const failure = isCatalogError(error) ? error : new TransportError(endpoint, error);
      if (failure.code === 'no_messages') {
        log.warn({ offsetPolicy, timeoutMs: this._pollTimeoutMs }, failure.message);
      } else {
        log.error({ err: error, code: failure.code }, 'stream read failed');
      }
      throw failure;
    }
  }

  private _decode(source: StreamSource, messages: readonly StreamMessage[], log: Logger): DecodedBatch {
    const records: unknown[] = [];
    let skipped = 0;

    for (const message of messages) {
      try {
        records.push(decodeJson(message.value));
      } catch (error) {
        if (this._decodeErrorPolicy === 'fail') {
          throw new DecodeError(source.topicName, message.offset, error);
        }
        skipped++;
        log.warn({ err: error, partition: message.partition, offset: message.offset }, 'skipped undecodable message');
      }
    }

    return { records, skipped };
  }
}
