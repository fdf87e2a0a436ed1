import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { BrokerRegistry } from './brokerRegistry';
import { PgliteDatabase } from './database';
import { DatasetTopicLinker } from './datasetTopicLinker';
import {
  DecodeError,
  NoMessagesFoundError,
  NotFoundError,
  TransportError,
  ValidationError,
} from './errors';
import { InMemoryStreamBroker } from './inMemoryStream';
import { migrate } from './migrations';
import { DatasetType } from './model';
import type { StreamConsumerFactory } from './streamConsumer';
import { DEFAULT_MAX_RECORDS, POLL_TIMEOUT_MS, StreamReader } from './streamReader';
import { TopicRegistry } from './topicRegistry';

const POLL_MS = 50;

describe('StreamReader', () => {
  let db: PgliteDatabase;
  let linker: DatasetTopicLinker;
  let stream: InMemoryStreamBroker;

  beforeEach(async () => {
    db = new PgliteDatabase(new PGlite());
    await migrate(db);
    await new BrokerRegistry(db).register({ name: 'local', address: '127.0.0.1', port: 9092 });
    await new TopicRegistry(db).register(1, { name: 'events', schema: {} });
    linker = new DatasetTopicLinker(db);
    await linker.registerDatasetMessageDetails({
      name: 'events',
      datasetType: DatasetType.train,
      brokerId: 1,
      topicId: 1,
    });
    stream = new InMemoryStreamBroker().start('127.0.0.1', 9092);
  });

  afterEach(async () => {
    await db.close();
  });

  function reader(consumers: StreamConsumerFactory = stream, skip = false): StreamReader {
    return new StreamReader(linker, consumers, {
      pollTimeoutMs: POLL_MS,
      decodeErrorPolicy: skip ? 'skip' : 'fail',
    });
  }

  test('defaults', () => {
    expect(DEFAULT_MAX_RECORDS).toBe(200);
    expect(POLL_TIMEOUT_MS).toBe(10_000);
  });

  describe('offset policy', () => {
    test('earliest returns messages published before the read', async () => {
      stream.publish('127.0.0.1', 9092, 'events', { n: 1 });
      stream.publish('127.0.0.1', 9092, 'events', { n: 2 });

      const window = await reader().fetchStreamWindow(1, { offsetPolicy: 'earliest' });

      expect(window).toEqual({
        datasetId: 1,
        records: [{ n: 1 }, { n: 2 }],
        recordCount: 2,
        topicName: 'events',
        skippedCount: 0,
      });
    });

    test('latest ignores messages published before the read', async () => {
      stream.publish('127.0.0.1', 9092, 'events', { n: 1 });
      const publishOnOpen: StreamConsumerFactory = {
        open: async (options) => {
          const session = await stream.open(options);
          stream.publish('127.0.0.1', 9092, 'events', { n: 2 });
          return session;
        },
      };

      const window = await reader(publishOnOpen).fetchStreamWindow(1, { offsetPolicy: 'latest' });

      expect(window.records).toEqual([{ n: 2 }]);
    });

    test('latest with nothing new is NoMessagesFound', async () => {
      stream.publish('127.0.0.1', 9092, 'events', { n: 1 });

      const result = reader().fetchStreamWindow(1, { offsetPolicy: 'latest' });

      await expect(result).rejects.toBeInstanceOf(NoMessagesFoundError);
      await expect(result).rejects.toThrow('No messages in stream topic: events');
      expect(stream.openSessions).toBe(0);
    });
  });

  describe('record count', () => {
    test('stops at maxRecords', async () => {
      for (let n = 1; n <= 5; n++) {
        stream.publish('127.0.0.1', 9092, 'events', { n });
      }

      const window = await reader().fetchStreamWindow(1, { offsetPolicy: 'earliest', maxRecords: 2 });

      expect(window.records).toEqual([{ n: 1 }, { n: 2 }]);
      expect(window.recordCount).toBe(2);
    });

    test('returns what is available without waiting out the poll window', async () => {
      for (let n = 1; n <= 3; n++) {
        stream.publish('127.0.0.1', 9092, 'events', { n });
      }
      const patient = new StreamReader(linker, stream, { pollTimeoutMs: 5000 });
      const started = Date.now();

      const window = await patient.fetchStreamWindow(1, { offsetPolicy: 'earliest', maxRecords: 10 });

      expect(window.recordCount).toBe(3);
      expect(Date.now() - started).toBeLessThan(1000);
    });

    test('uses the configured default when maxRecords is absent', async () => {
      for (let n = 1; n <= 3; n++) {
        stream.publish('127.0.0.1', 9092, 'events', { n });
      }
      const limited = new StreamReader(linker, stream, { pollTimeoutMs: POLL_MS, defaultMaxRecords: 2 });

      const window = await limited.fetchStreamWindow(1, { offsetPolicy: 'earliest' });

      expect(window.recordCount).toBe(2);
    });

    test('rejects a maxRecords below one without opening a session', async () => {
      const result = reader().fetchStreamWindow(1, { offsetPolicy: 'earliest', maxRecords: 0 });

      await expect(result).rejects.toBeInstanceOf(ValidationError);
      await expect(result).rejects.toHaveProperty('issues', ['/maxRecords must be >= 1']);
      expect(stream.openedSessions).toBe(0);
    });
  });

  describe('decoding', () => {
    test('an undecodable message fails the read under the fail policy', async () => {
      stream.publish('127.0.0.1', 9092, 'events', Buffer.from('not json', 'utf-8'));
      stream.publish('127.0.0.1', 9092, 'events', { n: 2 });

      const result = reader().fetchStreamWindow(1, { offsetPolicy: 'earliest' });

      await expect(result).rejects.toBeInstanceOf(DecodeError);
      await expect(result).rejects.toHaveProperty('offset', '0');
      expect(stream.openSessions).toBe(0);
    });

    test('a payload that is not valid UTF-8 fails the read under the fail policy', async () => {
      stream.publish('127.0.0.1', 9092, 'events', Buffer.from([0x22, 0xff, 0xfe, 0x22]));

      const result = reader().fetchStreamWindow(1, { offsetPolicy: 'earliest' });

      await expect(result).rejects.toBeInstanceOf(DecodeError);
      await expect(result).rejects.toHaveProperty('offset', '0');
    });

    test('an undecodable message is counted and dropped under the skip policy', async () => {
      stream.publish('127.0.0.1', 9092, 'events', Buffer.from('{broken', 'utf-8'));
      stream.publish('127.0.0.1', 9092, 'events', { n: 2 });

      const window = await reader(stream, true).fetchStreamWindow(1, { offsetPolicy: 'earliest' });

      expect(window.records).toEqual([{ n: 2 }]);
      expect(window.skippedCount).toBe(1);
    });

    test('an empty payload decodes to null', async () => {
      stream.publish('127.0.0.1', 9092, 'events', Buffer.alloc(0));

      const window = await reader().fetchStreamWindow(1, { offsetPolicy: 'earliest' });

      expect(window.records).toEqual([null]);
    });
  });

  describe('failures', () => {
    test('an unknown dataset is NotFound and opens no session', async () => {
      const result = reader().fetchStreamWindow(42, { offsetPolicy: 'earliest' });

      await expect(result).rejects.toBeInstanceOf(NotFoundError);
      await expect(result).rejects.toThrow('Message configuration not found for dataset 42');
      expect(stream.openedSessions).toBe(0);
    });

    test('an unreachable broker is a TransportError', async () => {
      const offline = new InMemoryStreamBroker();

      const result = reader(offline).fetchStreamWindow(1, { offsetPolicy: 'earliest' });

      await expect(result).rejects.toBeInstanceOf(TransportError);
      await expect(result).rejects.toThrow('Unable to read from broker 127.0.0.1:9092: Connection refused');
    });

    test('an unexpected poll failure is reported as a TransportError and the session is closed', async () => {
      let closed = 0;
      const broken: StreamConsumerFactory = {
        open: async () => ({
          poll: async () => {
            throw new Error('socket hang up');
          },
          close: async () => {
            closed++;
          },
        }),
      };

      const result = reader(broken).fetchStreamWindow(1, { offsetPolicy: 'earliest' });

      await expect(result).rejects.toBeInstanceOf(TransportError);
      await expect(result).rejects.toThrow('Unable to read from broker 127.0.0.1:9092: socket hang up');
      expect(closed).toBe(1);
    });

    test('a failing close does not hide the records', async () => {
      stream.publish('127.0.0.1', 9092, 'events', { n: 1 });
      const failingClose: StreamConsumerFactory = {
        open: async (options) => {
          const session = await stream.open(options);
          return {
            poll: (poll) => session.poll(poll),
            close: async () => {
              throw new Error('already closed');
            },
          };
        },
      };

      const window = await reader(failingClose).fetchStreamWindow(1, { offsetPolicy: 'earliest' });

      expect(window.records).toEqual([{ n: 1 }]);
    });
  });

  test('every read uses a fresh session', async () => {
    stream.publish('127.0.0.1', 9092, 'events', { n: 1 });

    await reader().fetchStreamWindow(1, { offsetPolicy: 'earliest' });
    await reader().fetchStreamWindow(1, { offsetPolicy: 'earliest' });

    expect(stream.openedSessions).toBe(2);
    expect(stream.openSessions).toBe(0);
  });
});
