import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { BrokerRegistry } from './brokerRegistry';
import { PgliteDatabase, type Database, type DbClient, type Row } from './database';
import { DatasetTopicLinker } from './datasetTopicLinker';
import { NotFoundError, StoreError, ValidationError } from './errors';
import { migrate } from './migrations';
import { DataSourceType, DatasetType } from './model';
import { TopicRegistry } from './topicRegistry';

/**
 * Fails the link insert inside transactions, after the dataset row was written.
 */
class FailingLinkDatabase implements Database {
  constructor(private readonly _inner: Database) { }

  query<T extends Row = Row>(sql: string, params?: unknown[]): Promise<{ rows: T[] }> {
    return this._inner.query<T>(sql, params);
  }

  transaction<T>(fn: (tx: DbClient) => Promise<T>): Promise<T> {
    return this._inner.transaction(tx =>
      fn({
        query: <R extends Row = Row>(sql: string, params?: unknown[]) =>
          sql.startsWith('INSERT INTO dataset_topic_details')
            ? Promise.reject(new Error('link insert failed'))
            : tx.query<R>(sql, params),
      })
    );
  }

  close(): Promise<void> {
    return this._inner.close();
  }
}

async function count(db: Database, table: string): Promise<number> {
  const { rows } = await db.query<{ n: number }>(`SELECT count(*)::int AS n FROM ${table}`);
  return rows[0].n;
}

describe('DatasetTopicLinker', () => {
  let db: PgliteDatabase;
  let linker: DatasetTopicLinker;

  beforeEach(async () => {
    db = new PgliteDatabase(new PGlite());
    await migrate(db);
    const brokers = new BrokerRegistry(db);
    const topics = new TopicRegistry(db);
    await brokers.register({ name: 'local', address: '127.0.0.1', port: 9092 });
    await brokers.register({ name: 'remote', address: '10.0.0.5', port: 9093 });
    await topics.register(1, { name: 'clicks', schema: { type: 'object' } });
    await topics.register(2, { name: 'views', schema: {} });
    linker = new DatasetTopicLinker(db);
  });

  afterEach(async () => {
    await db.close();
  });

  describe('registerDatasetMessageDetails', () => {
    test('creates a broker-sourced dataset and returns the composite view', async () => {
      const details = await linker.registerDatasetMessageDetails({
        name: 'clickstream',
        description: 'raw clicks',
        datasetType: DatasetType.both,
        brokerId: 1,
        topicId: 1,
      });

      expect(details.dataset).toMatchObject({
        id: 1,
        name: 'clickstream',
        description: 'raw clicks',
        datasetType: DatasetType.both,
        sourceType: DataSourceType.broker,
      });
      expect(details.broker).toMatchObject({ id: 1, name: 'local', address: '127.0.0.1', port: 9092 });
      expect(details.topic).toMatchObject({ id: 1, name: 'clicks', brokerId: 1, schema: { type: 'object' } });
    });

    test('stores a missing description as null', async () => {
      const details = await linker.registerDatasetMessageDetails({
        name: 'clickstream',
        datasetType: DatasetType.train,
        brokerId: 1,
        topicId: 1,
      });

      expect(details.dataset.description).toBeNull();
    });

    test('rejects a topic hosted on another broker and writes nothing', async () => {
      const result = linker.registerDatasetMessageDetails({
        name: 'mixed',
        datasetType: DatasetType.train,
        brokerId: 1,
        topicId: 2,
      });

      await expect(result).rejects.toBeInstanceOf(ValidationError);
      await expect(result).rejects.toThrow('Invalid input: topic 2 is not hosted on broker 1');
      expect(await count(db, 'dataset_info')).toBe(0);
    });

    test('reports a missing broker before a missing topic', async () => {
      const result = linker.registerDatasetMessageDetails({
        name: 'orphan',
        datasetType: DatasetType.train,
        brokerId: 9,
        topicId: 9,
      });

      await expect(result).rejects.toThrow('broker 9 not found');
    });

    test('reports a missing topic and writes nothing', async () => {
      const result = linker.registerDatasetMessageDetails({
        name: 'orphan',
        datasetType: DatasetType.train,
        brokerId: 1,
        topicId: 9,
      });

      await expect(result).rejects.toBeInstanceOf(NotFoundError);
      await expect(result).rejects.toThrow('topic 9 not found');
      expect(await count(db, 'dataset_info')).toBe(0);
    });

    test('rolls back the dataset row when the link cannot be written', async () => {
      const failing = new DatasetTopicLinker(new FailingLinkDatabase(db));

      const result = failing.registerDatasetMessageDetails({
        name: 'clickstream',
        datasetType: DatasetType.train,
        brokerId: 1,
        topicId: 1,
      });

      await expect(result).rejects.toBeInstanceOf(StoreError);
      await expect(result).rejects.toThrow(
        'Metadata store error during register dataset message details: link insert failed'
      );
      expect(await count(db, 'dataset_info')).toBe(0);
      expect(await count(db, 'dataset_topic_details')).toBe(0);
    });
  });

  describe('fetchDatasetMessageDetails', () => {
    test('returns the same view the register call returned', async () => {
      const registered = await linker.registerDatasetMessageDetails({
        name: 'views',
        datasetType: DatasetType.inference,
        brokerId: 2,
        topicId: 2,
      });

      expect(await linker.fetchDatasetMessageDetails(registered.dataset.id)).toEqual(registered);
    });

    test('reports a dataset without a topic link', async () => {
      await db.query(
        'INSERT INTO dataset_info (dataset_name, train_and_inference_type, data_source_type) VALUES ($1, $2, $3)',
        ['files', DatasetType.train, DataSourceType.file]
      );

      const result = linker.fetchDatasetMessageDetails(1);

      await expect(result).rejects.toBeInstanceOf(NotFoundError);
      await expect(result).rejects.toThrow('Message configuration not found for dataset 1');
    });
  });

  describe('resolveStreamSource', () => {
    test('returns the topic and broker endpoint', async () => {
      await linker.registerDatasetMessageDetails({
        name: 'views',
        datasetType: DatasetType.train,
        brokerId: 2,
        topicId: 2,
      });

      expect(await linker.resolveStreamSource(1)).toEqual({
        topicName: 'views',
        brokerAddress: '10.0.0.5',
        brokerPort: 9093,
      });
    });
  });

  describe('deregister', () => {
    test('removes the dataset and its link', async () => {
      await linker.registerDatasetMessageDetails({
        name: 'clickstream',
        datasetType: DatasetType.train,
        brokerId: 1,
        topicId: 1,
      });

      await linker.deregister(1);

      expect(await count(db, 'dataset_info')).toBe(0);
      expect(await count(db, 'dataset_topic_details')).toBe(0);
      await expect(linker.fetchDatasetMessageDetails(1)).rejects.toBeInstanceOf(NotFoundError);
    });

    test('leaves datasets of other source types alone', async () => {
      await db.query(
        'INSERT INTO dataset_info (dataset_name, train_and_inference_type, data_source_type) VALUES ($1, $2, $3)',
        ['table-backed', DatasetType.train, DataSourceType.table]
      );

      await expect(linker.deregister(1)).rejects.toThrow('dataset 1 not found');
      expect(await count(db, 'dataset_info')).toBe(1);
    });
  });
});
