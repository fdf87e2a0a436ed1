import { findBroker, toBroker, type BrokerRow, type RegistryOptions } from './brokerRegistry';
import type { Database } from './database';
import { NotFoundError, StoreError, ValidationError } from './errors';
import { reportFailure, silentLogger, type Logger } from './logger';
import {
  DataSourceType,
  DatasetType,
  type Broker,
  type Dataset,
  type DatasetMessageDetails,
  type DatasetMessageInput,
  type StreamSource,
  type Topic,
} from './model';
import { findTopic, toTopic, type TopicRow } from './topicRegistry';
import { validate } from './validation';

export type DatasetRow = {
  id: number;
  dataset_name: string;
  description: string | null;
  train_and_inference_type: number;
  data_source_type: number;
  register_date_time: Date;
  last_modified_time: Date;
};

/** One row of the dataset → link → topic → broker join. */
type DatasetMessageRow = DatasetRow & {
  topic_id: number;
  topic_name: string;
  topic_schema: TopicRow['topic_schema'];
  topic_broker_id: number;
  topic_creation_date: Date;
  broker_id: number;
  broker_name: string;
  broker_ip: string;
  broker_port: number;
  broker_creation_date: Date;
};

const DATASET_MESSAGE_JOIN = `
  FROM dataset_info d
  JOIN dataset_topic_details l ON l.dataset_id = d.id
  JOIN topic_details t ON t.id = l.topic_id
  JOIN broker_details b ON b.id = t.broker_id
  WHERE d.id = $1
  ORDER BY l.id
  LIMIT 1`;

export function toDataset(row: DatasetRow): Dataset {
  return {
    id: row.id,
    name: row.dataset_name,
    description: row.description,
    datasetType: enumValue(DatasetType, row.train_and_inference_type, 'train_and_inference_type'),
    sourceType: enumValue(DataSourceType, row.data_source_type, 'data_source_type'),
    registeredAt: row.register_date_time,
    lastModifiedAt: row.last_modified_time,
  };
}

/**
 * Assemble the composite view. Shared by the register and fetch paths so
 * both return the same shape.
 */
export function toDatasetMessageDetails(dataset: Dataset, broker: Broker, topic: Topic): DatasetMessageDetails {
  return { dataset, broker, topic };
}

function fromJoinedRow(row: DatasetMessageRow): DatasetMessageDetails {
  const broker: BrokerRow = {
    id: row.broker_id,
    broker_name: row.broker_name,
    broker_ip: row.broker_ip,
    broker_port: row.broker_port,
    creation_date: row.broker_creation_date,
  };
  const topic: TopicRow = {
    id: row.topic_id,
    topic_name: row.topic_name,
    topic_schema: row.topic_schema,
    broker_id: row.topic_broker_id,
    creation_date: row.topic_creation_date,
  };
  return toDatasetMessageDetails(toDataset(row), toBroker(broker), toTopic(topic));
}

function enumValue<T extends number>(values: Readonly<Record<string, T>>, value: number, column: string): T {
  const match = Object.values(values).find(v => v === value);
  if (match === undefined) {
    throw new StoreError('read dataset', new Error(`unexpected ${column} value ${value}`));
  }
  return match;
}

function messageDetailsNotFound(datasetId: number): NotFoundError {
  return new NotFoundError(
    'dataset_message',
    datasetId,
    `Message configuration not found for dataset ${datasetId}`
  );
}

/**
 * Ties broker-sourced datasets to the topic they read from.
 * Dataset and link rows are written and removed together.
 */
export class DatasetTopicLinker {
  private readonly _log: Logger;

  constructor(
    private readonly _db: Database,
    options: RegistryOptions = {}
  ) {
    this._log = (options.logger ?? silentLogger).child({ component: 'dataset-topic-linker' });
  }

  /**
   * Create a broker-sourced dataset linked to `topicId`.
   * The dataset row and its link are committed together or not at all.
   * @throws NotFoundError when the broker or topic does not exist
   * @throws ValidationError when the topic is not hosted on the broker
   */
  async registerDatasetMessageDetails(input: DatasetMessageInput): Promise<DatasetMessageDetails> {
    const data = validate.datasetMessageInput(input);

    try {
      const broker = await findBroker(this._db, data.brokerId);
      if (!broker) {
        throw new NotFoundError('broker', data.brokerId);
      }
      const topic = await findTopic(this._db, data.topicId);
      if (!topic) {
        throw new NotFoundError('topic', data.topicId);
      }
      if (topic.brokerId !== broker.id) {
        throw new ValidationError([`topic ${topic.id} is not hosted on broker ${broker.id}`]);
      }

      const dataset = await this._db.transaction(async (tx) => {
        const { rows } = await tx.query<DatasetRow>(
          `INSERT INTO dataset_info (dataset_name, description, train_and_inference_type, data_source_type)
           VALUES ($1, $2, $3, $4)
           RETURNING *`,
          [data.name, data.description ?? null, data.datasetType, DataSourceType.broker]
        );
        const created = toDataset(rows[0]);

        // The topic may have been deleted since it was resolved.
        const locked = await tx.query<{ id: number }>(
          'SELECT id FROM topic_details WHERE id = $1 FOR SHARE',
          [topic.id]
        );
        if (locked.rows.length === 0) {
          throw new NotFoundError('topic', topic.id);
        }

        await tx.query(
          'INSERT INTO dataset_topic_details (dataset_id, topic_id) VALUES ($1, $2)',
          [created.id, topic.id]
        );
        return created;
      });

      this._log.info({ datasetId: dataset.id, brokerId: broker.id, topicId: topic.id }, 'dataset linked to topic');
      return toDatasetMessageDetails(dataset, broker, topic);
    } catch (error) {
      throw reportFailure(this._log, 'register dataset message details', error);
    }
  }

  /**
   * Dataset, broker and topic of a broker-sourced dataset.
   * @throws NotFoundError when any hop of dataset → link → topic → broker is missing
   */
  async fetchDatasetMessageDetails(datasetId: number): Promise<DatasetMessageDetails> {
    const id = validate.id('dataset', datasetId);

    try {
      const { rows } = await this._db.query<DatasetMessageRow>(
        `SELECT
           d.*,
           t.id AS topic_id, t.topic_name, t.topic_schema, t.broker_id AS topic_broker_id,
           t.creation_date AS topic_creation_date,
           b.id AS broker_id, b.broker_name, b.broker_ip, b.broker_port,
           b.creation_date AS broker_creation_date
         ${DATASET_MESSAGE_JOIN}`,
        [id]
      );
      if (rows.length === 0) {
        throw messageDetailsNotFound(id);
      }
      return fromJoinedRow(rows[0]);
    } catch (error) {
      throw reportFailure(this._log, 'fetch dataset message details', error);
    }
  }

  /**
   * Connection parameters of the stream a dataset reads from.
   */
  async resolveStreamSource(datasetId: number): Promise<StreamSource> {
    const id = validate.id('dataset', datasetId);

    try {
      const { rows } = await this._db.query<{ topic_name: string; broker_ip: string; broker_port: number }>(
        `SELECT t.topic_name, b.broker_ip, b.broker_port ${DATASET_MESSAGE_JOIN}`,
        [id]
      );
      if (rows.length === 0) {
        throw messageDetailsNotFound(id);
      }
      const row = rows[0];
      return { topicName: row.topic_name, brokerAddress: row.broker_ip, brokerPort: row.broker_port };
    } catch (error) {
      throw reportFailure(this._log, 'resolve stream source', error);
    }
  }

  /**
   * Delete a broker-sourced dataset and its link, link first.
   * File and table datasets are not touched and report NotFound.
   */
  async deregister(datasetId: number): Promise<void> {
    const id = validate.id('dataset', datasetId);

    try {
      const links = await this._db.transaction(async (tx) => {
        const { rows } = await tx.query<{ id: number }>(
          'SELECT id FROM dataset_info WHERE id = $1 AND data_source_type = $2 FOR UPDATE',
          [id, DataSourceType.broker]
        );
        if (rows.length === 0) {
          throw new NotFoundError('dataset', id);
        }

        const removed = await tx.query<{ id: number }>(
          'DELETE FROM dataset_topic_details WHERE dataset_id = $1 RETURNING id',
          [id]
        );
        await tx.query('DELETE FROM dataset_info WHERE id = $1', [id]);
        return removed.rows.length;
      });
      this._log.info({ datasetId: id, links }, 'dataset deregistered');
    } catch (error) {
      throw reportFailure(this._log, 'deregister dataset', error);
    }
  }
}
