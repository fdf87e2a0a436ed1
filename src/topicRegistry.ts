import { findBroker, type RegistryOptions } from './brokerRegistry';
import type { Database, DbClient } from './database';
import { isUniqueViolation } from './database';
import { ConflictError, NotFoundError } from './errors';
import { reportFailure, silentLogger, type Logger } from './logger';
import type { JsonObject, Topic, TopicInput, TopicPatch } from './model';
import { buildUpdateById } from './sql';
import { validate } from './validation';

export type TopicRow = {
  id: number;
  topic_name: string;
  topic_schema: JsonObject;
  broker_id: number;
  creation_date: Date;
};

export function toTopic(row: TopicRow): Topic {
  return {
    id: row.id,
    name: row.topic_name,
    schema: row.topic_schema,
    brokerId: row.broker_id,
    createdAt: row.creation_date,
  };
}

/**
 * Topics hosted on registered brokers, unique per (name, broker).
 */
export class TopicRegistry {
  private readonly _log: Logger;

  constructor(
    private readonly _db: Database,
    options: RegistryOptions = {}
  ) {
    this._log = (options.logger ?? silentLogger).child({ component: 'topic-registry' });
  }

  /**
   * Register a topic under an existing broker.
   * @throws NotFoundError when the broker does not exist
   * @throws ConflictError carrying the id of the topic with the same name on that broker
   */
  async register(brokerId: number, input: TopicInput): Promise<Topic> {
    const ownerId = validate.id('broker', brokerId);
    const data = validate.topicInput(input);

    try {
      const broker = await findBroker(this._db, ownerId);
      if (!broker) {
        throw new NotFoundError('broker', ownerId);
      }
      await this._assertNameFree(data.name, ownerId);

      // Schema goes over the wire as text so both drivers bind it the same way.
      const { rows } = await this._db.query<TopicRow>(
        `INSERT INTO topic_details (topic_name, topic_schema, broker_id)
         VALUES ($1, $2::text::jsonb, $3)
         RETURNING *`,
        [data.name, JSON.stringify(data.schema), ownerId]
      );
      const topic = toTopic(rows[0]);
      this._log.info({ topicId: topic.id, brokerId: ownerId, name: topic.name }, 'topic registered');
      return topic;
    } catch (error) {
      throw reportFailure(this._log, 'register topic', await this._raceToConflict(error, data.name, ownerId));
    }
  }

  async update(id: number, patch: TopicPatch): Promise<Topic> {
    const topicId = validate.id('topic', id);
    const data = validate.topicPatch(patch);

    let current: Topic | null = null;
    try {
      current = await findTopic(this._db, topicId);
      if (!current) {
        throw new NotFoundError('topic', topicId);
      }
      if (data.name !== undefined && data.name !== current.name) {
        await this._assertNameFree(data.name, current.brokerId);
      }

      const stmt = buildUpdateById(
        'topic_details',
        topicId,
        {
          topic_name: data.name,
          topic_schema: data.schema === undefined ? undefined : JSON.stringify(data.schema),
        },
        { topic_schema: 'text::jsonb' }
      );
      if (!stmt) {
        return current;
      }

      const { rows } = await this._db.query<TopicRow>(stmt.sql, stmt.params);
      if (rows.length === 0) {
        throw new NotFoundError('topic', topicId);
      }
      const topic = toTopic(rows[0]);
      this._log.info({ topicId, fields: Object.keys(data) }, 'topic updated');
      return topic;
    } catch (error) {
      const cause = data.name === undefined || current === null
        ? error
        : await this._raceToConflict(error, data.name, current.brokerId);
      throw reportFailure(this._log, 'update topic', cause);
    }
  }

  async get(id: number): Promise<Topic> {
    const topicId = validate.id('topic', id);

    try {
      const topic = await findTopic(this._db, topicId);
      if (!topic) {
        throw new NotFoundError('topic', topicId);
      }
      return topic;
    } catch (error) {
      throw reportFailure(this._log, 'get topic', error);
    }
  }

  /**
   * All registered topics, by id.
   * @throws NotFoundError when no topic is registered at all
   */
  async list(): Promise<Topic[]> {
    try {
      const { rows } = await this._db.query<TopicRow>('SELECT * FROM topic_details ORDER BY id');
      if (rows.length === 0) {
        throw new NotFoundError('topic', null);
      }
      return rows.map(toTopic);
    } catch (error) {
      throw reportFailure(this._log, 'list topics', error);
    }
  }

  /**
   * Topics of one broker; empty when the broker has none.
   */
  async listByBroker(brokerId: number): Promise<Topic[]> {
    const ownerId = validate.id('broker', brokerId);

    try {
      const broker = await findBroker(this._db, ownerId);
      if (!broker) {
        throw new NotFoundError('broker', ownerId);
      }
      const { rows } = await this._db.query<TopicRow>(
        'SELECT * FROM topic_details WHERE broker_id = $1 ORDER BY id',
        [ownerId]
      );
      return rows.map(toTopic);
    } catch (error) {
      throw reportFailure(this._log, 'list broker topics', error);
    }
  }

  /**
   * Delete a topic. Dataset links that read from it are removed first,
   * in the same transaction, so no link is left pointing at a missing topic.
   */
  async delete(id: number): Promise<void> {
    const topicId = validate.id('topic', id);

    try {
      const links = await this._db.transaction(async (tx) => {
        const { rows } = await tx.query<{ id: number }>(
          'SELECT id FROM topic_details WHERE id = $1 FOR UPDATE',
          [topicId]
        );
        if (rows.length === 0) {
          throw new NotFoundError('topic', topicId);
        }

        const removed = await tx.query<{ id: number }>(
          'DELETE FROM dataset_topic_details WHERE topic_id = $1 RETURNING id',
          [topicId]
        );
        await tx.query('DELETE FROM topic_details WHERE id = $1', [topicId]);
        return removed.rows.length;
      });
      this._log.info({ topicId, links }, 'topic deleted');
    } catch (error) {
      throw reportFailure(this._log, 'delete topic', error);
    }
  }

  private async _assertNameFree(name: string, brokerId: number): Promise<void> {
    const existingId = await findTopicIdByName(this._db, name, brokerId);
    if (existingId !== null) {
      throw new ConflictError('topic', existingId);
    }
  }

  private async _raceToConflict(error: unknown, name: string, brokerId: number): Promise<unknown> {
    if (!isUniqueViolation(error)) {
      return error;
    }
    try {
      const existingId = await findTopicIdByName(this._db, name, brokerId);
      return existingId === null ? error : new ConflictError('topic', existingId);
    } catch {
      return error;
    }
  }
}

export async function findTopic(client: DbClient, id: number): Promise<Topic | null> {
  const { rows } = await client.query<TopicRow>('SELECT * FROM topic_details WHERE id = $1', [id]);
  return rows.length === 0 ? null : toTopic(rows[0]);
}

async function findTopicIdByName(client: DbClient, name: string, brokerId: number): Promise<number | null> {
  const { rows } = await client.query<{ id: number }>(
    'SELECT id FROM topic_details WHERE topic_name = $1 AND broker_id = $2',
    [name, brokerId]
  );
  return rows.length === 0 ? null : rows[0].id;
}
