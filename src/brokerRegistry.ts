import type { Database, DbClient } from './database';
import { isUniqueViolation } from './database';
import { ConflictError, NotFoundError } from './errors';
import { reportFailure, silentLogger, type Logger } from './logger';
import type { Broker, BrokerInput, BrokerPatch } from './model';
import { buildUpdateById } from './sql';
import { validate } from './validation';

export type BrokerRow = {
  id: number;
  broker_name: string;
  broker_ip: string;
  broker_port: number;
  creation_date: Date;
};

export function toBroker(row: BrokerRow): Broker {
  return {
    id: row.id,
    name: row.broker_name,
    address: row.broker_ip,
    port: row.broker_port,
    createdAt: row.creation_date,
  };
}

export interface RegistryOptions {
  readonly logger?: Logger;
}

/**
 * Message-broker endpoints known to the catalog, unique by name.
 */
export class BrokerRegistry {
  private readonly _log: Logger;

  constructor(
    private readonly _db: Database,
    options: RegistryOptions = {}
  ) {
    this._log = (options.logger ?? silentLogger).child({ component: 'broker-registry' });
  }

  /**
   * Register a broker endpoint.
   * @throws ValidationError for a malformed address, non-positive port or empty name
   * @throws ConflictError carrying the id of the broker that already has this name
   */
  async register(input: BrokerInput): Promise<Broker> {
    const data = validate.brokerInput(input);

    try {
      await this._assertNameFree(data.name);
      const { rows } = await this._db.query<BrokerRow>(
        `INSERT INTO broker_details (broker_name, broker_ip, broker_port)
         VALUES ($1, $2, $3)
         RETURNING *`,
        [data.name, data.address, data.port]
      );
      const broker = toBroker(rows[0]);
      this._log.info({ brokerId: broker.id, name: broker.name }, 'broker registered');
      return broker;
    } catch (error) {
      throw reportFailure(this._log, 'register broker', await this._raceToConflict(error, data.name));
    }
  }

  /**
   * Apply the supplied fields of `patch` to a broker.
   */
  async update(id: number, patch: BrokerPatch): Promise<Broker> {
    const brokerId = validate.id('broker', id);
    const data = validate.brokerPatch(patch);

    try {
      const current = await findBroker(this._db, brokerId);
      if (!current) {
        throw new NotFoundError('broker', brokerId);
      }
      if (data.name !== undefined && data.name !== current.name) {
        await this._assertNameFree(data.name);
      }

      const stmt = buildUpdateById('broker_details', brokerId, {
        broker_name: data.name,
        broker_ip: data.address,
        broker_port: data.port,
      });
      if (!stmt) {
        return current;
      }

      const { rows } = await this._db.query<BrokerRow>(stmt.sql, stmt.params);
      if (rows.length === 0) {
        throw new NotFoundError('broker', brokerId);
      }
      const broker = toBroker(rows[0]);
      this._log.info({ brokerId, fields: Object.keys(data) }, 'broker updated');
      return broker;
    } catch (error) {
      const cause = data.name === undefined ? error : await this._raceToConflict(error, data.name);
      throw reportFailure(this._log, 'update broker', cause);
    }
  }

  async get(id: number): Promise<Broker> {
    const brokerId = validate.id('broker', id);

    try {
      const broker = await findBroker(this._db, brokerId);
      if (!broker) {
        throw new NotFoundError('broker', brokerId);
      }
      return broker;
    } catch (error) {
      throw reportFailure(this._log, 'get broker', error);
    }
  }

  /**
   * All registered brokers, by id.
   * @throws NotFoundError when no broker is registered at all
   */
  async list(): Promise<Broker[]> {
    try {
      const { rows } = await this._db.query<BrokerRow>('SELECT * FROM broker_details ORDER BY id');
      if (rows.length === 0) {
        throw new NotFoundError('broker', null);
      }
      return rows.map(toBroker);
    } catch (error) {
      throw reportFailure(this._log, 'list brokers', error);
    }
  }

  /**
   * Delete a broker together with its topics and their dataset links.
   */
  async delete(id: number): Promise<void> {
    const brokerId = validate.id('broker', id);

    try {
      const removed = await this._db.transaction(async (tx) => {
        const { rows } = await tx.query<{ id: number }>(
          'SELECT id FROM broker_details WHERE id = $1 FOR UPDATE',
          [brokerId]
        );
        if (rows.length === 0) {
          throw new NotFoundError('broker', brokerId);
        }

        const links = await tx.query<{ id: number }>(
          `DELETE FROM dataset_topic_details
           WHERE topic_id IN (SELECT id FROM topic_details WHERE broker_id = $1)
           RETURNING id`,
          [brokerId]
        );
        const topics = await tx.query<{ id: number }>(
          'DELETE FROM topic_details WHERE broker_id = $1 RETURNING id',
          [brokerId]
        );
        await tx.query('DELETE FROM broker_details WHERE id = $1', [brokerId]);
        return { links: links.rows.length, topics: topics.rows.length };
      });
      this._log.info({ brokerId, ...removed }, 'broker deleted');
    } catch (error) {
      throw reportFailure(this._log, 'delete broker', error);
    }
  }

  private async _assertNameFree(name: string): Promise<void> {
    const existingId = await findBrokerIdByName(this._db, name);
    if (existingId !== null) {
      throw new ConflictError('broker', existingId);
    }
  }

  /**
   * A unique violation means another writer took the name between the
   * pre-check and the write; report it like the pre-check would have.
   */
  private async _raceToConflict(error: unknown, name: string): Promise<unknown> {
    if (!isUniqueViolation(error)) {
      return error;
    }
    try {
      const existingId = await findBrokerIdByName(this._db, name);
      return existingId === null ? error : new ConflictError('broker', existingId);
    } catch {
      return error;
    }
  }
}

export async function findBroker(client: DbClient, id: number): Promise<Broker | null> {
  const { rows } = await client.query<BrokerRow>('SELECT * FROM broker_details WHERE id = $1', [id]);
  return rows.length === 0 ? null : toBroker(rows[0]);
}

async function findBrokerIdByName(client: DbClient, name: string): Promise<number | null> {
  const { rows } = await client.query<{ id: number }>(
    'SELECT id FROM broker_details WHERE broker_name = $1',
    [name]
  );
  return rows.length === 0 ? null : rows[0].id;
}
