import type { DbClient } from './database';

const STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS broker_details (
    id SERIAL PRIMARY KEY,
    broker_name TEXT NOT NULL,
    broker_ip TEXT NOT NULL,
    broker_port INTEGER NOT NULL CHECK (broker_port > 0),
    creation_date TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT unique_broker_name UNIQUE (broker_name)
  )`,
  `CREATE TABLE IF NOT EXISTS topic_details (
    id SERIAL PRIMARY KEY,
    topic_name TEXT NOT NULL,
    topic_schema JSONB NOT NULL,
    broker_id INTEGER NOT NULL REFERENCES broker_details(id) ON DELETE CASCADE,
    creation_date TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT unique_topic_per_broker UNIQUE (topic_name, broker_id)
  )`,
  `CREATE TABLE IF NOT EXISTS dataset_info (
    id SERIAL PRIMARY KEY,
    dataset_name TEXT NOT NULL,
    description TEXT,
    train_and_inference_type INTEGER NOT NULL CHECK (train_and_inference_type IN (0, 1, 2)),
    data_source_type INTEGER NOT NULL CHECK (data_source_type IN (0, 1, 2)),
    register_date_time TIMESTAMPTZ NOT NULL DEFAULT now(),
    last_modified_time TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS dataset_topic_details (
    id SERIAL PRIMARY KEY,
    dataset_id INTEGER NOT NULL REFERENCES dataset_info(id) ON DELETE CASCADE,
    topic_id INTEGER NOT NULL REFERENCES topic_details(id) ON DELETE CASCADE,
    creation_date TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS ix_dataset_topic_details_dataset_id ON dataset_topic_details (dataset_id)`,
  `CREATE INDEX IF NOT EXISTS ix_dataset_topic_details_topic_id ON dataset_topic_details (topic_id)`,
];

/**
 * Create the catalog tables if they do not exist yet.
 */
export async function migrate(client: DbClient): Promise<void> {
  for (const sql of STATEMENTS) {
    await client.query(sql);
  }
}
