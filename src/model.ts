/**
 * Core data model types for the message catalog.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

// === Registry Types ===

export interface Broker {
  readonly id: number;
  readonly name: string;
  /** IPv4 or IPv6 literal */
  readonly address: string;
  readonly port: number;
  readonly createdAt: Date;
}

export interface Topic {
  readonly id: number;
  readonly name: string;
  /** Declared message schema, opaque to the catalog */
  readonly schema: JsonObject;
  readonly brokerId: number;
  readonly createdAt: Date;
}

export interface BrokerInput {
  readonly name: string;
  readonly address: string;
  readonly port: number;
}

export type BrokerPatch = Partial<BrokerInput>;

export interface TopicInput {
  readonly name: string;
  readonly schema: JsonObject;
}

export type TopicPatch = Partial<TopicInput>;

// === Dataset Types ===

/** What the dataset is used for. */
export const DatasetType = {
  train: 0,
  inference: 1,
  both: 2,
} as const;

export type DatasetType = (typeof DatasetType)[keyof typeof DatasetType];

/** Where the dataset's data lives. */
export const DataSourceType = {
  file: 0,
  table: 1,
  broker: 2,
} as const;

export type DataSourceType = (typeof DataSourceType)[keyof typeof DataSourceType];

export interface Dataset {
  readonly id: number;
  readonly name: string;
  readonly description: string | null;
  readonly datasetType: DatasetType;
  readonly sourceType: DataSourceType;
  readonly registeredAt: Date;
  readonly lastModifiedAt: Date;
}

export interface DatasetTopicLink {
  readonly id: number;
  readonly datasetId: number;
  readonly topicId: number;
  readonly createdAt: Date;
}

export interface DatasetMessageInput {
  readonly name: string;
  readonly description?: string;
  readonly datasetType: DatasetType;
  readonly brokerId: number;
  readonly topicId: number;
}

/** Composite view of a broker-sourced dataset and the stream it reads from. */
export interface DatasetMessageDetails {
  readonly dataset: Dataset;
  readonly broker: Broker;
  readonly topic: Topic;
}

// === Stream Types ===

export type OffsetPolicy = 'earliest' | 'latest';

export const OFFSET_POLICIES: readonly OffsetPolicy[] = ['earliest', 'latest'];

/** Connection parameters resolved for one dataset. */
export interface StreamSource {
  readonly topicName: string;
  readonly brokerAddress: string;
  readonly brokerPort: number;
}

export interface StreamWindow {
  readonly datasetId: number;
  readonly records: readonly unknown[];
  readonly recordCount: number;
  readonly topicName: string;
  /** Messages dropped because they could not be decoded (skip policy only) */
  readonly skippedCount: number;
}

// === JSON ===

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
