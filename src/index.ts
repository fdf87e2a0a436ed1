// Core data model
export type {
  Broker,
  BrokerInput,
  BrokerPatch,
  Topic,
  TopicInput,
  TopicPatch,
  Dataset,
  DatasetTopicLink,
  DatasetMessageInput,
  DatasetMessageDetails,
  OffsetPolicy,
  StreamSource,
  StreamWindow,
  JsonValue,
  JsonObject,
} from './model';

export { DatasetType, DataSourceType, OFFSET_POLICIES, isJsonObject } from './model';

// Errors and response envelopes
export type { CatalogErrorCode, ResourceKind } from './errors';
export {
  CatalogError,
  NotFoundError,
  ConflictError,
  ValidationError,
  NoMessagesFoundError,
  TransportError,
  DecodeError,
  StoreError,
  isCatalogError,
} from './errors';

export type { StandardResponse, ErrorResponse } from './response';
export { STATUS_BY_CODE, toStandardResponse, toErrorResponse } from './response';

// Metadata store
export type { DbClient, Database, Row } from './database';
export { PgDatabase, PgliteDatabase, openDatabase } from './database';
export { migrate } from './migrations';

// Configuration and logging
export type { CatalogConfig, DecodeErrorPolicy } from './config';
export { loadConfig, ConfigError } from './config';
export type { Logger } from './logger';
export { createLogger, silentLogger } from './logger';

// Registries
export type { RegistryOptions } from './brokerRegistry';
export { BrokerRegistry } from './brokerRegistry';
export { TopicRegistry } from './topicRegistry';
export { DatasetTopicLinker } from './datasetTopicLinker';

// Stream reading
export type {
  ConsumerSession,
  ConsumerSessionOptions,
  PollOptions,
  StreamMessage,
  StreamConsumerFactory,
} from './streamConsumer';
export type { KafkaConsumerFactoryOptions } from './kafkaConsumer';
export { KafkaConsumerFactory } from './kafkaConsumer';
export { InMemoryStreamBroker } from './inMemoryStream';
export type { StreamReaderOptions } from './streamReader';
export { StreamReader, DEFAULT_MAX_RECORDS, POLL_TIMEOUT_MS } from './streamReader';
export type { StreamWindowOptions } from './validation';

// Facade
export type { MessageCatalogOptions } from './messageCatalog';
export { MessageCatalog } from './messageCatalog';
