import { BrokerRegistry } from "./brokerRegistry";
import type { CatalogConfig } from "./config";
import { openDatabase, type Database } from "./database";
import { DatasetTopicLinker } from "./datasetTopicLinker";
import { KafkaConsumerFactory } from "./kafkaConsumer";
import { silentLogger, type Logger } from "./logger";
import { migrate } from "./migrations";
import type {
	Broker,
	BrokerInput,
	BrokerPatch,
	DatasetMessageDetails,
	DatasetMessageInput,
	StreamWindow,
	Topic,
	TopicInput,
	TopicPatch,
} from "./model";
import type { StreamConsumerFactory } from "./streamConsumer";
import { StreamReader, type StreamReaderOptions } from "./streamReader";
import { TopicRegistry } from "./topicRegistry";
import type { StreamWindowOptions } from "./validation";

export interface MessageCatalogOptions {
	readonly logger?: Logger;
	/** Source of consumer sessions; kafkajs when connecting from config */
	readonly consumers: StreamConsumerFactory;
	readonly stream?: Omit<StreamReaderOptions, "logger">;
}

/**
 * High-level catalog operations.
 * Coordinates the registries, the dataset linker and the stream reader over one metadata store.
 */
export class MessageCatalog {
	readonly brokers: BrokerRegistry;
	readonly topics: TopicRegistry;
	readonly linker: DatasetTopicLinker;
	readonly reader: StreamReader;

	private constructor(
		private readonly _db: Database,
		options: MessageCatalogOptions
	) {
		const logger = options.logger ?? silentLogger;
		this.brokers = new BrokerRegistry(_db, { logger });
		this.topics = new TopicRegistry(_db, { logger });
		this.linker = new DatasetTopicLinker(_db, { logger });
		this.reader = new StreamReader(this.linker, options.consumers, { ...options.stream, logger });
	}

	/**
	 * Open the configured metadata store, create missing tables and read streams through kafkajs.
	 */
	static async connect(config: CatalogConfig, logger: Logger = silentLogger): Promise<MessageCatalog> {
		const db = openDatabase(config.databaseUrl);
		const consumers = new KafkaConsumerFactory({ ...config.kafka, logger });
		return MessageCatalog.fromDatabase(db, {
			logger,
			consumers,
			stream: { decodeErrorPolicy: config.decodeErrorPolicy },
		});
	}

	/**
	 * Create a MessageCatalog over an existing database (useful for testing with PGLite).
	 */
	static async fromDatabase(db: Database, options: MessageCatalogOptions): Promise<MessageCatalog> {
		try {
			await migrate(db);
		} catch (error) {
			await db.close();
			throw error;
		}
		return new MessageCatalog(db, options);
	}

	// === Brokers ===

	registerBroker(input: BrokerInput): Promise<Broker> {
		return this.brokers.register(input);
	}

	updateBroker(id: number, patch: BrokerPatch): Promise<Broker> {
		return this.brokers.update(id, patch);
	}

	listBrokers(): Promise<Broker[]> {
		return this.brokers.list();
	}

	deleteBroker(id: number): Promise<void> {
		return this.brokers.delete(id);
	}

	// === Topics ===

	registerTopic(brokerId: number, input: TopicInput): Promise<Topic> {
		return this.topics.register(brokerId, input);
	}

	updateTopic(id: number, patch: TopicPatch): Promise<Topic> {
		return this.topics.update(id, patch);
	}

	listTopics(): Promise<Topic[]> {
		return this.topics.list();
	}

	deleteTopic(id: number): Promise<void> {
		return this.topics.delete(id);
	}

	// === Broker-sourced datasets ===

	registerDatasetMessageLink(input: DatasetMessageInput): Promise<DatasetMessageDetails> {
		return this.linker.registerDatasetMessageDetails(input);
	}

	fetchDatasetMessageDetails(datasetId: number): Promise<DatasetMessageDetails> {
		return this.linker.fetchDatasetMessageDetails(datasetId);
	}

	deregisterDatasetMessage(datasetId: number): Promise<void> {
		return this.linker.deregister(datasetId);
	}

	fetchDatasetTopicData(datasetId: number, options: StreamWindowOptions): Promise<StreamWindow> {
		return this.reader.fetchStreamWindow(datasetId, options);
	}

	/**
	 * Close the metadata store connection.
	 */
	async close(): Promise<void> {
		await this._db.close();
	}
}
