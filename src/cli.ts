import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import * as fs from "fs";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { MessageCatalog } from "./messageCatalog";
import { DatasetType, OFFSET_POLICIES, isJsonObject, type JsonObject, type OffsetPolicy } from "./model";
import { toErrorResponse, toStandardResponse, type StandardResponse } from "./response";

function parseInteger(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed)) {
		throw new InvalidArgumentError("Not an integer.");
	}
	return parsed;
}

/**
 * Inline JSON object, or `@path` to read it from a file.
 */
function parseJsonObject(value: string): JsonObject {
	const text = value.startsWith("@") ? fs.readFileSync(value.slice(1), "utf-8") : value;
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch {
		throw new InvalidArgumentError("Not valid JSON.");
	}
	if (!isJsonObject(parsed)) {
		throw new InvalidArgumentError("Expected a JSON object.");
	}
	return parsed;
}

function parseDatasetType(value: string): DatasetType {
	const byName = Object.entries(DatasetType).find(([name]) => name === value);
	if (byName) {
		return byName[1];
	}
	const byNumber = Object.values(DatasetType).find((type) => String(type) === value);
	if (byNumber === undefined) {
		throw new InvalidArgumentError("Expected train, inference, both or 0, 1, 2.");
	}
	return byNumber;
}

function parseOffsetPolicy(value: string): OffsetPolicy {
	const policy = OFFSET_POLICIES.find((p) => p === value);
	if (!policy) {
		throw new InvalidArgumentError(`Expected one of ${OFFSET_POLICIES.join(", ")}.`);
	}
	return policy;
}

/**
 * Run one catalog operation and print its response envelope as JSON.
 */
async function run(action: (catalog: MessageCatalog) => Promise<StandardResponse<unknown>>): Promise<void> {
	const config = loadConfig();
	const logger = createLogger(config.logLevel, 2);
	const catalog = await MessageCatalog.connect(config, logger);
	try {
		const response = await action(catalog);
		console.log(JSON.stringify(response, null, 2));
	} catch (error) {
		console.log(JSON.stringify(toErrorResponse(error), null, 2));
		process.exitCode = 1;
	} finally {
		await catalog.close();
	}
}

const program = new Command();

program
	.name("ml-catalog")
	.description("Register message brokers, topics and broker-sourced datasets, and read their streams")
	.version("1.0.0");

const broker = program.command("broker").description("Manage message-broker endpoints");

broker
	.command("register")
	.description("Register a broker endpoint")
	.requiredOption("-n, --name <name>", "Unique broker name")
	.requiredOption("-a, --address <ip>", "IPv4 or IPv6 address")
	.requiredOption("-p, --port <number>", "Port", parseInteger)
	.action(async (options: { name: string; address: string; port: number }) => {
		await run(async (catalog) =>
			toStandardResponse(201, "Broker created successfully.", await catalog.registerBroker(options))
		);
	});

broker
	.command("update <id>")
	.description("Update some fields of a broker")
	.option("-n, --name <name>", "New name")
	.option("-a, --address <ip>", "New address")
	.option("-p, --port <number>", "New port", parseInteger)
	.action(async (id: string, options: { name?: string; address?: string; port?: number }) => {
		await run(async (catalog) =>
			toStandardResponse(200, "Broker updated successfully.", await catalog.updateBroker(parseInteger(id), options))
		);
	});

broker
	.command("list")
	.description("List registered brokers")
	.action(async () => {
		await run(async (catalog) => toStandardResponse(200, "Broker details.", await catalog.listBrokers()));
	});

broker
	.command("delete <id>")
	.description("Delete a broker, its topics and their dataset links")
	.action(async (id: string) => {
		await run(async (catalog) => {
			await catalog.deleteBroker(parseInteger(id));
			return toStandardResponse(200, "Broker deleted successfully.", null);
		});
	});

const topic = program.command("topic").description("Manage topics hosted on brokers");

topic
	.command("register")
	.description("Register a topic under a broker")
	.requiredOption("-b, --broker <id>", "Broker id", parseInteger)
	.requiredOption("-n, --name <name>", "Topic name")
	.requiredOption("-s, --schema <json>", "Message schema as JSON, or @file", parseJsonObject)
	.action(async (options: { broker: number; name: string; schema: JsonObject }) => {
		await run(async (catalog) =>
			toStandardResponse(
				201,
				"Topic created successfully.",
				await catalog.registerTopic(options.broker, { name: options.name, schema: options.schema })
			)
		);
	});

topic
	.command("update <id>")
	.description("Update the name or schema of a topic")
	.option("-n, --name <name>", "New name")
	.option("-s, --schema <json>", "New message schema as JSON, or @file", parseJsonObject)
	.action(async (id: string, options: { name?: string; schema?: JsonObject }) => {
		await run(async (catalog) =>
			toStandardResponse(200, "Topic updated successfully.", await catalog.updateTopic(parseInteger(id), options))
		);
	});

topic
	.command("list")
	.description("List registered topics")
	.option("-b, --broker <id>", "Only topics of this broker", parseInteger)
	.action(async (options: { broker?: number }) => {
		await run(async (catalog) => {
			const topics = options.broker === undefined
				? await catalog.listTopics()
				: await catalog.topics.listByBroker(options.broker);
			return toStandardResponse(200, "Topic details.", topics);
		});
	});

topic
	.command("delete <id>")
	.description("Delete a topic and the dataset links that read from it")
	.action(async (id: string) => {
		await run(async (catalog) => {
			await catalog.deleteTopic(parseInteger(id));
			return toStandardResponse(200, "Topic deleted successfully.", null);
		});
	});

const dataset = program.command("dataset").description("Manage broker-sourced datasets");

dataset
	.command("register")
	.description("Create a dataset that reads from a broker topic")
	.requiredOption("-n, --name <name>", "Dataset name")
	.option("-d, --description <text>", "Description")
	.requiredOption("-t, --type <type>", "train, inference or both (0, 1, 2)", parseDatasetType)
	.requiredOption("-b, --broker <id>", "Broker id", parseInteger)
	.requiredOption("--topic <id>", "Topic id", parseInteger)
	.action(async (options: { name: string; description?: string; type: DatasetType; broker: number; topic: number }) => {
		await run(async (catalog) =>
			toStandardResponse(
				201,
				"Dataset linked to topic successfully.",
				await catalog.registerDatasetMessageLink({
					name: options.name,
					description: options.description,
					datasetType: options.type,
					brokerId: options.broker,
					topicId: options.topic,
				})
			)
		);
	});

dataset
	.command("show <id>")
	.description("Show a dataset with its broker and topic")
	.action(async (id: string) => {
		await run(async (catalog) =>
			toStandardResponse(200, "Dataset message details.", await catalog.fetchDatasetMessageDetails(parseInteger(id)))
		);
	});

dataset
	.command("deregister <id>")
	.description("Delete a broker-sourced dataset and its topic link")
	.action(async (id: string) => {
		await run(async (catalog) => {
			await catalog.deregisterDatasetMessage(parseInteger(id));
			return toStandardResponse(200, "Dataset and associated topic link deleted successfully.", null);
		});
	});

dataset
	.command("read <id>")
	.description("Read a window of live messages from the dataset's topic")
	.option("-m, --max-records <number>", "Maximum records to return", parseInteger)
	.option("-o, --offset <policy>", "earliest or latest", parseOffsetPolicy, "latest")
	.action(async (id: string, options: { maxRecords?: number; offset: OffsetPolicy }) => {
		await run(async (catalog) =>
			toStandardResponse(
				200,
				"Topic data.",
				await catalog.fetchDatasetTopicData(parseInteger(id), {
					maxRecords: options.maxRecords,
					offsetPolicy: options.offset,
				})
			)
		);
	});

program.parseAsync().catch((error: unknown) => {
	console.error(error);
	process.exitCode = 1;
});
