import pino, { type Logger, type LevelWithSilent } from "pino";
import { toCatalogError, type CatalogError } from "./errors";

export type { Logger };

/**
 * Create the root logger. Components take child loggers of it.
 * @param fd file descriptor to write to; the CLI logs to stderr to keep stdout for results
 */
export function createLogger(level: LevelWithSilent = "info", fd: 1 | 2 = 1): Logger {
	return pino(
		{
			name: "ml-message-catalog",
			level,
		},
		pino.destination(fd)
	);
}

/** Logger that discards everything. */
export const silentLogger: Logger = pino({ level: "silent" });

/**
 * Turn a thrown value into a catalog error and log it once.
 * Store failures are errors; expected outcomes (not found, conflict...) are warnings.
 */
export function reportFailure(log: Logger, operation: string, error: unknown): CatalogError {
	const failure = toCatalogError(operation, error);
	if (failure.code === "store") {
		log.error({ err: error, operation }, "metadata store error");
	} else {
		log.warn({ code: failure.code, operation }, failure.message);
	}
	return failure;
}
