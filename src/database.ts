import { Pool, type QueryResultRow } from "pg";
import { PGlite } from "@electric-sql/pglite";

export type Row = Record<string, unknown>;

/**
 * Database client interface - implemented over both pg and PGlite.
 */
export interface DbClient {
	query<T extends Row = Row>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

/**
 * A metadata store connection that can run transactions.
 */
export interface Database extends DbClient {
	/**
	 * Run `fn` inside a transaction.
	 * Commits when `fn` resolves, rolls back and rethrows when it rejects.
	 */
	transaction<T>(fn: (tx: DbClient) => Promise<T>): Promise<T>;
	close(): Promise<void>;
}

/**
 * PostgreSQL through a pg connection pool.
 * Each transaction holds one pooled connection for its whole duration.
 */
export class PgDatabase implements Database {
	constructor(private readonly _pool: Pool) { }

	static fromConnectionString(connectionString: string): PgDatabase {
		return new PgDatabase(new Pool({ connectionString }));
	}

	async query<T extends Row = Row>(sql: string, params?: unknown[]): Promise<{ rows: T[] }> {
		const result = await this._pool.query<T & QueryResultRow>(sql, params);
		return { rows: result.rows };
	}

	async transaction<T>(fn: (tx: DbClient) => Promise<T>): Promise<T> {
		const client = await this._pool.connect();
		const tx: DbClient = {
			query: async <R extends Row = Row>(sql: string, params?: unknown[]) => {
				const result = await client.query<R & QueryResultRow>(sql, params);
				return { rows: result.rows };
			},
		};

		// Set when the connection is unusable; pg then discards it instead of pooling it.
		let broken: Error | undefined;
		try {
			await client.query("BEGIN");
			const value = await fn(tx);
			await client.query("COMMIT");
			return value;
		} catch (error) {
			try {
				await client.query("ROLLBACK");
			} catch (rollbackError) {
				broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
			}
			throw error;
		} finally {
			client.release(broken);
		}
	}

	async close(): Promise<void> {
		await this._pool.end();
	}
}

/**
 * In-process PostgreSQL (PGlite). Used for tests and local catalogs.
 */
export class PgliteDatabase implements Database {
	constructor(private readonly _db: PGlite) { }

	async query<T extends Row = Row>(sql: string, params?: unknown[]): Promise<{ rows: T[] }> {
		const result = await this._db.query<T>(sql, params);
		return { rows: result.rows };
	}

	async transaction<T>(fn: (tx: DbClient) => Promise<T>): Promise<T> {
		return this._db.transaction(async (transaction) => {
			const tx: DbClient = {
				query: async <R extends Row = Row>(sql: string, params?: unknown[]) => {
					const result = await transaction.query<R>(sql, params);
					return { rows: result.rows };
				},
			};
			return fn(tx);
		});
	}

	async close(): Promise<void> {
		await this._db.close();
	}
}

/**
 * Open a metadata store.
 *
 * Connection string formats:
 * - `pglite:` or `pglite::memory:` - In-memory PGlite database
 * - `pglite:/path/to/dir` - PGlite database persisted to filesystem
 * - `postgresql://...` or other - PostgreSQL connection string
 */
export function openDatabase(connectionString: string): Database {
	if (connectionString.startsWith("pglite:")) {
		const pglitePath = connectionString.slice("pglite:".length);
		return new PgliteDatabase(new PGlite(pglitePath || undefined));
	}
	return PgDatabase.fromConnectionString(connectionString);
}

/**
 * Whether a driver error is a unique-constraint violation (SQLSTATE 23505).
 * Reads the structured error code, not the message.
 */
export function isUniqueViolation(error: unknown): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}
