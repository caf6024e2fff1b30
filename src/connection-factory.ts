import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, type Transaction } from "kysely";
import pg from "pg";

import { type Dialect, type StorefrontConfig } from "./config.ts";
import { assertNever } from "./helpers/utils.ts";
import { kyselyLogger, type Logger, silentLogger } from "./logger.ts";
import { type StorefrontDB } from "./schema/database.ts";

/**
 * The single seam through which every component reaches the database.
 */
export interface ConnectionFactory {
	readonly dialect: Dialect;
	readonly db: Kysely<StorefrontDB>;
	/**
	 * Runs `fn` on one connection taken from the pool, and releases it however
	 * `fn` exits.
	 */
	withConnection<T>(fn: (db: Kysely<StorefrontDB>) => Promise<T>): Promise<T>;
	/**
	 * Runs `fn` inside a transaction: committed when `fn` resolves, rolled back
	 * when it rejects.
	 */
	withTransaction<T>(fn: (trx: Transaction<StorefrontDB>) => Promise<T>): Promise<T>;
	destroy(): Promise<void>;
}

export class KyselyConnectionFactory implements ConnectionFactory {
	constructor(
		readonly dialect: Dialect,
		readonly db: Kysely<StorefrontDB>,
	) {}

	withConnection<T>(fn: (db: Kysely<StorefrontDB>) => Promise<T>): Promise<T> {
		return this.db.connection().execute(fn);
	}

	withTransaction<T>(fn: (trx: Transaction<StorefrontDB>) => Promise<T>): Promise<T> {
		return this.db.transaction().execute(fn);
	}

	destroy(): Promise<void> {
		return this.db.destroy();
	}
}

/**
 * Opens a better-sqlite3 database with foreign key enforcement on.
 */
export function openSqlite(filename: string): SQLite.Database {
	const database = new SQLite(filename);
	database.pragma("foreign_keys = ON");
	return database;
}

/**
 * Creates the connection factory for the configured dialect.  Kysely's query
 * log is forwarded to `logger`.
 */
export function createConnectionFactory(
	config: StorefrontConfig,
	logger: Logger = silentLogger,
): KyselyConnectionFactory {
	const log = kyselyLogger(logger);

	switch (config.dialect) {
		case "sqlite": {
			const dialect = new SqliteDialect({ database: openSqlite(config.filename) });
			logger.debug({ dialect: "sqlite", filename: config.filename }, "opening database");
			return new KyselyConnectionFactory("sqlite", new Kysely<StorefrontDB>({ dialect, log }));
		}
		case "postgres": {
			const dialect = new PostgresDialect({
				pool: new pg.Pool({ connectionString: config.connectionString, max: config.poolMax }),
			});
			logger.debug({ dialect: "postgres", poolMax: config.poolMax }, "opening database");
			return new KyselyConnectionFactory("postgres", new Kysely<StorefrontDB>({ dialect, log }));
		}
		default:
			return assertNever(config);
	}
}
