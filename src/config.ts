import { z } from "zod";

import { ConfigError } from "./helpers/errors.ts";
import { assertNever } from "./helpers/utils.ts";

// --- Schemas ---

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LogLevelSchema = z.enum(LOG_LEVELS).default("info");

const SqliteEnvSchema = z.object({
	STOREFRONT_DB: z.literal("sqlite"),
	/** better-sqlite3 filename (default: in-memory) */
	SQLITE_FILENAME: z.string().min(1).default(":memory:"),
	LOG_LEVEL: LogLevelSchema,
});

const PostgresEnvSchema = z.object({
	STOREFRONT_DB: z.literal("postgres"),
	DATABASE_URL: z
		.string({ required_error: "required when STOREFRONT_DB is postgres" })
		.url({ message: "must be a connection URL" }),
	/** pg pool size */
	DATABASE_POOL_MAX: z.coerce
		.number({ invalid_type_error: "must be a number" })
		.int({ message: "must be an integer" })
		.positive({ message: "must be a positive integer" })
		.default(10),
	LOG_LEVEL: LogLevelSchema,
});

const EnvSchema = z.discriminatedUnion("STOREFRONT_DB", [SqliteEnvSchema, PostgresEnvSchema]);

// --- Types ---

export interface SqliteConfig {
	readonly dialect: "sqlite";
	readonly filename: string;
	readonly logLevel: LogLevel;
}

export interface PostgresConfig {
	readonly dialect: "postgres";
	readonly connectionString: string;
	readonly poolMax: number;
	readonly logLevel: LogLevel;
}

export type StorefrontConfig = SqliteConfig | PostgresConfig;

export type Dialect = StorefrontConfig["dialect"];

export type Env = Readonly<Record<string, string | undefined>>;

// --- Loading ---

/**
 * Drops unset and blank variables so schema defaults apply to them.
 */
function presentVariables(env: Env): Record<string, string> {
	const present: Record<string, string> = {};
	for (const [name, value] of Object.entries(env)) {
		if (value !== undefined && value.trim() !== "") {
			present[name] = value.trim();
		}
	}
	return present;
}

/**
 * Reads the database and logging settings from environment variables.
 *
 * | variable            | default    |
 * |---------------------|------------|
 * | `STOREFRONT_DB`     | `sqlite`   |
 * | `SQLITE_FILENAME`   | `:memory:` |
 * | `DATABASE_URL`      | required for postgres |
 * | `DATABASE_POOL_MAX` | `10`       |
 * | `LOG_LEVEL`         | `info`     |
 *
 * @throws {ConfigError} Listing every invalid variable.
 */
export function loadConfig(env: Env = process.env): StorefrontConfig {
	const variables = presentVariables(env);
	const result = EnvSchema.safeParse({
		...variables,
		STOREFRONT_DB: variables.STOREFRONT_DB?.toLowerCase() ?? "sqlite",
	});

	if (!result.success) {
		throw new ConfigError(
			result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
		);
	}

	const parsed = result.data;
	switch (parsed.STOREFRONT_DB) {
		case "sqlite":
			return {
				dialect: "sqlite",
				filename: parsed.SQLITE_FILENAME,
				logLevel: parsed.LOG_LEVEL,
			};
		case "postgres":
			return {
				dialect: "postgres",
				connectionString: parsed.DATABASE_URL,
				poolMax: parsed.DATABASE_POOL_MAX,
				logLevel: parsed.LOG_LEVEL,
			};
		default:
			return assertNever(parsed);
	}
}
