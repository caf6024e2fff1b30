import type { LogEvent } from "kysely";
import { type DestinationStream, type Logger, pino } from "pino";

import { type LogLevel } from "./config.ts";

export type { Logger };

export interface LoggerOptions {
	readonly level?: LogLevel | undefined;
	readonly name?: string | undefined;
	/**
	 * Where log lines are written (default: stdout).
	 */
	readonly destination?: DestinationStream | undefined;
}

/**
 * Creates the library's pino logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const pinoOptions = {
		name: options.name ?? "storefront-dal",
		level: options.level ?? "info",
	};
	return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

/**
 * The logger components fall back to when none is injected.
 */
export const silentLogger: Logger = pino({ level: "silent" });

/**
 * Adapts Kysely's `log` hook to pino.  Executed statements are logged at
 * debug level and failed ones at error level.  Only the SQL text is logged,
 * never the bound parameter values.
 */
export function kyselyLogger(logger: Logger): (event: LogEvent) => void {
	return (event) => {
		const durationMs = Math.round(event.queryDurationMillis * 100) / 100;
		if (event.level === "error") {
			logger.error({ err: event.error, sql: event.query.sql, durationMs }, "query failed");
			return;
		}
		logger.debug({ sql: event.query.sql, durationMs }, "query executed");
	};
}
