import { createLogger, type Logger } from "../logger.ts";

export interface CapturedLogger {
	readonly logger: Logger;
	/**
	 * Every line written so far, parsed from JSON.
	 */
	readonly lines: Record<string, unknown>[];
	/**
	 * The `msg` of every line, in order.
	 */
	messages(): unknown[];
}

/**
 * A pino logger that writes into memory instead of stdout.
 */
export function captureLogger(level: "debug" | "info" = "debug"): CapturedLogger {
	const lines: Record<string, unknown>[] = [];
	const logger = createLogger({
		level,
		name: "test",
		destination: {
			write(line: string) {
				lines.push(JSON.parse(line));
			},
		},
	});
	return { logger, lines, messages: () => lines.map((line) => line.msg) };
}
