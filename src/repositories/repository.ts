import { type ConnectionFactory } from "../connection-factory.ts";
import { DataAccessError } from "../helpers/errors.ts";
import { type Logger, silentLogger } from "../logger.ts";
import { KyselyRowSource, type ExecuteResult, type RowSource } from "../row-source.ts";

export interface RepositoryOptions {
	readonly logger?: Logger | undefined;
	/**
	 * Source of `createdAt`, `updatedAt` and `orderDate` values.
	 */
	readonly now?: (() => Date) | undefined;
}

/**
 * State shared by the repositories.  Each repository reads and writes
 * through its own row source over the injected connection factory.
 */
export abstract class Repository {
	protected readonly rows: RowSource;
	protected readonly logger: Logger;
	protected readonly now: () => Date;

	constructor(
		protected readonly factory: ConnectionFactory,
		options: RepositoryOptions = {},
	) {
		this.rows = new KyselyRowSource(factory);
		this.logger = options.logger ?? silentLogger;
		this.now = options.now ?? (() => new Date());
	}
}

/**
 * The id an insert returned, or an error when it returned none.
 */
export function requireGeneratedId(result: ExecuteResult, table: string): number {
	if (result.generatedId === null) {
		throw new DataAccessError(`Insert into ${table} did not return a generated id`);
	}
	return result.generatedId;
}
