import { type Transaction } from "kysely";

import { type ConnectionFactory } from "./connection-factory.ts";
import { type Decoder } from "./helpers/decode.ts";
import { ScopeClosedError, TransactionError } from "./helpers/errors.ts";
import { type Params } from "./helpers/named-params.ts";
import { type Logger, silentLogger } from "./logger.ts";
import { type ExecuteResult, runStatement, toExecuteResult } from "./row-source.ts";
import { type StorefrontDB } from "./schema/database.ts";

export type WriteState = "idle" | "open" | "committed" | "rolled-back";

export interface WriteOperation {
	readonly sql: string;
	readonly params?: Params | undefined;
}

export interface AtomicWriteResult {
	/**
	 * Summed across all operations.
	 */
	readonly affectedRows: number;
	/**
	 * The generated id of the first operation that produced one.
	 */
	readonly generatedId: number | null;
}

export interface WriteOptions {
	/**
	 * Checked before each operation.  An abort rolls the transaction back.
	 */
	readonly signal?: AbortSignal | undefined;
}

/**
 * The handle given to {@link TransactionalWriter.run} callbacks.  Every
 * statement runs on the same transaction.
 */
export interface WriteScope {
	readonly state: WriteState;
	execute(template: string, params?: Params): Promise<ExecuteResult>;
	query<Row>(template: string, params: Params, decode: Decoder<Row>): Promise<Row[]>;
}

class TransactionScope implements WriteScope {
	#state: WriteState = "idle";
	#trx: Transaction<StorefrontDB> | null = null;
	#operationCount = 0;
	readonly #signal: AbortSignal | undefined;
	readonly #failedOperations = new WeakMap<object, number>();

	constructor(signal: AbortSignal | undefined) {
		this.#signal = signal;
	}

	get state(): WriteState {
		return this.#state;
	}

	get operationCount(): number {
		return this.#operationCount;
	}

	open(trx: Transaction<StorefrontDB>): void {
		this.#trx = trx;
		this.#state = "open";
	}

	close(state: "committed" | "rolled-back"): void {
		this.#trx = null;
		this.#state = state;
	}

	/**
	 * The index of the operation that raised `error`, if one did.
	 */
	failedOperation(error: unknown): number | null {
		if (typeof error !== "object" || error === null) {
			return null;
		}
		return this.#failedOperations.get(error) ?? null;
	}

	async #run(template: string, params: Params) {
		if (this.#state !== "open" || this.#trx === null) {
			throw new ScopeClosedError(this.#state);
		}
		const trx = this.#trx;
		this.#signal?.throwIfAborted();

		const index = this.#operationCount++;
		try {
			return await runStatement(trx, template, params);
		} catch (error) {
			if (typeof error === "object" && error !== null) {
				this.#failedOperations.set(error, index);
			}
			throw error;
		}
	}

	async execute(template: string, params: Params = {}): Promise<ExecuteResult> {
		return toExecuteResult(await this.#run(template, params));
	}

	async query<Row>(template: string, params: Params, decode: Decoder<Row>): Promise<Row[]> {
		const { rows } = await this.#run(template, params);
		return rows.map((row) => decode(row));
	}
}

function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Runs groups of write statements atomically: all of them commit, or none
 * do.  There is no retry.
 */
export class TransactionalWriter {
	readonly #factory: ConnectionFactory;
	readonly #logger: Logger;

	constructor(factory: ConnectionFactory, logger: Logger = silentLogger) {
		this.#factory = factory;
		this.#logger = logger;
	}

	/**
	 * Runs `work` inside one transaction and returns its result.  Use this
	 * form when a later statement needs a value produced by an earlier one.
	 *
	 * @throws {TransactionError} After rolling back.  `cause` is the error
	 *   that made the transaction fail, unchanged.
	 */
	async run<T>(work: (scope: WriteScope) => Promise<T>, options: WriteOptions = {}): Promise<T> {
		const { signal } = options;
		const scope = new TransactionScope(signal);

		try {
			signal?.throwIfAborted();
			const result = await this.#factory.withTransaction(async (trx) => {
				scope.open(trx);
				return work(scope);
			});
			scope.close("committed");
			this.#logger.debug({ operations: scope.operationCount }, "transaction committed");
			return result;
		} catch (error) {
			scope.close("rolled-back");
			const operationIndex = scope.failedOperation(error);
			this.#logger.warn({ err: error, operationIndex }, "transaction rolled back");
			throw new TransactionError(
				operationIndex === null
					? `Transaction rolled back: ${messageOf(error)}`
					: `Transaction rolled back at operation ${operationIndex}: ${messageOf(error)}`,
				operationIndex,
				{ cause: error },
			);
		}
	}

	/**
	 * Executes `operations` in order on one transaction.  An empty list
	 * commits nothing.
	 *
	 * @throws {TransactionError} After rolling back.  `operationIndex` names
	 *   the failing operation.
	 */
	executeAtomic(operations: readonly WriteOperation[], options: WriteOptions = {}): Promise<AtomicWriteResult> {
		return this.run(async (scope) => {
			let affectedRows = 0;
			let generatedId: number | null = null;
			for (const operation of operations) {
				const result = await scope.execute(operation.sql, operation.params ?? {});
				affectedRows += result.affectedRows;
				generatedId ??= result.generatedId;
			}
			return { affectedRows, generatedId };
		}, options);
	}
}
