import { type Kysely, type QueryResult } from "kysely";

import { type ConnectionFactory } from "./connection-factory.ts";
import { type Decoder, type RawRow } from "./helpers/decode.ts";
import { DataAccessError, toDataAccessError } from "./helpers/errors.ts";
import { compileStatement, type Params } from "./helpers/named-params.ts";
import { type StorefrontDB } from "./schema/database.ts";

export interface QueryOptions {
	/**
	 * Checked before the statement runs.
	 */
	readonly signal?: AbortSignal | undefined;
}

export interface ExecuteResult {
	/**
	 * The count the driver reports, or the number of returned rows when it
	 * reports none (SQLite statements with a RETURNING clause).
	 */
	readonly affectedRows: number;
	/**
	 * The first value of the first returned row, when that is an integer.
	 * Insert statements produce it with `RETURNING <id column>`.
	 */
	readonly generatedId: number | null;
	readonly rows: readonly RawRow[];
}

/**
 * Runs parameterized statements and decodes their rows.  Templates use
 * `@Name` placeholders bound from `params`.
 */
export interface RowSource {
	query<Row>(template: string, params: Params, decode: Decoder<Row>, options?: QueryOptions): Promise<Row[]>;
	queryFirst<Row>(
		template: string,
		params: Params,
		decode: Decoder<Row>,
		options?: QueryOptions,
	): Promise<Row | undefined>;
	/**
	 * The first column of the first row, or `undefined` without rows.
	 */
	scalar(template: string, params: Params, options?: QueryOptions): Promise<unknown>;
	execute(template: string, params: Params, options?: QueryOptions): Promise<ExecuteResult>;
}

//
// Statement execution shared with the transactional writer.
//

/**
 * Compiles and runs one statement on `db`, translating driver failures into
 * the data access error family.
 */
export async function runStatement(
	db: Kysely<StorefrontDB>,
	template: string,
	params: Params,
): Promise<QueryResult<RawRow>> {
	const query = compileStatement<RawRow>(template, params);
	try {
		return await query.execute(db);
	} catch (error) {
		throw toDataAccessError(error);
	}
}

function generatedIdOf(rows: readonly RawRow[]): number | null {
	const first = rows[0];
	if (first === undefined) {
		return null;
	}
	const value = Object.values(first)[0];
	if (typeof value === "bigint" || (typeof value === "string" && /^\d+$/.test(value))) {
		return safeId(Number(value), value);
	}
	if (typeof value === "number" && Number.isInteger(value)) {
		return safeId(value, value);
	}
	return null;
}

function safeId(id: number, raw: unknown): number {
	if (!Number.isSafeInteger(id)) {
		throw new DataAccessError(`Generated id ${String(raw)} is outside the safe integer range`);
	}
	return id;
}

export function toExecuteResult(result: QueryResult<RawRow>): ExecuteResult {
	return {
		affectedRows: result.numAffectedRows === undefined ? result.rows.length : Number(result.numAffectedRows),
		generatedId: generatedIdOf(result.rows),
		rows: result.rows,
	};
}

export function firstColumn(rows: readonly RawRow[]): unknown {
	const first = rows[0];
	return first === undefined ? undefined : Object.values(first)[0];
}

//
// Kysely-backed row source.
//

/**
 * A {@link RowSource} that takes one pooled connection per call from a
 * {@link ConnectionFactory}.
 */
export class KyselyRowSource implements RowSource {
	readonly #factory: ConnectionFactory;

	constructor(factory: ConnectionFactory) {
		this.#factory = factory;
	}

	#run(template: string, params: Params, options: QueryOptions): Promise<QueryResult<RawRow>> {
		options.signal?.throwIfAborted();
		return this.#factory.withConnection((db) => runStatement(db, template, params));
	}

	async query<Row>(
		template: string,
		params: Params,
		decode: Decoder<Row>,
		options: QueryOptions = {},
	): Promise<Row[]> {
		const { rows } = await this.#run(template, params, options);
		return rows.map((row) => decode(row));
	}

	async queryFirst<Row>(
		template: string,
		params: Params,
		decode: Decoder<Row>,
		options: QueryOptions = {},
	): Promise<Row | undefined> {
		const { rows } = await this.#run(template, params, options);
		const first = rows[0];
		return first === undefined ? undefined : decode(first);
	}

	async scalar(template: string, params: Params, options: QueryOptions = {}): Promise<unknown> {
		const { rows } = await this.#run(template, params, options);
		return firstColumn(rows);
	}

	async execute(template: string, params: Params, options: QueryOptions = {}): Promise<ExecuteResult> {
		return toExecuteResult(await this.#run(template, params, options));
	}
}
