export class StorefrontDalError extends Error {
	override name = "StorefrontDalError";
}

//
// Data access.
//

/**
 * Error thrown when a statement cannot be executed: the connection failed,
 * the SQL was malformed, or the database rejected the statement.
 */
export class DataAccessError extends StorefrontDalError {
	override name = "DataAccessError";
}

/**
 * Error thrown when a write violates a unique or primary key constraint.
 * Callers may translate this into a domain-level conflict.
 */
export class UniqueConstraintError extends DataAccessError {
	override name = "UniqueConstraintError";
}

/**
 * Error thrown when a write references a row that does not exist, or deletes
 * a row that is still referenced.
 */
export class ForeignKeyError extends DataAccessError {
	override name = "ForeignKeyError";
}

export class NotNullError extends DataAccessError {
	override name = "NotNullError";
}

/**
 * Error thrown when a statement template names a placeholder that has no
 * matching entry in the parameter bundle.
 */
export class MissingParameterError extends DataAccessError {
	override name = "MissingParameterError";

	constructor(readonly parameter: string) {
		super(`Missing value for parameter @${parameter}`);
	}
}

/**
 * Error thrown when a result row does not match the shape its decoder expects.
 */
export class RowDecodeError extends DataAccessError {
	override name = "RowDecodeError";

	constructor(
		readonly columns: readonly string[],
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
	}
}

//
// Aggregation.
//

/**
 * Error thrown when a flattened row has no usable parent identifier.  This
 * always indicates that the query and the aggregator disagree about the row
 * shape.
 */
export class AggregationError extends StorefrontDalError {
	override name = "AggregationError";

	constructor(
		readonly rowIndex: number,
		message: string,
	) {
		super(`Row ${rowIndex}: ${message}`);
	}
}

//
// Transactions.
//

/**
 * Error thrown when a transactional scope rolls back.  The original failure
 * is kept, unchanged, as `cause`.
 */
export class TransactionError extends StorefrontDalError {
	override name = "TransactionError";

	constructor(
		message: string,
		readonly operationIndex: number | null,
		options?: ErrorOptions,
	) {
		super(message, options);
	}
}

export class ScopeClosedError extends TransactionError {
	override name = "ScopeClosedError";

	constructor(state: string) {
		super(`Transaction scope is closed (state: ${state})`, null);
	}
}

//
// Configuration.
//

export class ConfigError extends StorefrontDalError {
	override name = "ConfigError";

	constructor(readonly issues: readonly string[]) {
		super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
	}
}

export class UnexpectedCaseError extends StorefrontDalError {
	override name = "UnexpectedCaseError";
}

//
// Driver error classification.
//

const SQLITE_UNIQUE_CODES = new Set(["SQLITE_CONSTRAINT_UNIQUE", "SQLITE_CONSTRAINT_PRIMARYKEY"]);
const SQLITE_FOREIGN_KEY_CODE = "SQLITE_CONSTRAINT_FOREIGNKEY";
const SQLITE_NOT_NULL_CODE = "SQLITE_CONSTRAINT_NOTNULL";

const PG_UNIQUE_VIOLATION = "23505";
const PG_FOREIGN_KEY_VIOLATION = "23503";
const PG_NOT_NULL_VIOLATION = "23502";

function driverCode(error: unknown): string | undefined {
	if (typeof error !== "object" || error === null || !("code" in error)) {
		return undefined;
	}
	return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Translates a driver error (better-sqlite3 or pg) into the data access error
 * family.  Classification is by the driver's error code only.  Errors that
 * already belong to this library are returned as they are.
 */
export function toDataAccessError(error: unknown): StorefrontDalError {
	if (error instanceof StorefrontDalError) {
		return error;
	}

	const message = error instanceof Error ? error.message : String(error);
	const options = { cause: error };
	const code = driverCode(error);

	if (code !== undefined) {
		if (SQLITE_UNIQUE_CODES.has(code) || code === PG_UNIQUE_VIOLATION) {
			return new UniqueConstraintError(message, options);
		}
		if (code === SQLITE_FOREIGN_KEY_CODE || code === PG_FOREIGN_KEY_VIOLATION) {
			return new ForeignKeyError(message, options);
		}
		if (code === SQLITE_NOT_NULL_CODE || code === PG_NOT_NULL_VIOLATION) {
			return new NotNullError(message, options);
		}
	}

	return new DataAccessError(message, options);
}
