export {
	aggregate,
	type Aggregate,
	type AggregateConfig,
	type AggregateOptions,
	type Aggregator,
	createAggregator,
	isPresentKey,
	type ParentKey,
	type PresenceFn,
} from "./aggregator.ts";
export {
	type Dialect,
	type Env,
	LOG_LEVELS,
	loadConfig,
	type LogLevel,
	type PostgresConfig,
	type SqliteConfig,
	type StorefrontConfig,
} from "./config.ts";
export {
	type ConnectionFactory,
	createConnectionFactory,
	KyselyConnectionFactory,
	openSqlite,
} from "./connection-factory.ts";
export * from "./entities.ts";
export {
	type Decoder,
	decodePrefixed,
	decodeValue,
	decodeWith,
	integer,
	nullableInteger,
	nullableText,
	nullableTimestamp,
	numeric,
	type RawRow,
	rawRow,
	text,
	timestamp,
} from "./helpers/decode.ts";
export {
	AggregationError,
	ConfigError,
	DataAccessError,
	ForeignKeyError,
	MissingParameterError,
	NotNullError,
	RowDecodeError,
	ScopeClosedError,
	StorefrontDalError,
	toDataAccessError,
	TransactionError,
	UnexpectedCaseError,
	UniqueConstraintError,
} from "./helpers/errors.ts";
export { compileStatement, type Params } from "./helpers/named-params.ts";
export { createLogger, kyselyLogger, type Logger, type LoggerOptions, silentLogger } from "./logger.ts";
export { CustomerRepository } from "./repositories/customer-repository.ts";
export { OrderRepository } from "./repositories/order-repository.ts";
export { escapeLike, ProductRepository } from "./repositories/product-repository.ts";
export { type RepositoryOptions } from "./repositories/repository.ts";
export { type ExecuteResult, KyselyRowSource, type QueryOptions, type RowSource } from "./row-source.ts";
export { type StorefrontDB } from "./schema/database.ts";
export {
	initializeDatabase,
	type InitializeOptions,
	type InitializeResult,
	loadSeedData,
	parseSeedData,
	type SeedData,
} from "./schema/initializer.ts";
export { createStorefront, type Storefront, type StorefrontOptions } from "./storefront.ts";
export {
	type AtomicWriteResult,
	TransactionalWriter,
	type WriteOperation,
	type WriteOptions,
	type WriteScope,
	type WriteState,
} from "./transactional-writer.ts";
