import { type Env, loadConfig, type StorefrontConfig } from "./config.ts";
import { createConnectionFactory, type KyselyConnectionFactory } from "./connection-factory.ts";
import { createLogger, type Logger } from "./logger.ts";
import { CustomerRepository } from "./repositories/customer-repository.ts";
import { OrderRepository } from "./repositories/order-repository.ts";
import { ProductRepository } from "./repositories/product-repository.ts";
import { KyselyRowSource } from "./row-source.ts";
import { initializeDatabase, type InitializeResult } from "./schema/initializer.ts";
import { TransactionalWriter } from "./transactional-writer.ts";

export interface StorefrontOptions {
	/**
	 * Settings to use instead of reading them from `env`.
	 */
	readonly config?: StorefrontConfig | undefined;
	/**
	 * Environment variables to read settings from (default: `process.env`).
	 */
	readonly env?: Env | undefined;
	readonly logger?: Logger | undefined;
	/**
	 * Seed demo data into an empty database (default: true).
	 */
	readonly seed?: boolean | undefined;
}

export interface Storefront {
	readonly config: StorefrontConfig;
	readonly logger: Logger;
	readonly factory: KyselyConnectionFactory;
	readonly rows: KyselyRowSource;
	readonly writer: TransactionalWriter;
	readonly products: ProductRepository;
	readonly customers: CustomerRepository;
	readonly orders: OrderRepository;
	readonly initialized: InitializeResult;
	close(): Promise<void>;
}

/**
 * Wires configuration, logging, the connection factory and the repositories
 * together, and initializes the database.  The factory is destroyed again if
 * initialization fails.
 */
export async function createStorefront(options: StorefrontOptions = {}): Promise<Storefront> {
	const config = options.config ?? loadConfig(options.env);
	const logger = options.logger ?? createLogger({ level: config.logLevel });
	const factory = createConnectionFactory(config, logger);

	let initialized: InitializeResult;
	try {
		initialized = await initializeDatabase(factory, { seed: options.seed, logger });
	} catch (error) {
		logger.error({ err: error }, "database initialization failed");
		await factory.destroy();
		throw error;
	}

	const repositoryOptions = { logger };
	return {
		config,
		logger,
		factory,
		rows: new KyselyRowSource(factory),
		writer: new TransactionalWriter(factory, logger),
		products: new ProductRepository(factory, repositoryOptions),
		customers: new CustomerRepository(factory, repositoryOptions),
		orders: new OrderRepository(factory, repositoryOptions),
		initialized,
		close: () => factory.destroy(),
	};
}
