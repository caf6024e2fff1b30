import { readFileSync } from "node:fs";

import { type ColumnDataType, type ColumnDefinitionBuilder, type Kysely, type Transaction } from "kysely";
import { z } from "zod";

import { type Dialect } from "../config.ts";
import { type ConnectionFactory } from "../connection-factory.ts";
import { ORDER_STATUSES } from "../entities.ts";
import { decodeValue, integer } from "../helpers/decode.ts";
import { ConfigError, UnexpectedCaseError } from "../helpers/errors.ts";
import { roundCents } from "../helpers/utils.ts";
import { type Logger, silentLogger } from "../logger.ts";
import { type StorefrontDB } from "./database.ts";

//
// Seed data.
//

const SeedSchema = z
	.object({
		products: z.array(
			z.object({
				name: z.string().min(1),
				description: z.string().nullable(),
				price: z.number().nonnegative(),
				stock: z.number().int().nonnegative(),
				category: z.string().nullable(),
			}),
		),
		customers: z.array(
			z.object({
				fullName: z.string().min(1),
				email: z.string().email(),
				phone: z.string().nullable(),
				address: z.string().nullable(),
			}),
		),
		orders: z.array(
			z.object({
				customerEmail: z.string().email(),
				orderDate: z.string().datetime(),
				status: z.enum(ORDER_STATUSES),
				items: z
					.array(z.object({ product: z.string(), quantity: z.number().int().positive() }))
					.min(1),
			}),
		),
	})
	.superRefine((seed, ctx) => {
		const products = new Set(seed.products.map((product) => product.name));
		const customers = new Set(seed.customers.map((customer) => customer.email));
		seed.orders.forEach((order, i) => {
			if (!customers.has(order.customerEmail)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["orders", i, "customerEmail"],
					message: `unknown customer ${order.customerEmail}`,
				});
			}
			order.items.forEach((item, j) => {
				if (!products.has(item.product)) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						path: ["orders", i, "items", j, "product"],
						message: `unknown product ${item.product}`,
					});
				}
			});
		});
	});

export type SeedData = z.infer<typeof SeedSchema>;

export const SEED_PATH = new URL("./seed.json", import.meta.url);

/**
 * Validates seed data.
 *
 * @throws {ConfigError} Listing every problem as `path: message`.
 */
export function parseSeedData(input: unknown): SeedData {
	const result = SeedSchema.safeParse(input);
	if (!result.success) {
		throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
	}
	return result.data;
}

export function loadSeedData(path: URL | string = SEED_PATH): SeedData {
	return parseSeedData(JSON.parse(readFileSync(path, "utf-8")));
}

//
// Schema.
//

const INDEXES = [
	["idx_products_category", "products", "category"],
	["idx_products_name", "products", "name"],
	["idx_customers_email", "customers", "email"],
	["idx_orders_customer_id", "orders", "customer_id"],
	["idx_orders_order_date", "orders", "order_date"],
	["idx_order_items_order_id", "order_items", "order_id"],
	["idx_order_items_product_id", "order_items", "product_id"],
] as const;

async function createSchema(db: Kysely<StorefrontDB>, dialect: Dialect): Promise<void> {
	const idType: ColumnDataType = dialect === "postgres" ? "serial" : "integer";
	const primaryId = (col: ColumnDefinitionBuilder) =>
		dialect === "postgres" ? col.primaryKey() : col.primaryKey().autoIncrement();

	await db.schema
		.createTable("products")
		.ifNotExists()
		.addColumn("id", idType, primaryId)
		.addColumn("name", "varchar(200)", (col) => col.notNull())
		.addColumn("description", "varchar(1000)")
		.addColumn("price", "numeric(18, 2)", (col) => col.notNull())
		.addColumn("stock", "integer", (col) => col.notNull().defaultTo(0))
		.addColumn("category", "varchar(100)")
		.addColumn("created_at", "text", (col) => col.notNull())
		.addColumn("updated_at", "text")
		.execute();

	await db.schema
		.createTable("customers")
		.ifNotExists()
		.addColumn("customer_id", idType, primaryId)
		.addColumn("full_name", "varchar(200)", (col) => col.notNull())
		.addColumn("email", "varchar(200)", (col) => col.notNull().unique())
		.addColumn("phone", "varchar(50)")
		.addColumn("address", "varchar(500)")
		.addColumn("created_at", "text", (col) => col.notNull())
		.execute();

	await db.schema
		.createTable("orders")
		.ifNotExists()
		.addColumn("order_id", idType, primaryId)
		.addColumn("customer_id", "integer", (col) => col.notNull().references("customers.customer_id"))
		.addColumn("order_date", "text", (col) => col.notNull())
		.addColumn("total_amount", "numeric(18, 2)", (col) => col.notNull())
		.addColumn("status", "varchar(50)", (col) => col.notNull())
		.execute();

	await db.schema
		.createTable("order_items")
		.ifNotExists()
		.addColumn("order_item_id", idType, primaryId)
		.addColumn("order_id", "integer", (col) => col.notNull().references("orders.order_id"))
		.addColumn("product_id", "integer", (col) => col.notNull().references("products.id"))
		.addColumn("quantity", "integer", (col) => col.notNull())
		.addColumn("unit_price", "numeric(18, 2)", (col) => col.notNull())
		.addColumn("total_price", "numeric(18, 2)", (col) => col.notNull())
		.execute();

	for (const [name, table, column] of INDEXES) {
		await db.schema.createIndex(name).ifNotExists().on(table).column(column).execute();
	}
}

function idOf(ids: ReadonlyMap<string, number>, key: string): number {
	const id = ids.get(key);
	if (id === undefined) {
		throw new UnexpectedCaseError(`Unknown seed reference: ${key}`);
	}
	return id;
}

async function insertSeed(trx: Transaction<StorefrontDB>, seed: SeedData, createdAt: string): Promise<void> {
	const productIds = new Map<string, number>();
	const prices = new Map<string, number>();
	for (const product of seed.products) {
		const { id } = await trx
			.insertInto("products")
			.values({ ...product, created_at: createdAt })
			.returning("id")
			.executeTakeFirstOrThrow();
		productIds.set(product.name, id);
		prices.set(product.name, product.price);
	}

	const customerIds = new Map<string, number>();
	for (const customer of seed.customers) {
		const { customer_id } = await trx
			.insertInto("customers")
			.values({
				full_name: customer.fullName,
				email: customer.email,
				phone: customer.phone,
				address: customer.address,
				created_at: createdAt,
			})
			.returning("customer_id")
			.executeTakeFirstOrThrow();
		customerIds.set(customer.email, customer_id);
	}

	for (const order of seed.orders) {
		const lines = order.items.map((item) => {
			const unitPrice = idOf(prices, item.product);
			return {
				product_id: idOf(productIds, item.product),
				quantity: item.quantity,
				unit_price: unitPrice,
				total_price: roundCents(item.quantity * unitPrice),
			};
		});

		const { order_id } = await trx
			.insertInto("orders")
			.values({
				customer_id: idOf(customerIds, order.customerEmail),
				order_date: order.orderDate,
				total_amount: roundCents(lines.reduce((sum, line) => sum + line.total_price, 0)),
				status: order.status,
			})
			.returning("order_id")
			.executeTakeFirstOrThrow();

		await trx
			.insertInto("order_items")
			.values(lines.map((line) => ({ ...line, order_id })))
			.execute();
	}
}

//
// Initialization.
//

export interface InitializeOptions {
	/**
	 * Seed demo data into an empty database (default: true).
	 */
	readonly seed?: boolean | undefined;
	readonly seedData?: SeedData | undefined;
	readonly logger?: Logger | undefined;
	readonly now?: (() => Date) | undefined;
}

export interface InitializeResult {
	readonly seeded: boolean;
}

/**
 * Creates the storefront tables and indexes when they are missing, then
 * seeds demo data when the products table is empty.  Safe to run on every
 * start.
 */
export async function initializeDatabase(
	factory: ConnectionFactory,
	options: InitializeOptions = {},
): Promise<InitializeResult> {
	const { seed = true, logger = silentLogger, now = () => new Date() } = options;

	await createSchema(factory.db, factory.dialect);
	logger.info({ dialect: factory.dialect }, "schema ready");

	if (!seed) {
		return { seeded: false };
	}

	const seedData = options.seedData ?? loadSeedData();
	return factory.withTransaction(async (trx) => {
		const { count } = await trx
			.selectFrom("products")
			.select((eb) => eb.fn.countAll().as("count"))
			.executeTakeFirstOrThrow();

		if (decodeValue(integer, count, "count") > 0) {
			logger.info("products table is not empty, skipping seed");
			return { seeded: false };
		}

		await insertSeed(trx, seedData, now().toISOString());
		logger.info(
			{
				products: seedData.products.length,
				customers: seedData.customers.length,
				orders: seedData.orders.length,
			},
			"seeded demo data",
		);
		return { seeded: true };
	});
}
