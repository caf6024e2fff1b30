import { z } from "zod";

import { createAggregator, isPresentKey } from "../aggregator.ts";
import { type ConnectionFactory } from "../connection-factory.ts";
import {
	type NewOrder,
	type Order,
	type OrderItem,
	type OrderStatus,
	type OrderWithDetails,
	type OrderWithItems,
	ORDER_STATUSES,
} from "../entities.ts";
import {
	decodePrefixed,
	decodeWith,
	type Decoder,
	integer,
	nullableText,
	numeric,
	rawRow,
	type RawRow,
	timestamp,
} from "../helpers/decode.ts";
import { roundCents } from "../helpers/utils.ts";
import { type QueryOptions } from "../row-source.ts";
import { TransactionalWriter, type WriteOptions } from "../transactional-writer.ts";
import { decodeCustomer } from "./customer-repository.ts";
import { Repository, type RepositoryOptions, requireGeneratedId } from "./repository.ts";

const decodeOrder: Decoder<Order> = decodeWith(
	z.object({
		orderId: integer,
		customerId: integer,
		orderDate: timestamp,
		totalAmount: numeric,
		status: z.enum(ORDER_STATUSES),
	}),
);

const decodeOrderItem: Decoder<OrderItem> = decodeWith(
	z.object({
		orderItemId: integer,
		orderId: integer,
		productId: integer,
		productName: nullableText,
		quantity: integer,
		unitPrice: numeric,
		totalPrice: numeric,
	}),
);

const SELECT_ORDER = `
	SELECT order_id AS "orderId", customer_id AS "customerId", order_date AS "orderDate",
	       total_amount AS "totalAmount", status
	FROM orders`;

// Joined entities are marked by a `prefix$$` on their columns.  The
// aggregator groups on "orderId"; "customer$$customerId" and
// "items$$orderItemId" tell real entities apart from outer-join padding.
const SELECT_ORDER_DETAILS = `
	SELECT o.order_id AS "orderId", o.customer_id AS "customerId", o.order_date AS "orderDate",
	       o.total_amount AS "totalAmount", o.status AS "status",
	       c.customer_id AS "customer$$customerId", c.full_name AS "customer$$fullName",
	       c.email AS "customer$$email", c.phone AS "customer$$phone",
	       c.address AS "customer$$address", c.created_at AS "customer$$createdAt",
	       oi.order_item_id AS "items$$orderItemId", oi.order_id AS "items$$orderId",
	       oi.product_id AS "items$$productId", p.name AS "items$$productName",
	       oi.quantity AS "items$$quantity", oi.unit_price AS "items$$unitPrice",
	       oi.total_price AS "items$$totalPrice"
	FROM orders o
	LEFT JOIN customers c ON c.customer_id = o.customer_id
	LEFT JOIN order_items oi ON oi.order_id = o.order_id
	LEFT JOIN products p ON p.id = oi.product_id`;

const orderDetails = createAggregator({
	key: (row: RawRow) => row.orderId,
	parent: decodeOrder,
})
	.hasOne("customer", decodePrefixed("customer", decodeCustomer), (row) =>
		isPresentKey(row["customer$$customerId"]),
	)
	.hasMany("items", decodePrefixed("items", decodeOrderItem), (row) => isPresentKey(row["items$$orderItemId"]));

export class OrderRepository extends Repository {
	readonly #writer: TransactionalWriter;

	constructor(factory: ConnectionFactory, options: RepositoryOptions = {}) {
		super(factory, options);
		this.#writer = new TransactionalWriter(factory, this.logger);
	}

	getById(orderId: number): Promise<Order | undefined> {
		return this.rows.queryFirst(`${SELECT_ORDER} WHERE order_id = @OrderId`, { OrderId: orderId }, decodeOrder);
	}

	/**
	 * The order with its customer and its items (in item id order).
	 */
	async getByIdWithDetails(
		orderId: number,
		options: QueryOptions = {},
	): Promise<OrderWithDetails | undefined> {
		const rows = await this.rows.query(
			`${SELECT_ORDER_DETAILS} WHERE o.order_id = @OrderId ORDER BY oi.order_item_id`,
			{ OrderId: orderId },
			rawRow,
			options,
		);
		const [order] = await orderDetails.aggregate(rows, { signal: options.signal, logger: this.logger });
		return order;
	}

	/**
	 * Every order with its customer and items, newest first.
	 */
	async getAllWithDetails(options: QueryOptions = {}): Promise<OrderWithDetails[]> {
		const rows = await this.rows.query(
			`${SELECT_ORDER_DETAILS} ORDER BY o.order_date DESC, o.order_id, oi.order_item_id`,
			{},
			rawRow,
			options,
		);
		return orderDetails.aggregate(rows, { signal: options.signal, logger: this.logger });
	}

	getByCustomerId(customerId: number): Promise<Order[]> {
		return this.rows.query(
			`${SELECT_ORDER} WHERE customer_id = @CustomerId ORDER BY order_date DESC, order_id`,
			{ CustomerId: customerId },
			decodeOrder,
		);
	}

	getAll(): Promise<Order[]> {
		return this.rows.query(`${SELECT_ORDER} ORDER BY order_date DESC, order_id`, {}, decodeOrder);
	}

	/**
	 * Inserts the order and its items in one transaction.  Item totals are
	 * `quantity * unitPrice`; the order total is their sum.
	 *
	 * @throws {TransactionError} After rolling back.  A missing customer or
	 *   product shows up as a `ForeignKeyError` cause.
	 */
	create(order: NewOrder, options: WriteOptions = {}): Promise<OrderWithItems> {
		const orderDate = this.now();
		const status: OrderStatus = order.status ?? "Pending";
		const lines = order.items.map((item) => ({
			...item,
			totalPrice: roundCents(item.quantity * item.unitPrice),
		}));
		const totalAmount = roundCents(lines.reduce((sum, line) => sum + line.totalPrice, 0));

		return this.#writer.run(async (scope) => {
			const inserted = await scope.execute(
				`INSERT INTO orders (customer_id, order_date, total_amount, status)
				 VALUES (@CustomerId, @OrderDate, @TotalAmount, @Status)
				 RETURNING order_id`,
				{
					CustomerId: order.customerId,
					OrderDate: orderDate.toISOString(),
					TotalAmount: totalAmount,
					Status: status,
				},
			);
			const orderId = requireGeneratedId(inserted, "orders");

			const items: OrderItem[] = [];
			for (const line of lines) {
				const result = await scope.execute(
					`INSERT INTO order_items (order_id, product_id, quantity, unit_price, total_price)
					 VALUES (@OrderId, @ProductId, @Quantity, @UnitPrice, @TotalPrice)
					 RETURNING order_item_id`,
					{
						OrderId: orderId,
						ProductId: line.productId,
						Quantity: line.quantity,
						UnitPrice: line.unitPrice,
						TotalPrice: line.totalPrice,
					},
				);
				items.push({
					orderItemId: requireGeneratedId(result, "order_items"),
					orderId,
					productId: line.productId,
					productName: null,
					quantity: line.quantity,
					unitPrice: line.unitPrice,
					totalPrice: line.totalPrice,
				});
			}

			this.logger.debug({ orderId, items: items.length }, "order created");
			return { orderId, customerId: order.customerId, orderDate, totalAmount, status, items };
		}, options);
	}

	/**
	 * @returns Whether an order with that id existed.
	 */
	async updateStatus(orderId: number, status: OrderStatus): Promise<boolean> {
		const result = await this.rows.execute("UPDATE orders SET status = @Status WHERE order_id = @OrderId", {
			OrderId: orderId,
			Status: status,
		});
		return result.affectedRows > 0;
	}
}
