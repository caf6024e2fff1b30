import { type Generated } from "kysely";

// Timestamps are ISO-8601 text in both dialects.

export interface ProductsTable {
	id: Generated<number>;
	name: string;
	description: string | null;
	price: number;
	stock: Generated<number>;
	category: string | null;
	created_at: string;
	updated_at: string | null;
}

export interface CustomersTable {
	customer_id: Generated<number>;
	full_name: string;
	email: string;
	phone: string | null;
	address: string | null;
	created_at: string;
}

export interface OrdersTable {
	order_id: Generated<number>;
	customer_id: number;
	order_date: string;
	total_amount: number;
	status: string;
}

export interface OrderItemsTable {
	order_item_id: Generated<number>;
	order_id: number;
	product_id: number;
	quantity: number;
	unit_price: number;
	total_price: number;
}

// Kysely Database interface
export interface StorefrontDB {
	products: ProductsTable;
	customers: CustomersTable;
	orders: OrdersTable;
	order_items: OrderItemsTable;
}
