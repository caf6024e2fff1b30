export const ORDER_STATUSES = ["Pending", "Processing", "Shipped", "Completed", "Cancelled"] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface Product {
	id: number;
	name: string;
	description: string | null;
	price: number;
	stock: number;
	category: string | null;
	createdAt: Date;
	updatedAt: Date | null;
}

export interface NewProduct {
	name: string;
	description?: string | null | undefined;
	price: number;
	/** Defaults to 0. */
	stock?: number | undefined;
	category?: string | null | undefined;
}

export type ProductChanges = Omit<Product, "createdAt" | "updatedAt">;

export interface Customer {
	customerId: number;
	fullName: string;
	email: string;
	phone: string | null;
	address: string | null;
	createdAt: Date;
}

export interface NewCustomer {
	fullName: string;
	email: string;
	phone?: string | null | undefined;
	address?: string | null | undefined;
}

export type CustomerChanges = Omit<Customer, "createdAt">;

export interface Order {
	orderId: number;
	customerId: number;
	orderDate: Date;
	totalAmount: number;
	status: OrderStatus;
}

export interface OrderItem {
	orderItemId: number;
	orderId: number;
	productId: number;
	/**
	 * Filled in by joined reads; `null` on freshly created items.
	 */
	productName: string | null;
	quantity: number;
	unitPrice: number;
	totalPrice: number;
}

export interface OrderWithDetails extends Order {
	customer: Customer | null;
	items: OrderItem[];
}

export interface OrderWithItems extends Order {
	items: OrderItem[];
}

export interface NewOrderItem {
	productId: number;
	quantity: number;
	unitPrice: number;
}

export interface NewOrder {
	customerId: number;
	/** Defaults to "Pending". */
	status?: OrderStatus | undefined;
	items: readonly NewOrderItem[];
}
