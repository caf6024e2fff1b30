import { type Customer, type Product } from "../entities.ts";

// Rows of fixture.sql, as the repositories decode them.

export const deskLamp: Product = {
	id: 1,
	name: "Desk Lamp",
	description: "Adjustable arm, warm light",
	price: 24.5,
	stock: 10,
	category: "Lighting",
	createdAt: new Date("2024-01-05T10:00:00.000Z"),
	updatedAt: null,
};

export const floorLamp: Product = {
	id: 2,
	name: "Floor Lamp",
	description: null,
	price: 60,
	stock: 3,
	category: "Lighting",
	createdAt: new Date("2024-01-06T10:00:00.000Z"),
	updatedAt: new Date("2024-02-01T08:30:00.000Z"),
};

export const mira: Customer = {
	customerId: 1,
	fullName: "Mira Lund",
	email: "mira@example.com",
	phone: "555-0101",
	address: "12 Birch Lane",
	createdAt: new Date("2024-02-01T09:00:00.000Z"),
};

export const tomas: Customer = {
	customerId: 2,
	fullName: "Tomas Quill",
	email: "tomas@example.com",
	phone: null,
	address: "48 Harbor Road",
	createdAt: new Date("2024-02-02T09:00:00.000Z"),
};

export const nadia: Customer = {
	customerId: 3,
	fullName: "Nadia Osei",
	email: "nadia@example.com",
	phone: "555-0103",
	address: null,
	createdAt: new Date("2024-02-03T09:00:00.000Z"),
};

export const fixtureCounts = {
	products: 5,
	customers: 3,
	orders: 3,
	orderItems: 3,
} as const;
