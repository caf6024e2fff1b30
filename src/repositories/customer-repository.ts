import { z } from "zod";

import { type Customer, type CustomerChanges, type NewCustomer } from "../entities.ts";
import { decodeWith, type Decoder, integer, nullableText, text, timestamp } from "../helpers/decode.ts";
import { Repository, requireGeneratedId } from "./repository.ts";

export const decodeCustomer: Decoder<Customer> = decodeWith(
	z.object({
		customerId: integer,
		fullName: text,
		email: text,
		phone: nullableText,
		address: nullableText,
		createdAt: timestamp,
	}),
);

const SELECT_CUSTOMER = `
	SELECT customer_id AS "customerId", full_name AS "fullName", email, phone, address,
	       created_at AS "createdAt"
	FROM customers`;

export class CustomerRepository extends Repository {
	getById(customerId: number): Promise<Customer | undefined> {
		return this.rows.queryFirst(
			`${SELECT_CUSTOMER} WHERE customer_id = @CustomerId`,
			{ CustomerId: customerId },
			decodeCustomer,
		);
	}

	getAll(): Promise<Customer[]> {
		return this.rows.query(`${SELECT_CUSTOMER} ORDER BY full_name, customer_id`, {}, decodeCustomer);
	}

	getByEmail(email: string): Promise<Customer | undefined> {
		return this.rows.queryFirst(`${SELECT_CUSTOMER} WHERE email = @Email`, { Email: email }, decodeCustomer);
	}

	/**
	 * @throws {UniqueConstraintError} If the email is already registered.
	 */
	async create(customer: NewCustomer): Promise<Customer> {
		const createdAt = this.now();
		const created = {
			fullName: customer.fullName,
			email: customer.email,
			phone: customer.phone ?? null,
			address: customer.address ?? null,
		};

		const result = await this.rows.execute(
			`INSERT INTO customers (full_name, email, phone, address, created_at)
			 VALUES (@FullName, @Email, @Phone, @Address, @CreatedAt)
			 RETURNING customer_id`,
			{
				FullName: created.fullName,
				Email: created.email,
				Phone: created.phone,
				Address: created.address,
				CreatedAt: createdAt.toISOString(),
			},
		);

		const customerId = requireGeneratedId(result, "customers");
		this.logger.debug({ customerId }, "customer created");
		return { customerId, ...created, createdAt };
	}

	/**
	 * @returns Whether a customer with that id existed.
	 * @throws {UniqueConstraintError} If the new email belongs to another customer.
	 */
	async update(customer: CustomerChanges): Promise<boolean> {
		const result = await this.rows.execute(
			`UPDATE customers
			 SET full_name = @FullName, email = @Email, phone = @Phone, address = @Address
			 WHERE customer_id = @CustomerId`,
			{
				CustomerId: customer.customerId,
				FullName: customer.fullName,
				Email: customer.email,
				Phone: customer.phone,
				Address: customer.address,
			},
		);
		return result.affectedRows > 0;
	}

	/**
	 * @throws {ForeignKeyError} If the customer still has orders.
	 */
	async delete(customerId: number): Promise<boolean> {
		const result = await this.rows.execute("DELETE FROM customers WHERE customer_id = @CustomerId", {
			CustomerId: customerId,
		});
		return result.affectedRows > 0;
	}
}
