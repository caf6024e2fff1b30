import { z } from "zod";

import { type NewProduct, type Product, type ProductChanges } from "../entities.ts";
import {
	decodeValue,
	decodeWith,
	type Decoder,
	integer,
	nullableText,
	nullableTimestamp,
	numeric,
	text,
	timestamp,
} from "../helpers/decode.ts";
import { Repository, requireGeneratedId } from "./repository.ts";

const decodeProduct: Decoder<Product> = decodeWith(
	z.object({
		id: integer,
		name: text,
		description: nullableText,
		price: numeric,
		stock: integer,
		category: nullableText,
		createdAt: timestamp,
		updatedAt: nullableTimestamp,
	}),
);

const SELECT_PRODUCT = `
	SELECT id, name, description, price, stock, category,
	       created_at AS "createdAt", updated_at AS "updatedAt"
	FROM products`;

/**
 * Escapes LIKE wildcards so `term` matches literally with `ESCAPE '\'`.
 */
export function escapeLike(term: string): string {
	return term.replace(/[\\%_]/g, "\\$&");
}

export class ProductRepository extends Repository {
	getById(id: number): Promise<Product | undefined> {
		return this.rows.queryFirst(`${SELECT_PRODUCT} WHERE id = @Id`, { Id: id }, decodeProduct);
	}

	getAll(): Promise<Product[]> {
		return this.rows.query(`${SELECT_PRODUCT} ORDER BY name, id`, {}, decodeProduct);
	}

	getByCategory(category: string): Promise<Product[]> {
		return this.rows.query(
			`${SELECT_PRODUCT} WHERE category = @Category ORDER BY name, id`,
			{ Category: category },
			decodeProduct,
		);
	}

	/**
	 * Case-insensitive substring search on name and description.  Wildcard
	 * characters in `term` match themselves.
	 */
	searchByName(term: string): Promise<Product[]> {
		return this.rows.query(
			`${SELECT_PRODUCT}
			 WHERE LOWER(name) LIKE LOWER(@Pattern) ESCAPE '\\'
			    OR LOWER(description) LIKE LOWER(@Pattern) ESCAPE '\\'
			 ORDER BY name, id`,
			{ Pattern: `%${escapeLike(term)}%` },
			decodeProduct,
		);
	}

	async create(product: NewProduct): Promise<Product> {
		const createdAt = this.now();
		const created = {
			name: product.name,
			description: product.description ?? null,
			price: product.price,
			stock: product.stock ?? 0,
			category: product.category ?? null,
		};

		const result = await this.rows.execute(
			`INSERT INTO products (name, description, price, stock, category, created_at)
			 VALUES (@Name, @Description, @Price, @Stock, @Category, @CreatedAt)
			 RETURNING id`,
			{
				Name: created.name,
				Description: created.description,
				Price: created.price,
				Stock: created.stock,
				Category: created.category,
				CreatedAt: createdAt.toISOString(),
			},
		);

		const id = requireGeneratedId(result, "products");
		this.logger.debug({ productId: id }, "product created");
		return { id, ...created, createdAt, updatedAt: null };
	}

	/**
	 * Overwrites the product's fields and stamps `updatedAt`.
	 *
	 * @returns Whether a product with that id existed.
	 */
	async update(product: ProductChanges): Promise<boolean> {
		const result = await this.rows.execute(
			`UPDATE products
			 SET name = @Name, description = @Description, price = @Price, stock = @Stock,
			     category = @Category, updated_at = @UpdatedAt
			 WHERE id = @Id`,
			{
				Id: product.id,
				Name: product.name,
				Description: product.description,
				Price: product.price,
				Stock: product.stock,
				Category: product.category,
				UpdatedAt: this.now().toISOString(),
			},
		);
		return result.affectedRows > 0;
	}

	/**
	 * @throws {ForeignKeyError} If an order item still references the product.
	 */
	async delete(id: number): Promise<boolean> {
		const result = await this.rows.execute("DELETE FROM products WHERE id = @Id", { Id: id });
		return result.affectedRows > 0;
	}

	async getTotalCount(): Promise<number> {
		return decodeValue(integer, await this.rows.scalar("SELECT COUNT(*) FROM products", {}), "count");
	}
}
