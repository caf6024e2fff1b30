import { z } from "zod";

import { RowDecodeError } from "./errors.ts";

/**
 * One result row as the driver returns it.
 */
export type RawRow = Readonly<Record<string, unknown>>;

/**
 * Turns a raw row into a typed value, or throws {@link RowDecodeError}.
 */
export type Decoder<Row> = (raw: RawRow) => Row;

/**
 * The identity decoder, for rows that are decoded piecewise later on.
 */
export const rawRow: Decoder<RawRow> = (raw) => raw;

function describeIssues(error: z.ZodError): { columns: string[]; detail: string } {
	const columns = [...new Set(error.issues.map((issue) => issue.path.join(".")))];
	const detail = error.issues.map((issue) => `${issue.path.join(".") || "(row)"}: ${issue.message}`).join("; ");
	return { columns, detail };
}

/**
 * Builds a row decoder from a zod schema.  Columns the schema does not name
 * are dropped.
 */
export function decodeWith<Schema extends z.ZodTypeAny>(schema: Schema): Decoder<z.output<Schema>> {
	return (raw) => {
		const result = schema.safeParse(raw);
		if (!result.success) {
			const { columns, detail } = describeIssues(result.error);
			throw new RowDecodeError(columns, `Row does not match the expected shape: ${detail}`, {
				cause: result.error,
			});
		}
		return result.data;
	};
}

/**
 * Decodes a single value, such as the result of a scalar query.
 */
export function decodeValue<Schema extends z.ZodTypeAny>(
	schema: Schema,
	value: unknown,
	column = "value",
): z.output<Schema> {
	const result = schema.safeParse(value);
	if (!result.success) {
		const detail = result.error.issues.map((issue) => issue.message).join("; ");
		throw new RowDecodeError([column], `Column ${column} does not match the expected type: ${detail}`, {
			cause: result.error,
		});
	}
	return result.data;
}

/**
 * Decodes the columns of one joined entity.  The entity's columns carry
 * `prefix$$` in front of their names; the prefix is stripped before `decode`
 * sees them.
 */
export function decodePrefixed<Row>(prefix: string, decode: Decoder<Row>): Decoder<Row> {
	const marker = `${prefix}$$`;
	return (raw) => {
		const columns: Record<string, unknown> = {};
		for (const [name, value] of Object.entries(raw)) {
			if (name.startsWith(marker)) {
				columns[name.slice(marker.length)] = value;
			}
		}
		try {
			return decode(columns);
		} catch (error) {
			if (error instanceof RowDecodeError) {
				throw new RowDecodeError(
					error.columns.map((column) => `${marker}${column}`),
					error.message,
					{ cause: error.cause },
				);
			}
			throw error;
		}
	};
}

//
// Column types.
//

const numberLike = z
	.union([z.number(), z.bigint(), z.string().regex(/^-?\d+(\.\d+)?$/, "Expected a numeric string")])
	.transform(Number);

/**
 * An integer column.  pg returns `bigint` columns and counts as strings;
 * values outside the safe integer range are rejected rather than rounded.
 */
export const integer = numberLike.pipe(z.number().int().safe());

export const nullableInteger = integer.nullable();

/**
 * A decimal column.  pg returns `numeric` as a string.
 */
export const numeric = numberLike.pipe(z.number().finite());

export const text = z.string();

export const nullableText = z.string().nullable();

/**
 * An ISO-8601 text column (or a native timestamp) decoded to a `Date`.
 */
export const timestamp = z
	.union([z.date(), z.string()])
	.transform((value) => (value instanceof Date ? value : new Date(value)))
	.pipe(z.date());

export const nullableTimestamp = timestamp.nullable();
