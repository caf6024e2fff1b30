import type { Logger } from "pino";

import { AggregationError } from "./helpers/errors.ts";
import { enumerate, type Extend } from "./helpers/utils.ts";

/**
 * The values accepted as a parent identifier.
 */
export type ParentKey = string | number | bigint;

/**
 * Decides whether the child (or related) portion of a flattened row holds a
 * real entity, as opposed to the null padding an outer join produces.
 */
export type PresenceFn<Row> = (row: Row) => boolean;

/**
 * Options for a single aggregation call.
 */
export interface AggregateOptions {
	/**
	 * Checked before each row is consumed.  When aborted, aggregation stops and
	 * the returned promise rejects with the signal's reason.
	 */
	readonly signal?: AbortSignal | undefined;
	/**
	 * Receives a debug summary once all rows are consumed.
	 */
	readonly logger?: Logger | undefined;
}

/**
 * The standard presence predicate for an outer-joined key column: `null`,
 * `undefined` and zero all mean "no entity on this row".
 */
export function isPresentKey(value: unknown): boolean {
	return value !== null && value !== undefined && value !== 0 && value !== 0n;
}

/**
 * A named slot on the parent entity, filled from the same flattened rows.
 */
interface Slot<Row> {
	/**
	 * "one" for a related entity taken from the parent's first row, "many" for
	 * a child collection that grows with every row.
	 */
	readonly mode: "one" | "many";
	readonly extract: (row: Row) => unknown;
	/**
	 * When omitted, every row is treated as carrying the entity.
	 */
	readonly isPresent?: PresenceFn<Row> | undefined;
}

/**
 * Internal configuration for an Aggregator.
 */
interface AggregatorProps<Row> {
	/**
	 * Extracts the parent identifier used to group rows.
	 */
	readonly key: (row: Row) => unknown;
	/**
	 * Extracts the parent's own fields.  Called once per distinct parent.
	 */
	readonly parent: (row: Row) => object;
	readonly slots: ReadonlyMap<string, Slot<Row>>;
}

/**
 * Per-parent state held only while one aggregation call runs.
 */
interface Group<Row> {
	readonly entity: Record<string, unknown>;
	readonly collections: readonly Collection<Row>[];
}

interface Collection<Row> {
	readonly slot: Slot<Row>;
	readonly children: unknown[];
}

export type { Aggregator };
/**
 * A configuration for rebuilding parent entities, with their related entities
 * and child collections, from the flattened rows of a join.
 *
 * Instances are immutable: every configuration method returns a new
 * Aggregator, so a configured instance may be shared and reused across calls.
 *
 * @template Row - The type of one flattened row.
 * @template Output - The type of one aggregated parent entity.
 */
class Aggregator<Row, Output> {
	#props: AggregatorProps<Row>;

	constructor(props: AggregatorProps<Row>) {
		this.#props = props;
	}

	//
	// Configuration.
	//

	/**
	 * Attaches a related entity (one-to-one) under `key`.  It is extracted once,
	 * from the first row of each parent, even though it repeats on every row.
	 *
	 * @param key - The property name on the parent.
	 * @param extract - Builds the related entity from a row.
	 * @param isPresent - When given and false for the parent's first row, the
	 *   slot is `null`.
	 */
	hasOne<K extends string, Related>(
		key: K,
		extract: (row: Row) => Related,
	): Aggregator<Row, Extend<Output, { [_ in K]: Related }>>;
	hasOne<K extends string, Related>(
		key: K,
		extract: (row: Row) => Related,
		isPresent: PresenceFn<Row>,
	): Aggregator<Row, Extend<Output, { [_ in K]: Related | null }>>;
	hasOne<K extends string, Related>(
		key: K,
		extract: (row: Row) => Related,
		isPresent?: PresenceFn<Row>,
	): Aggregator<Row, Extend<Output, { [_ in K]: Related | null }>> {
		return new Aggregator({
			...this.#props,
			slots: new Map(this.#props.slots).set(key, { mode: "one", extract, isPresent }),
		});
	}

	/**
	 * Attaches a child collection under `key`.  Every row whose presence
	 * predicate holds contributes one child, in row order.
	 *
	 * @param key - The property name on the parent.
	 * @param extract - Builds one child from a row.
	 * @param isPresent - Distinguishes a real child from outer-join padding;
	 *   usually `(row) => isPresentKey(row.childId)`.
	 */
	hasMany<K extends string, Child>(
		key: K,
		extract: (row: Row) => Child,
		isPresent: PresenceFn<Row>,
	): Aggregator<Row, Extend<Output, { [_ in K]: Child[] }>> {
		return new Aggregator({
			...this.#props,
			slots: new Map(this.#props.slots).set(key, { mode: "many", extract, isPresent }),
		});
	}

	//
	// Aggregation.
	//

	#keyOf(row: Row, rowIndex: number): ParentKey {
		const key = this.#props.key(row);
		switch (typeof key) {
			case "string":
			case "number":
			case "bigint":
				return key;
			case "undefined":
				return missingKey(rowIndex, "undefined");
			case "object":
				return key === null ? missingKey(rowIndex, "null") : unsupportedKey(rowIndex, "object");
			default:
				return unsupportedKey(rowIndex, typeof key);
		}
	}

	#openGroup(row: Row): Group<Row> {
		const entity: Record<string, unknown> = {};
		for (const [field, value] of Object.entries(this.#props.parent(row))) {
			entity[field] = value;
		}

		const collections: Collection<Row>[] = [];
		for (const [key, slot] of this.#props.slots) {
			if (slot.mode === "many") {
				const children: unknown[] = [];
				collections.push({ slot, children });
				entity[key] = children;
			} else {
				const present = slot.isPresent?.(row) ?? true;
				entity[key] = present ? slot.extract(row) : null;
			}
		}

		return { entity, collections };
	}

	#collect(group: Group<Row>, row: Row): void {
		for (const { slot, children } of group.collections) {
			if (slot.isPresent?.(row) ?? true) {
				children.push(slot.extract(row));
			}
		}
	}

	/**
	 * Consumes the rows once and returns one entity per distinct parent key, in
	 * the order the keys were first seen.
	 *
	 * @param rows - A sync or async iterable of flattened rows.
	 * @throws {AggregationError} If a row has no usable parent key.
	 */
	async aggregate(
		rows: Iterable<Row> | AsyncIterable<Row>,
		options: AggregateOptions = {},
	): Promise<Output[]> {
		const { signal, logger } = options;
		const groups = new Map<ParentKey, Group<Row>>();
		let rowCount = 0;

		signal?.throwIfAborted();
		for await (const [rowIndex, row] of enumerate(rows)) {
			signal?.throwIfAborted();
			rowCount = rowIndex + 1;

			const key = this.#keyOf(row, rowIndex);
			let group = groups.get(key);
			if (!group) {
				group = this.#openGroup(row);
				groups.set(key, group);
			}
			this.#collect(group, row);
		}

		logger?.debug({ rows: rowCount, parents: groups.size }, "aggregated flattened rows");

		const result: Output[] = [];
		for (const { entity } of groups.values()) {
			result.push(entity as Output);
		}
		return result;
	}
}

function missingKey(rowIndex: number, value: string): never {
	throw new AggregationError(rowIndex, `parent key is ${value}`);
}

function unsupportedKey(rowIndex: number, type: string): never {
	throw new AggregationError(rowIndex, `parent key has unsupported type ${type}`);
}

/**
 * Creates a new Aggregator.  Add related entities with `hasOne()` and child
 * collections with `hasMany()`, then call `aggregate()`.
 *
 * ```ts
 * const orders = createAggregator({
 *   key: (row: OrderRow) => row.orderId,
 *   parent: (row) => ({ orderId: row.orderId, status: row.status }),
 * })
 *   .hasOne("customer", (row) => ({ customerId: row.customerId }))
 *   .hasMany("items", (row) => ({ itemId: row.itemId }), (row) => isPresentKey(row.itemId));
 * ```
 */
export function createAggregator<Row, Parent extends object>(config: {
	readonly key: (row: Row) => unknown;
	readonly parent: (row: Row) => Parent;
}): Aggregator<Row, Parent> {
	return new Aggregator<Row, Parent>({ key: config.key, parent: config.parent, slots: new Map() });
}

/**
 * The result of {@link aggregate}: the parent's fields plus `related` and
 * `children`.
 */
export type Aggregate<Parent, Related, Child> = Extend<
	Extend<Parent, { related: Related }>,
	{ children: Child[] }
>;

/**
 * The extraction functions for {@link aggregate}.
 */
export interface AggregateConfig<Row, Parent extends object, Related, Child> {
	readonly parentKey: (row: Row) => unknown;
	readonly parent: (row: Row) => Parent;
	readonly related: (row: Row) => Related;
	readonly child: (row: Row) => Child;
	readonly childIsPresent: PresenceFn<Row>;
}

/**
 * Rebuilds parents, each with one related entity and one child collection,
 * from a flattened row sequence.
 */
export function aggregate<Row, Parent extends object, Related, Child>(
	rows: Iterable<Row> | AsyncIterable<Row>,
	config: AggregateConfig<Row, Parent, Related, Child>,
	options?: AggregateOptions,
): Promise<Aggregate<Parent, Related, Child>[]> {
	return createAggregator({ key: config.parentKey, parent: config.parent })
		.hasOne("related", config.related)
		.hasMany("children", config.child, config.childIsPresent)
		.aggregate(rows, options);
}
