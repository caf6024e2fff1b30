import assert from "node:assert/strict";
import { test } from "node:test";

import { aggregate, createAggregator, isPresentKey } from "./aggregator.ts";
import { AggregationError } from "./helpers/errors.ts";

// Test data types
interface OrderRow {
	orderId: number | null;
	status: string;
	customerId: number;
	customerName: string;
	itemId: number | null;
	sku: string | null;
}

function row(
	orderId: number | null,
	customerId: number,
	itemId: number | null,
	sku: string | null = itemId === null ? null : `SKU-${itemId}`,
): OrderRow {
	return { orderId, status: "Pending", customerId, customerName: `Customer ${customerId}`, itemId, sku };
}

const orderConfig = {
	parentKey: (r: OrderRow) => r.orderId,
	parent: (r: OrderRow) => ({ orderId: r.orderId, status: r.status }),
	related: (r: OrderRow) => ({ customerId: r.customerId, name: r.customerName }),
	child: (r: OrderRow) => ({ itemId: r.itemId, sku: r.sku }),
	childIsPresent: (r: OrderRow) => isPresentKey(r.itemId),
};

//
// aggregate()
//

test("aggregate: rebuilds parents with related entity and children", async () => {
	const rows = [row(1, 9, 101), row(1, 9, 102), row(2, 9, null)];

	const result = await aggregate(rows, orderConfig);

	assert.deepEqual(result, [
		{
			orderId: 1,
			status: "Pending",
			related: { customerId: 9, name: "Customer 9" },
			children: [
				{ itemId: 101, sku: "SKU-101" },
				{ itemId: 102, sku: "SKU-102" },
			],
		},
		{
			orderId: 2,
			status: "Pending",
			related: { customerId: 9, name: "Customer 9" },
			children: [],
		},
	]);
});

test("aggregate: empty input returns an empty collection", async () => {
	const result = await aggregate([], orderConfig);

	assert.deepEqual(result, []);
});

test("aggregate: returns exactly one parent per distinct key", async () => {
	const rows = [
		row(1, 1, 10),
		row(2, 1, 20),
		row(1, 1, 11),
		row(3, 2, null),
		row(2, 1, 21),
		row(1, 1, 12),
	];

	const result = await aggregate(rows, orderConfig);

	assert.equal(result.length, 3);
	assert.deepEqual(
		result.map((order) => order.orderId),
		[1, 2, 3],
	);
});

test("aggregate: a zero child key is treated as outer-join padding", async () => {
	const rows = [row(1, 9, 0, null), row(1, 9, 5)];

	const result = await aggregate(rows, orderConfig);

	assert.deepEqual(result[0]?.children, [{ itemId: 5, sku: "SKU-5" }]);
});

test("aggregate: rows failing the presence predicate never contribute children", async () => {
	const rows = [row(1, 9, null), row(2, 9, 0, null), row(2, 9, null), row(3, 9, 7)];

	const result = await aggregate(rows, orderConfig);

	const allChildren = result.flatMap((order) => order.children);
	assert.deepEqual(allChildren, [{ itemId: 7, sku: "SKU-7" }]);
	assert.deepEqual(
		result.map((order) => order.children.length),
		[0, 0, 1],
	);
});

test("aggregate: a parent with K children round-trips to exactly K children", async () => {
	for (const k of [0, 1, 2, 5]) {
		const rows =
			k === 0
				? [row(42, 1, null)]
				: Array.from({ length: k }, (_, i) => row(42, 1, 100 + i));

		const result = await aggregate(rows, orderConfig);

		assert.equal(result.length, 1);
		assert.equal(result[0]?.children.length, k);
	}
});

test("aggregate: re-aggregating the same rows gives structurally equal results", async () => {
	const rows = [row(2, 1, 20), row(1, 1, 10), row(2, 1, 21), row(3, 2, null)];

	const first = await aggregate(rows, orderConfig);
	const second = await aggregate(rows, orderConfig);

	assert.deepEqual(first, second);
	assert.notEqual(first[0], second[0]);
});

test("aggregate: related entity is taken from the parent's first row", async () => {
	let relatedCalls = 0;
	const rows = [row(1, 9, 101), row(1, 9, 102), row(1, 9, 103)];

	const result = await aggregate(rows, {
		...orderConfig,
		related: (r) => {
			relatedCalls++;
			return { customerId: r.customerId };
		},
	});

	assert.equal(relatedCalls, 1);
	assert.deepEqual(result[0]?.related, { customerId: 9 });
});

test("aggregate: parent fields are extracted once per parent", async () => {
	let parentCalls = 0;
	const rows = [row(1, 9, 101), row(1, 9, 102), row(2, 9, 201)];

	await aggregate(rows, {
		...orderConfig,
		parent: (r) => {
			parentCalls++;
			return { orderId: r.orderId };
		},
	});

	assert.equal(parentCalls, 2);
});

test("aggregate: accepts an async iterable of rows", async () => {
	async function* stream() {
		yield row(1, 9, 101);
		yield row(2, 9, null);
		yield row(1, 9, 102);
	}

	const result = await aggregate(stream(), orderConfig);

	assert.deepEqual(
		result.map((order) => [order.orderId, order.children.map((child) => child.itemId)]),
		[
			[1, [101, 102]],
			[2, []],
		],
	);
});

test("aggregate: accepts string and bigint parent keys", async () => {
	const rows = [
		{ key: "a", n: 1 },
		{ key: "b", n: 2 },
		{ key: "a", n: 3 },
	];

	const byString = await aggregate(rows, {
		parentKey: (r) => r.key,
		parent: (r) => ({ key: r.key }),
		related: () => null,
		child: (r) => r.n,
		childIsPresent: () => true,
	});

	assert.deepEqual(byString, [
		{ key: "a", related: null, children: [1, 3] },
		{ key: "b", related: null, children: [2] },
	]);

	const byBigint = await aggregate([{ id: 7n }, { id: 7n }], {
		parentKey: (r) => r.id,
		parent: (r) => ({ id: r.id }),
		related: () => null,
		child: () => "x",
		childIsPresent: () => true,
	});

	assert.deepEqual(byBigint, [{ id: 7n, related: null, children: ["x", "x"] }]);
});

//
// Errors
//

test("aggregate: a null parent key fails with AggregationError", async () => {
	const rows = [row(1, 9, 101), row(null, 9, 102)];

	await assert.rejects(
		() => aggregate(rows, orderConfig),
		(error: unknown) => {
			assert.ok(error instanceof AggregationError);
			assert.equal(error.rowIndex, 1);
			assert.equal(error.message, "Row 1: parent key is null");
			return true;
		},
	);
});

test("aggregate: an undefined parent key fails with AggregationError", async () => {
	const rows: { id?: number }[] = [{}];

	await assert.rejects(
		() =>
			aggregate(rows, {
				parentKey: (r) => r.id,
				parent: (r) => ({ id: r.id }),
				related: () => null,
				child: () => null,
				childIsPresent: () => false,
			}),
		(error: unknown) => {
			assert.ok(error instanceof AggregationError);
			assert.equal(error.message, "Row 0: parent key is undefined");
			return true;
		},
	);
});

test("aggregate: an object parent key fails with AggregationError", async () => {
	await assert.rejects(
		() =>
			aggregate([{ id: { nested: 1 } }], {
				parentKey: (r) => r.id,
				parent: () => ({}),
				related: () => null,
				child: () => null,
				childIsPresent: () => false,
			}),
		(error: unknown) => {
			assert.ok(error instanceof AggregationError);
			assert.equal(error.message, "Row 0: parent key has unsupported type object");
			return true;
		},
	);
});

test("aggregate: errors thrown by extractors propagate unchanged", async () => {
	const failure = new Error("bad column");

	await assert.rejects(
		() =>
			aggregate([row(1, 9, 101)], {
				...orderConfig,
				child: () => {
					throw failure;
				},
			}),
		(error: unknown) => error === failure,
	);
});

//
// Cancellation
//

test("aggregate: an already-aborted signal rejects before any row is read", async () => {
	const controller = new AbortController();
	const reason = new Error("request cancelled");
	controller.abort(reason);
	let consumed = 0;

	function* rows() {
		consumed++;
		yield row(1, 9, 101);
	}

	await assert.rejects(
		() => aggregate(rows(), orderConfig, { signal: controller.signal }),
		(error: unknown) => error === reason,
	);
	assert.equal(consumed, 0);
});

test("aggregate: aborting mid-stream stops consuming rows", async () => {
	const controller = new AbortController();
	const pulled: number[] = [];

	async function* rows() {
		for (let i = 1; i <= 5; i++) {
			pulled.push(i);
			if (i === 2) {
				controller.abort();
			}
			yield row(i, 9, null);
		}
	}

	await assert.rejects(
		() => aggregate(rows(), orderConfig, { signal: controller.signal }),
		(error: unknown) => error instanceof Error && error.name === "AbortError",
	);
	assert.deepEqual(pulled, [1, 2]);
});

//
// Builder
//

test("createAggregator: supports several related slots and collections", async () => {
	interface Row {
		id: number;
		author$$id: number | null;
		editor$$id: number | null;
		tag$$name: string | null;
		comment$$id: number | null;
	}

	const rows: Row[] = [
		{ id: 1, author$$id: 5, editor$$id: null, tag$$name: "a", comment$$id: 10 },
		{ id: 1, author$$id: 5, editor$$id: null, tag$$name: "b", comment$$id: null },
	];

	const result = await createAggregator({
		key: (r: Row) => r.id,
		parent: (r) => ({ id: r.id }),
	})
		.hasOne("author", (r) => ({ id: r.author$$id }))
		.hasOne("editor", (r) => ({ id: r.editor$$id }), (r) => isPresentKey(r.editor$$id))
		.hasMany("tags", (r) => r.tag$$name, (r) => r.tag$$name !== null)
		.hasMany("comments", (r) => ({ id: r.comment$$id }), (r) => isPresentKey(r.comment$$id))
		.aggregate(rows);

	assert.deepEqual(result, [
		{
			id: 1,
			author: { id: 5 },
			editor: null,
			tags: ["a", "b"],
			comments: [{ id: 10 }],
		},
	]);
});

test("createAggregator: configuration methods return new instances", async () => {
	const base = createAggregator({
		key: (r: { id: number; child: number | null }) => r.id,
		parent: (r) => ({ id: r.id }),
	});
	const withChildren = base.hasMany("children", (r) => r.child, (r) => isPresentKey(r.child));

	const rows = [{ id: 1, child: 2 }];

	assert.deepEqual(await base.aggregate(rows), [{ id: 1 }]);
	assert.deepEqual(await withChildren.aggregate(rows), [{ id: 1, children: [2] }]);
});

test("createAggregator: a repeated slot key replaces the earlier slot", async () => {
	const result = await createAggregator({
		key: (r: { id: number; v: number }) => r.id,
		parent: (r) => ({ id: r.id }),
	})
		.hasMany("values", (r) => r.v, () => true)
		.hasMany("values", (r) => r.v * 10, () => true)
		.aggregate([
			{ id: 1, v: 1 },
			{ id: 1, v: 2 },
		]);

	assert.deepEqual(result, [{ id: 1, values: [10, 20] }]);
});

//
// isPresentKey
//

test("isPresentKey: rejects null, undefined and zero", () => {
	assert.equal(isPresentKey(null), false);
	assert.equal(isPresentKey(undefined), false);
	assert.equal(isPresentKey(0), false);
	assert.equal(isPresentKey(0n), false);
});

test("isPresentKey: accepts non-zero numbers and strings", () => {
	assert.equal(isPresentKey(1), true);
	assert.equal(isPresentKey(-3), true);
	assert.equal(isPresentKey(5n), true);
	assert.equal(isPresentKey("abc"), true);
});
