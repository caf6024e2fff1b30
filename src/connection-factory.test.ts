import assert from "node:assert/strict";
import { test } from "node:test";

import { sql } from "kysely";

import { captureLogger } from "./__tests__/helpers.ts";
import { createConnectionFactory } from "./connection-factory.ts";

test("createConnectionFactory: opens sqlite with foreign keys enforced", async () => {
	const factory = createConnectionFactory({ dialect: "sqlite", filename: ":memory:", logLevel: "info" });

	try {
		assert.equal(factory.dialect, "sqlite");
		const { rows } = await sql<{ foreign_keys: number }>`pragma foreign_keys`.execute(factory.db);
		assert.deepEqual(rows, [{ foreign_keys: 1 }]);
	} finally {
		await factory.destroy();
	}
});

test("createConnectionFactory: builds a postgres factory without connecting", async () => {
	const factory = createConnectionFactory({
		dialect: "postgres",
		connectionString: "postgres://localhost:5432/storefront",
		poolMax: 2,
		logLevel: "info",
	});

	assert.equal(factory.dialect, "postgres");
	await factory.destroy();
});

test("createConnectionFactory: forwards query events to the logger", async () => {
	const { logger, lines } = captureLogger("debug");
	const factory = createConnectionFactory({ dialect: "sqlite", filename: ":memory:", logLevel: "debug" }, logger);

	try {
		await sql`select 1 as one`.execute(factory.db);
	} finally {
		await factory.destroy();
	}

	const executed = lines.filter((line) => line.msg === "query executed");
	assert.equal(executed.length, 1);
	assert.equal(executed[0]?.sql, "select 1 as one");
});

test("withConnection: runs the callback and returns its result", async () => {
	const factory = createConnectionFactory({ dialect: "sqlite", filename: ":memory:", logLevel: "info" });

	try {
		const result = await factory.withConnection(async (db) => {
			const { rows } = await sql<{ answer: number }>`select 42 as answer`.execute(db);
			return rows[0]?.answer;
		});
		assert.equal(result, 42);
	} finally {
		await factory.destroy();
	}
});

test("withConnection: releases the connection when the callback fails", async () => {
	const factory = createConnectionFactory({ dialect: "sqlite", filename: ":memory:", logLevel: "info" });
	const failure = new Error("callback failed");

	try {
		await assert.rejects(
			() =>
				factory.withConnection(async () => {
					throw failure;
				}),
			(error: unknown) => error === failure,
		);

		// The single sqlite connection must be available again.
		const { rows } = await sql<{ one: number }>`select 1 as one`.execute(factory.db);
		assert.deepEqual(rows, [{ one: 1 }]);
	} finally {
		await factory.destroy();
	}
});

test("withTransaction: rolls back when the callback fails", async () => {
	const factory = createConnectionFactory({ dialect: "sqlite", filename: ":memory:", logLevel: "info" });

	try {
		await sql`create table notes (body text not null)`.execute(factory.db);

		await assert.rejects(
			() =>
				factory.withTransaction(async (trx) => {
					await sql`insert into notes (body) values ('draft')`.execute(trx);
					throw new Error("abandon");
				}),
			/abandon/,
		);

		const { rows } = await sql<{ count: number }>`select count(*) as count from notes`.execute(factory.db);
		assert.deepEqual(rows, [{ count: 0 }]);
	} finally {
		await factory.destroy();
	}
});
