import { UnexpectedCaseError } from "./errors.ts";

export type Identity<T> = T;
export type Flatten<T> = Identity<{ [k in keyof T]: T[k] }>;
export type Extend<A, B> = Flatten<
	// fast path when there is no keys overlap
	keyof A & keyof B extends never
		? A & B
		: {
				[K in keyof A as K extends keyof B ? never : K]: A[K];
			} & {
				[K in keyof B]: B[K];
			}
>;

export function assertNever(arg: never): never {
	throw new UnexpectedCaseError(`Unexpected case: ${JSON.stringify(arg)}`);
}

export function isAsyncIterable<T>(input: unknown): input is AsyncIterable<T> {
	return (
		input !== null &&
		typeof input === "object" &&
		typeof Reflect.get(input, Symbol.asyncIterator) === "function"
	);
}

/**
 * Iterates a sync or async iterable with `for await`, yielding each item with
 * its zero-based position.
 */
export async function* enumerate<T>(
	input: Iterable<T> | AsyncIterable<T>,
): AsyncGenerator<[index: number, item: T]> {
	let index = 0;
	if (isAsyncIterable<T>(input)) {
		for await (const item of input) {
			yield [index++, item];
		}
		return;
	}
	for (const item of input) {
		yield [index++, item];
	}
}

/**
 * Rounds a currency amount to whole cents.
 */
export function roundCents(amount: number): number {
	return Math.round(amount * 100) / 100;
}
