import { type RawBuilder, sql } from "kysely";

import { DataAccessError, MissingParameterError } from "./errors.ts";

/**
 * Values bound to the `@Name` placeholders of a statement template.
 */
export type Params = Readonly<Record<string, unknown>>;

export type StatementToken =
	| { readonly kind: "text"; readonly text: string }
	| { readonly kind: "param"; readonly name: string };

const PLACEHOLDER = /[A-Za-z_]\w*/y;
const SYSTEM_VARIABLE = /@@\w*/y;

function matchAt(pattern: RegExp, input: string, index: number): string | null {
	pattern.lastIndex = index;
	const match = pattern.exec(input);
	return match ? match[0] : null;
}

/**
 * Index just past the quoted section starting at `start`.  A doubled quote
 * character is an escape, not the end of the section.
 */
function quotedEnd(template: string, start: number, quote: string): number {
	let i = start + 1;
	while (i < template.length) {
		if (template[i] === quote) {
			if (template[i + 1] !== quote) {
				return i + 1;
			}
			i += 2;
		} else {
			i++;
		}
	}
	return template.length;
}

/**
 * Index just past the comment starting at `start`, or `null` when no comment
 * starts there.  A line comment ends after its newline; an unterminated block
 * comment runs to the end of the template.
 */
function commentEnd(template: string, start: number): number | null {
	if (template.startsWith("--", start)) {
		const newline = template.indexOf("\n", start + 2);
		return newline === -1 ? template.length : newline + 1;
	}
	if (template.startsWith("/*", start)) {
		const close = template.indexOf("*/", start + 2);
		return close === -1 ? template.length : close + 2;
	}
	return null;
}

/**
 * Splits a statement template into literal SQL text and `@Name` placeholders.
 * `@` inside string literals, quoted identifiers and comments is text, and so
 * is `@@`.
 */
export function tokenize(template: string): StatementToken[] {
	const tokens: StatementToken[] = [];
	let text = "";
	let i = 0;

	while (i < template.length) {
		const ch = template.charAt(i);

		if (ch === "'" || ch === '"') {
			const end = quotedEnd(template, i, ch);
			text += template.slice(i, end);
			i = end;
			continue;
		}

		const comment = commentEnd(template, i);
		if (comment !== null) {
			text += template.slice(i, comment);
			i = comment;
			continue;
		}

		if (ch === "@") {
			const systemVariable = matchAt(SYSTEM_VARIABLE, template, i);
			if (systemVariable !== null) {
				text += systemVariable;
				i += systemVariable.length;
				continue;
			}

			const name = matchAt(PLACEHOLDER, template, i + 1);
			if (name !== null) {
				if (text) {
					tokens.push({ kind: "text", text });
					text = "";
				}
				tokens.push({ kind: "param", name });
				i += name.length + 1;
				continue;
			}
		}

		text += ch;
		i++;
	}

	if (text) {
		tokens.push({ kind: "text", text });
	}
	return tokens;
}

function bind(name: string, params: Params): RawBuilder<unknown> {
	if (!Object.hasOwn(params, name)) {
		throw new MissingParameterError(name);
	}

	const value = params[name];
	if (Array.isArray(value)) {
		if (value.length === 0) {
			throw new DataAccessError(`Parameter @${name} is an empty list`);
		}
		return sql`(${sql.join(value.map((item) => sql.val(item)))})`;
	}
	return sql.val(value);
}

/**
 * Compiles a statement template and its parameter bundle into a Kysely raw
 * query.  Values are never interpolated: every placeholder becomes a bound
 * parameter in the dialect's own placeholder style, and an array value
 * becomes a parenthesized list of them (`IN @Ids`).  Unused params are
 * ignored.
 *
 * @throws {MissingParameterError} If a placeholder has no value in `params`.
 */
export function compileStatement<Row = unknown>(template: string, params: Params = {}): RawBuilder<Row> {
	const parts = tokenize(template).map((token) =>
		token.kind === "text" ? sql.raw(token.text) : bind(token.name, params),
	);
	return sql<Row>`${sql.join(parts, sql.raw(""))}`;
}
