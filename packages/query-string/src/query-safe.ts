/**
 * Trust gate for query text
 *
 * intoQueryString() is the only way to obtain a QueryString. It accepts a
 * closed set of producers:
 *
 * - string-literal-typed text → static storage, no assertion needed
 * - AssertQuerySafe<Uint8Array> → borrowed storage tied to the caller's buffer,
 *   decoded once here; bytes that are not valid UTF-8 are rejected
 * - AssertQuerySafe<string> → boxed (exclusively-owned) storage
 * - AssertQuerySafe<SharedText> → shared storage over the same handle
 * - QueryString → returned unchanged
 *
 * A `string`-typed value (anything assembled at runtime) has no overload and
 * fails to compile. Wrapping it in AssertQuerySafe means the caller has made
 * sure it contains no injected input. Nothing here inspects the text.
 *
 * Callers that bypass the type checker (`any`, plain JavaScript) still get a
 * QuerySourceError for values outside the set; they do not get the
 * string-literal guarantee, which only the compiler can give.
 */

import { QuerySourceError } from './errors';
import { borrowedQuery, boxedQuery, isQueryString, sharedQuery, staticQuery, type QueryString } from './query-string';
import { isSharedText, type SharedText } from './shared-text';
import type { AssertableText, ConstantText, Lifetime } from './types';

const ACCEPTED_SOURCES = 'a string literal, AssertQuerySafe or QueryString';
const ACCEPTED_ASSERTED = 'AssertQuerySafe around a string, Uint8Array or SharedText';

/**
 * Assert that query text is safe to execute.
 *
 * Using this wrapper means **you** have made sure the text contains no SQL
 * injection: if it was built dynamically or from user input, you sanitized
 * that input yourself. Prefer bind parameters for dynamic values.
 *
 * String literals do not need this wrapper.
 *
 * @example
 * ```typescript
 * const sql = `SELECT * FROM ${tableFor(tenant)} WHERE id = $1`;
 * await boundary.query(new AssertQuerySafe(sql), [id]);
 * ```
 */
export class AssertQuerySafe<T extends AssertableText> {
	public constructor(private readonly asserted: T) {}

	get value(): T {
		return this.asserted;
	}
}

/**
 * Shorthand for `new AssertQuerySafe(value)`.
 */
export function assertQuerySafe<T extends AssertableText>(value: T): AssertQuerySafe<T> {
	return new AssertQuerySafe(value);
}

/**
 * Anything intoQueryString() accepts.
 *
 * S is inferred from a string literal argument; leave it generic in your own
 * signatures so literals keep their type.
 *
 * @example
 * ```typescript
 * function explain<S extends string = never>(source: QuerySafeStr<S>): QueryString {
 *   return intoQueryString(source);
 * }
 * explain('SELECT 1');                    // ok
 * explain(assertQuerySafe(builtSql));     // ok
 * explain(builtSql);                      // compile error
 * ```
 */
export type QuerySafeStr<S extends string = never> =
	| (S & ConstantText<S>)
	| AssertQuerySafe<AssertableText>
	| QueryString;

/**
 * Convert a producer into a QueryString.
 */
export function intoQueryString<L extends Lifetime>(source: QueryString<L>): QueryString<L>;
export function intoQueryString(source: AssertQuerySafe<Uint8Array>): QueryString<'borrowed'>;
export function intoQueryString(source: AssertQuerySafe<string | SharedText>): QueryString<'static'>;
export function intoQueryString<S extends string>(source: S & ConstantText<S>): QueryString<'static'>;
export function intoQueryString<S extends string = never>(source: QuerySafeStr<S>): QueryString;
export function intoQueryString(source: unknown): QueryString {
	if (typeof source === 'string') {
		return staticQuery(source);
	}
	if (isQueryString(source)) {
		return source;
	}
	if (source instanceof AssertQuerySafe) {
		return fromAsserted(source.value);
	}
	throw new QuerySourceError(QuerySourceError.describe(source), ACCEPTED_SOURCES);
}

function fromAsserted(value: unknown): QueryString {
	if (typeof value === 'string') {
		return boxedQuery(value);
	}
	if (value instanceof Uint8Array) {
		return borrowedQuery(value);
	}
	if (isSharedText(value)) {
		return sharedQuery(value);
	}
	throw new QuerySourceError(QuerySourceError.describe(value), ACCEPTED_ASSERTED);
}
