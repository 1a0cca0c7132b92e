/**
 * QueryString - text cleared to reach the query execution boundary
 *
 * One immutable value type with four storage modes:
 * - borrowed: text decoded from a buffer the caller owns, tied to that buffer
 * - static: compile-time constant text, kept as-is
 * - boxed: text owned by this value alone
 * - shared: a SharedText handle any number of holders reference
 *
 * Equality and hashing only look at the text, never at the mode.
 * Values are created through intoQueryString() in query-safe.ts.
 */

import { inspect } from 'node:util';
import { QuerySourceError } from './errors';
import { fnv1a } from './hash';
import type { SharedText } from './shared-text';
import type { Lifetime, QueryRepr, StorageMode } from './types';

// ignoreBOM keeps a leading U+FEFF so borrowed text matches the other modes
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Held only by the constructors in this module. */
const constructToken: unique symbol = Symbol('QueryString.construct');

export class QueryString<L extends Lifetime = Lifetime> {
	private readonly repr: QueryRepr;

	/**
	 * `'borrowed'` until toStatic() detaches the payload from the caller's buffer.
	 */
	public readonly lifetime: L;

	/** @internal */
	constructor(token: typeof constructToken, repr: QueryRepr, lifetime: L) {
		if (token !== constructToken) {
			throw new TypeError('QueryString values are created with intoQueryString()');
		}
		this.repr = repr;
		this.lifetime = lifetime;
		Object.freeze(this);
	}

	get storageMode(): StorageMode {
		return this.repr.kind;
	}

	/**
	 * The query text, as fixed at conversion. Never copies.
	 */
	asStr(): string {
		const repr = this.repr;
		switch (repr.kind) {
			case 'borrowed':
			case 'static':
			case 'boxed':
				return repr.text;
			case 'shared':
				return repr.shared.text;
		}
	}

	get length(): number {
		return this.asStr().length;
	}

	/**
	 * Detach from any caller-owned buffer.
	 *
	 * Borrowed storage moves its text into new boxed storage.
	 * Every other mode keeps its storage and mode; nothing is copied.
	 */
	toStatic(): QueryString<'static'> {
		if (this.repr.kind === 'borrowed') {
			return new QueryString(constructToken, { kind: 'boxed', text: this.repr.text }, 'static');
		}
		return new QueryString(constructToken, this.repr, 'static');
	}

	/**
	 * True when both values read their text from the same allocation.
	 * Two borrowed values share storage when they view the same buffer region.
	 */
	sharesStorageWith(other: QueryString): boolean {
		const a = this.repr;
		const b = other.repr;
		if (a === b) {
			return true;
		}
		if (a.kind === 'shared' && b.kind === 'shared') {
			return a.shared === b.shared;
		}
		if (a.kind === 'borrowed' && b.kind === 'borrowed') {
			return (
				a.bytes.buffer === b.bytes.buffer &&
				a.bytes.byteOffset === b.bytes.byteOffset &&
				a.bytes.byteLength === b.bytes.byteLength
			);
		}
		return false;
	}

	/**
	 * Compare by text. A plain string compares against the text directly.
	 */
	equals(other: QueryString | string): boolean {
		if (typeof other === 'string') {
			return this.asStr() === other;
		}
		return this.asStr() === other.asStr();
	}

	/**
	 * 32-bit hash of the text; equal values always hash equal.
	 */
	hashCode(): number {
		return fnv1a(this.asStr());
	}

	toString(): string {
		return this.asStr();
	}

	toJSON(): string {
		return this.asStr();
	}

	/** Shows the storage mode and size only; query text can carry sensitive literals. */
	[inspect.custom](): string {
		return `QueryString<${this.repr.kind}>(${this.length} chars)`;
	}
}

/**
 * Decode `bytes` once; later writes to the buffer do not reach the payload.
 *
 * @throws QuerySourceError when the bytes are not valid UTF-8
 * @internal
 */
export function borrowedQuery(bytes: Uint8Array): QueryString<'borrowed'> {
	return new QueryString(constructToken, { kind: 'borrowed', bytes, text: decodeStrict(bytes) }, 'borrowed');
}

function decodeStrict(bytes: Uint8Array): string {
	try {
		return utf8.decode(bytes);
	} catch (error) {
		if (error instanceof TypeError) {
			throw new QuerySourceError(`${QuerySourceError.describe(bytes)} with invalid UTF-8`, 'valid UTF-8 bytes');
		}
		throw error;
	}
}

/** @internal */
export function staticQuery(text: string): QueryString<'static'> {
	return new QueryString(constructToken, { kind: 'static', text }, 'static');
}

/** @internal */
export function boxedQuery(text: string): QueryString<'static'> {
	return new QueryString(constructToken, { kind: 'boxed', text }, 'static');
}

/** @internal */
export function sharedQuery(shared: SharedText): QueryString<'static'> {
	return new QueryString(constructToken, { kind: 'shared', shared }, 'static');
}

/**
 * Check if value is a QueryString.
 */
export function isQueryString(value: unknown): value is QueryString {
	return value instanceof QueryString;
}
