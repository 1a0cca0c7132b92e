/**
 * Immutable text handle meant to be referenced from many places at once.
 *
 * Converting an asserted SharedText into a QueryString keeps a reference to
 * this handle; the text is never copied. Instances are frozen.
 *
 * @example
 * ```typescript
 * const report = SharedText.from(loadReportSql());
 * const a = intoQueryString(assertQuerySafe(report));
 * const b = intoQueryString(assertQuerySafe(report));
 * a.sharesStorageWith(b); // true
 * ```
 */
export class SharedText {
	private constructor(private readonly payload: string) {
		Object.freeze(this);
	}

	get text(): string {
		return this.payload;
	}

	static from(text: string): SharedText {
		return new SharedText(text);
	}

	get length(): number {
		return this.payload.length;
	}

	toString(): string {
		return this.payload;
	}
}

/**
 * Check if value is a SharedText handle.
 */
export function isSharedText(value: unknown): value is SharedText {
	return value instanceof SharedText;
}
