/**
 * QuerySourceError
 *
 * Thrown by intoQueryString() when asserted bytes are not valid UTF-8, or
 * when a caller without type checking (plain JavaScript, or a value typed
 * `any`) passes something outside the accepted producers.
 *
 * @example
 * ```typescript
 * intoQueryString(42 as any);
 * // QuerySourceError: Cannot convert number to a QueryString - expected a string literal,
 * // AssertQuerySafe or QueryString
 * ```
 */
export class QuerySourceError extends Error {
	public override readonly name = 'QuerySourceError';

	/**
	 * @param received - Short description of the rejected value (its type, never its contents)
	 * @param expected - What the rejecting call accepts
	 */
	public constructor(
		public readonly received: string,
		public readonly expected: string
	) {
		super(`Cannot convert ${received} to a QueryString - expected ${expected}`);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, QuerySourceError);
		}
	}

	/**
	 * Describe a value by its type without including its contents.
	 */
	static describe(value: unknown): string {
		if (value === null) {
			return 'null';
		}
		if (typeof value === 'object') {
			const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
			return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
		}
		return typeof value;
	}
}
