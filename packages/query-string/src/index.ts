/**
 * @querygate/query-string - compile-time trust boundary for query text
 *
 * @example
 * ```typescript
 * import { createQueryBoundary, assertQuerySafe } from '@querygate/query-string';
 *
 * const db = createQueryBoundary((text, params) => pool.query(text, [...params]));
 *
 * // String literals cross the gate directly
 * await db.query('SELECT * FROM account WHERE id = $1', [id]);
 *
 * // Runtime-built text must be asserted
 * await db.query(assertQuerySafe(buildReportSql(columns)));
 *
 * // Does not compile: `string` is not a constant
 * // await db.query(`SELECT * FROM account WHERE name = '${name}'`);
 * ```
 *
 * @security
 * The gate never inspects text. AssertQuerySafe moves responsibility for the
 * text to the caller; pass user input as bind parameters, never in the text.
 */

export { QueryString, isQueryString } from './query-string';
export { AssertQuerySafe, assertQuerySafe, intoQueryString } from './query-safe';
export type { QuerySafeStr } from './query-safe';
export { SharedText, isSharedText } from './shared-text';
export { QuerySourceError } from './errors';
export {
	createQueryBoundary,
	createQueryBoundaryFromConfig,
	readQueryBoundaryConfig,
	DEFAULT_MAX_LOGGED_LENGTH
} from './query-boundary';
export type { QueryBoundary, QueryBoundaryOptions, QueryDriver, BoundQuery } from './query-boundary';
export type { Lifetime, StorageMode, ConstantText, AssertableText } from './types';
