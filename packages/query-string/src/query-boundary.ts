/**
 * Query boundary - the only door from application code to a database driver
 *
 * Wraps a driver function that takes raw text so callers can only reach it
 * with a QuerySafeStr producer. Raw `string` values assembled at runtime
 * fail to compile here.
 */

import type { ConfigProvider } from '@querygate/config';
import { createLoggerOptionsFromConfig, Logger } from '@querygate/logging';
import { intoQueryString, type QuerySafeStr } from './query-safe';
import type { QueryString } from './query-string';

/**
 * Driver function the boundary delegates to.
 *
 * Receives the final query text and the bind parameters unchanged.
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg';
 *
 * const pool = new Pool();
 * const driver: QueryDriver<QueryResult> = (text, params) => pool.query(text, [...params]);
 * ```
 */
export type QueryDriver<R> = (text: string, params: readonly unknown[]) => Promise<R>;

export interface QueryBoundaryOptions {
	/** Logger for query events. Default: `new Logger('QueryBoundary')` */
	logger?: Logger;
	/** Include the (truncated) query text in debug logs. Default: false */
	logQueryText?: boolean;
	/** Maximum number of characters of query text to log. Default: 200 */
	maxLoggedLength?: number;
}

/**
 * A query converted once and kept for later execution.
 * Its text no longer depends on any caller-owned buffer.
 */
export interface BoundQuery<R> {
	readonly query: QueryString<'static'>;
	execute(params?: readonly unknown[]): Promise<R>;
}

export interface QueryBoundary<R> {
	/**
	 * Convert `source` and run it through the driver.
	 *
	 * @throws Propagates any error from the driver unchanged
	 */
	query<S extends string = never>(source: QuerySafeStr<S>, params?: readonly unknown[]): Promise<R>;

	/**
	 * Convert `source` now, detach it from its origin and execute later.
	 */
	bind<S extends string = never>(source: QuerySafeStr<S>): BoundQuery<R>;
}

export const DEFAULT_MAX_LOGGED_LENGTH = 200;

/**
 * Create a query boundary around a driver function.
 *
 * @example
 * ```typescript
 * const db = createQueryBoundary(driver, { logger: new Logger('Reports') });
 *
 * await db.query('SELECT count(*) FROM account');
 * await db.query('SELECT * FROM account WHERE id = $1', [accountId]);
 *
 * // Runtime-built text needs an explicit assertion
 * await db.query(assertQuerySafe(`SELECT * FROM ${partitionFor(day)}`));
 * ```
 */
export function createQueryBoundary<R>(driver: QueryDriver<R>, options: QueryBoundaryOptions = {}): QueryBoundary<R> {
	const log = options.logger ?? new Logger('QueryBoundary');
	const logQueryText = options.logQueryText ?? false;
	const maxLoggedLength = options.maxLoggedLength ?? DEFAULT_MAX_LOGGED_LENGTH;

	function describe(query: QueryString, text: string, params: readonly unknown[]): Record<string, unknown> {
		const fields: Record<string, unknown> = {
			storageMode: query.storageMode,
			lifetime: query.lifetime,
			length: text.length,
			paramCount: params.length
		};
		if (logQueryText) {
			fields.text = truncate(text, maxLoggedLength);
		}
		return fields;
	}

	async function run(query: QueryString, params: readonly unknown[]): Promise<R> {
		// Decode once so the driver and the log see the same text
		const text = query.asStr();
		if (log.isLevelEnabled('debug')) {
			log.debug('Executing query', describe(query, text, params));
		}
		try {
			return await driver(text, params);
		} catch (error) {
			log.error('Query failed', { ...describe(query, text, params), error });
			throw error;
		}
	}

	return {
		query<S extends string = never>(source: QuerySafeStr<S>, params: readonly unknown[] = []): Promise<R> {
			return run(intoQueryString(source), params);
		},

		bind<S extends string = never>(source: QuerySafeStr<S>): BoundQuery<R> {
			const query = intoQueryString(source).toStatic();
			return {
				query,
				execute(params: readonly unknown[] = []): Promise<R> {
					return run(query, params);
				}
			};
		}
	};
}

/**
 * Read boundary logging settings from a config provider.
 *
 * Reads these keys:
 * - QUERY_LOG_TEXT: true | false (default: false)
 * - QUERY_LOG_MAX_LENGTH: positive integer (default: 200)
 */
export async function readQueryBoundaryConfig(
	config: ConfigProvider
): Promise<Required<Pick<QueryBoundaryOptions, 'logQueryText' | 'maxLoggedLength'>>> {
	const values = await config.loadKeys(['QUERY_LOG_TEXT', 'QUERY_LOG_MAX_LENGTH']);
	// Number() rejects trailing garbage that parseInt would drop
	const maxLength = Number(values.QUERY_LOG_MAX_LENGTH ?? '');

	return {
		logQueryText: values.QUERY_LOG_TEXT === 'true',
		maxLoggedLength: Number.isInteger(maxLength) && maxLength > 0 ? maxLength : DEFAULT_MAX_LOGGED_LENGTH
	};
}

/**
 * Create a boundary whose logger and logging settings come from config.
 *
 * The logger follows LOG_LEVEL and LOG_JSON; the boundary reads
 * QUERY_LOG_TEXT and QUERY_LOG_MAX_LENGTH.
 *
 * @example
 * ```typescript
 * const db = await createQueryBoundaryFromConfig(driver, new EnvConfigProvider());
 * ```
 */
export async function createQueryBoundaryFromConfig<R>(
	driver: QueryDriver<R>,
	config: ConfigProvider
): Promise<QueryBoundary<R>> {
	const [loggerOptions, boundaryOptions] = await Promise.all([
		createLoggerOptionsFromConfig(config),
		readQueryBoundaryConfig(config)
	]);
	return createQueryBoundary(driver, { ...boundaryOptions, logger: new Logger('QueryBoundary', loggerOptions) });
}

function truncate(text: string, max: number): string {
	if (text.length <= max) {
		return text;
	}
	// Never cut between the two halves of a surrogate pair
	const last = text.charCodeAt(max - 1);
	const end = last >= 0xd800 && last <= 0xdbff ? max - 1 : max;
	return `${text.slice(0, end)}...`;
}
