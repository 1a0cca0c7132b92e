/**
 * Unit tests for the query boundary
 */

import { EnvConfigProvider } from '@querygate/config';
import { Logger } from '@querygate/logging';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
	assertQuerySafe,
	createQueryBoundary,
	createQueryBoundaryFromConfig,
	DEFAULT_MAX_LOGGED_LENGTH,
	intoQueryString,
	readQueryBoundaryConfig
} from '../src/index';
import { createCapturingTransport, createMockDriver } from './helpers/mock-driver';

function debugLogger() {
	const transport = createCapturingTransport();
	const logger = new Logger('QueryBoundary', { level: 'debug', transports: [transport] });
	return { transport, logger };
}

describe('createQueryBoundary', () => {
	describe('query', () => {
		it('should hand constant text and params to the driver', async () => {
			const driver = createMockDriver([{ id: 5 }]);
			const { logger } = debugLogger();
			const db = createQueryBoundary(driver, { logger });

			const rows = await db.query('SELECT * FROM account WHERE id = $1', [5]);

			expect(rows).toEqual([{ id: 5 }]);
			expect(driver.calls).toEqual([{ text: 'SELECT * FROM account WHERE id = $1', params: [5] }]);
		});

		it('should default params to an empty list', async () => {
			const driver = createMockDriver(null);
			const { logger } = debugLogger();
			const db = createQueryBoundary(driver, { logger });

			await db.query('SELECT 1');

			expect(driver.calls).toEqual([{ text: 'SELECT 1', params: [] }]);
		});

		it('should accept asserted text in every storage mode', async () => {
			const driver = createMockDriver(null);
			const { logger } = debugLogger();
			const db = createQueryBoundary(driver, { logger });
			const table = 'audit_2026';

			await db.query(assertQuerySafe(`SELECT * FROM ${table}`));
			await db.query(assertQuerySafe(new TextEncoder().encode('SELECT 2')));
			await db.query(intoQueryString('SELECT 3'));

			expect(driver.calls.map((call) => call.text)).toEqual(['SELECT * FROM audit_2026', 'SELECT 2', 'SELECT 3']);
		});

		it('should log a debug entry without the query text by default', async () => {
			const driver = createMockDriver(null);
			const { logger, transport } = debugLogger();
			const db = createQueryBoundary(driver, { logger });

			await db.query('SELECT 1', [5]);

			expect(transport.logs).toHaveLength(1);
			expect(transport.logs[0]).toMatchObject({
				level: 10,
				name: 'QueryBoundary',
				msg: 'Executing query',
				storageMode: 'static',
				lifetime: 'static',
				length: 8,
				paramCount: 1
			});
			expect(transport.logs[0]).not.toHaveProperty('text');
		});

		it('should log truncated query text when enabled', async () => {
			const driver = createMockDriver(null);
			const { logger, transport } = debugLogger();
			const db = createQueryBoundary(driver, { logger, logQueryText: true, maxLoggedLength: 6 });

			await db.query('SELECT 1');
			await db.query('SELECT');

			expect(transport.logs.map((entry) => entry.text)).toEqual(['SELECT...', 'SELECT']);
		});

		it('should not split a surrogate pair when truncating', async () => {
			const driver = createMockDriver(null);
			const { logger, transport } = debugLogger();
			const db = createQueryBoundary(driver, { logger, logQueryText: true, maxLoggedLength: 8 });

			await db.query('SELECT 🎉');
			await db.query('SELECT 1🎉');

			expect(transport.logs.map((entry) => entry.text)).toEqual(['SELECT ...', 'SELECT 1...']);
		});

		it('should skip the debug entry when debug is disabled', async () => {
			const driver = createMockDriver(null);
			const transport = createCapturingTransport();
			const logger = new Logger('QueryBoundary', { level: 'info', transports: [transport] });
			const db = createQueryBoundary(driver, { logger });

			await db.query('SELECT 1');

			expect(transport.logs).toEqual([]);
		});

		it('should rethrow driver errors and log them', async () => {
			const failure = new Error('connection reset');
			const driver = createMockDriver(null, failure);
			const transport = createCapturingTransport();
			const logger = new Logger('QueryBoundary', { level: 'info', transports: [transport] });
			const db = createQueryBoundary(driver, { logger });

			await expect(db.query('SELECT 1', ['a', 'b'])).rejects.toBe(failure);

			expect(transport.logs).toHaveLength(1);
			expect(transport.logs[0]).toMatchObject({
				level: 40,
				msg: 'Query failed',
				storageMode: 'static',
				length: 8,
				paramCount: 2,
				error: failure
			});
		});
	});

	describe('bind', () => {
		it('should detach borrowed text from the caller buffer', async () => {
			const driver = createMockDriver(null);
			const { logger, transport } = debugLogger();
			const db = createQueryBoundary(driver, { logger });
			const buffer = new TextEncoder().encode('SELECT 1');

			const bound = db.bind(assertQuerySafe(buffer));
			buffer.set(new TextEncoder().encode('DELETE!!'));
			await bound.execute();

			expect(bound.query.storageMode).toBe('boxed');
			expect(bound.query.lifetime).toBe('static');
			expect(driver.calls).toEqual([{ text: 'SELECT 1', params: [] }]);
			expect(transport.logs[0]).toMatchObject({ storageMode: 'boxed', lifetime: 'static' });
		});

		it('should reuse the same query across executions', async () => {
			const driver = createMockDriver(null);
			const { logger } = debugLogger();
			const db = createQueryBoundary(driver, { logger });

			const bound = db.bind('SELECT * FROM account WHERE id = $1');
			await bound.execute([1]);
			await bound.execute([2]);

			expect(bound.query.storageMode).toBe('static');
			expect(driver.calls).toEqual([
				{ text: 'SELECT * FROM account WHERE id = $1', params: [1] },
				{ text: 'SELECT * FROM account WHERE id = $1', params: [2] }
			]);
		});
	});
});

describe('readQueryBoundaryConfig', () => {
	it('should use defaults when nothing is set', async () => {
		const config = await readQueryBoundaryConfig(new EnvConfigProvider({}));

		expect(config).toEqual({ logQueryText: false, maxLoggedLength: DEFAULT_MAX_LOGGED_LENGTH });
	});

	it('should read the text flag and length', async () => {
		const config = await readQueryBoundaryConfig(
			new EnvConfigProvider({ QUERY_LOG_TEXT: 'true', QUERY_LOG_MAX_LENGTH: '40' })
		);

		expect(config).toEqual({ logQueryText: true, maxLoggedLength: 40 });
	});

	it('should fall back to the default length for invalid values', async () => {
		for (const value of ['0', '-3', 'many', '', '40abc', '2.5']) {
			const config = await readQueryBoundaryConfig(new EnvConfigProvider({ QUERY_LOG_MAX_LENGTH: value }));

			expect(config.maxLoggedLength).toBe(200);
		}
	});

	it('should treat any value other than true as false', async () => {
		const config = await readQueryBoundaryConfig(new EnvConfigProvider({ QUERY_LOG_TEXT: 'yes' }));

		expect(config.logQueryText).toBe(false);
	});
});

describe('createQueryBoundaryFromConfig', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('should log through a console logger configured from the environment', async () => {
		const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
		const driver = createMockDriver(null);
		const db = await createQueryBoundaryFromConfig(
			driver,
			new EnvConfigProvider({
				LOG_LEVEL: 'debug',
				LOG_JSON: 'true',
				QUERY_LOG_TEXT: 'true',
				QUERY_LOG_MAX_LENGTH: '6'
			})
		);

		await db.query('SELECT 1', [7]);

		expect(driver.calls).toEqual([{ text: 'SELECT 1', params: [7] }]);
		expect(consoleLog).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(consoleLog.mock.calls[0]?.[0]))).toMatchObject({
			level: 10,
			name: 'QueryBoundary',
			msg: 'Executing query',
			storageMode: 'static',
			paramCount: 1,
			text: 'SELECT...'
		});
	});

	it('should stay quiet at the default info level', async () => {
		const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
		const db = await createQueryBoundaryFromConfig(createMockDriver(null), new EnvConfigProvider({}));

		await db.query('SELECT 1');

		expect(consoleLog).not.toHaveBeenCalled();
	});
});
