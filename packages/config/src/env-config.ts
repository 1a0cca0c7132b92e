import type { ConfigProvider } from './types';

/**
 * Configuration provider that reads from environment variables.
 *
 * Reads `process.env` (or the record passed in, for tests) at call time.
 * It does not load `.env` files; start Node with `--env-file` for that.
 *
 * @example
 * ```ts
 * const config = new EnvConfigProvider();
 * const level = await config.get('LOG_LEVEL');
 * ```
 */
export class EnvConfigProvider implements ConfigProvider {
	constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

	async get(key: string): Promise<string | undefined> {
		return this.env[key];
	}

	/**
	 * Gets a required environment variable.
	 * @throws Error if the variable is not set or empty
	 */
	async getRequired(key: string): Promise<string> {
		const value = this.env[key];
		if (value === undefined || value === '') {
			throw new Error(`Required config '${key}' is not set. Add it to your environment.`);
		}
		return value;
	}

	async loadKeys(keys: string[]): Promise<Record<string, string | undefined>> {
		const result: Record<string, string | undefined> = {};
		for (const key of keys) {
			result[key] = this.env[key];
		}
		return result;
	}
}
