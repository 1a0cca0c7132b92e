/**
 * Configuration provider interface.
 *
 * Implementations can be swapped per environment:
 * - Development and tests: EnvConfigProvider (reads process.env)
 * - Production: a custom provider (e.g. a secrets manager)
 *
 * @example
 * ```ts
 * const config = new EnvConfigProvider();
 * Logger.configure(await createLoggerOptionsFromConfig(config));
 * const boundary = createQueryBoundary(driver, await readQueryBoundaryConfig(config));
 * ```
 */
export interface ConfigProvider {
	/**
	 * Gets a configuration value by key.
	 * @returns The value, or undefined if not found
	 */
	get(key: string): Promise<string | undefined>;

	/**
	 * Gets a required configuration value.
	 * @throws Error if the value is not found or empty
	 */
	getRequired(key: string): Promise<string>;

	/**
	 * Loads multiple configuration values at once.
	 */
	loadKeys(keys: string[]): Promise<Record<string, string | undefined>>;
}
