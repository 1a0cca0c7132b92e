import type { ConfigProvider } from '@querygate/config';
import { parseLevelName, type LevelName } from './levels';
import { consoleTransport } from './transports/console';
import type { LoggerOptions } from './types';

/**
 * Logging configuration read from config provider.
 */
export interface LogConfig {
	/** Log level threshold (debug, info, warn, error). Default: 'info' */
	level: LevelName;
	/** Use JSON format (production) vs pretty format (dev) */
	jsonFormat: boolean;
}

/**
 * Read logging configuration from a config provider.
 *
 * Reads these keys:
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - LOG_JSON: true | false (default: false)
 */
export async function readLogConfig(config: ConfigProvider): Promise<LogConfig> {
	const values = await config.loadKeys(['LOG_LEVEL', 'LOG_JSON']);

	return {
		level: parseLevelName(values.LOG_LEVEL) ?? 'info',
		jsonFormat: values.LOG_JSON === 'true'
	};
}

/**
 * Build logger options from a LogConfig.
 *
 * @example
 * ```ts
 * const logConfig = await readLogConfig(new EnvConfigProvider());
 * Logger.configure(buildLoggerOptions(logConfig));
 * ```
 */
export function buildLoggerOptions(config: LogConfig): LoggerOptions {
	return {
		level: config.level,
		transports: [consoleTransport({ json: config.jsonFormat, pretty: !config.jsonFormat })]
	};
}

export async function createLoggerOptionsFromConfig(config: ConfigProvider): Promise<LoggerOptions> {
	return buildLoggerOptions(await readLogConfig(config));
}
