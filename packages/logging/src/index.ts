export { Logger, type LogObject, type Transport, type LoggerOptions, type LoggerGlobalOptions } from './logger';
export { levels, isLevelName, parseLevelName, isLevelEnabled, type LevelName, type LevelNumber } from './levels';
export {
	consoleTransport,
	formatPretty,
	formatJson,
	ANSI_COLORS,
	type ConsoleTransportOptions,
	type FormatOptions
} from './transports/console';
export { readLogConfig, buildLoggerOptions, createLoggerOptionsFromConfig, type LogConfig } from './config';
