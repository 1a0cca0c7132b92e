/**
 * Shared logging types.
 */

export type LevelName = 'debug' | 'info' | 'warn' | 'error';

/** Pino-compatible numbering */
export type LevelNumber = 10 | 20 | 30 | 40;

/**
 * A single structured log entry as handed to transports.
 */
export interface LogObject {
	time: number;
	level: LevelNumber;
	msg: string;
	name?: string;
	[key: string]: unknown;
}

/**
 * Destination for log entries.
 */
export interface Transport {
	write(obj: LogObject): void;
	flush(): Promise<void>;
	close(): Promise<void>;
}

export interface LoggerOptions {
	level?: LevelName;
	transports?: Transport[];
}

export interface LoggerGlobalOptions {
	level?: LevelName;
	transports?: Transport[];
}
