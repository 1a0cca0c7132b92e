import { levels, isLevelEnabled, type LevelName, type LevelNumber } from './levels';
import { consoleTransport } from './transports/console';
import type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions } from './types';

export type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions };

/**
 * Structured logger with a Pino-inspired design.
 *
 * - Produces structured log objects
 * - Writes synchronously to configurable transports
 * - Immutable context via with()
 * - Named children via child()
 *
 * Loggers without explicit transports resolve the global transports at write
 * time, so Logger.configure() also reaches loggers created before it ran.
 */
export class Logger {
	private static globalTransports: Transport[] | null = null;
	private static globalLevel: LevelName | null = null;

	private readonly name: string;
	private readonly levelName: LevelName | null;
	private readonly explicitTransports: Transport[] | null;
	private readonly context: Record<string, unknown>;

	constructor(name: string, options: LoggerOptions = {}, context: Record<string, unknown> = {}) {
		this.name = name;
		// null follows the global level, checked at write time
		this.levelName = options.level ?? null;
		this.explicitTransports = options.transports ?? null;
		this.context = context;
	}

	private get level(): LevelNumber {
		return levels[this.levelName ?? Logger.globalLevel ?? 'info'];
	}

	private get transports(): Transport[] {
		return this.explicitTransports ?? Logger.globalTransports ?? [Logger.defaultTransport()];
	}

	/**
	 * Configure global defaults for all Logger instances.
	 * Call this once at startup.
	 */
	static configure(options: LoggerGlobalOptions): void {
		if (options.level) {
			Logger.globalLevel = options.level;
		}
		if (options.transports) {
			Logger.globalTransports = options.transports;
		}
	}

	/**
	 * Reset global configuration to defaults.
	 *
	 * **IMPORTANT**: Tests that call Logger.configure() MUST call Logger.reset()
	 * in afterEach() to prevent test pollution.
	 */
	static reset(): void {
		Logger.globalLevel = null;
		Logger.globalTransports = null;
	}

	/**
	 * Flush and close the global transports.
	 *
	 * Uses Promise.allSettled so one failing transport does not keep the
	 * others from closing.
	 */
	static async shutdown(): Promise<void> {
		const transports = Logger.globalTransports ?? [];
		await Promise.allSettled(transports.map((transport) => transport.flush()));
		await Promise.allSettled(transports.map((transport) => transport.close()));
	}

	debug(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.debug, msg, data);
	}

	info(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.info, msg, data);
	}

	warn(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.warn, msg, data);
	}

	error(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.error, msg, data);
	}

	isLevelEnabled(level: LevelName): boolean {
		return isLevelEnabled(levels[level], this.level);
	}

	/**
	 * Creates a new logger with additional context (immutable)
	 */
	with(data: Record<string, unknown>): Logger {
		return new Logger(this.name, this.inheritedOptions(), { ...this.context, ...data });
	}

	/**
	 * Creates a child logger with a new name (immutable)
	 * Inherits context, level, and transports from parent
	 */
	child(name: string): Logger {
		return new Logger(name, this.inheritedOptions(), { ...this.context });
	}

	private inheritedOptions(): LoggerOptions {
		const options: LoggerOptions = {};
		if (this.levelName) {
			options.level = this.levelName;
		}
		if (this.explicitTransports) {
			options.transports = this.explicitTransports;
		}
		return options;
	}

	private log(level: LevelNumber, msg: string, data?: Record<string, unknown>): void {
		if (!isLevelEnabled(level, this.level)) {
			return;
		}

		const logObj: LogObject = {
			time: Date.now(),
			level,
			msg,
			name: this.name,
			...this.context,
			...data
		};

		for (const transport of this.transports) {
			transport.write(logObj);
		}
	}

	private static defaultTransport(): Transport {
		return consoleTransport();
	}
}
