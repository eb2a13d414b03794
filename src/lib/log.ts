import {z} from 'zod';

/**
 * Log levels in increasing verbosity. `off` silences everything.
 */
export const LogLevel = z.enum(['off', 'error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevel>;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	off: 0,
	error: 1,
	warn: 2,
	info: 3,
	debug: 4,
};

/**
 * The subset of `console` a `Logger` writes to.
 */
export type LogConsole = Pick<Console, 'error' | 'warn' | 'log'>;

/**
 * Labeled logger with an optional per-instance level.
 * Instances without their own level follow the static `Logger.level`.
 * The parser only traces at `debug`; the other levels are for hosts
 * that share a logger with it.
 *
 * @example
 * ```ts
 * const log = new Logger('option_parser');
 * log.debug('found option', 'v'); // [option_parser] found option v
 * ```
 */
export class Logger {
	/** Default level for instances without their own. */
	static level: LogLevel = 'info';

	readonly label: string;
	level: LogLevel | undefined;
	readonly console: LogConsole;

	#prefix: Array<string>;

	constructor(label?: string, level?: LogLevel, log_console: LogConsole = console) {
		this.label = label ?? '';
		this.level = level;
		this.console = log_console;
		this.#prefix = this.label ? [`[${this.label}]`] : [];
	}

	/**
	 * Whether messages at `level` are currently written.
	 */
	enabled(level: Exclude<LogLevel, 'off'>): boolean {
		return LOG_LEVEL_VALUES[this.level ?? Logger.level] >= LOG_LEVEL_VALUES[level];
	}

	error(...args: Array<unknown>): void {
		if (!this.enabled('error')) return;
		this.console.error(...this.#prefix, ...args);
	}

	warn(...args: Array<unknown>): void {
		if (!this.enabled('warn')) return;
		this.console.warn(...this.#prefix, ...args);
	}

	info(...args: Array<unknown>): void {
		if (!this.enabled('info')) return;
		this.console.log(...this.#prefix, ...args);
	}

	debug(...args: Array<unknown>): void {
		if (!this.enabled('debug')) return;
		this.console.log(...this.#prefix, ...args);
	}
}
