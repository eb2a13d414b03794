/**
 * Minimal short-option parser.
 *
 * Options are single UTF-16 code units declared up front with `add`.
 * Values are inline only: `-ffile.txt` gives `f` the value `file.txt`,
 * and a following token is never consumed as a value.
 * There is no grouping, so `-abc` is the option `a` with the value `bc`.
 *
 * @example
 * ```ts
 * import {OptionParser} from 'shortopt/option_parser.js';
 *
 * const parser = new OptionParser();
 * parser.add('v').add('f', true);
 *
 * const result = parser.parse(process.argv.slice(2));
 * if (!result.ok) process.exit(1);
 *
 * if (parser.has('v')) console.log('verbose');
 * while (parser.has('f')) {
 *   console.log('file', parser.pop_value('f'));
 * }
 * ```
 *
 * @module
 */

import {z} from 'zod';

import {Logger, LogLevel} from './log.js';

/**
 * An option key, exactly one UTF-16 code unit, the unit `parse` reads keys in.
 */
export const OptionKey = z.string().length(1);
export type OptionKey = z.infer<typeof OptionKey>;

/**
 * An option registered with `add` before parsing.
 */
export interface DeclaredOption {
	readonly key: string;
	readonly expects_value: boolean;
}

/**
 * An occurrence of a declared option found by `parse`.
 * `value` is `''` for options that take none.
 */
export interface ParsedOption {
	readonly key: string;
	readonly value: string;
	readonly expects_value: boolean;
}

export type OptionParseFailureType =
	| 'option_expected'
	| 'unknown_option'
	| 'missing_value'
	| 'unexpected_value';

/**
 * Why a `parse` call stopped.
 */
export interface OptionParseFailure {
	type: OptionParseFailureType;
	/** The offending token. */
	token: string;
	/** Position of `token` in the scanned args. */
	index: number;
	/** `null` when the token is not an option at all. */
	key: string | null;
	/** The diagnostic line reported through `output`. */
	message: string;
}

export type OptionParseResult = {ok: true} | {ok: false; failure: OptionParseFailure};

export type OptionParserReporter = (message: string) => void;

export const OptionParserOutput = z.union([
	z.enum(['stdout', 'stderr', 'none']),
	z.custom<OptionParserReporter>((v) => typeof v === 'function', 'Expected a function'),
]);
export type OptionParserOutput = z.infer<typeof OptionParserOutput>;

export const OptionParserOptions = z.strictObject({
	/**
	 * Where diagnostics go when `parse` fails.
	 * Defaults to standard output.
	 */
	output: OptionParserOutput.default('stdout'),
	/**
	 * Level for the parser's debug tracing, falls back to `Logger.level`.
	 */
	log_level: LogLevel.optional(),
});
export type OptionParserOptions = z.input<typeof OptionParserOptions>;

/**
 * Whether `token` looks like an option: a dash followed by at least one character.
 */
export const is_option = (token: string): boolean => token.length > 1 && token[0] === '-';

const to_reporter = (output: OptionParserOutput): OptionParserReporter | null => {
	switch (output) {
		case 'stdout':
			return (message) => console.log(message); // eslint-disable-line no-console
		case 'stderr':
			return (message) => console.error(message); // eslint-disable-line no-console
		case 'none':
			return null;
		default:
			return output;
	}
};

const to_message = (type: OptionParseFailureType, token: string, key: string | null): string => {
	switch (type) {
		case 'option_expected':
			return `Expected an option, found ${token}`;
		case 'unknown_option':
			return `Unknown option '${key}'`;
		case 'missing_value':
			return `Option '${key}' expects a value`;
		case 'unexpected_value':
			return `Option '${key}' doesn't expect a value`;
	}
};

/**
 * Parses short options against a set of declarations.
 *
 * Declarations are single-use: a successful `parse` clears them,
 * so a second cycle needs its options added again.
 * Parsed options accumulate across calls until popped.
 */
export class OptionParser {
	#declared: Array<DeclaredOption> = [];
	#parsed: Array<ParsedOption> = [];
	#report: OptionParserReporter | null;
	#log: Logger;

	constructor(options?: OptionParserOptions) {
		const {output, log_level} = OptionParserOptions.parse(options ?? {});
		this.#report = to_reporter(output);
		this.#log = new Logger('option_parser', log_level);
	}

	/**
	 * Copy of the options declared since the last successful parse.
	 */
	get declared(): ReadonlyArray<DeclaredOption> {
		return this.#declared.slice();
	}

	/**
	 * Copy of the parsed options not yet popped, in argv order.
	 */
	get parsed(): ReadonlyArray<ParsedOption> {
		return this.#parsed.slice();
	}

	/**
	 * Declares an option. Duplicate keys are accepted but only the first is ever matched.
	 * @param key - one UTF-16 code unit, so astral characters such as emoji are rejected
	 * @param expects_value - whether the option requires an inline value
	 * @returns this parser for chaining
	 * @throws Error if `key` is not exactly one UTF-16 code unit
	 */
	add(key: string, expects_value = false): this {
		if (!OptionKey.safeParse(key).success) {
			throw new Error(`Option key must be a single character, got "${key}"`);
		}
		this.#declared.push({key, expects_value});
		return this;
	}

	/**
	 * Scans `args` left to right, stopping at the first invalid token.
	 * Options matched before a failure stay parsed, and the declarations
	 * are kept so the caller may inspect or retry.
	 *
	 * @param args - arguments without the program name, e.g. `process.argv.slice(2)`
	 */
	parse(args: ReadonlyArray<string>): OptionParseResult {
		for (let i = 0; i < args.length; i++) {
			const token = args[i];
			if (token === undefined || !is_option(token)) {
				return this.#fail('option_expected', token ?? '', i, null);
			}

			const key = token.charAt(1);
			const declared = this.#declared.find((o) => o.key === key);
			if (!declared) {
				return this.#fail('unknown_option', token, i, key);
			}
			this.#log.debug('found option', key);

			const has_inline_value = token.length > 2;
			if (declared.expects_value && !has_inline_value) {
				return this.#fail('missing_value', token, i, key);
			}
			if (!declared.expects_value && has_inline_value) {
				return this.#fail('unexpected_value', token, i, key);
			}

			const value = has_inline_value ? token.substring(2) : '';
			if (has_inline_value) this.#log.debug('found value', value);

			this.#parsed.push({key, value, expects_value: declared.expects_value});
		}

		this.#declared.length = 0;
		return {ok: true};
	}

	/**
	 * Like `parse` but takes the full argument vector, skipping the program name at index 0.
	 *
	 * @example
	 * ```ts
	 * parser.parse_argv(process.argv.slice(1));
	 * ```
	 */
	parse_argv(argv: ReadonlyArray<string>): OptionParseResult {
		return this.parse(argv.slice(1));
	}

	/**
	 * Whether an unpopped occurrence of `key` exists.
	 */
	has(key: string): boolean {
		return this.#parsed.some((o) => o.key === key);
	}

	/**
	 * Removes the first occurrence of `key` and returns its value.
	 * Returns `''` without changing anything when there is none,
	 * so repeated options are drained with `while (parser.has(key))`.
	 */
	pop_value(key: string): string {
		const index = this.#parsed.findIndex((o) => o.key === key);
		if (index === -1) return '';
		const [popped] = this.#parsed.splice(index, 1);
		return popped?.value ?? '';
	}

	/**
	 * Alias of `pop_value`.
	 */
	pop_argument(key: string): string {
		return this.pop_value(key);
	}

	#fail(
		type: OptionParseFailureType,
		token: string,
		index: number,
		key: string | null,
	): OptionParseResult {
		const message = to_message(type, token, key);
		this.#report?.(message);
		return {ok: false, failure: {type, token, index, key, message}};
	}
}
