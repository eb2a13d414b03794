import {OptionParser, type OptionParserReporter} from './option_parser.js';

export const SHORTOPT_VERSION = '0.1.0';

export const CLI_EXAMPLE_USAGE = [
	'Usage: shortopt-example [OPTION]',
	'  -v        show version information',
	'  -f<file>  process <file>',
] as const;

/**
 * Example host program: help, version, and a repeatable file option.
 *
 * @param argv - full argument vector, index 0 is the program name
 * @param out - receives each output line, including parse diagnostics
 * @returns the process exit code
 */
export const cli_example_run = (
	argv: ReadonlyArray<string>,
	out: OptionParserReporter = console.log, // eslint-disable-line no-console
): number => {
	const parser = new OptionParser({output: out});
	parser.add('h').add('v').add('f', true);

	if (!parser.parse_argv(argv).ok) {
		return 1;
	}

	if (parser.has('h')) {
		for (const line of CLI_EXAMPLE_USAGE) out(line);
		return 0;
	}

	if (parser.has('v')) {
		out(`version ${SHORTOPT_VERSION}`);
	}

	while (parser.has('f')) {
		out(`processing '${parser.pop_value('f')}'`);
	}

	return 0;
};
