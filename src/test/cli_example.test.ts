import {describe, test, assert, expect} from 'vitest';

import {cli_example_run, CLI_EXAMPLE_USAGE, SHORTOPT_VERSION} from '$lib/cli_example.js';

const run = (...args: Array<string>): {code: number; lines: Array<string>} => {
	const lines: Array<string> = [];
	const code = cli_example_run(['shortopt-example', ...args], (line) => lines.push(line));
	return {code, lines};
};

describe('cli_example_run', () => {
	test('no arguments prints nothing', () => {
		expect(run()).toEqual({code: 0, lines: []});
	});

	test('help prints usage and stops', () => {
		const {code, lines} = run('-v', '-h', '-fa.txt');
		assert.strictEqual(code, 0);
		expect(lines).toEqual([...CLI_EXAMPLE_USAGE]);
	});

	test('version', () => {
		expect(run('-v')).toEqual({code: 0, lines: [`version ${SHORTOPT_VERSION}`]});
	});

	test('processes every file in order after the version', () => {
		expect(run('-fa.txt', '-v', '-fb.txt')).toEqual({
			code: 0,
			lines: ['version 0.1.0', "processing 'a.txt'", "processing 'b.txt'"],
		});
	});

	test('parse failure exits 1 with the diagnostic', () => {
		expect(run('-f')).toEqual({code: 1, lines: ["Option 'f' expects a value"]});
		expect(run('-q')).toEqual({code: 1, lines: ["Unknown option 'q'"]});
		expect(run('a.txt')).toEqual({code: 1, lines: ['Expected an option, found a.txt']});
	});
});
