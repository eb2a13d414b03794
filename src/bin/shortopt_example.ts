#!/usr/bin/env node

import {cli_example_run} from '../lib/cli_example.js';

process.exitCode = cli_example_run(process.argv.slice(1));
