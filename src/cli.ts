#!/usr/bin/env node
// CLI entry point for life-query

import { runCli } from './cli/index.js';
import { handleCliError } from './cli/utils/errors.js';

runCli(process.argv.slice(2)).catch(handleCliError);
