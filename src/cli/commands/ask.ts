/**
 * Ask CLI Command
 *
 * Routes one question and prints the rendered answer.
 */

import type { Command } from 'commander';
import { createCliEngine, type DataOptions } from '../utils/context.js';
import { formatJson } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { toResponseText } from '../../services/processing/response-text.js';

interface AskOptions extends DataOptions {
  json?: boolean;
}

export function addAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Answer a question about your records')
    .argument('<query>', 'Question in English or Chinese')
    .option('--data <file>', 'JSON records file')
    .option('--json', 'Print the full processing result as JSON')
    .action(async (query: string, options: AskOptions) => {
      let close: (() => void) | undefined;
      try {
        const { engine, close: closeEngine } = createCliEngine(options);
        close = closeEngine;

        const result = await engine.routeAndProcess(query);
        console.log(options.json ? formatJson(result) : toResponseText(result));
      } catch (error) {
        handleCliError(error);
      } finally {
        close?.();
      }
    });
}
