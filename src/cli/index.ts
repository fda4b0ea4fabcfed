/**
 * CLI Main Program
 *
 * Commander.js program setup for the life-query CLI.
 */

import { Command } from 'commander';
import { addAskCommand } from './commands/ask.js';
import { addRebuildEmbeddingsCommand } from './commands/rebuild-embeddings.js';
import { addSpendingCommand } from './commands/spending.js';

const VERSION = '0.1.0';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('life-query')
    .description('Ask questions about your personal records')
    .version(VERSION);

  addAskCommand(program);
  addRebuildEmbeddingsCommand(program);
  addSpendingCommand(program);

  return program;
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv, { from: 'user' });
}
