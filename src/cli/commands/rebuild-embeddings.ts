/**
 * Rebuild Embeddings CLI Command
 */

import type { Command } from 'commander';
import { createCliEngine, type DataOptions } from '../utils/context.js';
import { formatProgress } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';

export function addRebuildEmbeddingsCommand(program: Command): void {
  program
    .command('rebuild-embeddings')
    .description('Re-ingest every record into the embedding store')
    .option('--data <file>', 'JSON records file')
    .action(async (options: DataOptions) => {
      let close: (() => void) | undefined;
      try {
        const { engine, close: closeEngine } = createCliEngine(options);
        close = closeEngine;

        const result = await engine.rebuildEmbeddings((current, total) => {
          process.stderr.write(`\r${formatProgress(current, total)}`);
        });
        process.stderr.write('\n');

        if (result.skipped) {
          console.log('A rebuild is already in progress');
          return;
        }
        console.log(`Embedded ${result.ingested} of ${result.total} records (${result.failed} failed)`);
      } catch (error) {
        handleCliError(error);
      } finally {
        close?.();
      }
    });
}
