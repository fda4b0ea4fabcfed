/**
 * Spending CLI Command
 */

import { Option, type Command } from 'commander';
import { z } from 'zod';
import { createCliEngine, type DataOptions } from '../utils/context.js';
import { formatJson } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { TIME_PERIODS } from '../../core/types.js';
import { timeRangeForPeriod } from '../../services/query/time-range.js';
import { formatSpendingAnalysis } from '../../services/aggregation/spending-summary.js';

interface SpendingOptions extends DataOptions {
  period: string;
  json?: boolean;
}

const periodSchema = z.enum(TIME_PERIODS);

export function addSpendingCommand(program: Command): void {
  program
    .command('spending')
    .description('Summarize expenses for a period')
    .option('--data <file>', 'JSON records file')
    .addOption(new Option('--period <period>', 'Named period').choices(TIME_PERIODS).default('thisMonth'))
    .option('--json', 'Print the analysis as JSON')
    .action(async (options: SpendingOptions) => {
      let close: (() => void) | undefined;
      try {
        const { engine, close: closeEngine } = createCliEngine(options);
        close = closeEngine;

        const period = periodSchema.parse(options.period);
        const analysis = await engine.aggregator.analyzeSpending(timeRangeForPeriod(period, new Date()));
        console.log(options.json ? formatJson(analysis) : formatSpendingAnalysis(analysis));
      } catch (error) {
        handleCliError(error);
      } finally {
        close?.();
      }
    });
}
