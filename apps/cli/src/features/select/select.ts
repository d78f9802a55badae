import { getDefaultTaxRate } from '@lotwise/env';
import { getLogger } from '@lotwise/logger';
import type { Command } from 'commander';

import { ExitCodes } from '../shared/exit-codes.js';
import { configureCommandLogging, OutputManager } from '../shared/output.js';
import type { SelectCommandInput } from '../shared/schemas.js';

import { SelectHandler, type SelectResult } from './select-handler.js';
import { buildSelectParams, describeConfigFailure, describeSelectFailure, type RawSelectArgs } from './select-utils.js';
import {
  formatSelectionReport,
  formatTaxRatePercent,
  toSelectionReportJson,
  type SelectionReportJson,
  type SelectRunMetadata,
} from './select-view-utils.js';

const logger = getLogger('SelectCommand');

/**
 * Register the select command.
 */
export function registerSelectCommand(program: Command): void {
  program
    .command('select')
    .description('Choose lots to sell that raise a target amount while realizing the least capital gain')
    .argument(
      '<account-file>',
      'CSV with columns: Date, Fund, Transaction type, Shares transacted, Share price, Amount'
    )
    .argument('<price-file>', 'CSV with columns: Fund, Share price')
    .argument('<target>', 'Amount to raise, after tax')
    .argument('[tax-rate]', 'Flat tax rate on realized gains, e.g. 0.15 (default: LOTWISE_DEFAULT_TAX_RATE or 0)')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log diagnostics to stderr')
    .action(
      async (accountFile: string, priceFile: string, target: string, taxRate: string | undefined, rawOptions: unknown) => {
        await executeSelectCommand({ accountFile, priceFile, target, taxRate }, rawOptions);
      }
    );
}

/**
 * Execute the select command.
 */
async function executeSelectCommand(args: RawSelectArgs, rawOptions: unknown): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
  const earlyOutput = new OutputManager('select', isJsonMode ? 'json' : 'text');

  let defaultTaxRate: string | undefined;
  try {
    defaultTaxRate = getDefaultTaxRate();
  } catch (error) {
    earlyOutput.error(describeConfigFailure(error instanceof Error ? error : new Error(String(error))));
    return;
  }

  const paramsResult = buildSelectParams(args, rawOptions, defaultTaxRate);
  if (paramsResult.isErr()) {
    earlyOutput.error(describeSelectFailure(paramsResult.error));
    return;
  }

  const params = paramsResult.value;
  const output = new OutputManager('select', params.json ? 'json' : 'text');
  configureCommandLogging(params);

  output.intro('lotwise select');
  output.note(describeRequest(params), 'Request');

  try {
    const handler = new SelectHandler();
    const result = await handler.execute(params);

    if (result.isErr()) {
      output.error(describeSelectFailure(result.error));
      return;
    }

    handleSelectSuccess(output, params, result.value);
  } catch (error) {
    output.error(describeSelectFailure(error instanceof Error ? error : new Error(String(error))));
  }
}

function describeRequest(params: SelectCommandInput): string {
  const lines = [
    `Reading account information from: ${params.accountFile}`,
    `Reading fund prices from: ${params.priceFile}`,
    `Minimizing capital gains for a sale of: ${params.target.toFixed()}`,
  ];
  if (!params.taxRate.isZero()) {
    lines.push(`Applying a tax rate of ${formatTaxRatePercent(params.taxRate)}`);
  }
  return lines.join('\n');
}

/**
 * Handle a successful selection.
 */
function handleSelectSuccess(output: OutputManager, params: SelectCommandInput, result: SelectResult): void {
  logger.debug({ lotCount: result.lotCount, selected: result.report.rows.length }, 'Selection complete');

  if (output.isTextMode()) {
    if (result.skippedRows > 0) {
      output.warn(`Ignored ${result.skippedRows} account row(s) that did not add shares`);
    }
    output.outro(`Selected ${result.report.rows.length} of ${result.lotCount} lot(s)`);
    output.print(['', ...formatSelectionReport(result.report)]);
  }

  output.json<SelectionReportJson, SelectRunMetadata>(toSelectionReportJson(result.report), {
    accountFile: params.accountFile,
    lotCount: result.lotCount,
    priceFile: params.priceFile,
    skippedRows: result.skippedRows,
  });
  process.exit(ExitCodes.SUCCESS);
}
