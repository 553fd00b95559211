import { Command } from 'commander';
import {
  DEFAULT_ITEM_TITLE,
  loadConfig,
  parseConfig,
  readConfigFile,
  readConfigFromOnePassword,
  resolveConfigPath,
  runCommand,
  storeConfigInOnePassword,
} from './config';
import type { CommandRunner } from './config';
import { InputError } from './errors';
import { generateInvoice } from './services/generateInvoice';
import type { GenerateOptions } from './services/generateInvoice';
import type { InvoiceConfig } from './types/config';

export const PROGRAM_NAME = 'timesheet-invoice';

export interface CliOptions extends GenerateOptions {
  config?: string;
  opItem?: string;
  opAccount?: string;
}

interface StoreConfigCliOptions {
  config?: string;
  vault: string;
  title: string;
  account?: string;
}

export interface ProgramDeps {
  runner?: CommandRunner;
}

export async function loadCliConfig(options: CliOptions, runner: CommandRunner = runCommand): Promise<InvoiceConfig> {
  if (options.opItem) {
    if (options.config) {
      throw new InputError('Use either --config or --op-item, not both');
    }
    const text = await readConfigFromOnePassword(options.opItem, { account: options.opAccount, runner });
    return parseConfig(text, options.opItem);
  }

  return loadConfig(resolveConfigPath(options.config));
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const runner = deps.runner ?? runCommand;
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .enablePositionalOptions()
    .description('Generate a PDF invoice from hours worked or a CSV of line items')
    .option('--hours <hours>', 'number of hours worked')
    .option('--rate <rate>', 'hourly rate (default from config)')
    .option('--description <text>', 'description for the line item (default from config)')
    .option('--date <date>', 'invoice date in YYYY-MM-DD format (default: today)')
    .option('--csv <file>', 'CSV file with columns: hours, description, rate')
    .option('--output <file>', 'output PDF path (default: <filename_prefix>_<YYYYMMDD>.pdf)')
    .option('--config <file>', 'path to config file (default: $INVOICE_CONFIG or config.toml)')
    .option('--op-item <reference>', 'read the config from 1Password, e.g. op://Private/invoice-config/config')
    .option('--op-account <account>', '1Password account, e.g. my.1password.com')
    .action(async (options: CliOptions) => {
      const config = await loadCliConfig(options, runner);
      await generateInvoice(config, options);
    });

  program
    .command('store-config')
    .description('Store the config file in 1Password as a Secure Note')
    .option('--config <file>', 'path to config file (default: $INVOICE_CONFIG or config.toml)')
    .requiredOption('--vault <vault>', '1Password vault name')
    .option('--title <title>', 'item title in 1Password', DEFAULT_ITEM_TITLE)
    .option('--account <account>', '1Password account, e.g. my.1password.com')
    .action(async (options: StoreConfigCliOptions) => {
      const configPath = resolveConfigPath(options.config);
      const text = readConfigFile(configPath);
      // refuse to store settings that would not load later
      parseConfig(text, configPath);

      const reference = await storeConfigInOnePassword(text, {
        vault: options.vault,
        title: options.title,
        account: options.account,
        runner,
      });

      const accountFlag = options.account ? ` --op-account ${options.account}` : '';
      console.log(`\nUse with: ${PROGRAM_NAME} --hours 100 --op-item "${reference}"${accountFlag}`);
    });

  return program;
}
