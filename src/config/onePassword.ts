import { execFile } from 'child_process';
import { promisify } from 'util';
import { ConfigError } from '../errors';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, { encoding: 'utf8', maxBuffer: 10 * 1024 * 1024 });
  return { stdout, stderr };
};

const OP_BINARY = 'op';
export const DEFAULT_ITEM_TITLE = 'invoice-config';
export const CONFIG_FIELD = 'config';

export interface OnePasswordOptions {
  account?: string;
  runner?: CommandRunner;
}

export interface StoreConfigOptions extends OnePasswordOptions {
  vault: string;
  title?: string;
}

function accountArgs(account?: string): string[] {
  return account ? ['--account', account] : [];
}

function describeFailure(error: unknown): string {
  if (error && typeof error === 'object') {
    if ('code' in error && error.code === 'ENOENT') {
      return '1Password CLI (op) not found. Install it from https://1password.com/downloads/command-line/';
    }
    if ('stderr' in error && typeof error.stderr === 'string' && error.stderr.trim()) {
      return error.stderr.trim();
    }
  }
  return error instanceof Error ? error.message : String(error);
}

export function secretReference(vault: string, title: string): string {
  return `op://${vault}/${title}/${CONFIG_FIELD}`;
}

/** Fetch the TOML text stored under an op:// reference. */
export async function readConfigFromOnePassword(reference: string, options: OnePasswordOptions = {}): Promise<string> {
  const { account, runner = runCommand } = options;

  try {
    const { stdout } = await runner(OP_BINARY, ['read', reference, ...accountArgs(account)]);
    return stdout;
  } catch (error) {
    throw new ConfigError(`Failed to read ${reference} from 1Password: ${describeFailure(error)}`);
  }
}

async function itemExists(vault: string, title: string, options: OnePasswordOptions): Promise<boolean> {
  const { account, runner = runCommand } = options;
  try {
    await runner(OP_BINARY, ['item', 'get', title, '--vault', vault, ...accountArgs(account)]);
    return true;
  } catch (error) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigError(describeFailure(error));
    }
    return false;
  }
}

/**
 * Store config text as a Secure Note, editing the item when it already exists.
 * Returns the op:// reference to pass back through --op-item.
 */
export async function storeConfigInOnePassword(configText: string, options: StoreConfigOptions): Promise<string> {
  const { vault, title = DEFAULT_ITEM_TITLE, account, runner = runCommand } = options;
  const field = `${CONFIG_FIELD}[text]=${configText}`;

  const exists = await itemExists(vault, title, options);
  const args = exists
    ? ['item', 'edit', title, '--vault', vault, field, ...accountArgs(account)]
    : ['item', 'create', '--category', 'Secure Note', '--vault', vault, '--title', title, field, ...accountArgs(account)];

  try {
    await runner(OP_BINARY, args);
  } catch (error) {
    throw new ConfigError(`Failed to store in 1Password: ${describeFailure(error)}`);
  }

  const reference = secretReference(vault, title);
  console.log(`Config ${exists ? 'updated' : 'stored'} in 1Password: ${reference}`);
  return reference;
}
