import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildProgram, loadCliConfig } from './cli';
import type { CommandRunner } from './config';
import { ConfigError, InputError } from './errors';
import { TEST_CONFIG_TOML } from './fixtures/config';

const OP_REFERENCE = 'op://Private/invoice-config/config';

describe('timesheet-invoice', () => {
  let dir: string;
  let configPath: string;

  function run(...args: string[]): Promise<unknown> {
    return buildProgram().parseAsync(['node', 'timesheet-invoice', ...args]);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'invoice-cli-'));
    configPath = path.join(dir, 'config.toml');
    fs.writeFileSync(configPath, TEST_CONFIG_TOML);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes an invoice for a number of hours', async () => {
    const output = path.join(dir, 'out.pdf');

    await run('--hours', '200', '--date', '2025-12-02', '--config', configPath, '--output', output);

    expect(fs.readFileSync(output).subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(console.log).toHaveBeenCalledWith('Invoice EX-2025-12-02: items=1, total=30000.00 USD');
    expect(console.log).toHaveBeenCalledWith(`Invoice created: ${output}`);
  });

  it('names the file after the prefix and date by default', async () => {
    vi.stubEnv('INVOICE_OUTPUT_DIR', dir);

    await run('--hours', '8', '--date', '2025-12-02', '--config', configPath);

    expect(fs.existsSync(path.join(dir, 'Invoice_Example_20251202.pdf'))).toBe(true);
  });

  it('totals the rows of a CSV file', async () => {
    const csvPath = path.join(dir, 'hours.csv');
    fs.writeFileSync(csvPath, 'hours,description,rate\n100,Development,150\n50,Code review,150\n');

    await run('--csv', csvPath, '--date', '2025-12-02', '--config', configPath, '--output', path.join(dir, 'csv.pdf'));

    expect(console.log).toHaveBeenCalledWith('Invoice EX-2025-12-02: items=2, total=22500.00 USD');
  });

  it('writes nothing when the config is incomplete', async () => {
    fs.writeFileSync(configPath, TEST_CONFIG_TOML.replace('email = "billing@example.com"\n', ''));
    const output = path.join(dir, 'out.pdf');

    await expect(run('--hours', '200', '--config', configPath, '--output', output)).rejects.toBeInstanceOf(ConfigError);
    expect(fs.existsSync(output)).toBe(false);
  });

  it('rejects --hours together with --csv', async () => {
    const output = path.join(dir, 'out.pdf');

    await expect(run('--hours', '1', '--csv', 'hours.csv', '--config', configPath, '--output', output)).rejects.toThrow(
      'Use either --hours or --csv, not both',
    );
    expect(fs.existsSync(output)).toBe(false);
  });

  it('reads the config from 1Password', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: TEST_CONFIG_TOML, stderr: '' });
    const output = path.join(dir, 'op.pdf');

    await buildProgram({ runner }).parseAsync([
      'node',
      'timesheet-invoice',
      '--hours',
      '10',
      '--date',
      '2025-12-02',
      '--op-item',
      OP_REFERENCE,
      '--output',
      output,
    ]);

    expect(runner).toHaveBeenCalledWith('op', ['read', OP_REFERENCE]);
    expect(console.log).toHaveBeenCalledWith('Invoice EX-2025-12-02: items=1, total=1500.00 USD');
  });

  it('stores a validated config in 1Password', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: '', stderr: '' });

    await buildProgram({ runner }).parseAsync([
      'node',
      'timesheet-invoice',
      'store-config',
      '--config',
      configPath,
      '--vault',
      'Private',
      '--account',
      'my.1password.com',
    ]);

    expect(runner).toHaveBeenLastCalledWith('op', [
      'item',
      'edit',
      'invoice-config',
      '--vault',
      'Private',
      `config[text]=${TEST_CONFIG_TOML}`,
      '--account',
      'my.1password.com',
    ]);
    expect(console.log).toHaveBeenLastCalledWith(
      `\nUse with: timesheet-invoice --hours 100 --op-item "${OP_REFERENCE}" --op-account my.1password.com`,
    );
  });

  it('refuses to store a config that does not load', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: '', stderr: '' });
    fs.writeFileSync(configPath, '[sender]\nname = "Only a name"\n');

    await expect(
      buildProgram({ runner }).parseAsync(['node', 'timesheet-invoice', 'store-config', '--config', configPath, '--vault', 'Private']),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(runner).not.toHaveBeenCalled();
  });
});

describe('loadCliConfig', () => {
  it('rejects --config together with --op-item', async () => {
    const runner = vi.fn<CommandRunner>();

    await expect(loadCliConfig({ config: 'config.toml', opItem: OP_REFERENCE }, runner)).rejects.toBeInstanceOf(InputError);
    expect(runner).not.toHaveBeenCalled();
  });
});
