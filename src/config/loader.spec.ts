import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../errors';
import { TEST_CONFIG_TOML } from '../fixtures/config';
import { loadConfig, parseConfig, resolveConfigPath } from './loader';

function configErrors(text: string): string[] {
  try {
    parseConfig(text, 'test.toml');
  } catch (error) {
    if (error instanceof ConfigError) return error.errors;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

function withInvoiceKeys(extra: string): string {
  return TEST_CONFIG_TOML.replace('[invoice]\n', `[invoice]\n${extra}\n`);
}

describe('parseConfig', () => {
  it('maps the file onto the invoice settings', () => {
    const config = parseConfig(TEST_CONFIG_TOML, 'test.toml');

    expect(config.sender).toEqual({
      name: 'Jane Doe Consulting',
      address: ['12 Example Street', 'Springfield, ST 00000'],
      email: 'billing@example.com',
      phone: '555-0100',
    });
    expect(config.client).toEqual({
      name: 'John Smith',
      company: 'Example Corp',
      address: ['1 Client Way', 'Metropolis, ST 00001'],
    });
    expect(config.bank).toEqual({
      accountHolder: 'Jane Doe Consulting',
      accountNumber: '000123456789',
      bankName: 'Example Bank',
      achRouting: '000000001',
      wireRouting: '000000002',
      swift: null,
    });
    expect(config.invoice).toEqual({
      defaultRate: 1500000n,
      defaultDescription: 'Consulting Services',
      filenamePrefix: 'Invoice_Example',
      numberPrefix: 'EX-',
      currency: 'USD',
      locale: 'en-US',
      taxRate: 0n,
    });
  });

  it('reads optional invoice settings', () => {
    const config = parseConfig(withInvoiceKeys('currency = "eur"\nlocale = "de-DE"\ntax_rate = "19"'), 'test.toml');

    expect(config.invoice.currency).toBe('EUR');
    expect(config.invoice.locale).toBe('de-DE');
    expect(config.invoice.taxRate).toBe(190000n);
  });

  it('accepts a decimal rate written as text', () => {
    const text = TEST_CONFIG_TOML.replace('default_rate = 150', 'default_rate = "162.50"');

    expect(parseConfig(text, 'test.toml').invoice.defaultRate).toBe(1625000n);
  });

  it('names a missing field', () => {
    const text = TEST_CONFIG_TOML.replace('email = "billing@example.com"\n', '');

    expect(configErrors(text)).toEqual(['sender.email: Required']);
  });

  it('names a missing section', () => {
    const text = TEST_CONFIG_TOML.replace(/\[bank\][\s\S]*?(?=\[invoice\])/, '');

    expect(configErrors(text)).toEqual(['bank: Required']);
  });

  it('reports every invalid value', () => {
    const text = TEST_CONFIG_TOML.replace('default_rate = 150', 'default_rate = "a lot"').replace(
      'filename_prefix = "Invoice_Example"',
      'filename_prefix = "out/Invoice"',
    );

    expect(configErrors(text)).toEqual([
      'invoice.default_rate: Expected a decimal rate',
      'invoice.filename_prefix: Must not contain path separators',
    ]);
  });

  it('rejects a malformed currency code', () => {
    expect(configErrors(withInvoiceKeys('currency = "DOLLARS"'))).toEqual([
      'invoice.currency: Expected a 3-letter currency code',
    ]);
  });

  it('includes the field list in the message', () => {
    const text = TEST_CONFIG_TOML.replace('name = "John Smith"\n', '');

    expect(() => parseConfig(text, 'test.toml')).toThrow('Invalid configuration in test.toml\n  client.name: Required');
  });

  it('rejects invalid TOML', () => {
    expect(() => parseConfig('[sender\nname = 1', 'test.toml')).toThrow(/^Invalid TOML in test\.toml \(line \d+, column \d+\)$/);
  });
});

describe('loadConfig', () => {
  it('reads a config file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'invoice-config-'));
    const configPath = path.join(dir, 'config.toml');
    fs.writeFileSync(configPath, TEST_CONFIG_TOML);

    try {
      expect(loadConfig(configPath).client.name).toBe('John Smith');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('fails when the file is missing', () => {
    const configPath = path.join(os.tmpdir(), 'no-such-invoice-config.toml');

    expect(() => loadConfig(configPath)).toThrow(ConfigError);
    expect(() => loadConfig(configPath)).toThrow(`Config file not found: ${configPath}`);
  });
});

describe('resolveConfigPath', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('prefers the explicit path', () => {
    vi.stubEnv('INVOICE_CONFIG', 'env.toml');

    expect(resolveConfigPath('custom.toml', '/work')).toBe(path.resolve('/work', 'custom.toml'));
  });

  it('falls back to INVOICE_CONFIG, then config.toml', () => {
    vi.stubEnv('INVOICE_CONFIG', 'env.toml');
    expect(resolveConfigPath(undefined, '/work')).toBe(path.resolve('/work', 'env.toml'));

    vi.stubEnv('INVOICE_CONFIG', '');
    expect(resolveConfigPath(undefined, '/work')).toBe(path.resolve('/work', 'config.toml'));
  });
});
