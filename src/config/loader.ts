import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { parse, TomlError } from 'smol-toml';
import { ConfigError, extractErrorMessage } from '../errors';
import type { InvoiceConfig } from '../types/config';
import { configFileSchema, toInvoiceConfig } from './schema';

dotenv.config();

export const DEFAULT_CONFIG_FILE = 'config.toml';

// --config flag, then INVOICE_CONFIG, then ./config.toml
export function resolveConfigPath(explicit?: string, cwd = process.cwd()): string {
  return path.resolve(cwd, explicit || process.env.INVOICE_CONFIG || DEFAULT_CONFIG_FILE);
}

export function parseConfig(text: string, source: string): InvoiceConfig {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    const detail = error instanceof TomlError ? `line ${error.line}, column ${error.column}` : extractErrorMessage(error);
    throw new ConfigError(`Invalid TOML in ${source} (${detail})`);
  }

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${source}`, errors);
  }

  return toInvoiceConfig(result.data);
}

export function readConfigFile(configPath: string): string {
  try {
    return fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : null;
    if (code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    throw new ConfigError(`Cannot read config file ${configPath}: ${extractErrorMessage(error)}`);
  }
}

export function loadConfig(configPath: string): InvoiceConfig {
  return parseConfig(readConfigFile(configPath), configPath);
}
