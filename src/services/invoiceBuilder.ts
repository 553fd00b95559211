import path from 'path';
import { format, isValid, parse } from 'date-fns';
import { InputError } from '../errors';
import type { InvoiceConfig } from '../types/config';
import type { Invoice, LineItem } from '../types/invoice';
import { lineAmountCents, percentOfCents } from './money';

const DATE_INPUT_FORMAT = 'yyyy-MM-dd';

export function parseInvoiceDate(value?: string, today = new Date()): Date {
  if (value === undefined) {
    return new Date(today.getFullYear(), today.getMonth(), today.getDate());
  }

  const trimmed = value.trim();
  const date = parse(trimmed, DATE_INPUT_FORMAT, today);
  // date-fns accepts "2025-1-2"; the round trip keeps the input strictly YYYY-MM-DD
  if (!isValid(date) || format(date, DATE_INPUT_FORMAT) !== trimmed) {
    throw new InputError(`Invalid date "${value}": expected YYYY-MM-DD`);
  }
  return date;
}

export function formatInvoiceDate(date: Date): string {
  return format(date, 'MMMM d, yyyy');
}

export function invoiceNumber(prefix: string, date: Date): string {
  return `${prefix}${format(date, DATE_INPUT_FORMAT)}`;
}

/** {prefix}_{YYYYMMDD}.pdf in INVOICE_OUTPUT_DIR, or the working directory. */
export function defaultOutputPath(prefix: string, date: Date, dir = process.env.INVOICE_OUTPUT_DIR || process.cwd()): string {
  return path.resolve(dir, `${prefix}_${format(date, 'yyyyMMdd')}.pdf`);
}

export function buildInvoice(config: InvoiceConfig, items: LineItem[], date: Date): Invoice {
  if (items.length === 0) {
    throw new InputError('An invoice needs at least one line item');
  }

  const priced = items.map((item) => ({ ...item, amountCents: lineAmountCents(item.hours, item.rate) }));
  const subtotalCents = priced.reduce((acc, item) => acc + item.amountCents, 0n);
  const taxCents = percentOfCents(subtotalCents, config.invoice.taxRate);

  return {
    date,
    number: invoiceNumber(config.invoice.numberPrefix, date),
    items: priced,
    subtotalCents,
    taxCents,
    totalCents: subtotalCents + taxCents,
    config,
  };
}
