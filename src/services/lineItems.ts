import { InputError } from '../errors';
import type { InvoiceDefaults } from '../types/config';
import type { LineItem, LineItemDefaults } from '../types/invoice';
import { loadLineItemsFromCsv } from './csvParser';
import { describeInvalidDecimal, parseDecimal } from './money';

export interface LineItemOptions {
  hours?: string;
  rate?: string;
  description?: string;
  csv?: string;
}

function parseFlag(name: string, value: string): bigint {
  const parsed = parseDecimal(value);
  if (parsed === null) {
    throw new InputError(`--${name} "${value}" ${describeInvalidDecimal(value)}`);
  }
  return parsed;
}

/** --rate/--description override the configured defaults for every item. */
export function lineItemDefaults(options: Pick<LineItemOptions, 'rate' | 'description'>, invoice: InvoiceDefaults): LineItemDefaults {
  return {
    rate: options.rate !== undefined ? parseFlag('rate', options.rate) : invoice.defaultRate,
    description: options.description?.trim() || invoice.defaultDescription,
  };
}

export function singleLineItem(hours: string, defaults: LineItemDefaults): LineItem {
  return {
    hours: parseFlag('hours', hours),
    description: defaults.description,
    rate: defaults.rate,
  };
}

export function resolveLineItems(options: LineItemOptions, invoice: InvoiceDefaults): LineItem[] {
  if (options.csv !== undefined && options.hours !== undefined) {
    throw new InputError('Use either --hours or --csv, not both');
  }

  const defaults = lineItemDefaults(options, invoice);

  if (options.csv !== undefined) {
    return loadLineItemsFromCsv(options.csv, defaults);
  }
  if (options.hours !== undefined) {
    return [singleLineItem(options.hours, defaults)];
  }

  throw new InputError('Must provide either --hours or --csv');
}
