import type { InvoiceConfig } from './config';

/** Hours and rate are fixed-point values scaled by DECIMAL_SCALE. */
export interface LineItem {
  hours: bigint;
  description: string;
  rate: bigint;
}

export interface PricedLineItem extends LineItem {
  amountCents: bigint;
}

export interface Invoice {
  date: Date;
  number: string;
  items: PricedLineItem[];
  subtotalCents: bigint;
  taxCents: bigint;
  totalCents: bigint;
  config: InvoiceConfig;
}

export interface LineItemDefaults {
  rate: bigint;
  description: string;
}
