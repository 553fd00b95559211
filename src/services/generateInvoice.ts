import type { InvoiceConfig } from '../types/config';
import type { Invoice } from '../types/invoice';
import { buildInvoice, defaultOutputPath, parseInvoiceDate } from './invoiceBuilder';
import type { LineItemOptions } from './lineItems';
import { resolveLineItems } from './lineItems';
import { centsToDecimalString } from './money';
import { writeInvoicePdf } from './pdfRenderer';

export interface GenerateOptions extends LineItemOptions {
  date?: string;
  output?: string;
}

export interface GenerateResult {
  invoice: Invoice;
  outputPath: string;
}

export async function generateInvoice(config: InvoiceConfig, options: GenerateOptions): Promise<GenerateResult> {
  const date = parseInvoiceDate(options.date);
  const items = resolveLineItems(options, config.invoice);
  const invoice = buildInvoice(config, items, date);

  const target = options.output || defaultOutputPath(config.invoice.filenamePrefix, date);
  const outputPath = await writeInvoicePdf(invoice, target);

  console.log(
    `Invoice ${invoice.number}: items=${invoice.items.length}, total=${centsToDecimalString(invoice.totalCents)} ${config.invoice.currency}`,
  );
  console.log(`Invoice created: ${outputPath}`);

  return { invoice, outputPath };
}
