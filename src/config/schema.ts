import { z } from 'zod';
import { parseDecimal } from '../services/money';
import type { InvoiceConfig } from '../types/config';

const requiredText = z
  .string({ required_error: 'Required', invalid_type_error: 'Expected text' })
  .trim()
  .min(1, 'Required');

const optionalText = z
  .string({ invalid_type_error: 'Expected text' })
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

// "12 Main St\nSpringfield" or ["12 Main St", "Springfield"]
const address = z
  .union([requiredText, z.array(requiredText).min(1, 'Required')], {
    errorMap: (issue, ctx) =>
      issue.code === z.ZodIssueCode.invalid_union
        ? { message: ctx.data === undefined ? 'Required' : 'Expected text or a list of lines' }
        : { message: ctx.defaultError },
  })
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(/\r?\n/)).map((line) => line.trim()).filter(Boolean),
  );

const decimal = (message: string) =>
  z
    .union([z.number(), z.string()], {
      errorMap: (_issue, ctx) => ({ message: ctx.data === undefined ? 'Required' : message }),
    })
    .transform((value, ctx) => {
      const parsed = parseDecimal(value);
      if (parsed === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message });
        return z.NEVER;
      }
      return parsed;
    });

function isCurrencyCode(code: string): boolean {
  try {
    new Intl.NumberFormat('en-US', { style: 'currency', currency: code });
    return true;
  } catch {
    return false;
  }
}

function isLocale(locale: string): boolean {
  try {
    return Intl.NumberFormat.supportedLocalesOf([locale]).length > 0;
  } catch {
    return false;
  }
}

export const configFileSchema = z.object({
  sender: z.object({
    name: requiredText,
    address,
    email: requiredText.email('Expected an email address'),
    phone: optionalText,
  }),
  client: z.object({
    name: requiredText,
    company: optionalText,
    address,
  }),
  bank: z.object({
    account_holder: optionalText,
    account_number: requiredText,
    bank_name: optionalText,
    ach_routing: optionalText,
    wire_routing: optionalText,
    swift: optionalText,
  }),
  invoice: z.object({
    default_rate: decimal('Expected a decimal rate'),
    default_description: requiredText,
    filename_prefix: requiredText.regex(/^[^\\/:*?"<>|]+$/, 'Must not contain path separators'),
    number_prefix: z.string({ invalid_type_error: 'Expected text' }).default('INV-'),
    currency: requiredText
      .transform((code) => code.toUpperCase())
      .refine(isCurrencyCode, 'Expected a 3-letter currency code')
      .default('USD'),
    locale: requiredText.refine(isLocale, 'Unsupported locale').default('en-US'),
    tax_rate: decimal('Expected a decimal percentage').default(0),
  }),
});

export function toInvoiceConfig(file: z.output<typeof configFileSchema>): InvoiceConfig {
  const { sender, client, bank, invoice } = file;

  return {
    sender,
    client,
    bank: {
      accountHolder: bank.account_holder ?? sender.name,
      accountNumber: bank.account_number,
      bankName: bank.bank_name,
      achRouting: bank.ach_routing,
      wireRouting: bank.wire_routing,
      swift: bank.swift,
    },
    invoice: {
      defaultRate: invoice.default_rate,
      defaultDescription: invoice.default_description,
      filenamePrefix: invoice.filename_prefix,
      numberPrefix: invoice.number_prefix,
      currency: invoice.currency,
      locale: invoice.locale,
      taxRate: invoice.tax_rate,
    },
  };
}
