import { RenderError } from '../errors';
import type { Invoice } from '../types/invoice';
import { formatInvoiceDate } from './invoiceBuilder';
import { formatCurrencyFromCents, formatHours, formatRate } from './money';

export type FontName = 'Helvetica' | 'Helvetica-Bold' | 'Helvetica-Oblique' | 'Helvetica-BoldOblique';
export type TextAlign = 'left' | 'center' | 'right';

export interface TextOp {
  kind: 'text';
  text: string;
  x: number;
  y: number;
  width: number;
  font: FontName;
  size: number;
  align: TextAlign;
  color: string;
}

export interface LineOp {
  kind: 'line';
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  lineWidth: number;
}

export interface RectOp {
  kind: 'rect';
  x: number;
  y: number;
  width: number;
  height: number;
  lineWidth: number;
}

export type DrawOp = TextOp | LineOp | RectOp;

export interface InvoiceLayout {
  /** Page size in points, US Letter. */
  size: [number, number];
  ops: DrawOp[];
}

const INCH = 72;
const PAGE_WIDTH = 8.5 * INCH;
const PAGE_HEIGHT = 11 * INCH;
const MARGIN_X = 0.75 * INCH;
const MARGIN_Y = 0.5 * INCH;
const CONTENT_WIDTH = PAGE_WIDTH - 2 * MARGIN_X;

const LEADING = 14;
const ROW_HEIGHT = 18;
const CELL_PADDING_X = 6;
const CELL_PADDING_Y = 4;
const MIN_ITEM_ROWS = 7;

export const TABLE_HEADERS = ['Hours', 'Description', 'Rate', 'Amount'];
const COLUMN_WIDTHS = [0.8 * INCH, 4.0 * INCH, 1.0 * INCH, 1.2 * INCH];

const BLACK = '#000000';
const GREY = '#808080';

const FOOTER_SIZE = 8;
const FOOTER_Y = PAGE_HEIGHT - MARGIN_Y - FOOTER_SIZE - 2;
const FOOTER_GAP = 0.2 * INCH;

function columnX(index: number): number {
  return MARGIN_X + COLUMN_WIDTHS.slice(0, index).reduce((acc, width) => acc + width, 0);
}

class LayoutBuilder {
  readonly ops: DrawOp[] = [];

  text(text: string, x: number, y: number, width: number, style: Partial<Pick<TextOp, 'font' | 'size' | 'align' | 'color'>> = {}): void {
    this.ops.push({
      kind: 'text',
      text,
      x,
      y,
      width,
      font: style.font ?? 'Helvetica',
      size: style.size ?? 10,
      align: style.align ?? 'left',
      color: style.color ?? BLACK,
    });
  }

  line(x1: number, y1: number, x2: number, y2: number, lineWidth = 0.5): void {
    this.ops.push({ kind: 'line', x1, y1, x2, y2, lineWidth });
  }

  rect(x: number, y: number, width: number, height: number, lineWidth = 0.5): void {
    this.ops.push({ kind: 'rect', x, y, width, height, lineWidth });
  }

  /** Stacked lines at LEADING; returns the height used. */
  block(lines: string[], x: number, y: number, width: number, style: Partial<Pick<TextOp, 'font' | 'size' | 'align' | 'color'>> = {}): number {
    lines.forEach((line, index) => this.text(line, x, y + index * LEADING, width, style));
    return lines.length * LEADING;
  }

  cell(text: string, column: number, rowY: number, style: Partial<Pick<TextOp, 'font' | 'align'>> = {}): void {
    this.text(text, columnX(column) + CELL_PADDING_X, rowY + CELL_PADDING_Y, COLUMN_WIDTHS[column] - 2 * CELL_PADDING_X, style);
  }
}

function senderLines(invoice: Invoice): string[] {
  const { sender } = invoice.config;
  return [sender.name, ...sender.address, sender.email, ...(sender.phone ? [sender.phone] : [])];
}

function clientLines(invoice: Invoice): string[] {
  const { client } = invoice.config;
  return [client.name, ...(client.company ? [client.company] : []), ...client.address];
}

function bankLines(invoice: Invoice): string[] {
  const { bank } = invoice.config;
  const lines: string[] = [];
  if (bank.bankName) lines.push(`Bank: ${bank.bankName}`);
  lines.push(`Account Number: ${bank.accountNumber}`);
  if (bank.achRouting) lines.push(`ACH Routing Number: ${bank.achRouting}`);
  if (bank.wireRouting) lines.push(`Wire Routing Number: ${bank.wireRouting}`);
  if (bank.swift) lines.push(`SWIFT/BIC: ${bank.swift}`);
  return lines;
}

export function footerLine(invoice: Invoice): string {
  const { sender } = invoice.config;
  const parts = [sender.name, sender.address.join(', ')];
  if (sender.phone) parts.push(`Phone ${sender.phone}`);
  parts.push(sender.email);
  return parts.join(' ');
}

/** Money rows under the table: Subtotal and Tax only when a tax rate applies. */
function totalRows(invoice: Invoice): Array<[string, string]> {
  const { currency, locale, taxRate } = invoice.config.invoice;
  const money = (cents: bigint) => formatCurrencyFromCents(cents, currency, locale);
  const rows: Array<[string, string]> = [];

  if (taxRate !== 0n) {
    rows.push(['Subtotal', money(invoice.subtotalCents)]);
    rows.push(['Tax', money(invoice.taxCents)]);
  }
  rows.push(['Total', money(invoice.totalCents)]);
  return rows;
}

/**
 * Place every element of the single-page invoice. Throws RenderError when the
 * items push the closing lines into the footer.
 */
export function layoutInvoice(invoice: Invoice): InvoiceLayout {
  const { currency, locale } = invoice.config.invoice;
  const builder = new LayoutBuilder();
  const halfWidth = CONTENT_WIDTH / 2;
  const right = MARGIN_X + CONTENT_WIDTH;
  let y = MARGIN_Y;

  // Header: sender on the left, title and meta on the right
  const senderHeight = builder.block(senderLines(invoice), MARGIN_X, y, halfWidth);
  builder.text('INVOICE', MARGIN_X + halfWidth, y, halfWidth, { font: 'Helvetica-Bold', size: 28, align: 'right', color: GREY });
  const metaHeight =
    40 +
    builder.block(
      [`Date: ${formatInvoiceDate(invoice.date)}`, `Invoice #: ${invoice.number}`],
      MARGIN_X + halfWidth,
      y + 40,
      halfWidth,
      { align: 'right' },
    );
  y += Math.max(senderHeight, metaHeight) + 0.3 * INCH;

  builder.text('Bill To:', MARGIN_X, y, CONTENT_WIDTH, { font: 'Helvetica-Bold' });
  y += LEADING;
  builder.line(MARGIN_X, y, right, y, 1);
  y += 6;
  y += builder.block(clientLines(invoice), MARGIN_X, y, CONTENT_WIDTH) + 0.25 * INCH;

  // Line-item table
  const tableTop = y;
  TABLE_HEADERS.forEach((header, column) =>
    builder.cell(header, column, tableTop, { font: 'Helvetica-Bold', align: column === 3 ? 'right' : 'left' }),
  );

  invoice.items.forEach((item, index) => {
    const rowY = tableTop + (index + 1) * ROW_HEIGHT;
    builder.cell(item.hours === 0n ? '' : formatHours(item.hours), 0, rowY);
    builder.cell(item.description, 1, rowY);
    builder.cell(formatRate(item.rate, currency, locale), 2, rowY);
    builder.cell(formatCurrencyFromCents(item.amountCents, currency, locale), 3, rowY, { align: 'right' });
  });

  // header plus the item rows, padded with empty ruled rows
  const gridRows = 1 + Math.max(invoice.items.length, MIN_ITEM_ROWS);
  for (let row = 0; row <= gridRows; row++) {
    const rowY = tableTop + row * ROW_HEIGHT;
    builder.line(MARGIN_X, rowY, right, rowY);
  }
  y = tableTop + gridRows * ROW_HEIGHT;
  for (let column = 0; column <= COLUMN_WIDTHS.length; column++) {
    const x = columnX(column);
    builder.line(x, tableTop, x, y);
  }

  const totalsX = columnX(2);
  for (const [label, value] of totalRows(invoice)) {
    builder.rect(totalsX, y, right - totalsX, ROW_HEIGHT);
    builder.cell(label, 2, y, { font: 'Helvetica-Bold' });
    builder.cell(value, 3, y, { font: 'Helvetica-Bold', align: 'right' });
    y += ROW_HEIGHT;
  }
  y += 0.3 * INCH;

  // Payment details
  y += builder.block(bankLines(invoice), MARGIN_X, y, CONTENT_WIDTH, { align: 'center' }) + 0.2 * INCH;
  builder.text(`Make all checks payable to ${invoice.config.bank.accountHolder}`, MARGIN_X, y, CONTENT_WIDTH, {
    font: 'Helvetica-Oblique',
    size: 9,
    align: 'center',
    color: GREY,
  });
  y += 9 + 0.15 * INCH;
  builder.text('Thank you for your business!', MARGIN_X, y, CONTENT_WIDTH, { font: 'Helvetica-BoldOblique', align: 'center' });
  y += LEADING;

  const limit = FOOTER_Y - FOOTER_GAP;
  if (y > limit) {
    const fits = invoice.items.length - Math.ceil((y - limit) / ROW_HEIGHT);
    throw new RenderError(
      `Invoice has ${invoice.items.length} line items; at most ${Math.max(fits, 0)} fit on a single page`,
    );
  }

  builder.text(footerLine(invoice), MARGIN_X, FOOTER_Y, CONTENT_WIDTH, { size: FOOTER_SIZE, align: 'center' });

  return { size: [PAGE_WIDTH, PAGE_HEIGHT], ops: builder.ops };
}
