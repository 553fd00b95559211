import fs from 'fs';
import path from 'path';
import PDFDocument from 'pdfkit';
import { RenderError, extractErrorMessage } from '../errors';
import type { Invoice } from '../types/invoice';
import type { DrawOp } from './invoiceLayout';
import { layoutInvoice } from './invoiceLayout';

function draw(doc: PDFKit.PDFDocument, op: DrawOp): void {
  switch (op.kind) {
    case 'text':
      // height keeps every cell on one line; overflow ends in an ellipsis
      doc
        .font(op.font)
        .fontSize(op.size)
        .fillColor(op.color)
        .text(op.text, op.x, op.y, { width: op.width, height: op.size * 1.5, align: op.align, ellipsis: true });
      break;
    case 'line':
      doc.moveTo(op.x1, op.y1).lineTo(op.x2, op.y2).lineWidth(op.lineWidth).strokeColor('#000000').stroke();
      break;
    case 'rect':
      doc.rect(op.x, op.y, op.width, op.height).lineWidth(op.lineWidth).strokeColor('#000000').stroke();
      break;
  }
}

export async function renderInvoicePdf(invoice: Invoice): Promise<Buffer> {
  const layout = layoutInvoice(invoice);

  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: layout.size,
      margin: 0,
      info: {
        Title: `Invoice ${invoice.number}`,
        Author: invoice.config.sender.name,
        CreationDate: invoice.date,
      },
    });
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('error', reject);
    doc.on('end', () => resolve(Buffer.concat(chunks)));

    for (const op of layout.ops) {
      draw(doc, op);
    }
    doc.end();
  });
}

/** Render and write the invoice, creating the output directory when needed. */
export async function writeInvoicePdf(invoice: Invoice, outputPath: string): Promise<string> {
  const pdf = await renderInvoicePdf(invoice);
  const resolved = path.resolve(outputPath);

  try {
    await fs.promises.mkdir(path.dirname(resolved), { recursive: true });
    await fs.promises.writeFile(resolved, pdf);
  } catch (error) {
    throw new RenderError(`Cannot write ${resolved}: ${extractErrorMessage(error)}`);
  }

  return resolved;
}
