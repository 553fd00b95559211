import fs from 'fs';
import * as XLSX from 'xlsx';
import { InputError, extractErrorMessage } from '../errors';
import type { LineItem, LineItemDefaults } from '../types/invoice';
import { describeInvalidDecimal, parseDecimal } from './money';

export interface ColumnMapping {
  hours: number | null;
  description: number | null;
  rate: number | null;
}

export const COLUMN_NAMES: Record<keyof ColumnMapping, string[]> = {
  hours: ['hours', 'hrs', 'hour', 'quantity', 'qty'],
  description: ['description', 'desc', 'item', 'service'],
  rate: ['rate', 'hourly rate', 'price', 'unit price'],
};

const COLUMN_KEYS: (keyof ColumnMapping)[] = ['hours', 'description', 'rate'];

export function normalizeText(text: unknown): string {
  if (text === null || text === undefined) return '';
  return String(text).toLowerCase().trim();
}

/** Locate the header among the first rows; the hours column is mandatory. */
export function detectColumns(rows: string[][]): { mapping: ColumnMapping; headerRowIndex: number } | null {
  const searchLimit = Math.min(rows.length, 10);

  for (let i = 0; i < searchLimit; i++) {
    const row = rows[i];
    const mapping: ColumnMapping = { hours: null, description: null, rate: null };

    for (let col = 0; col < row.length; col++) {
      const cellText = normalizeText(row[col]);
      if (!cellText) continue;

      for (const key of COLUMN_KEYS) {
        if (mapping[key] === null && COLUMN_NAMES[key].includes(cellText)) {
          mapping[key] = col;
          break;
        }
      }
    }

    if (mapping.hours !== null) {
      return { mapping, headerRowIndex: i };
    }
  }

  return null;
}

/** Read CSV text into trimmed string cells without SheetJS number/date coercion. */
export function extractCsvRows(text: string): string[][] {
  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return [];

  const sheet = workbook.Sheets[sheetName];
  const rawRows: unknown[][] = XLSX.utils.sheet_to_json(sheet, { header: 1, defval: '', blankrows: true, raw: true });

  return rawRows.map((row) => row.map((cell) => (cell === null || cell === undefined ? '' : String(cell).trim())));
}

function cell(row: string[], col: number | null): string {
  return col === null ? '' : (row[col] ?? '').trim();
}

export function parseLineItemsCsv(text: string, fallback: LineItemDefaults): LineItem[] {
  const rows = extractCsvRows(text.replace(/^\uFEFF/, ''));

  const detected = detectColumns(rows);
  if (!detected) {
    throw new InputError('CSV header not found: expected columns hours, description, rate');
  }

  const { mapping, headerRowIndex } = detected;
  const items: LineItem[] = [];
  const errors: string[] = [];

  for (let i = headerRowIndex + 1; i < rows.length; i++) {
    const row = rows[i];
    if (!row.some((value) => value)) continue;

    const rowNumber = i + 1;
    const rawHours = cell(row, mapping.hours);
    const rawRate = cell(row, mapping.rate);

    const hours = parseDecimal(rawHours);
    const rate = rawRate ? parseDecimal(rawRate) : fallback.rate;

    if (hours === null) {
      errors.push(
        rawHours
          ? `Row ${rowNumber}: hours "${rawHours}" ${describeInvalidDecimal(rawHours)}`
          : `Row ${rowNumber}: hours is empty`,
      );
    }
    if (rate === null) {
      errors.push(`Row ${rowNumber}: rate "${rawRate}" ${describeInvalidDecimal(rawRate)}`);
    }
    if (hours === null || rate === null) continue;

    items.push({
      hours,
      description: cell(row, mapping.description) || fallback.description,
      rate,
    });
  }

  if (errors.length > 0) {
    throw new InputError(`CSV contains ${errors.length} malformed value(s)`, errors);
  }
  if (items.length === 0) {
    throw new InputError('CSV contains no line items');
  }

  return items;
}

export function loadLineItemsFromCsv(csvPath: string, fallback: LineItemDefaults): LineItem[] {
  let text: string;
  try {
    text = fs.readFileSync(csvPath, 'utf8');
  } catch (error) {
    throw new InputError(`Cannot read CSV file ${csvPath}: ${extractErrorMessage(error)}`);
  }

  const items = parseLineItemsCsv(text, fallback);
  console.log(`CSV parse: file=${csvPath}, items=${items.length}`);
  return items;
}
