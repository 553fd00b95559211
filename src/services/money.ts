/**
 * Fixed-point helpers. Hours, rates and percentages are bigints scaled by
 * DECIMAL_SCALE; money leaving a line is whole cents.
 */

export const DECIMAL_PLACES = 4;
export const DECIMAL_SCALE = 10n ** BigInt(DECIMAL_PLACES);

const CENTS_PER_UNIT = 100n;
const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;

function matchDecimal(value: string | number): RegExpMatchArray | null {
  const cleaned = String(value)
    .replace(/\s/g, '')
    .replace(/^([+-]?)[$€£]/, '$1')
    .replace(/,(?=\d{3}(?:\D|$))/g, '');

  return cleaned.match(DECIMAL_PATTERN);
}

/**
 * Parse "150", "7.25", "$1,200.50" or " 3 " into a scaled bigint.
 * Returns null for anything that is not a plain decimal with at most
 * DECIMAL_PLACES fractional digits.
 */
export function parseDecimal(value: string | number | null | undefined): bigint | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' && !Number.isFinite(value)) return null;

  const match = matchDecimal(value);
  if (!match) return null;

  const [, sign, whole = '', fraction = ''] = match;
  if (!whole && !fraction) return null;
  if (fraction.length > DECIMAL_PLACES) return null;

  const digits = `${whole || '0'}${fraction.padEnd(DECIMAL_PLACES, '0')}`;
  const scaled = BigInt(digits);
  return sign === '-' ? -scaled : scaled;
}

/** Completes `"<value>" ...` in messages for input parseDecimal rejected. */
export function describeInvalidDecimal(value: string): string {
  const fraction = matchDecimal(value)?.[3] ?? '';
  return fraction.length > DECIMAL_PLACES ? `has more than ${DECIMAL_PLACES} decimal places` : 'is not a number';
}

/** Divide and round half away from zero. */
function divideRounded(numerator: bigint, denominator: bigint): bigint {
  const negative = numerator < 0n !== denominator < 0n;
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;
  const quotient = (n * 2n + d) / (d * 2n);
  return negative ? -quotient : quotient;
}

export function lineAmountCents(hours: bigint, rate: bigint): bigint {
  return divideRounded(hours * rate * CENTS_PER_UNIT, DECIMAL_SCALE * DECIMAL_SCALE);
}

export function percentOfCents(cents: bigint, percent: bigint): bigint {
  return divideRounded(cents * percent, 100n * DECIMAL_SCALE);
}

function splitScaled(value: bigint, scale: bigint, places: number): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const whole = abs / scale;
  const fraction = (abs % scale).toString().padStart(places, '0');
  return `${negative ? '-' : ''}${whole}.${fraction}`;
}

/** 3000000n -> "30000.00" */
export function centsToDecimalString(cents: bigint): string {
  return splitScaled(cents, CENTS_PER_UNIT, 2);
}

/** Scaled value as a plain string without trailing zeros: 72500n -> "7.25" */
export function decimalToString(value: bigint): string {
  const text = splitScaled(value, DECIMAL_SCALE, DECIMAL_PLACES).replace(/0+$/, '');
  return text.endsWith('.') ? text.slice(0, -1) : text;
}

/**
 * Intl formatting without a float: the whole part is passed as a bigint and
 * the fraction digits are put into its formatted parts as they are.
 */
function formatExactCurrency(
  value: bigint,
  scale: bigint,
  fraction: (digits: string) => string,
  currency: string,
  locale: string,
): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const whole = abs / scale;
  const digits = fraction((abs % scale).toString().padStart(scale.toString().length - 1, '0'));

  const formatter = new Intl.NumberFormat(locale, {
    style: 'currency',
    currency,
    minimumFractionDigits: digits.length,
    maximumFractionDigits: digits.length,
  });
  const signed = negative ? (whole === 0n ? -0 : -whole) : whole;

  return formatter
    .formatToParts(signed)
    .map((part) => (part.type === 'fraction' ? digits : part.value))
    .join('');
}

export function formatCurrencyFromCents(cents: bigint, currency = 'USD', locale = 'en-US'): string {
  return formatExactCurrency(cents, CENTS_PER_UNIT, (digits) => digits, currency, locale);
}

/** Rates keep up to four decimals but always show at least cents. */
export function formatRate(rate: bigint, currency = 'USD', locale = 'en-US'): string {
  const trim = (digits: string) => digits.replace(/0+$/, '').padEnd(2, '0');
  return formatExactCurrency(rate, DECIMAL_SCALE, trim, currency, locale);
}

/** 2000000n -> "200.0", 72500n -> "7.25" */
export function formatHours(hours: bigint): string {
  const text = decimalToString(hours);
  return text.includes('.') ? text : `${text}.0`;
}
