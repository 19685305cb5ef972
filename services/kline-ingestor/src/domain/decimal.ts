import { MalformedPayload } from '../errors.js';

// Prices and volumes are NUMERIC(20,8): at most 12 integer digits, 8 fractional.
export const SCALE = 8;
const UNIT = 10n ** BigInt(SCALE);
const LIMIT = 10n ** 20n;
const DECIMAL_RE = /^(-?)(\d+)(?:\.(\d+))?$/;

/** Parses a decimal string into integer units of 1e-8, rounding half-up past the 8th digit. */
export function parseUnits(raw: string, field = 'value'): bigint {
  const m = DECIMAL_RE.exec(raw.trim());
  if (!m) throw new MalformedPayload(`${field} is not a decimal: ${JSON.stringify(raw)}`);

  const [, sign, intPart, fracPart = ''] = m;
  const kept = fracPart.slice(0, SCALE).padEnd(SCALE, '0');
  let units = BigInt(intPart) * UNIT + BigInt(kept);
  if (fracPart.length > SCALE && fracPart.charCodeAt(SCALE) >= '5'.charCodeAt(0)) units += 1n;

  if (units >= LIMIT) throw new MalformedPayload(`${field} exceeds NUMERIC(20,8): ${raw}`);
  return sign === '-' ? -units : units;
}

export function formatUnits(units: bigint): string {
  const neg = units < 0n;
  const abs = neg ? -units : units;
  const int = abs / UNIT;
  const frac = (abs % UNIT).toString().padStart(SCALE, '0');
  return `${neg ? '-' : ''}${int}.${frac}`;
}

/** Normalizes to the canonical 8-fractional-digit form, e.g. "12.3456" -> "12.34560000". */
export function toFixed8(raw: string, field?: string): string {
  return formatUnits(parseUnits(raw, field));
}
