import { describe, it, expect } from 'vitest';
import { formatUnits, parseUnits, toFixed8 } from '../../src/domain/decimal.js';
import { MalformedPayload } from '../../src/errors.js';

describe('decimal', () => {
  it('parses into 1e-8 units', () => {
    expect(parseUnits('42000.5')).toBe(4200050000000n);
    expect(parseUnits('0.00000001')).toBe(1n);
    expect(parseUnits('-1.5')).toBe(-150000000n);
  });

  it('formats with exactly eight fractional digits', () => {
    expect(formatUnits(4200050000000n)).toBe('42000.50000000');
    expect(formatUnits(-150000000n)).toBe('-1.50000000');
    expect(formatUnits(0n)).toBe('0.00000000');
  });

  it('rounds half-up past the eighth digit', () => {
    expect(toFixed8('0.123456789')).toBe('0.12345679');
    expect(toFixed8('0.123456784')).toBe('0.12345678');
    expect(toFixed8('1.999999995')).toBe('2.00000000');
  });

  it('trims surrounding whitespace', () => {
    expect(toFixed8(' 7 ')).toBe('7.00000000');
  });

  it('accepts twelve integer digits and rejects thirteen', () => {
    expect(toFixed8('999999999999.99999999')).toBe('999999999999.99999999');
    expect(() => parseUnits('1000000000000', 'volume')).toThrow(MalformedPayload);
  });

  it.each(['', 'abc', '1e5', '.5', '1.', '0x10'])('rejects %j', (raw) => {
    expect(() => parseUnits(raw, 'open')).toThrow(MalformedPayload);
  });
});
