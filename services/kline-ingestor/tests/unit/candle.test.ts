import { describe, it, expect } from 'vitest';
import {
  candleKey,
  fromBackfillEntry,
  fromStreamEvent,
  parseStreamControl,
  snapshotKey,
} from '../../src/domain/candle.js';
import { InvariantViolation, MalformedPayload } from '../../src/errors.js';
import { MINUTE, T0, combined, historyRow, klineEvent } from '../support/fixtures.js';

describe('candle model', () => {
  describe('fromStreamEvent', () => {
    it('normalizes a kline event', () => {
      const c = fromStreamEvent(klineEvent());
      expect(c).toEqual({
        symbol: 'BTCUSDT',
        interval: '1m',
        startTime: T0,
        endTime: T0 + MINUTE,
        open: '42000.00000000',
        high: '42010.00000000',
        low: '41995.00000000',
        close: '42005.00000000',
        volume: '12.34560000',
        firstTradeId: 100,
        lastTradeId: 150,
        tradeCount: 51,
        quoteVolume: '518500.00000000',
        closed: false,
      });
    });

    it('unwraps the combined-stream envelope', () => {
      const event = klineEvent({ x: true });
      expect(fromStreamEvent(combined(event))).toEqual(fromStreamEvent(event));
      expect(fromStreamEvent(combined(event)).closed).toBe(true);
    });

    it('uppercases the symbol', () => {
      expect(fromStreamEvent(klineEvent({ s: 'btcusdt' })).symbol).toBe('BTCUSDT');
    });

    it('maps the "no trades" id -1 to 0', () => {
      const c = fromStreamEvent(klineEvent({ f: -1, L: -1, n: 0 }));
      expect(c.firstTradeId).toBe(0);
      expect(c.lastTradeId).toBe(0);
    });

    it('rejects high below low', () => {
      expect(() => fromStreamEvent(klineEvent({ h: '41000', l: '42000' }))).toThrow(InvariantViolation);
      expect(() => fromStreamEvent(klineEvent({ h: '41000', l: '42000' }))).toThrow(
        'high 41000.00000000 < low 42000.00000000'
      );
    });

    it('rejects a span that does not match the interval', () => {
      expect(() => fromStreamEvent(klineEvent({ T: T0 + 2 * MINUTE - 1 }))).toThrow(InvariantViolation);
    });

    it('rejects a start time off the interval grid', () => {
      expect(() => fromStreamEvent(klineEvent({ t: T0 + 30_000, T: T0 + 30_000 + MINUTE - 1 }))).toThrow(
        InvariantViolation
      );
    });

    it('rejects open or close outside [low, high]', () => {
      expect(() => fromStreamEvent(klineEvent({ o: '43000' }))).toThrow(InvariantViolation);
      expect(() => fromStreamEvent(klineEvent({ c: '41000' }))).toThrow(InvariantViolation);
    });

    it('rejects non-positive prices and negative volume', () => {
      expect(() => fromStreamEvent(klineEvent({ o: '0', l: '0' }))).toThrow(InvariantViolation);
      expect(() => fromStreamEvent(klineEvent({ v: '-1' }))).toThrow(InvariantViolation);
    });

    it('rejects trade ids that run backwards', () => {
      expect(() => fromStreamEvent(klineEvent({ f: 200, L: 150 }))).toThrow(InvariantViolation);
    });

    it('reports structural problems as MalformedPayload', () => {
      const { o: _o, ...k } = klineEvent().k;
      expect(() => fromStreamEvent({ e: 'kline', k })).toThrow(MalformedPayload);
      expect(() => fromStreamEvent(klineEvent({ i: '1w' }))).toThrow(MalformedPayload);
      expect(() => fromStreamEvent(klineEvent({ c: 'n/a' }))).toThrow(MalformedPayload);
      expect(() => fromStreamEvent({ e: 'trade' })).toThrow(MalformedPayload);
    });
  });

  describe('fromBackfillEntry', () => {
    it('yields the same candle as the stream, minus trade ids', () => {
      const fromRest = fromBackfillEntry(historyRow(T0), 'BTCUSDT', '1m');
      const fromWs = fromStreamEvent(klineEvent({ x: true }));
      expect(fromRest).toEqual({ ...fromWs, firstTradeId: 0, lastTradeId: 0 });
    });

    it('rejects short rows', () => {
      expect(() => fromBackfillEntry(historyRow(T0).slice(0, 8), 'BTCUSDT', '1m')).toThrow(MalformedPayload);
    });

    it('checks the span against the requested interval', () => {
      expect(() => fromBackfillEntry(historyRow(T0), 'BTCUSDT', '5m')).toThrow(InvariantViolation);
    });
  });

  describe('parseStreamControl', () => {
    it('recognises acks and error replies', () => {
      expect(parseStreamControl({ result: null, id: 3 })).toEqual({ kind: 'ack', id: 3 });
      expect(parseStreamControl({ error: { code: 2, msg: 'Invalid request' }, id: 4 })).toEqual({
        kind: 'error',
        id: 4,
        code: 2,
        msg: 'Invalid request',
      });
      expect(parseStreamControl(klineEvent())).toBeNull();
    });
  });

  it('keys candles by symbol, interval and start', () => {
    expect(candleKey({ symbol: 'BTCUSDT', interval: '1m', startTime: T0 })).toBe(`BTCUSDT|1m|${T0}`);
  });

  describe('snapshotKey', () => {
    it('names the bucket of a bare or wrapped kline frame', () => {
      expect(snapshotKey(JSON.stringify(klineEvent()))).toBe(`BTCUSDT:1m:${T0}`);
      expect(snapshotKey(JSON.stringify(combined(klineEvent({ t: T0 + MINUTE }))))).toBe(`BTCUSDT:1m:${T0 + MINUTE}`);
    });

    it('leaves other frames unkeyed', () => {
      expect(snapshotKey('{"result":null,"id":1}')).toBeUndefined();
      expect(snapshotKey('not json')).toBeUndefined();
    });
  });
});
