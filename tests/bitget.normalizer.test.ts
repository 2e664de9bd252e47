import { describe, expect, it } from 'vitest';
import Decimal from 'decimal.js';
import type { CanonicalEvent } from '../src/core/events/EventBus';
import { createBitgetProfile } from '../src/exchange/bitget/profile';
import type { NormalizeContext } from '../src/exchange/types';

const profile = createBitgetProfile('futures');
const RECEIVED_TS = 1_700_000_000_200;

function normalizeFrame(frame: Record<string, unknown>): { events: CanonicalEvent[]; raw: string } {
  const raw = JSON.stringify(frame);
  const decoded = profile.decode(raw);
  if (decoded.kind !== 'data') throw new Error(`expected a data frame, got ${decoded.kind}`);
  const ctx: NormalizeContext = {
    connectionId: 'bitget:futures',
    exchange: 'bitget',
    marketType: 'futures',
    receivedTs: RECEIVED_TS,
    raw,
  };
  return { events: profile.normalize(decoded.payload, ctx), raw };
}

const arg = (channel: string) => ({ instType: 'USDT-FUTURES', channel, instId: 'BTCUSDT' });

describe('Bitget normalizer', () => {
  it('maps a ticker with exact decimal prices and ms timestamps', () => {
    const { events } = normalizeFrame({
      action: 'snapshot',
      arg: arg('ticker'),
      data: [
        {
          instId: 'BTCUSDT',
          lastPr: '88650.5',
          bidPr: '88650.4',
          askPr: '88650.6',
          bidSz: '1.25',
          askSz: '0.5',
          high24h: '89000',
          low24h: '87000.1',
          baseVolume: '12345.678',
          markPrice: '88649.9',
          indexPrice: '88655.2',
          ts: '1700000000123',
        },
      ],
      ts: 1700000000130,
    });

    expect(events).toHaveLength(1);
    const ticker = events[0];
    if (ticker?.kind !== 'ticker') throw new Error('expected ticker');
    expect(ticker.exchange).toBe('bitget');
    expect(ticker.marketType).toBe('futures');
    expect(ticker.connectionId).toBe('bitget:futures');
    expect(ticker.symbol).toBe('BTCUSDT');
    expect(ticker.eventTs).toBe(1_700_000_000_123);
    expect(ticker.receivedTs).toBe(RECEIVED_TS);
    expect(ticker.lastPrice).toBeInstanceOf(Decimal);
    expect(ticker.lastPrice.toString()).toBe('88650.5');
    expect(ticker.bestBid?.toString()).toBe('88650.4');
    expect(ticker.bestAsk?.toString()).toBe('88650.6');
    expect(ticker.bestBidSize?.toString()).toBe('1.25');
    expect(ticker.bestAskSize?.toString()).toBe('0.5');
    expect(ticker.high24h?.toString()).toBe('89000');
    expect(ticker.low24h?.toString()).toBe('87000.1');
    expect(ticker.volume24h?.toString()).toBe('12345.678');
    expect(ticker.markPrice?.toString()).toBe('88649.9');
    expect(ticker.indexPrice?.toString()).toBe('88655.2');
    expect(ticker.bestAsk?.minus(ticker.bestBid ?? 0).toString()).toBe('0.2');
  });

  it('leaves absent optional fields undefined', () => {
    const { events } = normalizeFrame({ arg: arg('ticker'), data: [{ lastPr: '1.5', ts: 1700000000000 }] });
    const ticker = events[0];
    if (ticker?.kind !== 'ticker') throw new Error('expected ticker');
    expect(ticker.bestBid).toBeUndefined();
    expect(ticker.markPrice).toBeUndefined();
  });

  it('maps trades and turns a broken item into a protocol_error carrying the raw frame', () => {
    const { events, raw } = normalizeFrame({
      arg: arg('trade'),
      data: [
        { ts: '1700000000500', price: '88651', size: '0.002', side: 'buy', tradeId: '1111' },
        { ts: '1700000000501', price: 'x', size: '0.1', side: 'sell', tradeId: '1112' },
      ],
    });

    expect(events).toHaveLength(2);
    const [trade, control] = events;
    if (trade?.kind !== 'trade') throw new Error('expected trade');
    expect(trade.side).toBe('buy');
    expect(trade.price.toString()).toBe('88651');
    expect(trade.size.toString()).toBe('0.002');
    expect(trade.tradeId).toBe('1111');
    expect(trade.eventTs).toBe(1_700_000_000_500);

    expect(control).toEqual({
      exchange: 'bitget',
      marketType: 'futures',
      connectionId: 'bitget:futures',
      symbol: 'BTCUSDT',
      eventTs: RECEIVED_TS,
      receivedTs: RECEIVED_TS,
      kind: 'control',
      code: 'protocol_error',
      message: 'field price is not a number: "x"',
      raw,
    });
  });

  it('reports every broken item of a frame in one protocol_error', () => {
    const { events, raw } = normalizeFrame({
      arg: arg('trade'),
      data: [
        { ts: '1700000000500', price: 'x', size: '0.1', side: 'sell', tradeId: '1112' },
        { ts: '1700000000501', price: '88651', size: '0.002', side: 'buy', tradeId: '1113' },
        { ts: '1700000000502', price: '88652', size: '0.5', side: 'hold', tradeId: '1114' },
      ],
    });

    expect(events.map((event) => event.kind)).toEqual(['trade', 'control']);
    const control = events[1];
    if (control?.kind !== 'control') throw new Error('expected control');
    expect(control.code).toBe('protocol_error');
    expect(control.message).toBe('field price is not a number: "x"; unknown trade side: "hold"');
    expect(control.raw).toBe(raw);
  });

  it('rejects an unknown trade side', () => {
    const { events } = normalizeFrame({
      arg: arg('trade'),
      data: [{ ts: '1700000000500', price: '1', size: '1', side: 'hold' }],
    });
    const control = events[0];
    if (control?.kind !== 'control') throw new Error('expected control');
    expect(control.message).toBe('unknown trade side: "hold"');
  });

  it('maps book snapshots and updates', () => {
    const snapshot = normalizeFrame({
      action: 'snapshot',
      arg: arg('books'),
      data: [{ asks: [['88651', '1.5']], bids: [['88650', '2'], ['88649.5', '0']], checksum: -123, seq: 42, ts: '1700000000600' }],
    }).events[0];
    if (snapshot?.kind !== 'orderbook') throw new Error('expected orderbook');
    expect(snapshot.action).toBe('snapshot');
    expect(snapshot.asks.map((level) => [level.price.toString(), level.size.toString()])).toEqual([['88651', '1.5']]);
    expect(snapshot.bids.map((level) => [level.price.toString(), level.size.toString()])).toEqual([
      ['88650', '2'],
      ['88649.5', '0'],
    ]);
    expect(snapshot.sequence).toBe(42);
    expect(snapshot.checksum).toBe(-123);
    expect(snapshot.eventTs).toBe(1_700_000_000_600);

    const update = normalizeFrame({
      action: 'update',
      arg: arg('books'),
      data: [{ asks: [], bids: [['88650', '3']], seq: 43, ts: '1700000000700' }],
    }).events[0];
    if (update?.kind !== 'orderbook') throw new Error('expected orderbook');
    expect(update.action).toBe('update');
    expect(update.asks).toEqual([]);
    expect(update.checksum).toBeUndefined();
  });

  it('maps candle rows', () => {
    const { events } = normalizeFrame({
      action: 'update',
      arg: arg('candle1m'),
      data: [['1700000040000', '88600', '88700', '88550', '88650', '12.5', '1108000', '1108000']],
    });
    const candle = events[0];
    if (candle?.kind !== 'candle') throw new Error('expected candle');
    expect(candle.interval).toBe('1m');
    expect(candle.openTime).toBe(1_700_000_040_000);
    expect(candle.eventTs).toBe(1_700_000_040_000);
    expect(candle.open.toString()).toBe('88600');
    expect(candle.high.toString()).toBe('88700');
    expect(candle.low.toString()).toBe('88550');
    expect(candle.close.toString()).toBe('88650');
    expect(candle.volume.toString()).toBe('12.5');
  });

  it('emits a single control event for an empty data list', () => {
    const { events } = normalizeFrame({ arg: arg('ticker'), data: [] });
    expect(events).toHaveLength(1);
    const control = events[0];
    if (control?.kind !== 'control') throw new Error('expected control');
    expect(control.message).toBe('data frame carries no items');
  });

  it('reports unsupported channels and frames without arg identity', () => {
    const unsupported = normalizeFrame({ arg: arg('fundingRate'), data: [{}] }).events[0];
    if (unsupported?.kind !== 'control') throw new Error('expected control');
    expect(unsupported.message).toBe('unsupported channel fundingRate');
    expect(unsupported.symbol).toBe('BTCUSDT');

    const anonymous = normalizeFrame({ arg: { channel: 'ticker' }, data: [{}] }).events[0];
    if (anonymous?.kind !== 'control') throw new Error('expected control');
    expect(anonymous.message).toBe('push frame without arg.channel / arg.instId');
    expect(anonymous.symbol).toBe('');
  });
});
