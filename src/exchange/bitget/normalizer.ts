import type { CandleEvent, CandleInterval, CanonicalEvent, OrderBookDeltaEvent, TickerEvent, TradeEvent } from '../../core/events/EventBus';
import { ProtocolError } from '../../core/errors';
import { isRecord, toOptionalInt } from '../../core/market/numeric';
import {
    controlEvent,
    eventBase,
    mapEach,
    optionalDecimal,
    requireDecimal,
    requireString,
    requireTs,
    toLevels,
    toSide,
} from '../normalizers/canonical';
import type { NormalizeContext } from '../types';
import { fromBitgetCandleChannel, normalizeBitgetSymbol } from './symbols';

/**
 * Push frame: `{ action?, arg: { instType, channel, instId }, data: [...] }`.
 */
export function normalizeBitgetPayload(payload: Record<string, unknown>, ctx: NormalizeContext): CanonicalEvent[] {
    const arg = isRecord(payload.arg) ? payload.arg : undefined;
    const channel = arg && typeof arg.channel === 'string' ? arg.channel : undefined;
    const instId = arg && typeof arg.instId === 'string' ? arg.instId : undefined;
    if (!channel || !instId) {
        return [controlEvent(ctx, '', 'protocol_error', 'push frame without arg.channel / arg.instId')];
    }
    const symbol = normalizeBitgetSymbol(instId);
    const data = payload.data;

    if (channel === 'ticker') return mapEach(ctx, symbol, data, (item) => mapTicker(ctx, symbol, item));
    if (channel === 'trade') return mapEach(ctx, symbol, data, (item) => mapTrade(ctx, symbol, item));
    if (channel.startsWith('books')) {
        const action = payload.action === 'update' ? 'update' : 'snapshot';
        return mapEach(ctx, symbol, data, (item) => mapBook(ctx, symbol, item, action));
    }
    const interval = fromBitgetCandleChannel(channel);
    if (interval) return mapEach(ctx, symbol, data, (item) => mapCandle(ctx, symbol, item, interval));

    return [controlEvent(ctx, symbol, 'protocol_error', `unsupported channel ${channel}`)];
}

function asRecord(item: unknown): Record<string, unknown> {
    if (!isRecord(item)) throw new ProtocolError('data item is not an object');
    return item;
}

function mapTicker(ctx: NormalizeContext, symbol: string, item: unknown): TickerEvent {
    const row = asRecord(item);
    return {
        ...eventBase(ctx, symbol, requireTs(row.ts, 'ts')),
        kind: 'ticker',
        lastPrice: requireDecimal(row.lastPr, 'lastPr'),
        bestBid: optionalDecimal(row.bidPr, 'bidPr'),
        bestBidSize: optionalDecimal(row.bidSz, 'bidSz'),
        bestAsk: optionalDecimal(row.askPr, 'askPr'),
        bestAskSize: optionalDecimal(row.askSz, 'askSz'),
        high24h: optionalDecimal(row.high24h, 'high24h'),
        low24h: optionalDecimal(row.low24h, 'low24h'),
        volume24h: optionalDecimal(row.baseVolume, 'baseVolume'),
        markPrice: optionalDecimal(row.markPrice, 'markPrice'),
        indexPrice: optionalDecimal(row.indexPrice, 'indexPrice'),
    };
}

function mapTrade(ctx: NormalizeContext, symbol: string, item: unknown): TradeEvent {
    const row = asRecord(item);
    return {
        ...eventBase(ctx, symbol, requireTs(row.ts, 'ts')),
        kind: 'trade',
        tradeId: row.tradeId !== undefined ? requireString(row.tradeId, 'tradeId') : undefined,
        side: toSide(row.side),
        price: requireDecimal(row.price, 'price'),
        size: requireDecimal(row.size, 'size'),
    };
}

function mapBook(ctx: NormalizeContext, symbol: string, item: unknown, action: 'snapshot' | 'update'): OrderBookDeltaEvent {
    const row = asRecord(item);
    return {
        ...eventBase(ctx, symbol, requireTs(row.ts, 'ts')),
        kind: 'orderbook',
        action,
        bids: toLevels(row.bids, 'bids'),
        asks: toLevels(row.asks, 'asks'),
        sequence: toOptionalInt(row.seq),
        checksum: toOptionalInt(row.checksum),
    };
}

// [ts, open, high, low, close, baseVolume, quoteVolume, usdtVolume]
function mapCandle(ctx: NormalizeContext, symbol: string, item: unknown, interval: CandleInterval): CandleEvent {
    if (!Array.isArray(item) || item.length < 6) throw new ProtocolError('candle row is not a [ts, o, h, l, c, vol] list');
    const openTime = requireTs(item[0], 'candle.ts');
    return {
        ...eventBase(ctx, symbol, openTime),
        kind: 'candle',
        interval,
        openTime,
        open: requireDecimal(item[1], 'candle.open'),
        high: requireDecimal(item[2], 'candle.high'),
        low: requireDecimal(item[3], 'candle.low'),
        close: requireDecimal(item[4], 'candle.close'),
        volume: requireDecimal(item[5], 'candle.volume'),
    };
}
