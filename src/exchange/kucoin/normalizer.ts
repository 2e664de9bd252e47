import type { CandleEvent, CandleInterval, CanonicalEvent, OrderBookDeltaEvent, OrderBookLevel, TickerEvent, TradeEvent } from '../../core/events/EventBus';
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
import { parseKucoinTopic } from './topics';

// ============================================================================
// KuCoin push: { type: "message", topic, subject, data }.
// Время приходит то в нс (futures ticker/execution, spot match), то в мс,
// свечи: в секундах; toEpochMs разбирается со всеми вариантами.
// ============================================================================

export function normalizeKucoinPayload(payload: Record<string, unknown>, ctx: NormalizeContext): CanonicalEvent[] {
    const topic = typeof payload.topic === 'string' ? payload.topic : '';
    const parsed = parseKucoinTopic(ctx.marketType, topic);
    if (!parsed) {
        return [controlEvent(ctx, '', 'protocol_error', `unsupported topic ${topic || '<missing>'}`)];
    }
    const { symbol } = parsed;
    const items = [payload.data];

    switch (parsed.kind) {
        case 'ticker':
            return mapEach(ctx, symbol, items, (item) => mapTicker(ctx, symbol, item));
        case 'trade':
            return mapEach(ctx, symbol, items, (item) => mapTrade(ctx, symbol, item));
        case 'orderbook':
            return mapEach(ctx, symbol, items, (item) =>
                ctx.marketType === 'spot' ? mapSpotBook(ctx, symbol, item) : mapFuturesBook(ctx, symbol, item)
            );
        case 'candle': {
            const interval = parsed.interval ?? '1m';
            return mapEach(ctx, symbol, items, (item) => mapCandle(ctx, symbol, item, interval));
        }
    }
}

function asRecord(item: unknown): Record<string, unknown> {
    if (!isRecord(item)) throw new ProtocolError('data is not an object');
    return item;
}

// futures: price/size/bestBidPrice/bestAskPrice/ts; spot: price/size/bestBid/bestAsk/time
function mapTicker(ctx: NormalizeContext, symbol: string, item: unknown): TickerEvent {
    const row = asRecord(item);
    return {
        ...eventBase(ctx, symbol, requireTs(row.ts ?? row.time, 'ts')),
        kind: 'ticker',
        lastPrice: requireDecimal(row.price, 'price'),
        lastSize: optionalDecimal(row.size, 'size'),
        bestBid: optionalDecimal(row.bestBidPrice ?? row.bestBid, 'bestBid'),
        bestBidSize: optionalDecimal(row.bestBidSize, 'bestBidSize'),
        bestAsk: optionalDecimal(row.bestAskPrice ?? row.bestAsk, 'bestAsk'),
        bestAskSize: optionalDecimal(row.bestAskSize, 'bestAskSize'),
    };
}

function mapTrade(ctx: NormalizeContext, symbol: string, item: unknown): TradeEvent {
    const row = asRecord(item);
    return {
        ...eventBase(ctx, symbol, requireTs(row.ts ?? row.time, 'ts')),
        kind: 'trade',
        tradeId: row.tradeId !== undefined ? requireString(row.tradeId, 'tradeId') : undefined,
        side: toSide(row.side),
        price: requireDecimal(row.price, 'price'),
        size: requireDecimal(row.size, 'size'),
    };
}

// { sequence, change: "price,side,size", timestamp }
function mapFuturesBook(ctx: NormalizeContext, symbol: string, item: unknown): OrderBookDeltaEvent {
    const row = asRecord(item);
    const change = typeof row.change === 'string' ? row.change.split(',') : [];
    if (change.length !== 3) throw new ProtocolError(`level2 change is not "price,side,size": ${String(row.change)}`);
    const [price, side, size] = change;
    const level: OrderBookLevel = {
        price: requireDecimal(price, 'change.price'),
        size: requireDecimal(size, 'change.size'),
    };
    const isBuy = toSide(side) === 'buy';
    return {
        ...eventBase(ctx, symbol, requireTs(row.timestamp ?? row.ts, 'timestamp')),
        kind: 'orderbook',
        action: 'update',
        bids: isBuy ? [level] : [],
        asks: isBuy ? [] : [level],
        sequence: toOptionalInt(row.sequence),
    };
}

// { changes: { asks: [[p, s, seq]], bids: [...] }, sequenceEnd, time }
function mapSpotBook(ctx: NormalizeContext, symbol: string, item: unknown): OrderBookDeltaEvent {
    const row = asRecord(item);
    const changes = isRecord(row.changes) ? row.changes : undefined;
    if (!changes) throw new ProtocolError('l2update without changes');
    return {
        ...eventBase(ctx, symbol, requireTs(row.time, 'time')),
        kind: 'orderbook',
        action: 'update',
        bids: toLevels(changes.bids, 'changes.bids'),
        asks: toLevels(changes.asks, 'changes.asks'),
        sequence: toOptionalInt(row.sequenceEnd),
    };
}

// candles: [start(s), open, close, high, low, volume, turnover]
function mapCandle(ctx: NormalizeContext, symbol: string, item: unknown, interval: CandleInterval): CandleEvent {
    const row = asRecord(item);
    const candle = row.candles;
    if (!Array.isArray(candle) || candle.length < 6) throw new ProtocolError('candles is not a [t, o, c, h, l, v] list');
    const openTime = requireTs(candle[0], 'candles.start');
    return {
        ...eventBase(ctx, symbol, row.time !== undefined ? requireTs(row.time, 'time') : openTime),
        kind: 'candle',
        interval,
        openTime,
        open: requireDecimal(candle[1], 'candles.open'),
        close: requireDecimal(candle[2], 'candles.close'),
        high: requireDecimal(candle[3], 'candles.high'),
        low: requireDecimal(candle[4], 'candles.low'),
        volume: requireDecimal(candle[5], 'candles.volume'),
    };
}
