import EventEmitter from 'eventemitter3';
import type Decimal from 'decimal.js';
import type { FatalError, SubscriptionError } from '../errors';

// ============================================================================
// Canonical market events
// ----------------------------------------------------------------------------
// Сюда летят нормализованные события (наши собственные типы), а не сырые
// ответы Bitget / KuCoin. Цены и объёмы: Decimal, время: unix ms.
// ============================================================================

export type ExchangeId = 'bitget' | 'kucoin';
export type MarketType = 'futures' | 'spot';
export type CandleInterval = '1m' | '5m' | '15m' | '30m' | '1h' | '4h' | '1d';
export type StreamChannel = 'ticker' | 'trade' | 'orderbook' | `candle:${CandleInterval}`;
export type ConnectionId = string;

export const CANDLE_INTERVALS: readonly CandleInterval[] = ['1m', '5m', '15m', '30m', '1h', '4h', '1d'];

export function parseCandleInterval(value: string | undefined): CandleInterval | undefined {
    return CANDLE_INTERVALS.find((candidate) => candidate === value);
}

export function isStreamChannel(value: string): value is StreamChannel {
    if (value === 'ticker' || value === 'trade' || value === 'orderbook') return true;
    if (!value.startsWith('candle:')) return false;
    return parseCandleInterval(value.slice('candle:'.length)) !== undefined;
}

/** Interval of a candle channel. */
export function candleIntervalOf(channel: `candle:${CandleInterval}`): CandleInterval {
    return parseCandleInterval(channel.slice('candle:'.length)) ?? '1m';
}

/**
 * Date.now() в виде функции, чтобы легче тестировать и мокать.
 */
export const nowMs = (): number => Date.now();

export interface CanonicalEventBase {
    readonly exchange: ExchangeId;
    readonly marketType: MarketType;
    readonly connectionId: ConnectionId;
    readonly symbol: string;
    /** Exchange-supplied event time, unix ms. */
    readonly eventTs: number;
    /** Local receipt time, unix ms. */
    readonly receivedTs: number;
}

export interface TickerEvent extends CanonicalEventBase {
    readonly kind: 'ticker';
    readonly lastPrice: Decimal;
    readonly lastSize?: Decimal;
    readonly bestBid?: Decimal;
    readonly bestBidSize?: Decimal;
    readonly bestAsk?: Decimal;
    readonly bestAskSize?: Decimal;
    readonly high24h?: Decimal;
    readonly low24h?: Decimal;
    readonly volume24h?: Decimal;
    readonly markPrice?: Decimal;
    readonly indexPrice?: Decimal;
}

export type TradeSide = 'buy' | 'sell';

export interface TradeEvent extends CanonicalEventBase {
    readonly kind: 'trade';
    readonly tradeId?: string;
    readonly side: TradeSide;
    readonly price: Decimal;
    readonly size: Decimal;
}

export interface CandleEvent extends CanonicalEventBase {
    readonly kind: 'candle';
    readonly interval: CandleInterval;
    readonly openTime: number;
    readonly open: Decimal;
    readonly high: Decimal;
    readonly low: Decimal;
    readonly close: Decimal;
    readonly volume: Decimal;
}

export interface OrderBookLevel {
    readonly price: Decimal;
    /** Zero size removes the level. */
    readonly size: Decimal;
}

export interface OrderBookDeltaEvent extends CanonicalEventBase {
    readonly kind: 'orderbook';
    readonly action: 'snapshot' | 'update';
    readonly bids: readonly OrderBookLevel[];
    readonly asks: readonly OrderBookLevel[];
    readonly sequence?: number;
    readonly checksum?: number;
}

export type ControlCode = 'protocol_error' | 'venue_error';

export interface ControlEvent extends CanonicalEventBase {
    readonly kind: 'control';
    readonly code: ControlCode;
    readonly message: string;
    /** Original frame kept for diagnostics. */
    readonly raw?: string;
}

export type CanonicalEvent = TickerEvent | TradeEvent | CandleEvent | OrderBookDeltaEvent | ControlEvent;

// ============================================================================
// Connection lifecycle notifications
// ============================================================================

export type ConnectionStateName = 'disconnected' | 'connecting' | 'authenticating' | 'subscribing' | 'streaming' | 'closing';

export interface ConnectionRef {
    connectionId: ConnectionId;
    exchange: ExchangeId;
    marketType: MarketType;
    ts: number;
}

export interface ConnectionStateChanged extends ConnectionRef {
    from: ConnectionStateName;
    to: ConnectionStateName;
}

export interface ConnectionConnected extends ConnectionRef {
    endpoint: string;
}

export interface ConnectionDisconnected extends ConnectionRef {
    reason: string;
    willRetry: boolean;
    retryInMs?: number;
    attempt: number;
}

export interface SubscriptionAcked extends ConnectionRef {
    symbol: string;
    channel: StreamChannel;
}

export interface SubscriptionFailed extends ConnectionRef {
    symbol: string;
    channel: StreamChannel;
    reason: string;
    error: SubscriptionError;
}

export interface ConnectionFatal extends ConnectionRef {
    error: FatalError;
}

// ---------------------------------------------------------------------------
// Карта всех событий: topic -> args tuple, один payload на topic.
// ---------------------------------------------------------------------------
export type IngestEventMap = {
    'market:event': [payload: CanonicalEvent];
    'connection:state': [payload: ConnectionStateChanged];
    'connection:connected': [payload: ConnectionConnected];
    'connection:disconnected': [payload: ConnectionDisconnected];
    'connection:fatal': [payload: ConnectionFatal];
    'subscription:acked': [payload: SubscriptionAcked];
    'subscription:failed': [payload: SubscriptionFailed];
};

export type IngestEventName = keyof IngestEventMap;
export type IngestPayload<T extends IngestEventName> = IngestEventMap[T][0];

/** What consumers receive: the topic plus its payload, as one tagged value. */
export type FeedEvent = { [K in IngestEventName]: { topic: K; payload: IngestPayload<K> } }[IngestEventName];

/**
 * Синхронная внутренняя шина между supervisor'ами и orchestrator'ом.
 * Внешние потребители получают события через EventDispatcher.
 */
export class EventBus {
    private readonly emitter = new EventEmitter();

    public publish<T extends IngestEventName>(topic: T, payload: IngestPayload<T>): boolean {
        return this.emitter.emit(topic, payload);
    }

    public subscribe<T extends IngestEventName>(topic: T, handler: (payload: IngestPayload<T>) => void): this {
        this.emitter.on(topic, handler);
        return this;
    }

    public unsubscribe<T extends IngestEventName>(topic: T, handler: (payload: IngestPayload<T>) => void): this {
        this.emitter.off(topic, handler);
        return this;
    }

    /**
     * Подписка на все topics сразу, в виде FeedEvent. Возвращает функцию отписки.
     */
    public subscribeAll(handler: (event: FeedEvent) => void): () => void {
        const stops = [
            this.bind('market:event', (payload) => handler({ topic: 'market:event', payload })),
            this.bind('connection:state', (payload) => handler({ topic: 'connection:state', payload })),
            this.bind('connection:connected', (payload) => handler({ topic: 'connection:connected', payload })),
            this.bind('connection:disconnected', (payload) => handler({ topic: 'connection:disconnected', payload })),
            this.bind('connection:fatal', (payload) => handler({ topic: 'connection:fatal', payload })),
            this.bind('subscription:acked', (payload) => handler({ topic: 'subscription:acked', payload })),
            this.bind('subscription:failed', (payload) => handler({ topic: 'subscription:failed', payload })),
        ];
        return () => stops.forEach((stop) => stop());
    }

    public listenerCount(topic: IngestEventName): number {
        return this.emitter.listenerCount(topic);
    }

    public removeAllListeners(): this {
        this.emitter.removeAllListeners();
        return this;
    }

    private bind<T extends IngestEventName>(topic: T, handler: (payload: IngestPayload<T>) => void): () => void {
        this.subscribe(topic, handler);
        return () => this.unsubscribe(topic, handler);
    }
}
