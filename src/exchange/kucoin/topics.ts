import { candleIntervalOf, parseCandleInterval, type CandleInterval, type MarketType, type StreamChannel } from '../../core/events/EventBus';

const CANDLE_TYPES: Record<CandleInterval, string> = {
    '1m': '1min',
    '5m': '5min',
    '15m': '15min',
    '30m': '30min',
    '1h': '1hour',
    '4h': '4hour',
    '1d': '1day',
};

const FUTURES_PREFIX = {
    ticker: '/contractMarket/ticker',
    trade: '/contractMarket/execution',
    orderbook: '/contractMarket/level2',
    candle: '/contractMarket/limitCandle',
} as const;

const SPOT_PREFIX = {
    ticker: '/market/ticker',
    trade: '/market/match',
    orderbook: '/market/level2',
    candle: '/market/candles',
} as const;

const SPOT_QUOTES = ['USDT', 'USDC', 'BTC', 'ETH', 'KCS'];

export type TopicKind = keyof typeof FUTURES_PREFIX;

const TOPIC_KINDS: readonly TopicKind[] = ['ticker', 'trade', 'orderbook', 'candle'];

export interface ParsedTopic {
    kind: TopicKind;
    symbol: string;
    interval?: CandleInterval;
}

/**
 * Futures contracts are dash-less (XBTUSDTM), spot pairs carry a dash (BTC-USDT).
 */
export function normalizeKucoinSymbol(marketType: MarketType, symbol: string): string {
    const upper = symbol.trim().toUpperCase().replace(/\//g, '-');
    if (marketType === 'futures') return upper.replace(/-/g, '');
    if (upper.includes('-')) return upper;
    const quote = SPOT_QUOTES.find((q) => upper.endsWith(q) && upper.length > q.length);
    return quote ? `${upper.slice(0, -quote.length)}-${quote}` : upper;
}

export function toKucoinTopic(marketType: MarketType, channel: StreamChannel, symbol: string): string {
    const prefixes = marketType === 'spot' ? SPOT_PREFIX : FUTURES_PREFIX;
    if (channel === 'ticker' || channel === 'trade' || channel === 'orderbook') {
        return `${prefixes[channel]}:${symbol}`;
    }
    const interval = candleIntervalOf(channel);
    return `${prefixes.candle}:${symbol}_${CANDLE_TYPES[interval]}`;
}

export function parseKucoinTopic(marketType: MarketType, topic: string): ParsedTopic | undefined {
    const idx = topic.indexOf(':');
    if (idx === -1) return undefined;
    const prefix = topic.slice(0, idx);
    const rest = topic.slice(idx + 1);
    const prefixes = marketType === 'spot' ? SPOT_PREFIX : FUTURES_PREFIX;

    const kind = TOPIC_KINDS.find((candidate) => prefixes[candidate] === prefix);
    if (!kind || !rest) return undefined;
    if (kind !== 'candle') return { kind, symbol: rest };

    const sep = rest.lastIndexOf('_');
    if (sep === -1) return undefined;
    const interval = fromCandleType(rest.slice(sep + 1));
    return interval ? { kind, symbol: rest.slice(0, sep), interval } : undefined;
}

export function topicChannel(parsed: ParsedTopic): StreamChannel {
    if (parsed.kind === 'candle') return `candle:${parsed.interval ?? '1m'}`;
    return parsed.kind;
}

function fromCandleType(type: string): CandleInterval | undefined {
    for (const [interval, name] of Object.entries(CANDLE_TYPES)) {
        if (name === type) return parseCandleInterval(interval);
    }
    return undefined;
}
