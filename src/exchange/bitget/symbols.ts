import { candleIntervalOf, parseCandleInterval, type CandleInterval, type MarketType, type StreamChannel } from '../../core/events/EventBus';

export type BitgetInstType = 'USDT-FUTURES' | 'SPOT';

const CANDLE_CHANNELS: Record<CandleInterval, string> = {
    '1m': 'candle1m',
    '5m': 'candle5m',
    '15m': 'candle15m',
    '30m': 'candle30m',
    '1h': 'candle1H',
    '4h': 'candle4H',
    '1d': 'candle1D',
};

export const BITGET_BOOK_CHANNEL = 'books';

export function toBitgetInstType(marketType: MarketType): BitgetInstType {
    return marketType === 'spot' ? 'SPOT' : 'USDT-FUTURES';
}

/** BTCUSDT_UMCBL / btc-usdt / BTC/USDT -> BTCUSDT */
export function normalizeBitgetSymbol(symbol: string): string {
    return symbol
        .trim()
        .toUpperCase()
        .replace(/_[A-Z]+$/, '')
        .replace(/[-/]/g, '');
}

export function toBitgetChannel(channel: StreamChannel): string {
    if (channel === 'ticker' || channel === 'trade') return channel;
    if (channel === 'orderbook') return BITGET_BOOK_CHANNEL;
    return CANDLE_CHANNELS[candleIntervalOf(channel)];
}

export function fromBitgetCandleChannel(channel: string): CandleInterval | undefined {
    for (const [interval, name] of Object.entries(CANDLE_CHANNELS)) {
        if (name === channel) return parseCandleInterval(interval);
    }
    return undefined;
}

export function fromBitgetChannel(channel: string): StreamChannel | undefined {
    if (channel === 'ticker' || channel === 'trade') return channel;
    if (channel === BITGET_BOOK_CHANNEL) return 'orderbook';
    const interval = fromBitgetCandleChannel(channel);
    return interval ? `candle:${interval}` : undefined;
}
