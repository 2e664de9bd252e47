import type { MarketType } from '../../core/events/EventBus';
import { isRecord } from '../../core/market/numeric';
import type { InboundFrame, OutboundRequest, SubscriptionKey, SubscriptionOp, VenueProfile } from '../types';
import { normalizeBitgetPayload } from './normalizer';
import { fromBitgetChannel, normalizeBitgetSymbol, toBitgetChannel, toBitgetInstType } from './symbols';

export const BITGET_PUBLIC_WS_URL = 'wss://ws.bitget.com/v2/ws/public';
export const BITGET_PING_INTERVAL_MS = 30_000;
// Bitget limits one frame to a bounded number of args
const MAX_ARGS_PER_REQUEST = 20;

interface BitgetArg {
    instType: string;
    channel: string;
    instId: string;
}

// ============================================================================
// Bitget public stream (v2)
// ----------------------------------------------------------------------------
// Keepalive: строка "ping", ответ: строка "pong".
// Подписка: { op: "subscribe", args: [{ instType, channel, instId }] },
// подтверждение приходит на каждый arg отдельно: { event: "subscribe", arg }.
// ============================================================================

export function createBitgetProfile(marketType: MarketType): VenueProfile {
    const instType = toBitgetInstType(marketType);

    const toArg = (key: SubscriptionKey): BitgetArg => ({
        instType,
        channel: toBitgetChannel(key.channel),
        instId: normalizeBitgetSymbol(key.symbol),
    });

    const keyFromArg = (arg: unknown): SubscriptionKey | undefined => {
        if (!isRecord(arg) || typeof arg.channel !== 'string' || typeof arg.instId !== 'string') return undefined;
        const channel = fromBitgetChannel(arg.channel);
        return channel ? { symbol: normalizeBitgetSymbol(arg.instId), channel } : undefined;
    };

    return {
        exchange: 'bitget',
        marketType,
        keepaliveIntervalMs: BITGET_PING_INTERVAL_MS,
        readyOnOpen: true,
        normalizeSymbol: normalizeBitgetSymbol,
        buildPing: () => 'ping',

        buildRequests(op: SubscriptionOp, keys: readonly SubscriptionKey[]): OutboundRequest[] {
            const out: OutboundRequest[] = [];
            for (let i = 0; i < keys.length; i += MAX_ARGS_PER_REQUEST) {
                const chunk = keys.slice(i, i + MAX_ARGS_PER_REQUEST);
                out.push({ op, keys: chunk, payload: JSON.stringify({ op, args: chunk.map(toArg) }) });
            }
            return out;
        },

        decode(text: string): InboundFrame {
            if (text === 'pong') return { kind: 'pong' };

            let parsed: unknown;
            try {
                parsed = JSON.parse(text);
            } catch {
                return { kind: 'malformed', reason: 'frame is not valid JSON' };
            }
            if (!isRecord(parsed)) return { kind: 'malformed', reason: 'frame is not a JSON object' };

            const event = parsed.event;
            if (event === 'subscribe' || event === 'unsubscribe') {
                const key = keyFromArg(parsed.arg);
                return { kind: 'ack', op: event, keys: key ? [key] : [] };
            }
            if (event === 'error') {
                const reason = `code=${String(parsed.code ?? 'unknown')} ${String(parsed.msg ?? '')}`.trim();
                const key = keyFromArg(parsed.arg);
                return key ? { kind: 'nack', keys: [key], reason } : { kind: 'venue_error', reason };
            }
            if (isRecord(parsed.arg) && parsed.data !== undefined) return { kind: 'data', payload: parsed };

            return { kind: 'malformed', reason: 'unrecognized frame' };
        },

        normalize: normalizeBitgetPayload,
    };
}
