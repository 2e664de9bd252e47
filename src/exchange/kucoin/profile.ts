import type { MarketType } from '../../core/events/EventBus';
import { isRecord } from '../../core/market/numeric';
import type { InboundFrame, OutboundRequest, SubscriptionKey, SubscriptionOp, VenueProfile } from '../types';
import { KUCOIN_DEFAULT_PING_INTERVAL_MS } from './bulletAuth';
import { normalizeKucoinPayload } from './normalizer';
import { normalizeKucoinSymbol, toKucoinTopic } from './topics';

// ============================================================================
// KuCoin (token-gated)
// ----------------------------------------------------------------------------
// Сессия готова только после { type: "welcome" }.
// Keepalive: { id, type: "ping" }, ответ { id, type: "pong" } с тем же id.
// Одна подписка = один запрос с собственным id, ack/error приходят по id.
// ============================================================================

export function createKucoinProfile(marketType: MarketType): VenueProfile {
    const normalizeSymbol = (symbol: string) => normalizeKucoinSymbol(marketType, symbol);

    return {
        exchange: 'kucoin',
        marketType,
        keepaliveIntervalMs: KUCOIN_DEFAULT_PING_INTERVAL_MS,
        readyOnOpen: false,
        normalizeSymbol,
        buildPing: (id: string) => JSON.stringify({ id, type: 'ping' }),

        buildRequests(op: SubscriptionOp, keys: readonly SubscriptionKey[], nextId: () => string): OutboundRequest[] {
            return keys.map((key) => {
                const id = nextId();
                const payload = JSON.stringify({
                    id,
                    type: op,
                    topic: toKucoinTopic(marketType, key.channel, normalizeSymbol(key.symbol)),
                    privateChannel: false,
                    response: true,
                });
                return { op, requestId: id, keys: [key], payload };
            });
        },

        decode(text: string): InboundFrame {
            let parsed: unknown;
            try {
                parsed = JSON.parse(text);
            } catch {
                return { kind: 'malformed', reason: 'frame is not valid JSON' };
            }
            if (!isRecord(parsed)) return { kind: 'malformed', reason: 'frame is not a JSON object' };

            const id = parsed.id !== undefined && parsed.id !== null ? String(parsed.id) : undefined;
            switch (parsed.type) {
                case 'pong':
                    return { kind: 'pong', id };
                case 'welcome':
                    return { kind: 'welcome', id };
                case 'ack':
                    // op is resolved from the pending request with this id
                    return { kind: 'ack', op: 'subscribe', requestId: id, keys: [] };
                case 'error': {
                    const reason = `code=${String(parsed.code ?? 'unknown')} ${String(parsed.data ?? '')}`.trim();
                    return id ? { kind: 'nack', requestId: id, keys: [], reason } : { kind: 'venue_error', reason };
                }
                case 'message':
                    return { kind: 'data', payload: parsed };
                default:
                    return { kind: 'malformed', reason: `unrecognized frame type ${String(parsed.type)}` };
            }
        },

        normalize: normalizeKucoinPayload,
    };
}
