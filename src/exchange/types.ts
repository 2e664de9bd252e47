import type {
    CanonicalEvent,
    ConnectionId,
    ExchangeId,
    MarketType,
    StreamChannel,
} from '../core/events/EventBus';
import type { TransportError } from '../core/errors';

// ---------------------------------------------------------------------------
// Subscriptions
// ---------------------------------------------------------------------------

export interface SubscriptionKey {
    symbol: string;
    channel: StreamChannel;
}

export const subscriptionKeyOf = (sub: SubscriptionKey): string => `${sub.channel}|${sub.symbol}`;

// ---------------------------------------------------------------------------
// Transport Adapter contract
// ---------------------------------------------------------------------------

export type TransportEvent =
    | { type: 'open' }
    | { type: 'message'; data: string }
    | { type: 'closed'; code: number; reason: string }
    | { type: 'error'; error: TransportError };

export interface TransportHandle {
    send(payload: string): void;
    /** Graceful close; the adapter terminates the socket if the peer does not answer in time. */
    close(code?: number, reason?: string): void;
    terminate(): void;
    isOpen(): boolean;
}

/** Opens a socket to `endpoint`. Never retries: failures surface as `closed` / `error` events. */
export type TransportFactory = (endpoint: string, onEvent: (event: TransportEvent) => void) => TransportHandle;

// ---------------------------------------------------------------------------
// Auth/Handshake Provider contract
// ---------------------------------------------------------------------------

export interface AuthGrant {
    /** Full URL the transport opens, token already embedded where the venue needs it. */
    endpoint: string;
    token?: string;
    /** End of the stated validity window, unix ms. */
    expiresAt?: number;
    /** Keepalive cadence advertised by the venue, overrides the profile default. */
    pingIntervalMs?: number;
}

export interface AuthProvider {
    readonly tokenGated: boolean;
    /** Safe to call repeatedly: every reconnect and every proactive refresh calls it again. */
    acquire(signal?: AbortSignal): Promise<AuthGrant>;
}

// ---------------------------------------------------------------------------
// Venue profile: per-exchange capabilities as a plain object of functions
// ---------------------------------------------------------------------------

export type SubscriptionOp = 'subscribe' | 'unsubscribe';

export interface OutboundRequest {
    op: SubscriptionOp;
    requestId?: string;
    keys: SubscriptionKey[];
    payload: string;
}

export type InboundFrame =
    | { kind: 'pong'; id?: string }
    | { kind: 'welcome'; id?: string }
    | { kind: 'ack'; op: SubscriptionOp; requestId?: string; keys: SubscriptionKey[] }
    | { kind: 'nack'; requestId?: string; keys: SubscriptionKey[]; reason: string }
    | { kind: 'venue_error'; reason: string }
    | { kind: 'data'; payload: Record<string, unknown> }
    | { kind: 'malformed'; reason: string };

export interface NormalizeContext {
    connectionId: ConnectionId;
    exchange: ExchangeId;
    marketType: MarketType;
    receivedTs: number;
    raw: string;
}

export interface VenueProfile {
    readonly exchange: ExchangeId;
    readonly marketType: MarketType;
    readonly keepaliveIntervalMs: number;
    /** false: the session is usable only after the venue's welcome frame. */
    readonly readyOnOpen: boolean;
    normalizeSymbol(symbol: string): string;
    buildPing(id: string): string;
    buildRequests(op: SubscriptionOp, keys: readonly SubscriptionKey[], nextId: () => string): OutboundRequest[];
    decode(text: string): InboundFrame;
    normalize(payload: Record<string, unknown>, ctx: NormalizeContext): CanonicalEvent[];
}

// ---------------------------------------------------------------------------
// Credentials collaborator
// ---------------------------------------------------------------------------

export interface ExchangeCredentials {
    key: string;
    secret: string;
    passphrase: string;
}
