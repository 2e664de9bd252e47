import { isStreamChannel, type StreamChannel } from '../../core/events/EventBus';
import { SubscriptionError, toErrorMessage } from '../../core/errors';
import { m } from '../../core/logMarkers';
import { logger } from '../../infra/logger';
import { subscriptionKeyOf, type SubscriptionKey, type SubscriptionOp, type VenueProfile } from '../types';

export type SubscriptionSender = (payload: string) => void;

export interface SubscriptionManagerOptions {
    profile: VenueProfile;
    logPrefix?: string;
    nextId?: () => string;
}

interface PendingRequest {
    op: SubscriptionOp;
    keys: string[];
}

// ============================================================================
// SubscriptionManager
// ----------------------------------------------------------------------------
// desired  : что хочет вызывающий (меняется только add/remove/nack),
// confirmed: что подтвердила биржа (меняется только ack'ами, ⊆ desired),
// pending  : отправленные, но ещё не подтверждённые запросы.
// Пока sender не подключён, add/remove только меняют desired;
// onReconnected() отправляет весь desired ровно один раз.
// ============================================================================

export class SubscriptionManager {
    private readonly desired = new Map<string, SubscriptionKey>();
    private readonly confirmed = new Set<string>();
    private readonly pendingByKey = new Map<string, SubscriptionOp>();
    private readonly pendingRequests = new Map<string, PendingRequest>();
    private readonly profile: VenueProfile;
    private readonly logPrefix: string;
    private readonly nextId: () => string;
    private sender: SubscriptionSender | null = null;

    constructor(opts: SubscriptionManagerOptions) {
        this.profile = opts.profile;
        this.logPrefix = opts.logPrefix ?? `[${opts.profile.exchange.toUpperCase()}Subs]`;
        this.nextId = opts.nextId ?? createRequestIdFactory();
    }

    /** Normalized key as the venue profile sees it. */
    keyOf(symbol: string, channel: StreamChannel): SubscriptionKey {
        return { symbol: this.profile.normalizeSymbol(symbol), channel };
    }

    add(symbol: string, channel: StreamChannel): boolean {
        const key = this.keyOf(symbol, channel);
        const id = subscriptionKeyOf(key);
        if (this.desired.has(id)) return false;
        this.desired.set(id, key);
        if (this.sender) this.send('subscribe', [key]);
        return true;
    }

    remove(symbol: string, channel: StreamChannel): boolean {
        const key = this.keyOf(symbol, channel);
        const id = subscriptionKeyOf(key);
        if (!this.desired.delete(id)) return false;
        const wasConfirmed = this.confirmed.delete(id);
        const wasPending = this.pendingByKey.delete(id);
        if (this.sender && (wasConfirmed || wasPending)) this.send('unsubscribe', [key]);
        return true;
    }

    has(symbol: string, channel: StreamChannel): boolean {
        return this.desired.has(subscriptionKeyOf(this.keyOf(symbol, channel)));
    }

    desiredSet(): SubscriptionKey[] {
        return sortKeys(Array.from(this.desired.values()));
    }

    confirmedSet(): SubscriptionKey[] {
        const out: SubscriptionKey[] = [];
        for (const id of this.confirmed) {
            const key = this.desired.get(id);
            if (key) out.push(key);
        }
        return sortKeys(out);
    }

    /** Connection is usable: later add/remove go straight to the wire. */
    attach(sender: SubscriptionSender): void {
        this.sender = sender;
    }

    /** Connection lost: nothing is confirmed any more, in-flight requests are void. */
    detach(): void {
        this.sender = null;
        this.confirmed.clear();
        this.pendingByKey.clear();
        this.pendingRequests.clear();
    }

    /**
     * Replays the whole desired set once on a fresh session.
     * Returns the number of keys sent.
     */
    onReconnected(): number {
        this.confirmed.clear();
        this.pendingByKey.clear();
        this.pendingRequests.clear();
        const keys = this.desiredSet();
        if (!this.sender || keys.length === 0) return 0;
        this.send('subscribe', keys);
        logger.info(m('subscribe', `${this.logPrefix} replayed ${keys.length} subscription(s)`));
        return keys.length;
    }

    /** True when the key moved to confirmed; acks for keys no longer desired are ignored. */
    onAck(symbol: string, channel: StreamChannel): boolean {
        const id = subscriptionKeyOf(this.keyOf(symbol, channel));
        this.pendingByKey.delete(id);
        if (!this.desired.has(id) || this.confirmed.has(id)) return false;
        this.confirmed.add(id);
        return true;
    }

    /**
     * Rejected key leaves the desired set so later reconnects do not replay it.
     * The error goes back to the caller; the connection is untouched.
     */
    onNack(symbol: string, channel: StreamChannel, reason: string): SubscriptionError | undefined {
        const key = this.keyOf(symbol, channel);
        const id = subscriptionKeyOf(key);
        this.pendingByKey.delete(id);
        this.confirmed.delete(id);
        if (!this.desired.delete(id)) return undefined;
        logger.warn(m('warn', `${this.logPrefix} subscription rejected ${key.channel}:${key.symbol} reason=${reason}`));
        return new SubscriptionError(key.symbol, key.channel, `subscription rejected: ${reason}`, { reason });
    }

    /** Maps a venue request id (ack/error by id) back to the keys and op it carried. */
    resolveRequest(requestId: string): { op: SubscriptionOp; keys: SubscriptionKey[] } | undefined {
        const request = this.pendingRequests.get(requestId);
        if (!request) return undefined;
        this.pendingRequests.delete(requestId);
        const keys: SubscriptionKey[] = [];
        for (const id of request.keys) {
            const key = this.desired.get(id) ?? parseKeyId(id);
            if (key) keys.push(key);
        }
        return { op: request.op, keys };
    }

    pendingCount(): number {
        return this.pendingByKey.size;
    }

    private send(op: SubscriptionOp, keys: SubscriptionKey[]): void {
        const sender = this.sender;
        if (!sender) return;
        for (const request of this.profile.buildRequests(op, keys, this.nextId)) {
            const ids = request.keys.map(subscriptionKeyOf);
            try {
                sender(request.payload);
            } catch (err) {
                // desired is intact, the next replay sends it again
                logger.warn(m('warn', `${this.logPrefix} ${op} send failed: ${toErrorMessage(err)}`));
                continue;
            }
            if (op === 'subscribe') ids.forEach((id) => this.pendingByKey.set(id, op));
            if (request.requestId) this.pendingRequests.set(request.requestId, { op, keys: ids });
            logger.debug(m('subscribe', `${this.logPrefix} ${op} sent ${ids.join(', ')}`));
        }
    }
}

function sortKeys(keys: SubscriptionKey[]): SubscriptionKey[] {
    return keys.sort((a, b) => subscriptionKeyOf(a).localeCompare(subscriptionKeyOf(b)));
}

function parseKeyId(id: string): SubscriptionKey | undefined {
    const sep = id.indexOf('|');
    if (sep === -1) return undefined;
    const channel = id.slice(0, sep);
    const symbol = id.slice(sep + 1);
    return isStreamChannel(channel) ? { symbol, channel } : undefined;
}

export function createRequestIdFactory(start = Date.now()): () => string {
    let seq = 0;
    return () => {
        seq += 1;
        return `${start}${String(seq).padStart(4, '0')}`;
    };
}
