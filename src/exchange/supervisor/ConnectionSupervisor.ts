import type {
    CanonicalEvent,
    ConnectionId,
    ConnectionRef,
    ConnectionStateName,
    EventBus,
    StreamChannel,
} from '../../core/events/EventBus';
import { nowMs } from '../../core/events/EventBus';
import { FatalError, toErrorMessage } from '../../core/errors';
import { m } from '../../core/logMarkers';
import { logger } from '../../infra/logger';
import { DEFAULT_TOKEN_REFRESH_LEAD_MS, effectiveExpiry, isGrantUsable } from '../auth/authPolicy';
import { controlEvent } from '../normalizers/canonical';
import { SubscriptionManager } from '../subscriptions/SubscriptionManager';
import { redact } from '../transport/wsTransport';
import type {
    AuthGrant,
    AuthProvider,
    InboundFrame,
    NormalizeContext,
    SubscriptionKey,
    TransportEvent,
    TransportFactory,
    TransportHandle,
    VenueProfile,
} from '../types';
import { normalizeBackoffPolicy, type BackoffPolicy } from './backoff';
import {
    INITIAL_SNAPSHOT,
    transition,
    type MachineConfig,
    type SupervisorEffect,
    type SupervisorInput,
    type SupervisorSnapshot,
} from './stateMachine';

export interface ConnectionSupervisorOptions {
    connectionId: ConnectionId;
    profile: VenueProfile;
    auth: AuthProvider;
    transport: TransportFactory;
    bus: EventBus;
    backoff?: Partial<BackoffPolicy>;
    /** How long a session must stream before the retry counter resets; defaults to one keepalive cycle. */
    stableMs?: number;
    /** Upper bound for auth + socket open + venue welcome. */
    connectTimeoutMs?: number;
    tokenRefreshLeadMs?: number;
    now?: () => number;
    subscriptions?: SubscriptionManager;
}

export interface ConnectionSnapshot {
    connectionId: ConnectionId;
    exchange: VenueProfile['exchange'];
    marketType: VenueProfile['marketType'];
    state: ConnectionStateName;
    attempt: number;
    fatal: boolean;
    keepaliveIntervalMs: number;
    lastActivityTs?: number;
    lastPingTs?: number;
    lastPongTs?: number;
    tokenExpiresAt?: number;
    desired: SubscriptionKey[];
    confirmed: SubscriptionKey[];
    /** Sent requests still waiting for an ack. */
    pending: number;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 15_000;

// ============================================================================
// ConnectionSupervisor
// ----------------------------------------------------------------------------
// Один экземпляр = одно соединение (exchange × marketType).
// Решения принимает stateMachine.transition(); здесь только исполнение
// эффектов: таймеры, сокет, auth, публикация в шину.
// Все колбэки старых сокетов / auth-запросов отбрасываются по поколению.
// ============================================================================

export class ConnectionSupervisor {
    public readonly connectionId: ConnectionId;
    public readonly subscriptions: SubscriptionManager;
    private readonly profile: VenueProfile;
    private readonly auth: AuthProvider;
    private readonly transport: TransportFactory;
    private readonly bus: EventBus;
    private readonly machine: MachineConfig;
    private readonly stableMs?: number;
    private readonly connectTimeoutMs: number;
    private readonly tokenRefreshLeadMs: number;
    private readonly now: () => number;
    private readonly logPrefix: string;

    private snapshot: SupervisorSnapshot = INITIAL_SNAPSHOT;
    private readonly queue: SupervisorInput[] = [];
    private dispatching = false;

    private handle: TransportHandle | null = null;
    private transportGeneration = 0;
    private authGeneration = 0;
    private authAbort: AbortController | null = null;
    private grant: AuthGrant | null = null;

    private retryTimer: NodeJS.Timeout | null = null;
    private keepaliveTimer: NodeJS.Timeout | null = null;
    private tokenTimer: NodeJS.Timeout | null = null;
    private stableTimer: NodeJS.Timeout | null = null;
    private connectTimer: NodeJS.Timeout | null = null;

    private lastActivityTs?: number;
    private lastPingTs?: number;
    private lastPongTs?: number;
    private pingSeq = 0;
    private pendingPingId: string | null = null;
    private stopWaiters: Array<() => void> = [];

    constructor(opts: ConnectionSupervisorOptions) {
        this.connectionId = opts.connectionId;
        this.profile = opts.profile;
        this.auth = opts.auth;
        this.transport = opts.transport;
        this.bus = opts.bus;
        this.machine = {
            tokenGated: opts.auth.tokenGated,
            backoff: normalizeBackoffPolicy({ jitterSeed: opts.connectionId, ...opts.backoff }),
        };
        this.stableMs = opts.stableMs;
        this.connectTimeoutMs = Math.max(1_000, opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
        this.tokenRefreshLeadMs = opts.tokenRefreshLeadMs ?? DEFAULT_TOKEN_REFRESH_LEAD_MS;
        this.now = opts.now ?? nowMs;
        this.logPrefix = `[${opts.profile.exchange.toUpperCase()}WS#${opts.connectionId}]`;
        this.subscriptions =
            opts.subscriptions ?? new SubscriptionManager({ profile: opts.profile, logPrefix: this.logPrefix });
    }

    get state(): ConnectionStateName {
        return this.snapshot.state;
    }

    get keepaliveIntervalMs(): number {
        return this.grant?.pingIntervalMs ?? this.profile.keepaliveIntervalMs;
    }

    start(): void {
        if (this.snapshot.state !== 'disconnected') return;
        logger.info(m('lifecycle', `${this.logPrefix} start (tokenGated=${this.machine.tokenGated})`));
        this.dispatch({ type: 'start' });
    }

    /** Resolves once the socket is closed and the connection sits in `disconnected`. */
    stop(reason = 'stopped by caller'): Promise<void> {
        if (this.snapshot.state === 'disconnected') return Promise.resolve();
        const done = new Promise<void>((resolve) => {
            this.stopWaiters.push(resolve);
        });
        this.dispatch({ type: 'stop', reason });
        return done;
    }

    addSubscription(symbol: string, channel: StreamChannel): boolean {
        return this.subscriptions.add(symbol, channel);
    }

    removeSubscription(symbol: string, channel: StreamChannel): boolean {
        return this.subscriptions.remove(symbol, channel);
    }

    getSnapshot(): ConnectionSnapshot {
        return {
            connectionId: this.connectionId,
            exchange: this.profile.exchange,
            marketType: this.profile.marketType,
            state: this.snapshot.state,
            attempt: this.snapshot.failures,
            fatal: this.snapshot.fatal,
            keepaliveIntervalMs: this.keepaliveIntervalMs,
            lastActivityTs: this.lastActivityTs,
            lastPingTs: this.lastPingTs,
            lastPongTs: this.lastPongTs,
            tokenExpiresAt: this.grant?.expiresAt,
            desired: this.subscriptions.desiredSet(),
            confirmed: this.subscriptions.confirmedSet(),
            pending: this.subscriptions.pendingCount(),
        };
    }

    // ------------------------------------------------------------------------
    // State machine driver
    // ------------------------------------------------------------------------

    private dispatch(input: SupervisorInput): void {
        this.queue.push(input);
        if (this.dispatching) return;
        this.dispatching = true;
        try {
            let next = this.queue.shift();
            while (next) {
                this.apply(next);
                next = this.queue.shift();
            }
        } finally {
            this.dispatching = false;
        }
        if (this.snapshot.state === 'disconnected' && this.stopWaiters.length > 0) {
            const waiters = this.stopWaiters;
            this.stopWaiters = [];
            waiters.forEach((resolve) => resolve());
        }
    }

    private apply(input: SupervisorInput): void {
        const { next, effects, path } = transition(this.snapshot, input, this.machine);
        this.snapshot = next;
        for (const change of path) {
            logger.info(m('lifecycle', `${this.logPrefix} ${change.from} -> ${change.to} (${input.type})`));
            this.bus.publish('connection:state', { ...this.ref(), from: change.from, to: change.to });
        }
        for (const effect of effects) {
            this.run(effect);
        }
    }

    private run(effect: SupervisorEffect): void {
        switch (effect.type) {
            case 'acquire_auth':
                this.acquireAuth();
                return;
            case 'cancel_auth':
                this.cancelAuth();
                return;
            case 'open_transport':
                this.openTransport();
                return;
            case 'close_transport':
                this.closeTransport(effect.reason);
                return;
            case 'arm_connect_timeout':
                this.armConnectTimeout();
                return;
            case 'clear_connect_timeout':
                this.clearTimer('connectTimer');
                return;
            case 'replay_subscriptions':
                this.subscriptions.attach((payload) => this.send(payload));
                this.subscriptions.onReconnected();
                return;
            case 'start_session_timers':
                this.startKeepalive();
                this.scheduleTokenRefresh();
                return;
            case 'stop_session_timers':
                this.clearKeepalive();
                this.clearTimer('tokenTimer');
                this.pendingPingId = null;
                return;
            case 'schedule_retry':
                this.scheduleRetry(effect.delayMs, effect.attempt);
                return;
            case 'cancel_retry':
                this.clearTimer('retryTimer');
                return;
            case 'schedule_stability':
                this.scheduleStableReset();
                return;
            case 'cancel_stability':
                this.clearTimer('stableTimer');
                return;
            case 'emit_connected':
                logger.info(m('ok', `${this.logPrefix} streaming, ${this.subscriptions.desiredSet().length} subscription(s) desired`));
                this.bus.publish('connection:connected', {
                    ...this.ref(),
                    endpoint: this.grant ? redact(this.grant.endpoint) : '',
                });
                return;
            case 'emit_disconnected':
                this.bus.publish('connection:disconnected', {
                    ...this.ref(),
                    reason: effect.reason,
                    willRetry: effect.willRetry,
                    retryInMs: effect.retryInMs,
                    attempt: effect.attempt,
                });
                return;
            case 'emit_fatal': {
                const message =
                    effect.cause === 'configuration'
                        ? `unrecoverable configuration: ${effect.reason}`
                        : `retry budget exhausted after ${effect.attempts} attempt(s): ${effect.reason}`;
                const error = new FatalError(message, {
                    connectionId: this.connectionId,
                    cause: effect.cause,
                    attempts: effect.attempts,
                    maxRetries: this.machine.backoff.maxRetries,
                });
                logger.error(m('error', `${this.logPrefix} ${error.message}`));
                this.bus.publish('connection:fatal', { ...this.ref(), error });
                return;
            }
        }
    }

    // ------------------------------------------------------------------------
    // Auth
    // ------------------------------------------------------------------------

    private acquireAuth(): void {
        this.cancelAuth();
        const generation = ++this.authGeneration;
        const abort = new AbortController();
        this.authAbort = abort;
        logger.info(m('auth', `${this.logPrefix} acquiring token`));
        this.auth
            .acquire(abort.signal)
            .then((grant) => {
                if (generation !== this.authGeneration) return;
                this.authAbort = null;
                this.grant = grant;
                this.dispatch({ type: 'auth_acquired' });
            })
            .catch((err: unknown) => {
                if (generation !== this.authGeneration) return;
                this.authAbort = null;
                logger.warn(m('warn', `${this.logPrefix} auth failed: ${toErrorMessage(err)}`));
                this.dispatch({ type: 'auth_failed', reason: toErrorMessage(err) });
            });
    }

    private cancelAuth(): void {
        this.authGeneration += 1;
        if (this.authAbort) {
            this.authAbort.abort();
            this.authAbort = null;
        }
    }

    // ------------------------------------------------------------------------
    // Transport
    // ------------------------------------------------------------------------

    private openTransport(): void {
        if (this.auth.tokenGated) {
            if (!this.grant) {
                this.dispatch({ type: 'auth_failed', reason: 'no grant to open the transport with' });
                return;
            }
            if (!isGrantUsable(this.grant, this.now(), this.tokenRefreshLeadMs)) {
                this.dispatch({
                    type: 'auth_failed',
                    reason: `token expires within the ${this.tokenRefreshLeadMs}ms refresh lead`,
                });
                return;
            }
            this.connectTransport(this.grant);
            return;
        }
        // public endpoint: the provider only names the URL
        const generation = ++this.authGeneration;
        this.auth
            .acquire()
            .then((grant) => {
                if (generation !== this.authGeneration) return;
                this.grant = grant;
                this.connectTransport(grant);
            })
            .catch((err: unknown) => {
                if (generation !== this.authGeneration) return;
                this.dispatch({ type: 'transport_error', reason: `endpoint lookup failed: ${toErrorMessage(err)}` });
            });
    }

    private connectTransport(grant: AuthGrant): void {
        const invalid = endpointProblem(grant.endpoint);
        if (invalid) {
            this.dispatch({ type: 'unrecoverable', reason: `invalid endpoint ${redact(grant.endpoint)}: ${invalid}` });
            return;
        }
        if (this.handle) this.closeTransport('superseded');
        const generation = ++this.transportGeneration;
        logger.info(m('connect', `${this.logPrefix} connecting to ${redact(grant.endpoint)}`));
        try {
            this.handle = this.transport(grant.endpoint, (event) => this.onTransportEvent(generation, event));
        } catch (err) {
            this.handle = null;
            this.dispatch({ type: 'transport_error', reason: `open failed: ${toErrorMessage(err)}` });
        }
    }

    private closeTransport(reason: string): void {
        this.subscriptions.detach();
        const handle = this.handle;
        this.handle = null;
        const closing = this.snapshot.state === 'closing';
        if (!closing) {
            // late events of the old socket must not reach the new attempt
            this.transportGeneration += 1;
        }
        if (!handle) {
            if (closing) this.dispatch({ type: 'transport_closed', reason: 'no open transport' });
            return;
        }
        logger.info(m('socket', `${this.logPrefix} closing socket (${reason})`));
        handle.close(1000, reason.slice(0, 100));
    }

    private onTransportEvent(generation: number, event: TransportEvent): void {
        if (generation !== this.transportGeneration) return;
        switch (event.type) {
            case 'open':
                this.lastActivityTs = this.now();
                this.dispatch({ type: 'transport_opened' });
                if (this.profile.readyOnOpen) this.dispatch({ type: 'session_ready' });
                return;
            case 'message':
                this.onMessage(event.data);
                return;
            case 'closed':
                this.handle = null;
                logger.warn(m('socket', `${this.logPrefix} socket closed code=${event.code} reason=${event.reason || 'n/a'}`));
                this.dispatch({ type: 'transport_closed', reason: `code=${event.code} ${event.reason}`.trim() });
                return;
            case 'error':
                logger.warn(m('warn', `${this.logPrefix} ${event.error.message}`));
                this.dispatch({ type: 'transport_error', reason: event.error.message });
                return;
        }
    }

    private send(payload: string): void {
        if (!this.handle) throw new Error('transport is not open');
        this.handle.send(payload);
    }

    // ------------------------------------------------------------------------
    // Inbound frames
    // ------------------------------------------------------------------------

    private onMessage(text: string): void {
        const receivedTs = this.now();
        this.lastActivityTs = receivedTs;
        const frame = this.profile.decode(text);
        this.handleFrame(frame, text, receivedTs);
    }

    private handleFrame(frame: InboundFrame, raw: string, receivedTs: number): void {
        switch (frame.kind) {
            case 'pong':
                this.lastPongTs = receivedTs;
                if (frame.id !== undefined && frame.id !== this.pendingPingId) {
                    logger.debug(m('heartbeat', `${this.logPrefix} pong id=${frame.id} does not match ping id=${this.pendingPingId ?? 'n/a'}`));
                    return;
                }
                this.pendingPingId = null;
                logger.debug(m('heartbeat', `${this.logPrefix} pong`));
                return;
            case 'welcome':
                logger.info(m('connect', `${this.logPrefix} welcome received`));
                this.dispatch({ type: 'session_ready' });
                return;
            case 'ack':
                this.onAck(frame);
                return;
            case 'nack':
                this.onNack(frame, raw, receivedTs);
                return;
            case 'venue_error':
                logger.warn(m('warn', `${this.logPrefix} venue error: ${frame.reason}`));
                this.bus.publish('market:event', controlEvent(this.normalizeContext(raw, receivedTs), '', 'venue_error', frame.reason));
                return;
            case 'malformed':
                this.publishProtocolError(frame.reason, raw, receivedTs);
                return;
            case 'data':
                this.onData(frame.payload, raw, receivedTs);
                return;
        }
    }

    private onAck(frame: Extract<InboundFrame, { kind: 'ack' }>): void {
        const resolved = frame.requestId ? this.subscriptions.resolveRequest(frame.requestId) : undefined;
        const op = resolved?.op ?? frame.op;
        const keys = frame.keys.length > 0 ? frame.keys : resolved?.keys ?? [];
        if (op === 'unsubscribe') {
            keys.forEach((key) => logger.debug(m('subscribe', `${this.logPrefix} unsubscribed ${key.channel}:${key.symbol}`)));
            return;
        }
        for (const key of keys) {
            if (!this.subscriptions.onAck(key.symbol, key.channel)) continue;
            logger.debug(m('subscribe', `${this.logPrefix} subscribed ${key.channel}:${key.symbol}`));
            this.bus.publish('subscription:acked', { ...this.ref(), symbol: key.symbol, channel: key.channel });
        }
    }

    private onNack(frame: Extract<InboundFrame, { kind: 'nack' }>, raw: string, receivedTs: number): void {
        const resolved = frame.requestId ? this.subscriptions.resolveRequest(frame.requestId) : undefined;
        const keys = frame.keys.length > 0 ? frame.keys : resolved?.keys ?? [];
        if (keys.length === 0 || resolved?.op === 'unsubscribe') {
            logger.warn(m('warn', `${this.logPrefix} request rejected: ${frame.reason}`));
            this.bus.publish('market:event', controlEvent(this.normalizeContext(raw, receivedTs), '', 'venue_error', frame.reason));
            return;
        }
        for (const key of keys) {
            const error = this.subscriptions.onNack(key.symbol, key.channel, frame.reason);
            if (!error) continue;
            this.bus.publish('subscription:failed', {
                ...this.ref(),
                symbol: key.symbol,
                channel: key.channel,
                reason: frame.reason,
                error,
            });
        }
    }

    private onData(payload: Record<string, unknown>, raw: string, receivedTs: number): void {
        const ctx = this.normalizeContext(raw, receivedTs);
        let events: CanonicalEvent[];
        try {
            events = this.profile.normalize(payload, ctx);
        } catch (err) {
            this.publishProtocolError(`normalizer failed: ${toErrorMessage(err)}`, raw, receivedTs);
            return;
        }
        for (const event of events) {
            if (event.kind === 'control') {
                logger.warn(m('warn', `${this.logPrefix} ${event.code}: ${event.message}`));
            }
            this.bus.publish('market:event', event);
        }
    }

    private publishProtocolError(reason: string, raw: string, receivedTs: number): void {
        logger.warn(m('warn', `${this.logPrefix} protocol_error: ${reason}`));
        this.bus.publish('market:event', controlEvent(this.normalizeContext(raw, receivedTs), '', 'protocol_error', reason));
    }

    private normalizeContext(raw: string, receivedTs: number): NormalizeContext {
        return {
            connectionId: this.connectionId,
            exchange: this.profile.exchange,
            marketType: this.profile.marketType,
            receivedTs,
            raw,
        };
    }

    // ------------------------------------------------------------------------
    // Timers
    // ------------------------------------------------------------------------

    private startKeepalive(): void {
        this.clearKeepalive();
        const intervalMs = this.keepaliveIntervalMs;
        this.lastActivityTs = this.now();
        this.keepaliveTimer = setInterval(() => this.keepaliveTick(intervalMs), intervalMs);
    }

    private keepaliveTick(intervalMs: number): void {
        const silentMs = this.now() - (this.lastActivityTs ?? 0);
        if (silentMs > 2 * intervalMs) {
            logger.warn(m('timeout', `${this.logPrefix} no inbound traffic for ${silentMs}ms, treating connection as stale`));
            this.dispatch({ type: 'stale', reason: `no inbound traffic for ${silentMs}ms` });
            return;
        }
        if (!this.handle || !this.handle.isOpen()) return;
        this.pingSeq += 1;
        const id = `${this.now()}${this.pingSeq}`;
        try {
            this.handle.send(this.profile.buildPing(id));
        } catch (err) {
            logger.warn(m('heartbeat', `${this.logPrefix} ping failed: ${toErrorMessage(err)}`));
            return;
        }
        this.pendingPingId = id;
        this.lastPingTs = this.now();
        logger.debug(m('heartbeat', `${this.logPrefix} ping id=${id}`));
    }

    private scheduleTokenRefresh(): void {
        this.clearTimer('tokenTimer');
        if (!this.grant || !this.auth.tokenGated) return;
        const expiry = effectiveExpiry(this.grant, this.tokenRefreshLeadMs);
        if (expiry === undefined) return;
        const delay = Math.max(0, expiry - this.now());
        logger.info(m('auth', `${this.logPrefix} token refresh in ${delay}ms`));
        this.tokenTimer = setTimeout(() => {
            this.tokenTimer = null;
            logger.info(m('auth', `${this.logPrefix} token close to expiry, planned reconnect`));
            this.dispatch({ type: 'token_expiring' });
        }, delay);
        this.tokenTimer.unref?.();
    }

    private scheduleRetry(delayMs: number, attempt: number): void {
        this.clearTimer('retryTimer');
        const budget = this.machine.backoff.maxRetries > 0 ? `/${this.machine.backoff.maxRetries}` : '';
        logger.warn(m('warn', `${this.logPrefix} reconnect in ${delayMs}ms (attempt ${attempt}${budget})`));
        this.retryTimer = setTimeout(() => {
            this.retryTimer = null;
            this.dispatch({ type: 'backoff_elapsed' });
        }, delayMs);
    }

    private scheduleStableReset(): void {
        this.clearTimer('stableTimer');
        this.stableTimer = setTimeout(() => {
            this.stableTimer = null;
            this.dispatch({ type: 'stable' });
        }, this.stableMs ?? this.keepaliveIntervalMs);
        this.stableTimer.unref?.();
    }

    private armConnectTimeout(): void {
        this.clearTimer('connectTimer');
        this.connectTimer = setTimeout(() => {
            this.connectTimer = null;
            this.dispatch({ type: 'connect_timeout', reason: `session not ready after ${this.connectTimeoutMs}ms` });
        }, this.connectTimeoutMs);
    }

    private clearTimer(name: 'retryTimer' | 'tokenTimer' | 'stableTimer' | 'connectTimer'): void {
        const timer = this[name];
        if (timer) {
            clearTimeout(timer);
            this[name] = null;
        }
    }

    private clearKeepalive(): void {
        if (this.keepaliveTimer) {
            clearInterval(this.keepaliveTimer);
            this.keepaliveTimer = null;
        }
    }

    private ref(): ConnectionRef {
        return {
            connectionId: this.connectionId,
            exchange: this.profile.exchange,
            marketType: this.profile.marketType,
            ts: this.now(),
        };
    }
}

/** Problems no retry can fix; undefined when the URL is usable. */
function endpointProblem(endpoint: string): string | undefined {
    let url: URL;
    try {
        url = new URL(endpoint);
    } catch {
        return 'not a valid URL';
    }
    if (url.protocol !== 'ws:' && url.protocol !== 'wss:') return `unsupported protocol ${url.protocol}`;
    return undefined;
}
