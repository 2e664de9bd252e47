import type { ConnectionStateName } from '../../core/events/EventBus';
import { computeBackoffDelay, isRetryBudgetExhausted, type BackoffPolicy } from './backoff';

// ============================================================================
// Reconnect state machine
// ----------------------------------------------------------------------------
// Чистая функция: (snapshot, input) -> (next snapshot, effects).
// Никаких таймеров и сокетов внутри: их исполняет ConnectionSupervisor.
//
//   disconnected --start--> connecting --(token-gated)--> authenticating
//   authenticating --auth_acquired--> connecting (open transport)
//   connecting --transport_opened--> subscribing --session_ready--> streaming
//   streaming --closed/error/stale--> connecting (retry after backoff)
//   streaming --token_expiring--> connecting --> authenticating
//   * --stop--> closing --transport_closed--> disconnected
//   * --failure over budget--> disconnected (fatal)
//   * --unrecoverable (bad endpoint)--> disconnected (fatal), без ретраев
// ============================================================================

export interface SupervisorSnapshot {
    readonly state: ConnectionStateName;
    /** Consecutive failed attempts since the last stable session. */
    readonly failures: number;
    /** In `connecting`, waiting for the backoff delay. */
    readonly retryPending: boolean;
    /** Terminal: retry budget exhausted. Only an explicit start leaves it. */
    readonly fatal: boolean;
}

export interface MachineConfig {
    tokenGated: boolean;
    backoff: BackoffPolicy;
}

export type FailureInput =
    | { type: 'auth_failed'; reason: string }
    | { type: 'transport_error'; reason: string }
    | { type: 'transport_closed'; reason: string }
    | { type: 'connect_timeout'; reason: string }
    | { type: 'stale'; reason: string };

export type SupervisorInput =
    | { type: 'start' }
    | { type: 'backoff_elapsed' }
    | { type: 'auth_acquired' }
    | { type: 'transport_opened' }
    | { type: 'session_ready' }
    | { type: 'token_expiring' }
    | { type: 'stable' }
    | { type: 'stop'; reason: string }
    | { type: 'unrecoverable'; reason: string }
    | FailureInput;

export type FatalCause = 'retry_budget' | 'configuration';

export type SupervisorEffect =
    | { type: 'acquire_auth' }
    | { type: 'cancel_auth' }
    | { type: 'open_transport' }
    | { type: 'close_transport'; reason: string }
    | { type: 'arm_connect_timeout' }
    | { type: 'clear_connect_timeout' }
    | { type: 'replay_subscriptions' }
    | { type: 'start_session_timers' }
    | { type: 'stop_session_timers' }
    | { type: 'schedule_retry'; delayMs: number; attempt: number }
    | { type: 'cancel_retry' }
    | { type: 'schedule_stability' }
    | { type: 'cancel_stability' }
    | { type: 'emit_connected' }
    | { type: 'emit_disconnected'; reason: string; willRetry: boolean; retryInMs?: number; attempt: number }
    | { type: 'emit_fatal'; cause: FatalCause; reason: string; attempts: number };

export interface StateChange {
    from: ConnectionStateName;
    to: ConnectionStateName;
}

export interface TransitionResult {
    next: SupervisorSnapshot;
    effects: SupervisorEffect[];
    /** Every state passed through, in order; empty when the state did not change. */
    path: StateChange[];
}

export const INITIAL_SNAPSHOT: SupervisorSnapshot = {
    state: 'disconnected',
    failures: 0,
    retryPending: false,
    fatal: false,
};

const ACTIVE_STATES: ReadonlySet<ConnectionStateName> = new Set(['connecting', 'authenticating', 'subscribing', 'streaming']);

export function transition(snapshot: SupervisorSnapshot, input: SupervisorInput, config: MachineConfig): TransitionResult {
    const builder = new TransitionBuilder(snapshot);

    switch (input.type) {
        case 'start':
            if (snapshot.state !== 'disconnected') return builder.unchanged();
            builder.patch({ failures: 0, fatal: false, retryPending: false });
            builder.moveTo('connecting');
            beginAttempt(builder, config);
            return builder.result();

        case 'backoff_elapsed':
            if (snapshot.state !== 'connecting' || !snapshot.retryPending) return builder.unchanged();
            builder.patch({ retryPending: false });
            beginAttempt(builder, config);
            return builder.result();

        case 'auth_acquired':
            if (snapshot.state !== 'authenticating') return builder.unchanged();
            builder.moveTo('connecting');
            builder.effect({ type: 'open_transport' });
            return builder.result();

        case 'transport_opened':
            if (snapshot.state !== 'connecting' || snapshot.retryPending) return builder.unchanged();
            builder.moveTo('subscribing');
            return builder.result();

        case 'session_ready':
            if (snapshot.state !== 'subscribing') return builder.unchanged();
            builder.effect({ type: 'clear_connect_timeout' });
            builder.effect({ type: 'replay_subscriptions' });
            builder.moveTo('streaming');
            builder.effect({ type: 'start_session_timers' });
            builder.effect({ type: 'schedule_stability' });
            builder.effect({ type: 'emit_connected' });
            return builder.result();

        case 'token_expiring':
            // planned reconnect: does not count against the retry budget
            if (snapshot.state !== 'streaming' || !config.tokenGated) return builder.unchanged();
            builder.effect({ type: 'stop_session_timers' });
            builder.effect({ type: 'cancel_stability' });
            builder.effect({ type: 'close_transport', reason: 'token refresh' });
            builder.effect({ type: 'emit_disconnected', reason: 'token refresh', willRetry: true, retryInMs: 0, attempt: 0 });
            builder.moveTo('connecting');
            beginAttempt(builder, config);
            return builder.result();

        case 'stable':
            if (snapshot.state !== 'streaming' || snapshot.failures === 0) return builder.unchanged();
            builder.patch({ failures: 0 });
            return builder.result();

        case 'stop':
            if (snapshot.state === 'disconnected' || snapshot.state === 'closing') return builder.unchanged();
            builder.patch({ retryPending: false });
            builder.effect({ type: 'cancel_retry' });
            builder.effect({ type: 'cancel_auth' });
            builder.effect({ type: 'clear_connect_timeout' });
            builder.effect({ type: 'stop_session_timers' });
            builder.effect({ type: 'cancel_stability' });
            builder.moveTo('closing');
            builder.effect({ type: 'close_transport', reason: input.reason });
            return builder.result();

        case 'unrecoverable':
            if (!ACTIVE_STATES.has(snapshot.state)) return builder.unchanged();
            builder.patch({ fatal: true, retryPending: false });
            builder.effect({ type: 'cancel_retry' });
            stopAttempt(builder, input.reason);
            builder.moveTo('disconnected');
            builder.effect({ type: 'emit_disconnected', reason: input.reason, willRetry: false, attempt: snapshot.failures });
            builder.effect({ type: 'emit_fatal', cause: 'configuration', reason: input.reason, attempts: snapshot.failures });
            return builder.result();

        default:
            return handleFailure(builder, snapshot, input, config);
    }
}

function handleFailure(
    builder: TransitionBuilder,
    snapshot: SupervisorSnapshot,
    input: FailureInput,
    config: MachineConfig
): TransitionResult {
    if (snapshot.state === 'closing') {
        // the socket we asked to close is gone: stop is complete
        if (input.type !== 'transport_closed') return builder.unchanged();
        builder.moveTo('disconnected');
        builder.effect({ type: 'emit_disconnected', reason: 'stopped', willRetry: false, attempt: snapshot.failures });
        return builder.result();
    }
    if (!ACTIVE_STATES.has(snapshot.state) || snapshot.retryPending) return builder.unchanged();

    const failures = snapshot.failures + 1;
    const reason = `${input.type}: ${input.reason}`;
    builder.patch({ failures });
    stopAttempt(builder, reason);

    if (isRetryBudgetExhausted(config.backoff, failures)) {
        builder.patch({ fatal: true, retryPending: false });
        builder.moveTo('disconnected');
        builder.effect({ type: 'emit_disconnected', reason, willRetry: false, attempt: failures });
        builder.effect({ type: 'emit_fatal', cause: 'retry_budget', reason, attempts: failures });
        return builder.result();
    }

    const delayMs = computeBackoffDelay(config.backoff, failures);
    builder.patch({ retryPending: true });
    builder.moveTo('connecting');
    builder.effect({ type: 'emit_disconnected', reason, willRetry: true, retryInMs: delayMs, attempt: failures });
    builder.effect({ type: 'schedule_retry', delayMs, attempt: failures });
    return builder.result();
}

function stopAttempt(builder: TransitionBuilder, reason: string): void {
    builder.effect({ type: 'cancel_auth' });
    builder.effect({ type: 'clear_connect_timeout' });
    builder.effect({ type: 'stop_session_timers' });
    builder.effect({ type: 'cancel_stability' });
    builder.effect({ type: 'close_transport', reason });
}

function beginAttempt(builder: TransitionBuilder, config: MachineConfig): void {
    builder.effect({ type: 'arm_connect_timeout' });
    if (config.tokenGated) {
        builder.moveTo('authenticating');
        builder.effect({ type: 'acquire_auth' });
        return;
    }
    builder.effect({ type: 'open_transport' });
}

class TransitionBuilder {
    private snapshot: SupervisorSnapshot;
    private readonly effects: SupervisorEffect[] = [];
    private readonly path: StateChange[] = [];

    constructor(initial: SupervisorSnapshot) {
        this.snapshot = initial;
    }

    patch(changes: Partial<SupervisorSnapshot>): void {
        this.snapshot = { ...this.snapshot, ...changes };
    }

    moveTo(state: ConnectionStateName): void {
        if (this.snapshot.state === state) return;
        this.path.push({ from: this.snapshot.state, to: state });
        this.snapshot = { ...this.snapshot, state };
    }

    effect(effect: SupervisorEffect): void {
        this.effects.push(effect);
    }

    unchanged(): TransitionResult {
        return { next: this.snapshot, effects: [], path: [] };
    }

    result(): TransitionResult {
        return { next: this.snapshot, effects: this.effects, path: this.path };
    }
}
