export type IngestErrorKind = 'transport' | 'auth' | 'subscription' | 'protocol' | 'fatal';

export class IngestError extends Error {
    readonly kind: IngestErrorKind;
    readonly details?: Record<string, unknown>;
    readonly originalError?: unknown;

    constructor(kind: IngestErrorKind, message: string, details?: Record<string, unknown>, originalError?: unknown) {
        super(message);
        this.name = 'IngestError';
        this.kind = kind;
        this.details = details;
        this.originalError = originalError;
    }
}

/** Socket-level failure. Always retried under the backoff policy. */
export class TransportError extends IngestError {
    constructor(message: string, details?: Record<string, unknown>, originalError?: unknown) {
        super('transport', message, details, originalError);
        this.name = 'TransportError';
    }
}

/** Token acquisition failed. Retried like a transport failure. */
export class AuthError extends IngestError {
    constructor(message: string, details?: Record<string, unknown>, originalError?: unknown) {
        super('auth', message, details, originalError);
        this.name = 'AuthError';
    }
}

export class SubscriptionError extends IngestError {
    readonly symbol: string;
    readonly channel: string;

    constructor(symbol: string, channel: string, message: string, details?: Record<string, unknown>) {
        super('subscription', message, details);
        this.name = 'SubscriptionError';
        this.symbol = symbol;
        this.channel = channel;
    }
}

export class ProtocolError extends IngestError {
    constructor(message: string, details?: Record<string, unknown>, originalError?: unknown) {
        super('protocol', message, details, originalError);
        this.name = 'ProtocolError';
    }
}

/** Retry budget exhausted or unusable configuration. The caller must restart the connection. */
export class FatalError extends IngestError {
    constructor(message: string, details?: Record<string, unknown>, originalError?: unknown) {
        super('fatal', message, details, originalError);
        this.name = 'FatalError';
    }
}

export const toErrorMessage = (err: unknown): string => {
    if (!err) return 'unknown error';
    if (err instanceof Error) return err.message;
    try {
        return JSON.stringify(err);
    } catch {
        return String(err);
    }
};
