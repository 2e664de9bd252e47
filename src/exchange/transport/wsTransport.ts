import WebSocket, { type RawData } from 'ws';
import { TransportError, toErrorMessage } from '../../core/errors';
import type { TransportEvent, TransportFactory, TransportHandle } from '../types';

export interface WsTransportOptions {
    /** How long close() waits for the peer before terminate(). */
    closeTimeoutMs?: number;
    handshakeTimeoutMs?: number;
}

const DEFAULT_CLOSE_TIMEOUT_MS = 2_000;
const DEFAULT_HANDSHAKE_TIMEOUT_MS = 15_000;

// ============================================================================
// WsTransport
// ----------------------------------------------------------------------------
// Только сетевой I/O: открыть сокет, отправить текст, закрыть.
// Никаких ретраев и состояния подписок: всё сообщается событиями наверх.
// ============================================================================

class WsTransportHandle implements TransportHandle {
    private readonly socket: WebSocket;
    private closeTimer: NodeJS.Timeout | null = null;
    private finished = false;

    constructor(
        endpoint: string,
        private readonly onEvent: (event: TransportEvent) => void,
        private readonly opts: Required<WsTransportOptions>
    ) {
        this.socket = new WebSocket(endpoint, { handshakeTimeout: opts.handshakeTimeoutMs });

        this.socket.on('open', () => {
            this.onEvent({ type: 'open' });
        });

        this.socket.on('message', (data: RawData, isBinary: boolean) => {
            this.onEvent({ type: 'message', data: isBinary ? rawToString(data) : data.toString() });
        });

        this.socket.on('close', (code: number, reason: Buffer) => {
            this.finish();
            this.onEvent({ type: 'closed', code, reason: reason.toString() });
        });

        this.socket.on('error', (err: Error) => {
            this.onEvent({ type: 'error', error: new TransportError(`socket error: ${err.message}`, { endpoint: redact(endpoint) }, err) });
        });
    }

    send(payload: string): void {
        if (this.socket.readyState !== WebSocket.OPEN) {
            throw new TransportError('socket is not open', { readyState: this.socket.readyState });
        }
        this.socket.send(payload);
    }

    close(code = 1000, reason = 'client close'): void {
        if (this.finished) return;
        if (this.socket.readyState === WebSocket.CLOSING || this.socket.readyState === WebSocket.CLOSED) return;
        if (this.socket.readyState === WebSocket.CONNECTING) {
            this.terminate();
            return;
        }
        this.closeTimer = setTimeout(() => this.terminate(), this.opts.closeTimeoutMs);
        this.closeTimer.unref?.();
        try {
            this.socket.close(code, reason);
        } catch (err) {
            this.onEvent({ type: 'error', error: new TransportError(`close failed: ${toErrorMessage(err)}`, undefined, err) });
            this.terminate();
        }
    }

    terminate(): void {
        if (this.finished) return;
        this.clearCloseTimer();
        this.socket.terminate();
    }

    isOpen(): boolean {
        return this.socket.readyState === WebSocket.OPEN;
    }

    private finish(): void {
        this.finished = true;
        this.clearCloseTimer();
        this.socket.removeAllListeners('message');
    }

    private clearCloseTimer(): void {
        if (this.closeTimer) {
            clearTimeout(this.closeTimer);
            this.closeTimer = null;
        }
    }
}

export function createWsTransport(options: WsTransportOptions = {}): TransportFactory {
    const opts: Required<WsTransportOptions> = {
        closeTimeoutMs: Math.max(100, options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS),
        handshakeTimeoutMs: Math.max(1_000, options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS),
    };
    return (endpoint, onEvent) => new WsTransportHandle(endpoint, onEvent, opts);
}

function rawToString(data: RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
    return data.toString('utf8');
}

/** Strips query tokens before an endpoint reaches logs or error details. */
export function redact(endpoint: string): string {
    const idx = endpoint.indexOf('?');
    return idx === -1 ? endpoint : `${endpoint.slice(0, idx)}?…`;
}
