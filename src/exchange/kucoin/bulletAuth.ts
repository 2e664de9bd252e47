import { createHmac, randomUUID } from 'node:crypto';
import { AuthError, toErrorMessage } from '../../core/errors';
import { m } from '../../core/logMarkers';
import { nowMs, type MarketType } from '../../core/events/EventBus';
import { fetchJson, type HttpJsonClient, type HttpJsonResult } from '../../infra/http';
import { logger } from '../../infra/logger';
import { isRecord, toOptionalInt } from '../../core/market/numeric';
import type { AuthGrant, AuthProvider, ExchangeCredentials } from '../types';

export const KUCOIN_FUTURES_REST_URL = 'https://api-futures.kucoin.com';
export const KUCOIN_SPOT_REST_URL = 'https://api.kucoin.com';
export const KUCOIN_TOKEN_TTL_MS = 24 * 60 * 60 * 1000;
export const KUCOIN_DEFAULT_PING_INTERVAL_MS = 18_000;

const PUBLIC_PATH = '/api/v1/bullet-public';
const PRIVATE_PATH = '/api/v1/bullet-private';
const SUCCESS_CODE = '200000';

export interface KucoinBulletAuthOptions {
    marketType: MarketType;
    restUrl?: string;
    credentials?: ExchangeCredentials | null;
    tokenTtlMs?: number;
    http?: HttpJsonClient;
    now?: () => number;
    connectIdFactory?: () => string;
}

/**
 * Two-phase handshake: a REST call issues a short-lived token and the socket
 * endpoint, the socket URL then carries the token as a query parameter.
 */
export class KucoinBulletAuthProvider implements AuthProvider {
    public readonly tokenGated = true;
    private readonly restUrl: string;
    private readonly credentials: ExchangeCredentials | null;
    private readonly tokenTtlMs: number;
    private readonly http: HttpJsonClient;
    private readonly now: () => number;
    private readonly connectIdFactory: () => string;

    constructor(opts: KucoinBulletAuthOptions) {
        this.restUrl = (opts.restUrl ?? (opts.marketType === 'spot' ? KUCOIN_SPOT_REST_URL : KUCOIN_FUTURES_REST_URL)).replace(/\/+$/, '');
        this.credentials = opts.credentials ?? null;
        this.tokenTtlMs = Math.max(60_000, opts.tokenTtlMs ?? KUCOIN_TOKEN_TTL_MS);
        this.http = opts.http ?? fetchJson;
        this.now = opts.now ?? nowMs;
        this.connectIdFactory = opts.connectIdFactory ?? randomUUID;
    }

    get isPrivate(): boolean {
        return this.credentials !== null;
    }

    async acquire(signal?: AbortSignal): Promise<AuthGrant> {
        const path = this.isPrivate ? PRIVATE_PATH : PUBLIC_PATH;
        const url = `${this.restUrl}${path}`;
        const issuedAt = this.now();

        let result: HttpJsonResult;
        try {
            result = await this.http(url, { method: 'POST', headers: this.buildHeaders(path, issuedAt), signal });
        } catch (err) {
            throw new AuthError(`KuCoin token request failed: ${toErrorMessage(err)}`, { url }, err);
        }

        const body = result.data;
        if (!isRecord(body)) {
            throw new AuthError('KuCoin token response is not an object', { url, status: result.status });
        }
        if (String(body.code) !== SUCCESS_CODE) {
            throw new AuthError(`KuCoin token request rejected: ${String(body.msg ?? 'unknown error')}`, {
                url,
                status: result.status,
                code: body.code,
            });
        }

        const data = body.data;
        const token = isRecord(data) && typeof data.token === 'string' ? data.token : undefined;
        const servers = isRecord(data) && Array.isArray(data.instanceServers) ? data.instanceServers : [];
        const server = servers.find(isRecord);
        const endpoint = server && typeof server.endpoint === 'string' ? server.endpoint : undefined;
        if (!token || !endpoint || !server) {
            throw new AuthError('KuCoin token response misses token or instance server', { url });
        }

        const pingIntervalMs = toOptionalInt(server.pingInterval) ?? KUCOIN_DEFAULT_PING_INTERVAL_MS;
        const separator = endpoint.includes('?') ? '&' : '?';
        const grant: AuthGrant = {
            endpoint: `${endpoint}${separator}token=${encodeURIComponent(token)}&connectId=${encodeURIComponent(this.connectIdFactory())}`,
            token,
            expiresAt: issuedAt + this.tokenTtlMs,
            pingIntervalMs,
        };
        logger.info(
            m('auth', `[KuCoinAuth] token issued (${this.isPrivate ? 'private' : 'public'}) pingInterval=${pingIntervalMs}ms ttl=${this.tokenTtlMs}ms`)
        );
        return grant;
    }

    private buildHeaders(path: string, timestamp: number): Record<string, string> {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (!this.credentials) return headers;
        const { key, secret, passphrase } = this.credentials;
        const ts = String(timestamp);
        headers['KC-API-KEY'] = key;
        headers['KC-API-TIMESTAMP'] = ts;
        headers['KC-API-SIGN'] = sign(secret, `${ts}POST${path}`);
        headers['KC-API-PASSPHRASE'] = sign(secret, passphrase);
        headers['KC-API-KEY-VERSION'] = '2';
        return headers;
    }
}

function sign(secret: string, payload: string): string {
    return createHmac('sha256', secret).update(payload).digest('base64');
}
