import https from 'node:https';
import { URL } from 'node:url';

export interface HttpJsonRequest {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string;
    signal?: AbortSignal;
}

export interface HttpJsonResult {
    ok: boolean;
    status: number;
    statusText: string;
    data: unknown;
    headers: Record<string, string>;
}

export type HttpJsonClient = (url: string, request?: HttpJsonRequest) => Promise<HttpJsonResult>;

export class HttpRequestError extends Error {
    readonly details?: Record<string, unknown>;
    readonly originalError?: unknown;

    constructor(message: string, details?: Record<string, unknown>, originalError?: unknown) {
        super(message);
        this.name = 'HttpRequestError';
        this.details = details;
        this.originalError = originalError;
    }
}

export const fetchJson: HttpJsonClient = async (url, request = {}) => {
    if (typeof globalThis.fetch === 'function') {
        const response = await globalThis.fetch(url, {
            method: request.method ?? 'GET',
            headers: request.headers,
            body: request.body,
            signal: request.signal,
        });
        const data: unknown = await response.json().catch(() => undefined);
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            headers[key.toLowerCase()] = value;
        });
        return {
            ok: response.ok,
            status: response.status,
            statusText: response.statusText,
            data,
            headers,
        };
    }

    return httpsJson(url, request);
};

function httpsJson(url: string, request: HttpJsonRequest): Promise<HttpJsonResult> {
    return new Promise((resolve, reject) => {
        const { signal } = request;
        if (signal?.aborted) {
            reject(new HttpRequestError('HTTP request aborted', { url }, new Error('AbortError')));
            return;
        }
        const target = new URL(url);
        const req = https.request(
            target,
            { method: request.method ?? 'GET', headers: request.headers },
            (res) => {
                const status = res.statusCode ?? 0;
                const statusText = res.statusMessage ?? '';
                const ok = status >= 200 && status < 300;
                let body = '';

                res.setEncoding('utf8');
                res.on('data', (chunk: string) => {
                    body += chunk;
                });
                res.on('end', () => {
                    try {
                        const data: unknown = body ? JSON.parse(body) : undefined;
                        resolve({ ok, status, statusText, data, headers: normalizeHeaders(res.headers) });
                    } catch (error) {
                        reject(new HttpRequestError('HTTP invalid JSON', { status, statusText, url }, error));
                    }
                });
            }
        );

        req.on('error', (error) => {
            reject(new HttpRequestError('HTTP request error', { url }, error));
        });

        if (signal) {
            const onAbort = () => {
                req.destroy(new Error('AbortError'));
                reject(new HttpRequestError('HTTP request aborted', { url }, new Error('AbortError')));
            };
            signal.addEventListener('abort', onAbort, { once: true });
            req.on('close', () => signal.removeEventListener('abort', onAbort));
        }

        if (request.body) req.write(request.body);
        req.end();
    });
}

function normalizeHeaders(raw: Record<string, string | string[] | undefined>): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(raw)) {
        if (value === undefined) continue;
        out[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
    }
    return out;
}
