import type { ExchangeId, MarketType } from '../core/events/EventBus';
import type { HttpJsonClient } from '../infra/http';
import { createStaticAuthProvider } from './auth/authPolicy';
import { BITGET_PUBLIC_WS_URL, createBitgetProfile } from './bitget/profile';
import { KucoinBulletAuthProvider } from './kucoin/bulletAuth';
import { createKucoinProfile } from './kucoin/profile';
import type { AuthProvider, ExchangeCredentials, VenueProfile } from './types';

export interface VenueEndpoints {
    bitgetWsUrl?: string;
    kucoinFuturesRestUrl?: string;
    kucoinSpotRestUrl?: string;
}

export interface VenueBuildOptions {
    exchange: ExchangeId;
    marketType: MarketType;
    credentials: ExchangeCredentials | null;
    endpoints?: VenueEndpoints;
    http?: HttpJsonClient;
    now?: () => number;
}

export interface Venue {
    profile: VenueProfile;
    auth: AuthProvider;
}

/**
 * Profile + auth provider per (exchange, market type).
 * Bitget public channels need no credentials, so they are not used for the stream.
 */
export function createVenue(opts: VenueBuildOptions): Venue {
    const endpoints = opts.endpoints ?? {};
    switch (opts.exchange) {
        case 'bitget':
            return {
                profile: createBitgetProfile(opts.marketType),
                auth: createStaticAuthProvider(endpoints.bitgetWsUrl ?? BITGET_PUBLIC_WS_URL),
            };
        case 'kucoin':
            return {
                profile: createKucoinProfile(opts.marketType),
                auth: new KucoinBulletAuthProvider({
                    marketType: opts.marketType,
                    restUrl: opts.marketType === 'spot' ? endpoints.kucoinSpotRestUrl : endpoints.kucoinFuturesRestUrl,
                    credentials: opts.credentials,
                    http: opts.http,
                    now: opts.now,
                }),
            };
    }
}

export const connectionIdOf = (exchange: ExchangeId, marketType: MarketType): string => `${exchange}:${marketType}`;
