import type { OverflowPolicy } from '../core/events/Dispatcher';
import { isStreamChannel, type ExchangeId, type MarketType, type StreamChannel } from '../core/events/EventBus';
import { logger } from '../infra/logger';
import { BITGET_PUBLIC_WS_URL } from '../exchange/bitget/profile';
import { KUCOIN_FUTURES_REST_URL, KUCOIN_SPOT_REST_URL } from '../exchange/kucoin/bulletAuth';

export interface IngestConfig {
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  /** 0 = retry forever. */
  maxRetries: number;
  /** undefined = one keepalive cycle of the venue. */
  stableMs?: number;
  connectTimeoutMs: number;
  tokenRefreshLeadMs: number;
  consumerQueueSize: number;
  overflowPolicy: OverflowPolicy;
  consumerTimeoutMs: number;
  bitgetWsUrl: string;
  kucoinFuturesRestUrl: string;
  kucoinSpotRestUrl: string;
}

export interface FeedTargets {
  exchanges: ExchangeId[];
  marketType: MarketType;
  symbols: string[];
  channels: StreamChannel[];
}

type Env = Record<string, string | undefined>;

export function loadIngestConfig(env: Env = process.env): IngestConfig {
  const reconnectBaseMs = readNumber(env, 'INGEST_RECONNECT_BASE_MS', 500, { min: 1 });
  return {
    reconnectBaseMs,
    reconnectMaxMs: readNumber(env, 'INGEST_RECONNECT_MAX_MS', 30_000, { min: reconnectBaseMs }),
    maxRetries: readNumber(env, 'INGEST_MAX_RETRIES', 10, { min: 0 }),
    stableMs: readOptionalNumber(env, 'INGEST_STABLE_MS', { min: 1 }),
    connectTimeoutMs: readNumber(env, 'INGEST_CONNECT_TIMEOUT_MS', 15_000, { min: 1_000 }),
    tokenRefreshLeadMs: readNumber(env, 'INGEST_TOKEN_REFRESH_LEAD_MS', 60_000, { min: 0 }),
    consumerQueueSize: readNumber(env, 'INGEST_CONSUMER_QUEUE_SIZE', 1_000, { min: 1 }),
    overflowPolicy: readOverflowPolicy(env),
    consumerTimeoutMs: readNumber(env, 'INGEST_CONSUMER_TIMEOUT_MS', 5_000, { min: 1 }),
    bitgetWsUrl: readString(env, 'BITGET_WS_URL', BITGET_PUBLIC_WS_URL),
    kucoinFuturesRestUrl: readString(env, 'KUCOIN_FUTURES_REST_URL', KUCOIN_FUTURES_REST_URL),
    kucoinSpotRestUrl: readString(env, 'KUCOIN_SPOT_REST_URL', KUCOIN_SPOT_REST_URL),
  };
}

export function loadFeedTargets(env: Env = process.env): FeedTargets {
  const exchanges = readList(env, 'FEED_EXCHANGES', ['bitget'])
    .map((value) => value.toLowerCase())
    .filter((value): value is ExchangeId => {
    if (value === 'bitget' || value === 'kucoin') return true;
    logger.warn(`[Config] FEED_EXCHANGES: unknown exchange "${value}" ignored`);
    return false;
  });
  const channels = readList(env, 'FEED_CHANNELS', ['ticker'])
    .map((value) => value.toLowerCase())
    .filter((value): value is StreamChannel => {
    if (isStreamChannel(value)) return true;
    logger.warn(`[Config] FEED_CHANNELS: unknown channel "${value}" ignored`);
    return false;
  });
  const marketRaw = env.FEED_MARKET_TYPE?.trim().toLowerCase();
  return {
    exchanges,
    marketType: marketRaw === 'spot' ? 'spot' : 'futures',
    symbols: readList(env, 'FEED_SYMBOLS', ['BTCUSDT']).map((symbol) => symbol.toUpperCase()),
    channels,
  };
}

export function readNumber(env: Env, name: string, fallback: number, bounds: { min?: number; max?: number } = {}): number {
  return readOptionalNumber(env, name, bounds) ?? fallback;
}

function readOptionalNumber(env: Env, name: string, bounds: { min?: number; max?: number }): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    logger.warn(`[Config] ${name}="${raw}" is not a number, using default`);
    return undefined;
  }
  let value = Math.floor(parsed);
  if (bounds.min !== undefined) value = Math.max(bounds.min, value);
  if (bounds.max !== undefined) value = Math.min(bounds.max, value);
  return value;
}

export function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '0' || normalized === 'false' || normalized === 'off') return false;
  if (normalized === '1' || normalized === 'true' || normalized === 'on') return true;
  return fallback;
}

export function readList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (!raw) return fallback;
  const list = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
  return list.length ? list : fallback;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

function readOverflowPolicy(env: Env): OverflowPolicy {
  const raw = env.INGEST_OVERFLOW_POLICY?.trim().toLowerCase();
  if (raw === undefined || raw === '' || raw === 'drop_oldest') return 'drop_oldest';
  if (raw === 'reject') return 'reject';
  logger.warn(`[Config] INGEST_OVERFLOW_POLICY="${raw}" is not drop_oldest|reject, using drop_oldest`);
  return 'drop_oldest';
}
