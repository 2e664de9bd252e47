export { IngestionOrchestrator, type IngestionOrchestratorOptions, type SymbolCatalog } from './control/orchestrator';
export { loadIngestConfig, loadFeedTargets, type IngestConfig, type FeedTargets } from './control/config';
export { EnvCredentialsProvider, StaticCredentialsProvider, type CredentialsProvider } from './control/credentials';

export {
    EventBus,
    CANDLE_INTERVALS,
    isStreamChannel,
    type CandleEvent,
    type CandleInterval,
    type CanonicalEvent,
    type ConnectionId,
    type ConnectionStateName,
    type ControlEvent,
    type ExchangeId,
    type FeedEvent,
    type IngestEventMap,
    type IngestEventName,
    type MarketType,
    type OrderBookDeltaEvent,
    type OrderBookLevel,
    type StreamChannel,
    type TickerEvent,
    type TradeEvent,
} from './core/events/EventBus';
export {
    EventDispatcher,
    type Consumer,
    type ConsumerHandle,
    type ConsumerStats,
    type OverflowPolicy,
    type PublishResult,
} from './core/events/Dispatcher';
export {
    AuthError,
    FatalError,
    IngestError,
    ProtocolError,
    SubscriptionError,
    TransportError,
    type IngestErrorKind,
} from './core/errors';

export { ConnectionSupervisor, type ConnectionSnapshot, type ConnectionSupervisorOptions } from './exchange/supervisor/ConnectionSupervisor';
export { computeBackoffDelay, DEFAULT_BACKOFF, type BackoffPolicy } from './exchange/supervisor/backoff';
export { SubscriptionManager } from './exchange/subscriptions/SubscriptionManager';
export { createBitgetProfile, BITGET_PUBLIC_WS_URL } from './exchange/bitget/profile';
export { createKucoinProfile } from './exchange/kucoin/profile';
export { KucoinBulletAuthProvider } from './exchange/kucoin/bulletAuth';
export { createStaticAuthProvider } from './exchange/auth/authPolicy';
export { createWsTransport } from './exchange/transport/wsTransport';
export { createVenue, connectionIdOf, type Venue } from './exchange/venues';
export type {
    AuthGrant,
    AuthProvider,
    ExchangeCredentials,
    SubscriptionKey,
    TransportEvent,
    TransportFactory,
    TransportHandle,
    VenueProfile,
} from './exchange/types';
export { logger, type LogLevel, type LogSink } from './infra/logger';
