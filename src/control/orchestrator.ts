import { EventDispatcher, type Consumer, type ConsumerHandle, type ConsumerStats } from '../core/events/Dispatcher';
import { EventBus, nowMs, type ConnectionId, type ExchangeId, type MarketType, type StreamChannel } from '../core/events/EventBus';
import { SubscriptionError, toErrorMessage } from '../core/errors';
import { m } from '../core/logMarkers';
import { logger } from '../infra/logger';
import type { HttpJsonClient } from '../infra/http';
import { ConnectionSupervisor, type ConnectionSnapshot } from '../exchange/supervisor/ConnectionSupervisor';
import { createWsTransport } from '../exchange/transport/wsTransport';
import type { ExchangeCredentials, TransportFactory } from '../exchange/types';
import { connectionIdOf, createVenue, type Venue, type VenueBuildOptions } from '../exchange/venues';
import { loadIngestConfig, type IngestConfig } from './config';
import { EnvCredentialsProvider, type CredentialsProvider } from './credentials';

type CleanupFn = () => Promise<void> | void;

/** Listing lookup owned by the caller; no process-wide symbol cache lives here. */
export interface SymbolCatalog {
  isListed(exchange: ExchangeId, marketType: MarketType, symbol: string): boolean | Promise<boolean>;
}

export interface IngestionOrchestratorOptions {
  config?: IngestConfig;
  credentials?: CredentialsProvider;
  transport?: TransportFactory;
  http?: HttpJsonClient;
  catalog?: SymbolCatalog;
  bus?: EventBus;
  now?: () => number;
  venueFactory?: (opts: VenueBuildOptions) => Venue;
}

/**
 * IngestionOrchestrator = входная точка управления.
 * Владеет supervisor'ами соединений и диспетчером потребителей;
 * всё, что видят внешние потребители, проходит bus -> dispatcher.
 */
export class IngestionOrchestrator {
  private readonly config: IngestConfig;
  private readonly credentials: CredentialsProvider;
  private readonly transport: TransportFactory;
  private readonly http?: HttpJsonClient;
  private readonly catalog?: SymbolCatalog;
  private readonly bus: EventBus;
  private readonly now: () => number;
  private readonly venueFactory: (opts: VenueBuildOptions) => Venue;
  private readonly dispatcher: EventDispatcher;
  private readonly connections = new Map<ConnectionId, ConnectionSupervisor>();
  private readonly unbindBus: () => void;
  private cleanupFns: CleanupFn[] = [];
  /** Ids started again while their stop was still closing the socket. */
  private readonly restartAfterStop = new Set<ConnectionId>();
  private shuttingDown = false;

  constructor(opts: IngestionOrchestratorOptions = {}) {
    this.config = opts.config ?? loadIngestConfig();
    this.credentials = opts.credentials ?? new EnvCredentialsProvider();
    this.transport = opts.transport ?? createWsTransport({ handshakeTimeoutMs: this.config.connectTimeoutMs });
    this.http = opts.http;
    this.catalog = opts.catalog;
    this.bus = opts.bus ?? new EventBus();
    this.now = opts.now ?? nowMs;
    this.venueFactory = opts.venueFactory ?? createVenue;
    this.dispatcher = new EventDispatcher({
      queueSize: this.config.consumerQueueSize,
      overflowPolicy: this.config.overflowPolicy,
      consumerTimeoutMs: this.config.consumerTimeoutMs,
    });
    this.unbindBus = this.bus.subscribeAll((event) => {
      this.dispatcher.publish(event);
    });
  }

  /**
   * One connection per (exchange, market type). Calling it again for a live
   * connection is a no-op; for a stopped or fatal one it restarts it.
   * `credentials`: undefined = ask the credentials provider, null = public only.
   */
  startConnection(exchange: ExchangeId, marketType: MarketType = 'futures', credentials?: ExchangeCredentials | null): ConnectionId {
    if (this.shuttingDown) throw new Error('orchestrator is shutting down');
    const id = connectionIdOf(exchange, marketType);
    const existing = this.connections.get(id);
    if (existing) {
      if (existing.state === 'closing') {
        // stopConnection still owns it: restart once the socket is gone
        this.restartAfterStop.add(id);
      } else {
        existing.start();
      }
      return id;
    }

    const venue = this.venueFactory({
      exchange,
      marketType,
      credentials: credentials === undefined ? this.credentials.getCredentials(exchange) : credentials,
      endpoints: {
        bitgetWsUrl: this.config.bitgetWsUrl,
        kucoinFuturesRestUrl: this.config.kucoinFuturesRestUrl,
        kucoinSpotRestUrl: this.config.kucoinSpotRestUrl,
      },
      http: this.http,
      now: this.now,
    });
    const supervisor = new ConnectionSupervisor({
      connectionId: id,
      profile: venue.profile,
      auth: venue.auth,
      transport: this.transport,
      bus: this.bus,
      backoff: {
        baseMs: this.config.reconnectBaseMs,
        maxMs: this.config.reconnectMaxMs,
        maxRetries: this.config.maxRetries,
      },
      stableMs: this.config.stableMs,
      connectTimeoutMs: this.config.connectTimeoutMs,
      tokenRefreshLeadMs: this.config.tokenRefreshLeadMs,
      now: this.now,
    });
    this.connections.set(id, supervisor);
    logger.info(m('connect', `[Orchestrator] connection ${id} created`));
    supervisor.start();
    return id;
  }

  /** Closes the socket and forgets the connection, its desired set included. */
  async stopConnection(id: ConnectionId): Promise<void> {
    const supervisor = this.connections.get(id);
    if (!supervisor) return;
    this.restartAfterStop.delete(id);
    await supervisor.stop('stopConnection');
    if (this.restartAfterStop.delete(id)) {
      logger.info(m('connect', `[Orchestrator] connection ${id} restarted after stop`));
      supervisor.start();
      return;
    }
    // a start that ran while the stop was settling keeps the connection
    if (this.connections.get(id) !== supervisor || supervisor.state !== 'disconnected') return;
    this.connections.delete(id);
    logger.info(m('shutdown', `[Orchestrator] connection ${id} stopped`));
  }

  /**
   * Resolves true when the pair joined the desired set. Unlisted symbols and
   * unsupported channels resolve false and surface as `subscription:failed`.
   */
  async addSubscription(id: ConnectionId, symbol: string, channel: StreamChannel): Promise<boolean> {
    const supervisor = this.requireConnection(id);
    const snapshot = supervisor.getSnapshot();
    const key = supervisor.subscriptions.keyOf(symbol, channel);

    const rejection = await this.checkSubscription(snapshot, key.symbol, channel);
    if (rejection) {
      this.bus.publish('subscription:failed', {
        connectionId: id,
        exchange: snapshot.exchange,
        marketType: snapshot.marketType,
        ts: this.now(),
        symbol: key.symbol,
        channel,
        reason: rejection,
        error: new SubscriptionError(key.symbol, channel, rejection),
      });
      logger.warn(m('warn', `[Orchestrator] ${id} ${channel}:${key.symbol} rejected: ${rejection}`));
      return false;
    }
    // the connection may have been stopped while the catalog answered
    const current = this.connections.get(id);
    if (!current) return false;
    return current.addSubscription(symbol, channel);
  }

  removeSubscription(id: ConnectionId, symbol: string, channel: StreamChannel): boolean {
    return this.requireConnection(id).removeSubscription(symbol, channel);
  }

  registerConsumer(fn: Consumer, name?: string): ConsumerHandle {
    return this.dispatcher.subscribe(fn, name);
  }

  unregisterConsumer(handle: ConsumerHandle): boolean {
    return this.dispatcher.unsubscribe(handle);
  }

  getConnectionState(id: ConnectionId): ConnectionSnapshot | undefined {
    return this.connections.get(id)?.getSnapshot();
  }

  listConnections(): ConnectionSnapshot[] {
    return Array.from(this.connections.values()).map((supervisor) => supervisor.getSnapshot());
  }

  consumerStats(): ConsumerStats[] {
    return this.dispatcher.stats();
  }

  /** Waits until every consumer queue is empty. */
  drain(): Promise<void> {
    return this.dispatcher.drain();
  }

  /**
   * Регистрируем “что надо аккуратно выключить” после соединений.
   */
  registerCleanup(fn: CleanupFn): void {
    this.cleanupFns.push(fn);
  }

  async shutdown(reason = 'shutdown'): Promise<void> {
    if (this.shuttingDown) {
      logger.debug('[Orchestrator] shutdown already in progress, ignoring duplicate call');
      return;
    }
    this.shuttingDown = true;
    logger.info(m('shutdown', `[Orchestrator] shutdown requested: ${reason}`));

    await Promise.all(Array.from(this.connections.keys()).map((id) => this.stopConnection(id)));
    await this.dispatcher.drain();
    this.unbindBus();
    this.dispatcher.close();

    logger.info(m('cleanup', `[Orchestrator] running ${this.cleanupFns.length} cleanup(s)`));
    for (let i = this.cleanupFns.length - 1; i >= 0; i--) {
      try {
        await this.cleanupFns[i]?.();
      } catch (err) {
        logger.error(m('cleanup', `[Orchestrator] cleanup error: ${toErrorMessage(err)}`));
      }
    }
    this.cleanupFns = [];
    logger.info(m('ok', '[Orchestrator] stopped'));
  }

  private requireConnection(id: ConnectionId): ConnectionSupervisor {
    const supervisor = this.connections.get(id);
    if (!supervisor) throw new Error(`unknown connection ${id}`);
    return supervisor;
  }

  private async checkSubscription(snapshot: ConnectionSnapshot, symbol: string, channel: StreamChannel): Promise<string | undefined> {
    if (!symbol) return 'empty symbol';
    if (!this.catalog) return undefined;
    try {
      const listed = await this.catalog.isListed(snapshot.exchange, snapshot.marketType, symbol);
      return listed ? undefined : `${symbol} is not listed on ${snapshot.exchange} ${snapshot.marketType}`;
    } catch (err) {
      logger.warn(m('warn', `[Orchestrator] symbol catalog lookup failed, accepting ${symbol}: ${toErrorMessage(err)}`));
      return undefined;
    }
  }
}
