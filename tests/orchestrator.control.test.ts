import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadIngestConfig } from '../src/control/config';
import { StaticCredentialsProvider } from '../src/control/credentials';
import { IngestionOrchestrator, type SymbolCatalog } from '../src/control/orchestrator';
import type { FeedEvent } from '../src/core/events/EventBus';
import { disconnects, marketEvents } from '../src/core/events/testing';
import { bulletReply, createFakeHttp } from './helpers/fakeHttp';
import { createFakeTransport, type FakeTransport } from './helpers/fakeTransport';
import { BITGET_ENDPOINT, bitgetTicker, flush, T0 } from './helpers/supervisorHarness';

const config = loadIngestConfig({
  BITGET_WS_URL: BITGET_ENDPOINT,
  INGEST_RECONNECT_BASE_MS: '100',
  INGEST_RECONNECT_MAX_MS: '1000',
});

function setup(opts: { catalog?: SymbolCatalog; transport?: FakeTransport } = {}) {
  const transport: FakeTransport = opts.transport ?? createFakeTransport();
  const http = createFakeHttp([bulletReply()]);
  const orchestrator = new IngestionOrchestrator({
    config,
    credentials: new StaticCredentialsProvider(),
    transport: transport.factory,
    http: http.client,
    catalog: opts.catalog,
  });
  const received: FeedEvent[] = [];
  orchestrator.registerConsumer((event) => {
    received.push(event);
  }, 'test-consumer');
  return { orchestrator, transport, http, received };
}

describe('IngestionOrchestrator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts a connection, subscribes and hands events to consumers', async () => {
    const { orchestrator, transport, received } = setup();
    const id = orchestrator.startConnection('bitget');
    expect(id).toBe('bitget:futures');

    await expect(orchestrator.addSubscription(id, 'btc-usdt', 'ticker')).resolves.toBe(true);
    await flush();
    const socket = transport.last();
    expect(socket.endpoint).toBe(BITGET_ENDPOINT);
    socket.serverOpen();
    expect(socket.sentJson()).toEqual([
      { op: 'subscribe', args: [{ instType: 'USDT-FUTURES', channel: 'ticker', instId: 'BTCUSDT' }] },
    ]);

    socket.serverSend(bitgetTicker('64000.1'));
    await orchestrator.drain();
    const [ticker] = marketEvents(received);
    expect(ticker?.kind).toBe('ticker');
    expect(ticker?.symbol).toBe('BTCUSDT');
    expect(orchestrator.getConnectionState(id)?.state).toBe('streaming');
    expect(orchestrator.consumerStats()[0]).toMatchObject({ name: 'test-consumer', failed: 0, dropped: 0 });
  });

  it('treats a second start of a live connection as a no-op', async () => {
    const { orchestrator, transport } = setup();
    orchestrator.startConnection('bitget');
    await flush();
    expect(orchestrator.startConnection('bitget')).toBe('bitget:futures');
    await flush();
    expect(transport.sockets).toHaveLength(1);
    expect(orchestrator.listConnections().map((snapshot) => snapshot.connectionId)).toEqual(['bitget:futures']);
  });

  it('rejects symbols the catalog does not list', async () => {
    const catalog: SymbolCatalog = { isListed: (_exchange, _market, symbol) => symbol !== 'NOPEUSDT' };
    const { orchestrator, received } = setup({ catalog });
    const id = orchestrator.startConnection('bitget');

    await expect(orchestrator.addSubscription(id, 'NOPEUSDT', 'trade')).resolves.toBe(false);
    await orchestrator.drain();
    const failed = received.flatMap((event) => (event.topic === 'subscription:failed' ? [event.payload] : []));
    expect(failed.map((payload) => [payload.symbol, payload.channel, payload.reason])).toEqual([
      ['NOPEUSDT', 'trade', 'NOPEUSDT is not listed on bitget futures'],
    ]);
    expect(orchestrator.getConnectionState(id)?.desired).toEqual([]);
  });

  it('accepts the symbol when the catalog lookup fails', async () => {
    const catalog: SymbolCatalog = {
      isListed: async () => {
        throw new Error('catalog offline');
      },
    };
    const { orchestrator } = setup({ catalog });
    const id = orchestrator.startConnection('bitget');

    await expect(orchestrator.addSubscription(id, 'ETHUSDT', 'ticker')).resolves.toBe(true);
    expect(orchestrator.getConnectionState(id)?.desired).toEqual([{ symbol: 'ETHUSDT', channel: 'ticker' }]);
  });

  it('refuses an empty symbol', async () => {
    const { orchestrator } = setup();
    const id = orchestrator.startConnection('bitget');
    await expect(orchestrator.addSubscription(id, '', 'ticker')).resolves.toBe(false);
  });

  it('throws for connections it does not know', async () => {
    const { orchestrator } = setup();
    expect(() => orchestrator.removeSubscription('kucoin:spot', 'XBTUSDTM', 'ticker')).toThrow('unknown connection kucoin:spot');
    await expect(orchestrator.addSubscription('kucoin:spot', 'XBTUSDTM', 'ticker')).rejects.toThrow('unknown connection kucoin:spot');
    await expect(orchestrator.stopConnection('kucoin:spot')).resolves.toBeUndefined();
  });

  it('stopConnection closes the socket and forgets the connection', async () => {
    const { orchestrator, transport, received } = setup();
    const id = orchestrator.startConnection('bitget');
    await flush();
    transport.last().serverOpen();

    await orchestrator.stopConnection(id);
    await orchestrator.drain();
    expect(transport.last().closedByClient).toEqual({ code: 1000, reason: 'stopConnection' });
    expect(orchestrator.getConnectionState(id)).toBeUndefined();
    expect(disconnects(received).map((event) => [event.reason, event.willRetry])).toEqual([['stopped', false]]);
  });

  it('keeps a connection that was started again while its stop settled', async () => {
    const { orchestrator, transport } = setup();
    const id = orchestrator.startConnection('bitget');
    await flush();
    transport.last().serverOpen();

    const stopping = orchestrator.stopConnection(id);
    expect(orchestrator.startConnection('bitget')).toBe(id);
    await stopping;
    await flush();

    expect(transport.sockets).toHaveLength(2);
    expect(orchestrator.getConnectionState(id)?.state).toBe('connecting');
    transport.last().serverOpen();
    expect(orchestrator.getConnectionState(id)?.state).toBe('streaming');
  });

  it('restarts after the close completes when started during closing', async () => {
    const { orchestrator, transport } = setup({ transport: createFakeTransport({ autoCloseAck: false }) });
    const id = orchestrator.startConnection('bitget');
    await flush();
    const first = transport.last();
    first.serverOpen();

    const stopping = orchestrator.stopConnection(id);
    await flush();
    expect(orchestrator.getConnectionState(id)?.state).toBe('closing');
    expect(orchestrator.startConnection('bitget')).toBe(id);
    expect(transport.sockets).toHaveLength(1);

    first.serverClose(1000, '');
    await stopping;
    await flush();
    expect(transport.sockets).toHaveLength(2);
    expect(orchestrator.getConnectionState(id)?.state).toBe('connecting');
  });

  it('fetches a KuCoin token before opening the socket', async () => {
    const { orchestrator, transport, http } = setup();
    const id = orchestrator.startConnection('kucoin', 'futures');
    expect(id).toBe('kucoin:futures');
    await flush();

    expect(http.calls.map((call) => call.url)).toEqual(['https://api-futures.kucoin.com/api/v1/bullet-public']);
    expect(transport.last().endpoint.startsWith('wss://ws-api.example.test/?token=test-token&connectId=')).toBe(true);
    expect(orchestrator.getConnectionState(id)).toMatchObject({ state: 'connecting', keepaliveIntervalMs: 18_000 });
  });

  it('shutdown stops every connection, then runs cleanups in reverse order', async () => {
    const { orchestrator, transport, received } = setup();
    const order: string[] = [];
    orchestrator.registerCleanup(() => {
      order.push('first');
    });
    orchestrator.registerCleanup(async () => {
      order.push('second');
    });
    orchestrator.registerCleanup(() => {
      throw new Error('cleanup failed');
    });
    orchestrator.startConnection('bitget');
    await flush();
    transport.last().serverOpen();

    await orchestrator.shutdown('test over');
    expect(order).toEqual(['second', 'first']);
    expect(orchestrator.listConnections()).toEqual([]);
    expect(disconnects(received).map((event) => event.reason)).toEqual(['stopped']);
    expect(() => orchestrator.startConnection('bitget')).toThrow('orchestrator is shutting down');
    await expect(orchestrator.shutdown()).resolves.toBeUndefined();
    expect(order).toEqual(['second', 'first']);
  });
});
