import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { disconnects, marketEvents, stateChanges, topicsOf } from '../src/core/events/testing';
import { computeBackoffDelay } from '../src/exchange/supervisor/backoff';
import { BITGET_ENDPOINT, bitgetAck, bitgetHarness, bitgetTicker, flush, T0 } from './helpers/supervisorHarness';

const subscribeFrame = (channel: string) =>
  JSON.stringify({ op: 'subscribe', args: [{ instType: 'USDT-FUTURES', channel, instId: 'BTCUSDT' }] });

describe('ConnectionSupervisor reconnect and resubscribe', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('streams, drops, backs off and replays the desired set exactly once', async () => {
    const { supervisor, transport, events } = bitgetHarness();
    supervisor.addSubscription('BTCUSDT', 'ticker');
    supervisor.start();
    await flush();

    const first = transport.last();
    expect(first.endpoint).toBe(BITGET_ENDPOINT);
    first.serverOpen();
    expect(supervisor.state).toBe('streaming');
    expect(first.sent).toEqual([subscribeFrame('ticker')]);
    expect(supervisor.getSnapshot().pending).toBe(1);
    expect(topicsOf(events)).toEqual(['connection:state', 'connection:state', 'connection:state', 'connection:connected']);
    expect(stateChanges(events)).toEqual(['disconnected->connecting', 'connecting->subscribing', 'subscribing->streaming']);

    first.serverSend(bitgetAck('ticker'));
    first.serverSend(bitgetTicker('88650.5'));
    expect(supervisor.getSnapshot().confirmed).toEqual([{ symbol: 'BTCUSDT', channel: 'ticker' }]);
    expect(supervisor.getSnapshot().pending).toBe(0);
    const [ticker] = marketEvents(events);
    expect(ticker?.kind === 'ticker' && ticker.lastPrice.toString()).toBe('88650.5');

    first.serverClose(1006, 'abnormal');
    const delay = computeBackoffDelay({ baseMs: 100, maxMs: 1_000, maxRetries: 3, jitterSeed: 'bitget:futures' }, 1);
    expect(supervisor.state).toBe('connecting');
    expect(disconnects(events)).toEqual([
      {
        connectionId: 'bitget:futures',
        exchange: 'bitget',
        marketType: 'futures',
        ts: T0,
        reason: 'transport_closed: code=1006 abnormal',
        willRetry: true,
        retryInMs: delay,
        attempt: 1,
      },
    ]);
    expect(supervisor.getSnapshot().confirmed).toEqual([]);
    expect(supervisor.getSnapshot().desired).toEqual([{ symbol: 'BTCUSDT', channel: 'ticker' }]);

    await vi.advanceTimersByTimeAsync(delay - 1);
    expect(transport.sockets).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    await flush();
    expect(transport.sockets).toHaveLength(2);

    const second = transport.last();
    second.serverOpen();
    expect(supervisor.state).toBe('streaming');
    expect(second.sent).toEqual([subscribeFrame('ticker')]);
    expect(first.sent).toHaveLength(1);
    expect(supervisor.getSnapshot().attempt).toBe(1);
  });

  it('queues subscriptions added while disconnected and sends later ones directly', async () => {
    const { supervisor, transport } = bitgetHarness();
    supervisor.addSubscription('BTCUSDT', 'ticker');
    supervisor.addSubscription('btc-usdt', 'ticker');
    supervisor.start();
    await flush();
    const socket = transport.last();
    socket.serverOpen();

    supervisor.addSubscription('BTCUSDT', 'candle:5m');
    expect(socket.sent).toEqual([subscribeFrame('ticker'), subscribeFrame('candle5m')]);

    socket.serverSend(bitgetAck('candle5m'));
    expect(supervisor.removeSubscription('BTCUSDT', 'candle:5m')).toBe(true);
    expect(socket.sent[2]).toBe(
      JSON.stringify({ op: 'unsubscribe', args: [{ instType: 'USDT-FUTURES', channel: 'candle5m', instId: 'BTCUSDT' }] })
    );
  });

  it('ignores frames from a socket that was replaced', async () => {
    const { supervisor, transport, events } = bitgetHarness();
    supervisor.start();
    await flush();
    const first = transport.last();
    first.serverOpen();
    first.serverClose(1006, '');

    await vi.advanceTimersByTimeAsync(1_000);
    await flush();
    transport.last().serverOpen();

    first.serverSend(bitgetTicker('1'));
    first.serverClose(1000, 'late');
    expect(marketEvents(events)).toEqual([]);
    expect(supervisor.state).toBe('streaming');
  });

  it('resets the attempt counter after a stable session', async () => {
    const { supervisor, transport } = bitgetHarness({ stableMs: 5_000 });
    supervisor.start();
    await flush();
    transport.last().serverOpen();
    transport.last().serverClose(1006, '');
    await vi.advanceTimersByTimeAsync(1_000);
    await flush();
    transport.last().serverOpen();
    expect(supervisor.getSnapshot().attempt).toBe(1);

    await vi.advanceTimersByTimeAsync(4_999);
    expect(supervisor.getSnapshot().attempt).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(supervisor.getSnapshot().attempt).toBe(0);
  });

  it('publishes subscription outcomes and keeps rejected keys out of replays', async () => {
    const { supervisor, transport, events } = bitgetHarness();
    supervisor.addSubscription('BTCUSDT', 'ticker');
    supervisor.addSubscription('NOPEUSDT', 'ticker');
    supervisor.start();
    await flush();
    const first = transport.last();
    first.serverOpen();

    first.serverSend(bitgetAck('ticker'));
    first.serverSend({
      event: 'error',
      arg: { instType: 'USDT-FUTURES', channel: 'ticker', instId: 'NOPEUSDT' },
      code: 30001,
      msg: 'instId does not exist',
    });

    const acked = events.flatMap((event) => (event.topic === 'subscription:acked' ? [event.payload] : []));
    const failed = events.flatMap((event) => (event.topic === 'subscription:failed' ? [event.payload] : []));
    expect(acked.map((payload) => `${payload.channel}:${payload.symbol}`)).toEqual(['ticker:BTCUSDT']);
    expect(failed).toHaveLength(1);
    expect(failed[0]?.reason).toBe('code=30001 instId does not exist');
    expect(failed[0]?.error.kind).toBe('subscription');
    expect(supervisor.state).toBe('streaming');

    first.serverClose(1006, '');
    await vi.advanceTimersByTimeAsync(1_000);
    await flush();
    transport.last().serverOpen();
    expect(transport.last().sent).toEqual([subscribeFrame('ticker')]);
  });

  it('turns undecodable frames into protocol_error control events', async () => {
    const { supervisor, transport, events } = bitgetHarness();
    supervisor.start();
    await flush();
    const socket = transport.last();
    socket.serverOpen();
    vi.setSystemTime(T0 + 250);
    socket.serverSend('garbage');

    expect(marketEvents(events)).toEqual([
      {
        exchange: 'bitget',
        marketType: 'futures',
        connectionId: 'bitget:futures',
        symbol: '',
        eventTs: T0 + 250,
        receivedTs: T0 + 250,
        kind: 'control',
        code: 'protocol_error',
        message: 'frame is not valid JSON',
        raw: 'garbage',
      },
    ]);
    expect(supervisor.state).toBe('streaming');

    socket.serverSend(bitgetTicker('88650.5'));
    const after = marketEvents(events);
    expect(after.map((event) => event.kind)).toEqual(['control', 'ticker']);
    const ticker = after[1];
    if (ticker?.kind !== 'ticker') throw new Error('expected ticker');
    expect(ticker.lastPrice.toString()).toBe('88650.5');
    expect(supervisor.state).toBe('streaming');
  });

  it('counts a session that never becomes ready as a failed attempt', async () => {
    const { supervisor, transport, events } = bitgetHarness({ connectTimeoutMs: 5_000 });
    supervisor.start();
    await flush();
    const socket = transport.last();

    await vi.advanceTimersByTimeAsync(5_000);
    expect(socket.closedByClient).toEqual({ code: 1000, reason: 'connect_timeout: session not ready after 5000ms' });
    expect(disconnects(events).map((event) => event.reason)).toEqual(['connect_timeout: session not ready after 5000ms']);
    expect(supervisor.getSnapshot().attempt).toBe(1);
  });
});
