import { logger } from '../infra/logger';
import type { FeedEvent } from '../core/events/EventBus';
import { toErrorMessage } from '../core/errors';
import { loadFeedTargets, loadIngestConfig, readFlag } from '../control/config';
import { IngestionOrchestrator } from '../control/orchestrator';

// Точка входа live-ленты: поднимает соединения из FEED_*,
// подписывает символы и пишет нормализованные события в лог.

async function main(): Promise<void> {
    const config = loadIngestConfig();
    const targets = loadFeedTargets();
    const logEvents = readFlag(process.env, 'FEED_LOG_EVENTS', true);

    logger.info(
        `[live-feed] starting: exchanges=${targets.exchanges.join(',') || 'none'} marketType=${targets.marketType} symbols=${targets.symbols.join(',')} channels=${targets.channels.join(',')}`
    );
    if (targets.exchanges.length === 0 || targets.channels.length === 0) {
        throw new Error('nothing to stream: FEED_EXCHANGES and FEED_CHANNELS must name at least one valid entry');
    }

    const orchestrator = new IngestionOrchestrator({ config });

    orchestrator.registerConsumer((event) => {
        if (logEvents) logger.info(`[live-feed] ${describeEvent(event)}`);
    }, 'live-feed-log');

    for (const exchange of targets.exchanges) {
        const id = orchestrator.startConnection(exchange, targets.marketType);
        for (const symbol of targets.symbols) {
            for (const channel of targets.channels) {
                await orchestrator.addSubscription(id, symbol, channel);
            }
        }
    }

    // Пульс раз в 30 секунд: состояние соединений и очередей.
    const heartbeatInterval = setInterval(() => {
        for (const conn of orchestrator.listConnections()) {
            logger.info(
                `[live-feed] ${conn.connectionId} state=${conn.state} confirmed=${conn.confirmed.length}/${conn.desired.length} attempt=${conn.attempt}`
            );
        }
    }, 30_000);
    orchestrator.registerCleanup(() => clearInterval(heartbeatInterval));
    orchestrator.registerCleanup(() => logger.flush());

    let isShuttingDown = false;
    const shutdown = async (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;
        logger.info(`[live-feed] received ${signal}, stopping...`);
        try {
            await orchestrator.shutdown(signal);
        } catch (err) {
            logger.error('[live-feed] shutdown failed', err);
            process.exitCode = 1;
        }
        process.exit();
    };

    process.on('unhandledRejection', (reason) => {
        logger.error(`[live-feed] unhandledRejection: ${toErrorMessage(reason)}`);
        void shutdown('unhandledRejection');
    });
    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

function describeEvent(event: FeedEvent): string {
    switch (event.topic) {
        case 'market:event': {
            const e = event.payload;
            const head = `${e.exchange}/${e.marketType} ${e.symbol} ${e.kind}`;
            switch (e.kind) {
                case 'ticker':
                    return `${head} last=${e.lastPrice.toString()} bid=${e.bestBid?.toString() ?? 'n/a'} ask=${e.bestAsk?.toString() ?? 'n/a'}`;
                case 'trade':
                    return `${head} ${e.side} ${e.size.toString()} @ ${e.price.toString()}`;
                case 'candle':
                    return `${head} ${e.interval} o=${e.open.toString()} h=${e.high.toString()} l=${e.low.toString()} c=${e.close.toString()}`;
                case 'orderbook':
                    return `${head} ${e.action} bids=${e.bids.length} asks=${e.asks.length}`;
                case 'control':
                    return `${head} ${e.code}: ${e.message}`;
            }
            break;
        }
        case 'connection:state':
            return `${event.payload.connectionId} ${event.payload.from} -> ${event.payload.to}`;
        case 'connection:connected':
            return `${event.payload.connectionId} connected ${event.payload.endpoint}`;
        case 'connection:disconnected':
            return `${event.payload.connectionId} disconnected (${event.payload.reason}) willRetry=${event.payload.willRetry}`;
        case 'connection:fatal':
            return `${event.payload.connectionId} FATAL ${event.payload.error.message}`;
        case 'subscription:acked':
            return `${event.payload.connectionId} subscribed ${event.payload.channel}:${event.payload.symbol}`;
        case 'subscription:failed':
            return `${event.payload.connectionId} subscription failed ${event.payload.channel}:${event.payload.symbol}: ${event.payload.reason}`;
    }
    return event.topic;
}

main().catch((error) => {
    logger.error('[live-feed] fatal error', error);
    process.exit(1);
});
