import { toErrorMessage } from '../errors';
import { m } from '../logMarkers';
import { logger } from '../../infra/logger';
import type { FeedEvent } from './EventBus';

export type OverflowPolicy = 'drop_oldest' | 'reject';

export type Consumer = (event: FeedEvent) => void | Promise<void>;

export interface ConsumerHandle {
    readonly id: number;
    readonly name: string;
}

export interface DispatcherOptions {
    /** Per-consumer queue bound. */
    queueSize?: number;
    overflowPolicy?: OverflowPolicy;
    /** How long one consumer call may run before the queue moves on. */
    consumerTimeoutMs?: number;
}

export interface ConsumerStats {
    name: string;
    queued: number;
    delivered: number;
    failed: number;
    timedOut: number;
    /** drop_oldest: events evicted from a full queue. */
    dropped: number;
    /** reject: events refused because the queue was full. */
    rejected: number;
}

export interface PublishResult {
    accepted: number;
    /** Consumers whose full queue refused the event (reject policy only). */
    rejectedBy: string[];
}

interface ConsumerSlot {
    handle: ConsumerHandle;
    consumer: Consumer;
    queue: FeedEvent[];
    running: boolean;
    active: boolean;
    stats: ConsumerStats;
    idleWaiters: Array<() => void>;
}

export const DEFAULT_QUEUE_SIZE = 1_000;
export const DEFAULT_CONSUMER_TIMEOUT_MS = 5_000;
// не больше одного warn на столько потерянных событий
const OVERFLOW_LOG_EVERY = 1_000;

// ============================================================================
// EventDispatcher
// ----------------------------------------------------------------------------
// publish() только раскладывает событие по очередям и сразу возвращается.
// У каждого потребителя своя очередь и свой цикл доставки, поэтому медленный
// или падающий потребитель не задерживает ни других, ни ingestion.
// ============================================================================

export class EventDispatcher {
    private readonly slots = new Map<number, ConsumerSlot>();
    private readonly queueSize: number;
    private readonly overflowPolicy: OverflowPolicy;
    private readonly consumerTimeoutMs: number;
    private nextId = 1;

    constructor(opts: DispatcherOptions = {}) {
        this.queueSize = Math.max(1, Math.floor(opts.queueSize ?? DEFAULT_QUEUE_SIZE));
        this.overflowPolicy = opts.overflowPolicy ?? 'drop_oldest';
        this.consumerTimeoutMs = Math.max(1, opts.consumerTimeoutMs ?? DEFAULT_CONSUMER_TIMEOUT_MS);
    }

    get policy(): OverflowPolicy {
        return this.overflowPolicy;
    }

    subscribe(consumer: Consumer, name?: string): ConsumerHandle {
        const id = this.nextId++;
        const handle: ConsumerHandle = { id, name: name ?? `consumer-${id}` };
        this.slots.set(id, {
            handle,
            consumer,
            queue: [],
            running: false,
            active: true,
            stats: { name: handle.name, queued: 0, delivered: 0, failed: 0, timedOut: 0, dropped: 0, rejected: 0 },
            idleWaiters: [],
        });
        logger.debug(`[Dispatcher] consumer registered: ${handle.name}`);
        return handle;
    }

    /** Pending events of the consumer are discarded. */
    unsubscribe(handle: ConsumerHandle): boolean {
        const slot = this.slots.get(handle.id);
        if (!slot) return false;
        slot.active = false;
        slot.queue.length = 0;
        this.slots.delete(handle.id);
        this.notifyIdle(slot);
        logger.debug(`[Dispatcher] consumer removed: ${handle.name}`);
        return true;
    }

    publish(event: FeedEvent): PublishResult {
        const result: PublishResult = { accepted: 0, rejectedBy: [] };
        for (const slot of this.slots.values()) {
            if (this.enqueue(slot, event)) {
                result.accepted += 1;
            } else {
                result.rejectedBy.push(slot.handle.name);
            }
        }
        return result;
    }

    consumerCount(): number {
        return this.slots.size;
    }

    stats(): ConsumerStats[] {
        return Array.from(this.slots.values()).map((slot) => ({ ...slot.stats, queued: slot.queue.length }));
    }

    /** Resolves once every queue is empty and no consumer call is in flight. */
    async drain(): Promise<void> {
        await Promise.all(
            Array.from(this.slots.values()).map(
                (slot) =>
                    new Promise<void>((resolve) => {
                        if (!slot.running && slot.queue.length === 0) {
                            resolve();
                            return;
                        }
                        slot.idleWaiters.push(resolve);
                    })
            )
        );
    }

    close(): void {
        for (const slot of Array.from(this.slots.values())) {
            this.unsubscribe(slot.handle);
        }
    }

    private enqueue(slot: ConsumerSlot, event: FeedEvent): boolean {
        if (slot.queue.length >= this.queueSize) {
            if (this.overflowPolicy === 'reject') {
                slot.stats.rejected += 1;
                this.logOverflow(slot, slot.stats.rejected, 'rejected');
                return false;
            }
            slot.queue.shift();
            slot.stats.dropped += 1;
            this.logOverflow(slot, slot.stats.dropped, 'dropped oldest');
        }
        slot.queue.push(event);
        if (!slot.running) {
            slot.running = true;
            this.pump(slot).catch((err: unknown) => {
                slot.running = false;
                logger.error(m('error', `[Dispatcher] delivery loop for ${slot.handle.name} crashed: ${toErrorMessage(err)}`));
            });
        }
        return true;
    }

    private async pump(slot: ConsumerSlot): Promise<void> {
        // первый await отделяет доставку от вызова publish()
        await Promise.resolve();
        let event = slot.queue.shift();
        while (event && slot.active) {
            await this.deliver(slot, event);
            event = slot.queue.shift();
        }
        slot.running = false;
        this.notifyIdle(slot);
    }

    private async deliver(slot: ConsumerSlot, event: FeedEvent): Promise<void> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<'timeout'>((resolve) => {
            timer = setTimeout(() => resolve('timeout'), this.consumerTimeoutMs);
        });
        try {
            const call = Promise.resolve().then(() => slot.consumer(event));
            // a consumer that outlives the timeout may still reject later
            call.catch((err: unknown) => {
                logger.warn(m('warn', `[Dispatcher] consumer ${slot.handle.name} failed: ${toErrorMessage(err)}`));
            });
            const outcome = await Promise.race([call.then(() => 'done' as const), timeout]);
            if (outcome === 'timeout') {
                slot.stats.timedOut += 1;
                logger.warn(m('timeout', `[Dispatcher] consumer ${slot.handle.name} exceeded ${this.consumerTimeoutMs}ms, moving on`));
                return;
            }
            slot.stats.delivered += 1;
        } catch {
            slot.stats.failed += 1;
        } finally {
            clearTimeout(timer);
        }
    }

    private notifyIdle(slot: ConsumerSlot): void {
        if (slot.running && slot.queue.length > 0) return;
        const waiters = slot.idleWaiters;
        slot.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
    }

    private logOverflow(slot: ConsumerSlot, count: number, what: string): void {
        if (count !== 1 && count % OVERFLOW_LOG_EVERY !== 0) return;
        logger.warn(
            m('warn', `[Dispatcher] queue of ${slot.handle.name} is full (${this.queueSize}), ${what} ${count} event(s) so far (policy=${this.overflowPolicy})`)
        );
    }
}
