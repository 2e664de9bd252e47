import type Decimal from 'decimal.js';
import type {
    CanonicalEvent,
    CanonicalEventBase,
    ControlCode,
    ControlEvent,
    OrderBookLevel,
    TradeSide,
} from '../../core/events/EventBus';
import { ProtocolError } from '../../core/errors';
import { toDecimal, toEpochMs } from '../../core/market/numeric';
import type { NormalizeContext } from '../types';

// ============================================================================
// Общие кирпичики нормализации.
// Любое поле, которое не удалось распарсить, становится ProtocolError; mapEach превращает
// его в Control(protocol_error) вместо частично заполненного события.
// ============================================================================

export function requireDecimal(value: unknown, field: string): Decimal {
    const parsed = toDecimal(value);
    if (!parsed) throw new ProtocolError(`field ${field} is not a number: ${describe(value)}`, { field });
    return parsed;
}

/** Absent stays undefined, present-but-garbage is still an error. */
export function optionalDecimal(value: unknown, field: string): Decimal | undefined {
    if (value === undefined || value === null || value === '') return undefined;
    return requireDecimal(value, field);
}

export function requireTs(value: unknown, field: string): number {
    const ts = toEpochMs(value);
    if (ts === undefined) throw new ProtocolError(`field ${field} is not a timestamp: ${describe(value)}`, { field });
    return ts;
}

export function requireString(value: unknown, field: string): string {
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    throw new ProtocolError(`field ${field} is missing`, { field });
}

export function toSide(value: unknown): TradeSide {
    const v = typeof value === 'string' ? value.toLowerCase() : '';
    if (v === 'buy' || v === 'b') return 'buy';
    if (v === 'sell' || v === 's') return 'sell';
    throw new ProtocolError(`unknown trade side: ${describe(value)}`, { field: 'side' });
}

export function toLevels(entries: unknown, field: string): OrderBookLevel[] {
    if (entries === undefined || entries === null) return [];
    if (!Array.isArray(entries)) throw new ProtocolError(`field ${field} is not a list`, { field });
    return entries.map((row: unknown, idx) => {
        if (!Array.isArray(row) || row.length < 2) {
            throw new ProtocolError(`field ${field}[${idx}] is not a [price, size] pair`, { field });
        }
        return {
            price: requireDecimal(row[0], `${field}[${idx}].price`),
            size: requireDecimal(row[1], `${field}[${idx}].size`),
        };
    });
}

export function eventBase(ctx: NormalizeContext, symbol: string, eventTs: number): CanonicalEventBase {
    return {
        exchange: ctx.exchange,
        marketType: ctx.marketType,
        connectionId: ctx.connectionId,
        symbol,
        eventTs,
        receivedTs: ctx.receivedTs,
    };
}

export function controlEvent(ctx: NormalizeContext, symbol: string, code: ControlCode, message: string): ControlEvent {
    return {
        ...eventBase(ctx, symbol, ctx.receivedTs),
        kind: 'control',
        code,
        message,
        raw: ctx.raw,
    };
}

/**
 * Maps every item of a data frame. The valid items are still mapped; whatever
 * failed is reported as a single protocol_error per frame, carrying the raw frame.
 */
export function mapEach(
    ctx: NormalizeContext,
    symbol: string,
    items: unknown,
    mapper: (item: unknown) => CanonicalEvent
): CanonicalEvent[] {
    if (!Array.isArray(items) || items.length === 0) {
        return [controlEvent(ctx, symbol, 'protocol_error', 'data frame carries no items')];
    }
    const out: CanonicalEvent[] = [];
    const failures: string[] = [];
    for (const item of items) {
        try {
            out.push(mapper(item));
        } catch (err) {
            if (!(err instanceof ProtocolError)) throw err;
            failures.push(err.message);
        }
    }
    if (failures.length > 0) {
        out.push(controlEvent(ctx, symbol, 'protocol_error', failures.join('; ')));
    }
    return out;
}

function describe(value: unknown): string {
    if (value === undefined) return 'undefined';
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}
