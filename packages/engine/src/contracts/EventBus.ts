/**
 * @fileoverview EventBus Contract
 *
 * Typed events for a batch run. Each event type has a fixed data shape,
 * declared once in EngineEventMap, so subscribers read `event.data`
 * without guessing.
 *
 * Dispatch is synchronous and in-process; a run's events arrive in the
 * order the engine emits them.
 *
 * @module @filekit/engine/contracts/EventBus
 */

import type { OperationType } from "./Proposal.js";

interface EntityRef {
    readonly domainId: string;
    readonly entityId: string;
}

/**
 * Data carried by each event type.
 */
export interface EngineEventMap {
    "run:started": { readonly domainId: string; readonly providerId: string };
    "run:completed": {
        readonly domainId: string;
        readonly scanned: number;
        readonly planned: number;
        readonly unplanned: number;
        readonly failed: number;
        readonly durationMs: number;
    };
    "run:error": { readonly domainId: string; readonly error: string };

    "entity:received": EntityRef;
    "entity:planned": EntityRef & {
        readonly operation: OperationType;
        readonly target?: string;
        readonly reason?: string;
        readonly confidence: number;
        readonly plannerId: string;
    };
    "entity:unplanned": EntityRef;
    "entity:actionExecuting": EntityRef & { readonly actionId: string; readonly operation: OperationType };
    "entity:actionExecuted": EntityRef & {
        readonly actionId: string;
        readonly success: boolean;
        readonly status?: string;
        /** Target of the proposal the action ran for */
        readonly target?: string;
        readonly error?: string;
    };
    "entity:actionError": EntityRef & { readonly actionId: string; readonly error: string };
    "entity:processed": EntityRef & { readonly operation: OperationType; readonly duration: number };
    "entity:error": EntityRef & { readonly error: string };
}

export type EventType = keyof EngineEventMap;

export type LifecycleEventType = Extract<EventType, `run:${string}`>;

export type ProcessingEventType = Extract<EventType, `entity:${string}`>;

/**
 * One emitted event. Without a type argument, `data` is the union of
 * every event's data.
 */
export interface EventPayload<K extends EventType = EventType> {
    readonly type: K;

    /** ISO timestamp */
    readonly timestamp: string;

    /** Shared by every event of one entity */
    readonly traceId?: string;

    readonly data: EngineEventMap[K];
}

export type EventHandler<K extends EventType = EventType> = (event: EventPayload<K>) => void | Promise<void>;

export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("entity:planned", (event) => {
 *     console.log(`${event.data.entityId} -> ${event.data.target}`);
 * });
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    emit<K extends EventType>(event: EventPayload<K>): void;

    subscribe<K extends EventType>(eventType: K, handler: EventHandler<K>): Subscription;

    /**
     * Receive every event, after the handlers of its own type.
     */
    subscribeAll(handler: EventHandler): Subscription;

    /**
     * Like subscribe(), but the handler is removed after its first event.
     */
    once<K extends EventType>(eventType: K, handler: EventHandler<K>): Subscription;

    /**
     * Drop the handlers of one type, or every handler when no type is given.
     */
    clear(eventType?: EventType): void;
}

/**
 * Stamp an event with the current time.
 */
export function createEvent<K extends EventType>(
    type: K,
    data: EngineEventMap[K],
    traceId?: string
): EventPayload<K> {
    return {
        type,
        timestamp: new Date().toISOString(),
        data,
        ...(traceId !== undefined && { traceId }),
    };
}
