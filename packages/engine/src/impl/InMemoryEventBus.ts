/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * @module @filekit/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventHandler,
    EventPayload,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";

/**
 * A typed handler bound to its event type; stored per type under one
 * erased signature.
 */
type Listener = (event: EventPayload) => void | Promise<void>;

function isEventOf<K extends EventType>(event: EventPayload, type: K): event is EventPayload<K> {
    return event.type === type;
}

/**
 * Dispatches synchronously to the handlers of the event's type, then to
 * subscribeAll() handlers. A handler that throws or rejects is reported
 * on stderr and does not stop the others.
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 * bus.subscribe("run:completed", (event) => {
 *     console.log(`Scanned ${event.data.scanned} entries`);
 * });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers = new Map<EventType, Set<Listener>>();
    private readonly allHandlers = new Set<EventHandler>();

    emit<K extends EventType>(event: EventPayload<K>): void {
        const listeners = this.handlers.get(event.type);
        if (listeners) {
            // Copy so once() handlers can remove themselves mid-dispatch
            for (const listener of [...listeners]) {
                this.invoke(() => listener(event), `EventBus handler error for ${event.type}:`);
            }
        }

        for (const handler of [...this.allHandlers]) {
            this.invoke(() => handler(event), "EventBus handler error for *:");
        }
    }

    subscribe<K extends EventType>(eventType: K, handler: EventHandler<K>): Subscription {
        const listener: Listener = (event) => (isEventOf(event, eventType) ? handler(event) : undefined);
        const listeners = this.handlers.get(eventType) ?? new Set<Listener>();
        listeners.add(listener);
        this.handlers.set(eventType, listeners);

        return {
            unsubscribe: () => {
                listeners.delete(listener);
            },
        };
    }

    subscribeAll(handler: EventHandler): Subscription {
        this.allHandlers.add(handler);

        return {
            unsubscribe: () => {
                this.allHandlers.delete(handler);
            },
        };
    }

    once<K extends EventType>(eventType: K, handler: EventHandler<K>): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            return handler(event);
        });

        return subscription;
    }

    clear(eventType?: EventType): void {
        if (eventType === undefined) {
            this.handlers.clear();
            this.allHandlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Handlers registered for one type, or for every event when no type is given.
     */
    handlerCount(eventType?: EventType): number {
        return eventType === undefined
            ? this.allHandlers.size
            : this.handlers.get(eventType)?.size ?? 0;
    }

    private invoke(call: () => void | Promise<void>, label: string): void {
        try {
            const result = call();
            if (result instanceof Promise) {
                result.catch((error: unknown) => console.error(label, error));
            }
        }
        catch (error) {
            console.error(label, error);
        }
    }
}
