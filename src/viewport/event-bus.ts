/**
 * Typed event bus for viewport changes.
 * Hosts subscribe to follow what the binding installs into the engine.
 */

import type { Viewport } from './viewport';
import type { ViewportAnimation } from './viewport-animation';
import type { ResolvedViewportState } from './state-resolver';

/** Event map defining all viewport events and their payloads */
export interface ViewportEvents {
    /** A different viewport value was set (equal values are not reported) */
    'viewport:changed': {
        previous: Viewport;
        current: Viewport;
        animation: ViewportAnimation | null;
    };
    /** A resolved state was built and handed to the engine */
    'viewport:stateInstalled': {
        kind: ResolvedViewportState['kind'];
        animation: ViewportAnimation | null;
    };
    /**
     * The camera was released to the user.
     * `interrupted` means a user gesture took over, `requested` means idle was set explicitly.
     */
    'viewport:idle': {
        reason: 'interrupted' | 'requested';
    };
}

type EventHandler<T> = (payload: T) => void;

type HandlerRegistry = {
    [K in keyof ViewportEvents]?: Set<EventHandler<ViewportEvents[K]>>;
};

export class ViewportEventBus {
    private handlers: HandlerRegistry = {};

    /** Register an event handler */
    on<K extends keyof ViewportEvents>(event: K, handler: EventHandler<ViewportEvents[K]>): void {
        const existing: Set<EventHandler<ViewportEvents[K]>> | undefined = this.handlers[event];
        const handlers = existing ?? new Set<EventHandler<ViewportEvents[K]>>();
        handlers.add(handler);
        this.handlers[event] = handlers;
    }

    /** Remove an event handler */
    off<K extends keyof ViewportEvents>(event: K, handler: EventHandler<ViewportEvents[K]>): void {
        const handlers: Set<EventHandler<ViewportEvents[K]>> | undefined = this.handlers[event];
        handlers?.delete(handler);
    }

    /** Emit an event to all registered handlers */
    emit<K extends keyof ViewportEvents>(event: K, payload: ViewportEvents[K]): void {
        const handlers: Set<EventHandler<ViewportEvents[K]>> | undefined = this.handlers[event];
        if (!handlers) return;
        for (const handler of handlers) {
            handler(payload);
        }
    }

    handlerCount(event: keyof ViewportEvents): number {
        return this.handlers[event]?.size ?? 0;
    }

    /** Remove all handlers */
    clear(): void {
        this.handlers = {};
    }
}

/**
 * Tracks subscriptions so they can be dropped together.
 *
 * @example
 * ```ts
 * const subscriptions = new EventSubscriptionManager();
 * subscriptions.subscribe(binding.events, 'viewport:idle', () => showRecenterButton());
 * // on teardown
 * subscriptions.unsubscribeAll();
 * ```
 */
export class EventSubscriptionManager {
    private unsubscribers: Array<() => void> = [];

    subscribe<K extends keyof ViewportEvents>(
        eventBus: ViewportEventBus,
        event: K,
        handler: EventHandler<ViewportEvents[K]>,
    ): void {
        eventBus.on(event, handler);
        this.unsubscribers.push(() => eventBus.off(event, handler));
    }

    unsubscribeAll(): void {
        for (const unsubscribe of this.unsubscribers) {
            unsubscribe();
        }
        this.unsubscribers = [];
    }

    /** Number of active subscriptions */
    get count(): number {
        return this.unsubscribers.length;
    }
}
