import { computed, getCurrentScope, onScopeDispose, shallowRef, toValue, watch } from 'vue';
import type { MaybeRefOrGetter } from 'vue';
import { LogHandler } from '@/utilities/log-handler';
import { directionalInsetsEqual } from '@/viewport/edge-insets';
import type { DirectionalInsets, LayoutDirection } from '@/viewport/edge-insets';
import { ViewportEventBus } from '@/viewport/event-bus';
import { resolveViewportState } from '@/viewport/state-resolver';
import type { ResolvedViewportState } from '@/viewport/state-resolver';
import { Viewport } from '@/viewport/viewport';
import { durationOf } from '@/viewport/viewport-animation';
import type { ViewportAnimation } from '@/viewport/viewport-animation';
import { getViewportSettings } from '@/viewport/viewport-settings';
import { buildViewportState } from '@/viewport/viewport-state-factory';
import type { ViewportStateFactory } from '@/viewport/viewport-state-factory';

const log = new LogHandler('UseViewport');

/**
 * Camera-state engine as seen by the binding: its state constructors,
 * plus the two ways of driving the camera.
 */
export interface ViewportEngine<TState, TStyle = unknown> extends ViewportStateFactory<TState, TStyle> {
    /** Stop driving the camera and cancel any running transition */
    idle(): void;
    /** Start driving the camera with `state`; a null animation jumps */
    transition(state: TState, animation: ViewportAnimation | null): void;
}

export interface UseViewportOptions<TState, TStyle = unknown> {
    engine: ViewportEngine<TState, TStyle>;
    /** Safe area reported by the host view */
    safeAreaInsets: MaybeRefOrGetter<DirectionalInsets>;
    /** Falls back to the `defaultLayoutDirection` setting */
    layoutDirection?: MaybeRefOrGetter<LayoutDirection | undefined>;
    style?: MaybeRefOrGetter<TStyle | undefined>;
    /** Defaults to `Viewport.styleDefault()` */
    initialViewport?: Viewport;
    events?: ViewportEventBus;
}

type IdleReason = 'interrupted' | 'requested';

/**
 * Binds a Viewport value to a camera-state engine.
 *
 * The initial viewport is installed right away. Setting a different viewport
 * installs its resolved state; setting an equal one does nothing.
 * Safe-area and layout-direction changes re-resolve the current viewport without animation.
 */
export function useViewport<TState, TStyle = unknown>(options: UseViewportOptions<TState, TStyle>) {
    const { engine } = options;
    const events = options.events ?? new ViewportEventBus();

    const viewport = shallowRef<Viewport>(options.initialViewport ?? Viewport.styleDefault());
    const resolvedState = shallowRef<ResolvedViewportState<TStyle> | null>(null);

    const layoutDirection = computed<LayoutDirection>(
        () => toValue(options.layoutDirection) ?? getViewportSettings().state.defaultLayoutDirection
    );
    const safeAreaInsets = computed(() => toValue(options.safeAreaInsets));

    /** Run an engine call; failures are logged and rethrown */
    function callEngine(target: Viewport, action: () => void): void {
        try {
            action();
        } catch (e) {
            log.error(`Engine failed to install ${target.mode.kind} viewport`, e instanceof Error ? e : new Error(String(e)));
            throw e;
        }
    }

    function install(animation: ViewportAnimation | null, idleReason: IdleReason = 'requested'): void {
        const target = viewport.value;
        const resolved = resolveViewportState(target, {
            layoutDirection: layoutDirection.value,
            safeAreaInsets: () => safeAreaInsets.value,
            style: toValue(options.style),
        });

        if (resolved === null) {
            callEngine(target, () => engine.idle());
            resolvedState.value = null;
            log.debug(`camera released (${idleReason})`);
            events.emit('viewport:idle', { reason: idleReason });
            return;
        }

        callEngine(target, () => engine.transition(buildViewportState(resolved, engine), animation));
        resolvedState.value = resolved;
        log.debug({ installed: resolved.kind, duration: animation ? durationOf(animation) : 0 });
        events.emit('viewport:stateInstalled', { kind: resolved.kind, animation });
    }

    function replace(next: Viewport, animation: ViewportAnimation | null, idleReason: IdleReason): boolean {
        const previous = viewport.value;
        if (previous.equals(next)) {
            return false;
        }

        viewport.value = next;
        events.emit('viewport:changed', { previous, current: next, animation });
        try {
            install(animation, idleReason);
        } catch (e) {
            // engine kept the previous state
            viewport.value = previous;
            throw e;
        }
        return true;
    }

    /**
     * Move to a new viewport. Returns false when `next` equals the current viewport.
     * The animation is ignored for `idle`.
     */
    function setViewport(next: Viewport, animation: ViewportAnimation | null = null): boolean {
        return replace(next, animation, 'requested');
    }

    /** The user took over the camera (drag, pinch, ...) */
    function interrupt(): void {
        replace(Viewport.idle(), null, 'interrupted');
    }

    const stopEnvironmentWatch = watch(
        [layoutDirection, safeAreaInsets],
        ([direction, insets], [previousDirection, previousInsets]) => {
            if (!getViewportSettings().state.reapplyOnEnvironmentChange || viewport.value.isIdle) return;
            if (direction === previousDirection && directionalInsetsEqual(insets, previousInsets)) return;
            install(null);
        },
        { flush: 'sync' }
    );

    function dispose(): void {
        stopEnvironmentWatch();
    }

    if (getCurrentScope()) {
        onScopeDispose(dispose);
    }

    install(null);

    return {
        viewport: computed(() => viewport.value),
        resolvedState: computed(() => resolvedState.value),
        layoutDirection,
        events,
        setViewport,
        interrupt,
        dispose,
    };
}
