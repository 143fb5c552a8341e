import { getViewportSettings } from './viewport-settings';

/**
 * How the engine should move the camera to a newly installed viewport.
 * These are descriptors only; timing and easing are the engine's job.
 * Durations are in seconds.
 */
export type ViewportAnimation =
    /** engine-chosen transition, never longer than maxDuration; the only one that handles a moving puck */
    | { readonly kind: 'default'; readonly maxDuration: number }
    | { readonly kind: 'immediate' }
    /** zoom out, pan, zoom in; engine picks the duration when absent */
    | { readonly kind: 'fly'; readonly duration?: number }
    | { readonly kind: 'easeIn'; readonly duration: number }
    | { readonly kind: 'easeOut'; readonly duration: number }
    | { readonly kind: 'easeInOut'; readonly duration: number }
    | { readonly kind: 'linear'; readonly duration: number };

export type ViewportAnimationKind = ViewportAnimation['kind'];

export const ViewportAnimation = Object.freeze({
    default(maxDuration: number = getViewportSettings().state.defaultMaxAnimationDuration): ViewportAnimation {
        return { kind: 'default', maxDuration };
    },
    immediate: Object.freeze<ViewportAnimation>({ kind: 'immediate' }),
    fly(duration?: number): ViewportAnimation {
        return duration === undefined ? { kind: 'fly' } : { kind: 'fly', duration };
    },
    easeIn(duration: number): ViewportAnimation {
        return { kind: 'easeIn', duration };
    },
    easeOut(duration: number): ViewportAnimation {
        return { kind: 'easeOut', duration };
    },
    easeInOut(duration: number): ViewportAnimation {
        return { kind: 'easeInOut', duration };
    },
    linear(duration: number): ViewportAnimation {
        return { kind: 'linear', duration };
    },
});

/** Seconds, or undefined when the engine decides */
export function durationOf(animation: ViewportAnimation): number | undefined {
    switch (animation.kind) {
    case 'immediate':
        return 0;
    case 'default':
        return animation.maxDuration;
    case 'fly':
    case 'easeIn':
    case 'easeOut':
    case 'easeInOut':
    case 'linear':
        return animation.duration;
    }
}
