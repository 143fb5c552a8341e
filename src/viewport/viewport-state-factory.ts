import { LogHandler } from '@/utilities/log-handler';
import { resolveViewportState } from './state-resolver';
import type {
    CameraParameters,
    FollowPuckParameters,
    OverviewParameters,
    ResolvedViewportState,
    StyleDefaultRequest,
    ViewportEnvironment,
} from './state-resolver';
import type { Viewport } from './viewport';

const log = new LogHandler('ViewportStateFactory');

/**
 * Construction contract of the camera-state engine.
 * Each method builds the engine's own state object from a resolved parameter bundle;
 * the returned state is opaque here.
 */
export interface ViewportStateFactory<TState, TStyle = unknown> {
    makeCameraState(parameters: CameraParameters): TState;
    makeStyleDefaultState(request: StyleDefaultRequest<TStyle>): TState;
    makeOverviewState(parameters: OverviewParameters): TState;
    makeFollowPuckState(parameters: FollowPuckParameters): TState;
}

/** Hand a resolved bundle to the matching engine constructor */
export function buildViewportState<TState, TStyle>(
    resolved: ResolvedViewportState<TStyle>,
    factory: ViewportStateFactory<TState, TStyle>
): TState {
    switch (resolved.kind) {
    case 'camera':
        return factory.makeCameraState(resolved);
    case 'styleDefault':
        return factory.makeStyleDefaultState(resolved);
    case 'overview':
        return factory.makeOverviewState(resolved);
    case 'followPuck':
        return factory.makeFollowPuckState(resolved);
    }
}

/**
 * Resolve a viewport and build the matching engine state.
 * Returns null for `idle` without calling the factory.
 */
export function makeViewportState<TState, TStyle>(
    viewport: Viewport,
    environment: ViewportEnvironment<TStyle>,
    factory: ViewportStateFactory<TState, TStyle>
): TState | null {
    const resolved = resolveViewportState(viewport, environment);
    if (resolved === null) {
        log.debug('idle viewport, no state');
        return null;
    }

    log.debug({ kind: resolved.kind, padding: resolved.padding });
    return buildViewportState(resolved, factory);
}
