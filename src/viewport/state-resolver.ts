import { resolveGeometryPadding, resolvePadding } from './padding-resolver';
import type { DirectionalInsets, LayoutDirection } from './edge-insets';
import type { Coordinate, Geometry, ScreenPoint } from './geometry';
import type { FollowPuckBearing, Viewport } from './viewport';

/** Safe area as a value, or read on demand from the host view */
export type SafeAreaSource = DirectionalInsets | (() => DirectionalInsets);

/** What the host view knows at resolution time */
export interface ViewportEnvironment<TStyle = unknown> {
    readonly layoutDirection: LayoutDirection;
    readonly safeAreaInsets: SafeAreaSource;
    /** Active style / camera query surface, handed to the engine untouched */
    readonly style?: TStyle;
}

export interface CameraParameters {
    readonly kind: 'camera';
    readonly center?: Coordinate;
    readonly anchor?: ScreenPoint;
    readonly zoom?: number;
    readonly bearing?: number;
    readonly pitch?: number;
    readonly padding: DirectionalInsets;
}

/** Ask the engine to use the camera defined by the active style */
export interface StyleDefaultRequest<TStyle = unknown> {
    readonly kind: 'styleDefault';
    readonly padding: DirectionalInsets;
    readonly style: TStyle | undefined;
}

export interface OverviewParameters {
    readonly kind: 'overview';
    readonly geometry: Geometry;
    readonly geometryPadding: DirectionalInsets;
    readonly bearing: number;
    readonly pitch: number;
    readonly padding: DirectionalInsets;
    readonly maxZoom?: number;
    readonly offset?: ScreenPoint;
    /** Always 0 here; transition animation is layered on by the caller */
    readonly animationDuration: number;
}

export interface FollowPuckParameters {
    readonly kind: 'followPuck';
    readonly padding: DirectionalInsets;
    readonly zoom: number;
    readonly bearing: FollowPuckBearing;
    readonly pitch: number;
}

export type ResolvedViewportState<TStyle = unknown> =
    | CameraParameters
    | StyleDefaultRequest<TStyle>
    | OverviewParameters
    | FollowPuckParameters;

export function readSafeArea(source: SafeAreaSource): DirectionalInsets {
    return typeof source === 'function' ? source() : source;
}

/**
 * Map a viewport to the parameters a camera-state engine needs.
 * Returns null for `idle`: nothing should drive the camera, and the safe area is not read.
 */
export function resolveViewportState<TStyle>(
    viewport: Viewport,
    environment: ViewportEnvironment<TStyle>
): ResolvedViewportState<TStyle> | null {
    const mode = viewport.mode;
    if (mode.kind === 'idle') {
        return null;
    }

    const { layoutDirection } = environment;
    const padding = resolvePadding(viewport.insetOptions, layoutDirection, readSafeArea(environment.safeAreaInsets));

    switch (mode.kind) {
    case 'styleDefault':
        return { kind: 'styleDefault', padding, style: environment.style };
    case 'camera': {
        const { center, anchor, zoom, bearing, pitch } = mode.options;
        return { kind: 'camera', center, anchor, zoom, bearing, pitch, padding };
    }
    case 'overview': {
        const options = mode.options;
        return {
            kind: 'overview',
            geometry: options.geometry,
            geometryPadding: resolveGeometryPadding(options.geometryPadding, layoutDirection),
            bearing: options.bearing,
            pitch: options.pitch,
            padding,
            maxZoom: options.maxZoom,
            offset: options.offset,
            animationDuration: 0,
        };
    }
    case 'followPuck': {
        const { zoom, bearing, pitch } = mode.options;
        return { kind: 'followPuck', padding, zoom, bearing, pitch };
    }
    }
}
