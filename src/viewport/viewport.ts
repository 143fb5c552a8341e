import { EDGES, ZERO_EDGE_INSETS, edgeInsetsEqual, edgeSetsEqual, withEdgeInset } from './edge-insets';
import type { Edge, EdgeInsets } from './edge-insets';
import { coordinatesEqual, geometriesEqual, screenPointsEqual, toGeometry } from './geometry';
import type { Coordinate, Geometry, GeometryConvertible, ScreenPoint } from './geometry';

/**
 * Camera settings of a `camera` viewport.
 * An absent field leaves that camera dimension as it is; it never means zero.
 */
export interface CameraOptions {
    /** Geographic coordinate rendered at the midpoint of the map */
    readonly center?: Coordinate;
    /** Screen point about which zoom and bearing are applied. Mutually exclusive with `center`. */
    readonly anchor?: ScreenPoint;
    readonly zoom?: number;
    /** Degrees clockwise from true north */
    readonly bearing?: number;
    /** Degrees toward the horizon, 0 is top-down */
    readonly pitch?: number;
}

export interface OverviewOptions {
    readonly geometry: Geometry;
    readonly bearing: number;
    readonly pitch: number;
    /**
     * Extra padding added around the geometry while fitting it.
     * Not the same as the viewport insets, which offset the whole viewport.
     */
    readonly geometryPadding: EdgeInsets;
    readonly maxZoom?: number;
    /** Center of the fitted bounds relative to the map's center, in screen points */
    readonly offset?: ScreenPoint;
}

/** Where a follow-puck camera takes its bearing from */
export type FollowPuckBearing =
    | { readonly kind: 'constant'; readonly degrees: number }
    /** live device heading */
    | { readonly kind: 'heading' }
    /** live direction of travel */
    | { readonly kind: 'course' };

export const FollowPuckBearing = Object.freeze({
    constant(degrees: number): FollowPuckBearing {
        return { kind: 'constant', degrees };
    },
    heading: Object.freeze<FollowPuckBearing>({ kind: 'heading' }),
    course: Object.freeze<FollowPuckBearing>({ kind: 'course' }),
});

export interface FollowPuckOptions {
    readonly zoom: number;
    readonly bearing: FollowPuckBearing;
    readonly pitch: number;
}

export type ViewportMode =
    | { readonly kind: 'idle' }
    | { readonly kind: 'styleDefault' }
    | { readonly kind: 'camera'; readonly options: CameraOptions }
    | { readonly kind: 'overview'; readonly options: OverviewOptions }
    | { readonly kind: 'followPuck'; readonly options: FollowPuckOptions };

export type ViewportModeKind = ViewportMode['kind'];

/** Insets applied on top of the safe area. Not used by `idle`. */
export interface InsetOptions {
    readonly insets: EdgeInsets;
    /** Edges whose safe-area contribution is dropped from the resulting padding */
    readonly ignoredSafeAreaEdges: ReadonlySet<Edge>;
}

export interface OverviewParams {
    bearing?: number;
    pitch?: number;
    geometryPadding?: EdgeInsets;
    maxZoom?: number;
    offset?: ScreenPoint;
}

export interface FollowPuckParams {
    bearing?: FollowPuckBearing;
    pitch?: number;
}

const DEFAULT_INSET_OPTIONS: InsetOptions = Object.freeze({
    insets: ZERO_EDGE_INSETS,
    ignoredSafeAreaEdges: new Set<Edge>(),
});

/**
 * Declarative description of how the map camera should be positioned.
 *
 * Exactly one mode is active:
 * - `idle`: the user drives the camera, nothing is installed.
 * - `styleDefault`: camera taken from the active style.
 * - `camera`: explicit center / anchor / zoom / bearing / pitch.
 * - `overview`: fit a geometry at the smallest zoom that shows it.
 * - `followPuck`: track the user location indicator.
 *
 * Values are immutable. Inset operations return a new Viewport.
 * Only configured values can be read back; the live camera belongs to the engine.
 */
export class Viewport {
    public readonly mode: ViewportMode;
    public readonly insetOptions: InsetOptions;

    private constructor(mode: ViewportMode, insetOptions: InsetOptions = DEFAULT_INSET_OPTIONS) {
        this.mode = mode;
        this.insetOptions = insetOptions;
        Object.freeze(this);
    }

    public static idle(): Viewport {
        return new Viewport({ kind: 'idle' });
    }

    public static styleDefault(): Viewport {
        return new Viewport({ kind: 'styleDefault' });
    }

    public static camera(options: CameraOptions = {}): Viewport {
        const { center, anchor, zoom, bearing, pitch } = options;
        return new Viewport({
            kind: 'camera',
            options: Object.freeze({
                center: center && Object.freeze({ ...center }),
                anchor: anchor && Object.freeze({ ...anchor }),
                zoom,
                bearing,
                pitch,
            }),
        });
    }

    public static overview(geometry: GeometryConvertible, params: OverviewParams = {}): Viewport {
        return new Viewport({
            kind: 'overview',
            options: Object.freeze({
                geometry: toGeometry(geometry),
                bearing: params.bearing ?? 0,
                pitch: params.pitch ?? 0,
                geometryPadding: Object.freeze({ ...(params.geometryPadding ?? ZERO_EDGE_INSETS) }),
                maxZoom: params.maxZoom,
                offset: params.offset && Object.freeze({ ...params.offset }),
            }),
        });
    }

    public static followPuck(zoom: number, params: FollowPuckParams = {}): Viewport {
        return new Viewport({
            kind: 'followPuck',
            options: Object.freeze({
                zoom,
                bearing: params.bearing ?? FollowPuckBearing.constant(0),
                pitch: params.pitch ?? 0,
            }),
        });
    }

    /**
     * Replace the whole inset configuration.
     * The insets are added to the safe area, except on the edges in `ignoringSafeArea`.
     */
    public insetBy(insets: EdgeInsets, ignoringSafeArea: Iterable<Edge> = []): Viewport {
        return new Viewport(this.mode, Object.freeze({
            insets: Object.freeze({ ...insets }),
            ignoredSafeAreaEdges: new Set(ignoringSafeArea),
        }));
    }

    /**
     * Set the inset of the given edges, keeping everything else.
     * Can be chained to configure different edges.
     */
    public insetEdges(edges: Iterable<Edge>, length: number, ignoringSafeArea = false): Viewport {
        const selected = new Set(edges);
        let insets = this.insetOptions.insets;
        const ignored = new Set(this.insetOptions.ignoredSafeAreaEdges);

        for (const edge of EDGES) {
            if (!selected.has(edge)) continue;
            insets = withEdgeInset(insets, edge, length);
            if (ignoringSafeArea) {
                ignored.add(edge);
            } else {
                ignored.delete(edge);
            }
        }

        return new Viewport(this.mode, Object.freeze({ insets, ignoredSafeAreaEdges: ignored }));
    }

    public get isIdle(): boolean {
        return this.mode.kind === 'idle';
    }

    public get isStyleDefault(): boolean {
        return this.mode.kind === 'styleDefault';
    }

    /** Camera settings, when this is a `camera` viewport */
    public get camera(): CameraOptions | undefined {
        return this.mode.kind === 'camera' ? this.mode.options : undefined;
    }

    public get overview(): OverviewOptions | undefined {
        return this.mode.kind === 'overview' ? this.mode.options : undefined;
    }

    public get followPuck(): FollowPuckOptions | undefined {
        return this.mode.kind === 'followPuck' ? this.mode.options : undefined;
    }

    public equals(other: Viewport): boolean {
        if (this === other) return true;
        return modesEqual(this.mode, other.mode)
            && edgeInsetsEqual(this.insetOptions.insets, other.insetOptions.insets)
            && edgeSetsEqual(this.insetOptions.ignoredSafeAreaEdges, other.insetOptions.ignoredSafeAreaEdges);
    }
}

function modesEqual(a: ViewportMode, b: ViewportMode): boolean {
    switch (a.kind) {
    case 'idle':
    case 'styleDefault':
        return b.kind === a.kind;
    case 'camera':
        return b.kind === 'camera' && cameraOptionsEqual(a.options, b.options);
    case 'overview':
        return b.kind === 'overview' && overviewOptionsEqual(a.options, b.options);
    case 'followPuck':
        return b.kind === 'followPuck' && followPuckOptionsEqual(a.options, b.options);
    }
}

function cameraOptionsEqual(a: CameraOptions, b: CameraOptions): boolean {
    return coordinatesEqual(a.center, b.center)
        && screenPointsEqual(a.anchor, b.anchor)
        && a.zoom === b.zoom
        && a.bearing === b.bearing
        && a.pitch === b.pitch;
}

function overviewOptionsEqual(a: OverviewOptions, b: OverviewOptions): boolean {
    return geometriesEqual(a.geometry, b.geometry)
        && a.bearing === b.bearing
        && a.pitch === b.pitch
        && edgeInsetsEqual(a.geometryPadding, b.geometryPadding)
        && a.maxZoom === b.maxZoom
        && screenPointsEqual(a.offset, b.offset);
}

export function followPuckBearingsEqual(a: FollowPuckBearing, b: FollowPuckBearing): boolean {
    if (a.kind === 'constant') {
        return b.kind === 'constant' && a.degrees === b.degrees;
    }
    return a.kind === b.kind;
}

function followPuckOptionsEqual(a: FollowPuckOptions, b: FollowPuckOptions): boolean {
    return a.zoom === b.zoom
        && followPuckBearingsEqual(a.bearing, b.bearing)
        && a.pitch === b.pitch;
}
