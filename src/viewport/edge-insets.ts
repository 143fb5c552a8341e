/**
 * Edge and inset model.
 *
 * Two inset shapes are in play:
 *
 * - EdgeInsets: abstract, direction-independent (top / leading / bottom / trailing).
 *   This is what callers configure on a Viewport.
 * - DirectionalInsets: concrete screen sides (top / left / bottom / right).
 *   This is what the host supplies as safe area and what the camera engine consumes.
 *
 * The layout direction decides which side `leading` and `trailing` land on.
 */

export type LayoutDirection = 'leftToRight' | 'rightToLeft';

/** Direction-independent edge name */
export type Edge = 'top' | 'leading' | 'bottom' | 'trailing';

/** Concrete screen side */
export type Side = 'top' | 'left' | 'bottom' | 'right';

export interface EdgeInsets {
    readonly top: number;
    readonly leading: number;
    readonly bottom: number;
    readonly trailing: number;
}

export interface DirectionalInsets {
    readonly top: number;
    readonly left: number;
    readonly bottom: number;
    readonly right: number;
}

export const ZERO_EDGE_INSETS: EdgeInsets = Object.freeze({ top: 0, leading: 0, bottom: 0, trailing: 0 });

export const ZERO_DIRECTIONAL_INSETS: DirectionalInsets = Object.freeze({ top: 0, left: 0, bottom: 0, right: 0 });

/** All edges in a stable order */
export const EDGES: readonly Edge[] = Object.freeze(['top', 'leading', 'bottom', 'trailing']);

/**
 * Edge -> EdgeInsets field.
 * Everything that reads or writes the inset of a named edge goes through this table.
 */
export const EDGE_TO_INSET_KEY: Readonly<Record<Edge, keyof EdgeInsets>> = Object.freeze({
    top: 'top',
    leading: 'leading',
    bottom: 'bottom',
    trailing: 'trailing',
});

/** Common edge sets */
export const EdgeSet = Object.freeze({
    none: Object.freeze<Edge[]>([]),
    all: EDGES,
    horizontal: Object.freeze<Edge[]>(['leading', 'trailing']),
    vertical: Object.freeze<Edge[]>(['top', 'bottom']),
});

/** Map an abstract edge to the screen side it occupies in the given layout direction */
export function resolveEdge(edge: Edge, layoutDirection: LayoutDirection): Side {
    switch (edge) {
    case 'top':
        return 'top';
    case 'bottom':
        return 'bottom';
    case 'leading':
        return layoutDirection === 'leftToRight' ? 'left' : 'right';
    case 'trailing':
        return layoutDirection === 'leftToRight' ? 'right' : 'left';
    }
}

/** Read the inset of one edge */
export function edgeInset(insets: EdgeInsets, edge: Edge): number {
    return insets[EDGE_TO_INSET_KEY[edge]];
}

/** Copy of `insets` with one edge replaced */
export function withEdgeInset(insets: EdgeInsets, edge: Edge, value: number): EdgeInsets {
    return { ...insets, [EDGE_TO_INSET_KEY[edge]]: value };
}

/** Directional (screen) insets -> abstract insets */
export function toEdgeInsets(insets: DirectionalInsets, layoutDirection: LayoutDirection): EdgeInsets {
    let result = ZERO_EDGE_INSETS;
    for (const edge of EDGES) {
        result = withEdgeInset(result, edge, insets[resolveEdge(edge, layoutDirection)]);
    }
    return result;
}

/** Abstract insets -> directional (screen) insets */
export function toDirectionalInsets(insets: EdgeInsets, layoutDirection: LayoutDirection): DirectionalInsets {
    const result: Record<Side, number> = { top: 0, left: 0, bottom: 0, right: 0 };
    for (const edge of EDGES) {
        result[resolveEdge(edge, layoutDirection)] = edgeInset(insets, edge);
    }
    return result;
}

/** Field-wise sum */
export function addEdgeInsets(a: EdgeInsets, b: EdgeInsets): EdgeInsets {
    return {
        top: a.top + b.top,
        leading: a.leading + b.leading,
        bottom: a.bottom + b.bottom,
        trailing: a.trailing + b.trailing,
    };
}

/** Build abstract insets, missing edges are zero */
export function edgeInsets(values: Partial<EdgeInsets> = {}): EdgeInsets {
    return { ...ZERO_EDGE_INSETS, ...values };
}

/** Build directional insets, missing sides are zero */
export function directionalInsets(values: Partial<DirectionalInsets> = {}): DirectionalInsets {
    return { ...ZERO_DIRECTIONAL_INSETS, ...values };
}

export function edgeInsetsEqual(a: EdgeInsets, b: EdgeInsets): boolean {
    return a.top === b.top
        && a.leading === b.leading
        && a.bottom === b.bottom
        && a.trailing === b.trailing;
}

export function directionalInsetsEqual(a: DirectionalInsets, b: DirectionalInsets): boolean {
    return a.top === b.top
        && a.left === b.left
        && a.bottom === b.bottom
        && a.right === b.right;
}

export function edgeSetsEqual(a: ReadonlySet<Edge>, b: ReadonlySet<Edge>): boolean {
    if (a.size !== b.size) return false;
    for (const edge of a) {
        if (!b.has(edge)) return false;
    }
    return true;
}
