import { addEdgeInsets, toDirectionalInsets, toEdgeInsets, withEdgeInset } from './edge-insets';
import type { DirectionalInsets, EdgeInsets, LayoutDirection } from './edge-insets';
import type { InsetOptions } from './viewport';

/**
 * Combine the host's safe area with a viewport's inset options.
 *
 * Order matters: ignored edges are zeroed before the configured insets are added,
 * so ignoring the safe area on an edge never cancels the inset set for it.
 */
export function resolvePadding(
    insetOptions: InsetOptions,
    layoutDirection: LayoutDirection,
    safeAreaInsets: DirectionalInsets
): DirectionalInsets {
    let result = toEdgeInsets(safeAreaInsets, layoutDirection);

    for (const edge of insetOptions.ignoredSafeAreaEdges) {
        result = withEdgeInset(result, edge, 0);
    }

    result = addEdgeInsets(result, insetOptions.insets);

    return toDirectionalInsets(result, layoutDirection);
}

/** Overview geometry padding in screen sides */
export function resolveGeometryPadding(geometryPadding: EdgeInsets, layoutDirection: LayoutDirection): DirectionalInsets {
    return toDirectionalInsets(geometryPadding, layoutDirection);
}
