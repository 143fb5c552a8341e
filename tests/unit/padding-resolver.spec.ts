/**
 * Unit tests for combining safe area and viewport insets into padding.
 */

import { describe, it, expect } from 'vitest';
import { EdgeSet, directionalInsets, edgeInsets } from '@/viewport/edge-insets';
import { resolveGeometryPadding, resolvePadding } from '@/viewport/padding-resolver';
import { Viewport } from '@/viewport/viewport';

describe('resolvePadding', () => {
    const safeArea = directionalInsets({ top: 20, left: 0, bottom: 34, right: 0 });

    it('should use the safe area as is when no insets are configured', () => {
        const padding = resolvePadding(Viewport.styleDefault().insetOptions, 'leftToRight', safeArea);

        expect(padding).toEqual({ top: 20, left: 0, bottom: 34, right: 0 });
    });

    it('should add configured insets on top of the safe area', () => {
        const viewport = Viewport.styleDefault().insetEdges(['top'], 10);

        expect(resolvePadding(viewport.insetOptions, 'leftToRight', safeArea).top).toBe(30);
    });

    it('should zero an ignored edge before adding its inset', () => {
        const viewport = Viewport.styleDefault().insetEdges(['top'], 10, true);

        expect(resolvePadding(viewport.insetOptions, 'leftToRight', safeArea)).toEqual({
            top: 10, left: 0, bottom: 34, right: 0,
        });
    });

    it('should drop the safe area on ignored edges that have no inset', () => {
        const viewport = Viewport.camera().insetBy(edgeInsets(), EdgeSet.vertical);

        expect(resolvePadding(viewport.insetOptions, 'leftToRight', safeArea)).toEqual({
            top: 0, left: 0, bottom: 0, right: 0,
        });
    });

    it('should place a leading inset on the left in left-to-right layout', () => {
        const sides = directionalInsets({ left: 3, right: 5 });
        const viewport = Viewport.camera().insetEdges(['leading'], 7);

        expect(resolvePadding(viewport.insetOptions, 'leftToRight', sides)).toEqual({
            top: 0, left: 10, bottom: 0, right: 5,
        });
    });

    it('should place a leading inset on the right in right-to-left layout', () => {
        const sides = directionalInsets({ left: 3, right: 5 });
        const viewport = Viewport.camera().insetEdges(['leading'], 7);

        expect(resolvePadding(viewport.insetOptions, 'rightToLeft', sides)).toEqual({
            top: 0, left: 3, bottom: 0, right: 12,
        });
    });

    it('should ignore the safe area on the side the trailing edge occupies', () => {
        const sides = directionalInsets({ left: 44, right: 44 });
        const viewport = Viewport.camera().insetEdges(['trailing'], 0, true);

        expect(resolvePadding(viewport.insetOptions, 'leftToRight', sides)).toEqual({
            top: 0, left: 44, bottom: 0, right: 0,
        });
        expect(resolvePadding(viewport.insetOptions, 'rightToLeft', sides)).toEqual({
            top: 0, left: 0, bottom: 0, right: 44,
        });
    });
});

describe('resolveGeometryPadding', () => {
    it('should convert geometry padding with the layout direction', () => {
        const padding = edgeInsets({ top: 1, leading: 2, bottom: 3, trailing: 4 });

        expect(resolveGeometryPadding(padding, 'leftToRight')).toEqual({ top: 1, left: 2, bottom: 3, right: 4 });
        expect(resolveGeometryPadding(padding, 'rightToLeft')).toEqual({ top: 1, left: 4, bottom: 3, right: 2 });
    });
});
