/**
 * Unit tests for viewport settings and the animation descriptors that read them.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { LogHandler } from '@/utilities/log-handler';
import { ViewportAnimation, durationOf } from '@/viewport/viewport-animation';
import { ViewportSettingsManager, getViewportSettings } from '@/viewport/viewport-settings';

const STORAGE_KEY = 'map_viewport_settings';

describe('ViewportSettingsManager', () => {
    afterEach(() => {
        localStorage.removeItem(STORAGE_KEY);
        getViewportSettings().resetToDefaults();
    });

    it('should start from the defaults', () => {
        expect(new ViewportSettingsManager().state).toEqual({
            defaultLayoutDirection: 'leftToRight',
            defaultMaxAnimationDuration: 3.5,
            reapplyOnEnvironmentChange: true,
            debugLogging: false,
        });
    });

    it('should merge stored values over the defaults', () => {
        localStorage.setItem(STORAGE_KEY, JSON.stringify({ defaultLayoutDirection: 'rightToLeft', debugLogging: true }));

        const settings = new ViewportSettingsManager();

        expect(settings.state.defaultLayoutDirection).toBe('rightToLeft');
        expect(settings.state.debugLogging).toBe(true);
        expect(settings.state.defaultMaxAnimationDuration).toBe(3.5);
    });

    it('should drop stored values of the wrong type', () => {
        localStorage.setItem(STORAGE_KEY, JSON.stringify({
            defaultLayoutDirection: 'diagonal',
            defaultMaxAnimationDuration: -1,
            reapplyOnEnvironmentChange: 'yes',
        }));

        expect(new ViewportSettingsManager().state).toEqual(new ViewportSettingsManager().getDefaults());
    });

    it('should fall back to the defaults for unreadable storage', () => {
        localStorage.setItem(STORAGE_KEY, '{not json');

        expect(new ViewportSettingsManager().state.defaultMaxAnimationDuration).toBe(3.5);
    });

    it('should turn debug output on and off with the setting', () => {
        getViewportSettings().state.debugLogging = true;
        expect(LogHandler.getLogManager().debugEnabled).toBe(true);

        getViewportSettings().state.debugLogging = false;
        expect(LogHandler.getLogManager().debugEnabled).toBe(false);
    });

    it('should not load settings until they are first used', async () => {
        vi.resetModules();
        const getItem = vi.spyOn(Storage.prototype, 'getItem');

        const fresh = await import('@/index');
        expect(fresh.Viewport.camera({ zoom: 4 }).camera?.zoom).toBe(4);
        expect(getItem).not.toHaveBeenCalled();

        expect(fresh.getViewportSettings()).toBe(fresh.getViewportSettings());
        expect(getItem).toHaveBeenCalledTimes(1);
        expect(getItem).toHaveBeenCalledWith(STORAGE_KEY);
        getItem.mockRestore();
    });

    it('should restore defaults', () => {
        getViewportSettings().state.defaultMaxAnimationDuration = 1;

        getViewportSettings().resetToDefaults();

        expect(getViewportSettings().state.defaultMaxAnimationDuration).toBe(3.5);
    });
});

describe('ViewportAnimation', () => {
    afterEach(() => {
        getViewportSettings().resetToDefaults();
    });

    it('should take the default max duration from the settings', () => {
        expect(ViewportAnimation.default()).toEqual({ kind: 'default', maxDuration: 3.5 });

        getViewportSettings().state.defaultMaxAnimationDuration = 2;

        expect(ViewportAnimation.default()).toEqual({ kind: 'default', maxDuration: 2 });
        expect(ViewportAnimation.default(1)).toEqual({ kind: 'default', maxDuration: 1 });
    });

    it('should report durations', () => {
        expect(durationOf(ViewportAnimation.immediate)).toBe(0);
        expect(durationOf(ViewportAnimation.default(4))).toBe(4);
        expect(durationOf(ViewportAnimation.fly())).toBeUndefined();
        expect(durationOf(ViewportAnimation.fly(1.5))).toBe(1.5);
        expect(durationOf(ViewportAnimation.easeInOut(0.8))).toBe(0.8);
        expect(durationOf(ViewportAnimation.linear(2))).toBe(2);
    });
});
