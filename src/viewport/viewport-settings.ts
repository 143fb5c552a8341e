import { reactive, watch } from 'vue';
import { LogHandler } from '@/utilities/log-handler';
import type { LayoutDirection } from './edge-insets';

const SETTINGS_STORAGE_KEY = 'map_viewport_settings';

const log = new LogHandler('ViewportSettings');

/**
 * Viewport settings - persisted to localStorage and restored on load.
 */
export interface ViewportSettings {
    /** Used by the viewport binding when the host does not report a direction */
    defaultLayoutDirection: LayoutDirection;
    /** Seconds, upper bound of the `default` viewport animation */
    defaultMaxAnimationDuration: number;
    /** Re-resolve the current viewport when safe area or layout direction change */
    reapplyOnEnvironmentChange: boolean;
    debugLogging: boolean;
}

const DEFAULT_SETTINGS: ViewportSettings = {
    defaultLayoutDirection: 'leftToRight',
    defaultMaxAnimationDuration: 3.5,
    reapplyOnEnvironmentChange: true,
    debugLogging: false,
};

function isLayoutDirection(value: unknown): value is LayoutDirection {
    return value === 'leftToRight' || value === 'rightToLeft';
}

/** Keep only stored values of the right type, so a stale or hand-edited entry cannot break the defaults */
function sanitize(stored: unknown): Partial<ViewportSettings> {
    if (typeof stored !== 'object' || stored === null) return {};

    const result: Partial<ViewportSettings> = {};
    const entries = new Map<string, unknown>(Object.entries(stored));

    const direction = entries.get('defaultLayoutDirection');
    if (isLayoutDirection(direction)) result.defaultLayoutDirection = direction;

    const duration = entries.get('defaultMaxAnimationDuration');
    if (typeof duration === 'number' && Number.isFinite(duration) && duration >= 0) {
        result.defaultMaxAnimationDuration = duration;
    }

    const reapply = entries.get('reapplyOnEnvironmentChange');
    if (typeof reapply === 'boolean') result.reapplyOnEnvironmentChange = reapply;

    const debug = entries.get('debugLogging');
    if (typeof debug === 'boolean') result.debugLogging = debug;

    return result;
}

/** Load settings from localStorage, merging with defaults */
function loadSettings(): ViewportSettings {
    try {
        const stored = localStorage.getItem(SETTINGS_STORAGE_KEY);
        if (!stored) return { ...DEFAULT_SETTINGS };

        return {
            ...DEFAULT_SETTINGS,
            ...sanitize(JSON.parse(stored)),
        };
    } catch (e) {
        log.warn('Failed to load viewport settings from localStorage: ' + String(e));
        return { ...DEFAULT_SETTINGS };
    }
}

function saveSettings(settings: ViewportSettings): void {
    try {
        localStorage.setItem(SETTINGS_STORAGE_KEY, JSON.stringify(settings));
    } catch (e) {
        log.warn('Failed to save viewport settings to localStorage: ' + String(e));
    }
}

/**
 * Settings manager.
 * - loads from localStorage on init
 * - saves (debounced) when any value changes
 * - exposes reactive state
 */
export class ViewportSettingsManager {
    public readonly state: ViewportSettings;

    private saveTimeoutId: ReturnType<typeof setTimeout> | null = null;

    constructor() {
        this.state = reactive<ViewportSettings>(loadSettings());
        LogHandler.setDebugEnabled(this.state.debugLogging);

        watch(
            () => ({ ...this.state }),
            () => this.debouncedSave(),
            { flush: 'post' }
        );
        watch(
            () => this.state.debugLogging,
            enabled => LogHandler.setDebugEnabled(enabled),
            { flush: 'sync' }
        );
    }

    private debouncedSave(): void {
        if (this.saveTimeoutId !== null) {
            clearTimeout(this.saveTimeoutId);
        }
        this.saveTimeoutId = setTimeout(() => {
            saveSettings(this.state);
            this.saveTimeoutId = null;
        }, 100);
    }

    public resetToDefaults(): void {
        Object.assign(this.state, DEFAULT_SETTINGS);
    }

    public getDefaults(): ViewportSettings {
        return { ...DEFAULT_SETTINGS };
    }
}

let sharedSettings: ViewportSettingsManager | null = null;

/** Shared settings, loaded on first use */
export function getViewportSettings(): ViewportSettingsManager {
    if (sharedSettings === null) {
        sharedSettings = new ViewportSettingsManager();
    }
    return sharedSettings;
}
