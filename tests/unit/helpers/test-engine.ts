import { vi } from 'vitest';
import type { ViewportEngine } from '@/composables/useViewport';
import type {
    CameraParameters,
    FollowPuckParameters,
    OverviewParameters,
    ResolvedViewportState,
    StyleDefaultRequest,
} from '@/viewport/state-resolver';
import type { ViewportAnimation } from '@/viewport/viewport-animation';

/** Stand-in engine state: remembers which constructor built it and from what */
export interface TestEngineState {
    built: ResolvedViewportState['kind'];
    from: ResolvedViewportState;
}

/**
 * In-process camera-state engine. Every method is a vi.fn spy so tests can
 * assert which constructor ran and what was installed.
 */
export function createTestEngine() {
    return {
        makeCameraState: vi.fn((parameters: CameraParameters): TestEngineState => ({ built: 'camera', from: parameters })),
        makeStyleDefaultState: vi.fn((request: StyleDefaultRequest): TestEngineState => ({ built: 'styleDefault', from: request })),
        makeOverviewState: vi.fn((parameters: OverviewParameters): TestEngineState => ({ built: 'overview', from: parameters })),
        makeFollowPuckState: vi.fn((parameters: FollowPuckParameters): TestEngineState => ({ built: 'followPuck', from: parameters })),
        idle: vi.fn((): void => undefined),
        transition: vi.fn((_state: TestEngineState, _animation: ViewportAnimation | null): void => undefined),
    } satisfies ViewportEngine<TestEngineState>;
}

export type TestEngine = ReturnType<typeof createTestEngine>;
