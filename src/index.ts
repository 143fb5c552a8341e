export * from './viewport/edge-insets';
export * from './viewport/geometry';
export * from './viewport/viewport';
export * from './viewport/padding-resolver';
export * from './viewport/state-resolver';
export * from './viewport/viewport-state-factory';
export * from './viewport/viewport-animation';
export * from './viewport/viewport-settings';
export * from './viewport/event-bus';
export { useViewport } from './composables/useViewport';
export type { UseViewportOptions, ViewportEngine } from './composables/useViewport';
export { LogHandler } from './utilities/log-handler';
export { LogManager, LogType } from './utilities/log-manager';
export type { ILogMessage, LogMessageCallback } from './utilities/log-manager';
