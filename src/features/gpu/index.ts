/**
 * GPU Frame Graph
 */

export * from './resources';
export * from './graph';
export * from './backend';

export { FrameDriver, DEFAULT_SURFACE_NAME } from './runtime/frame-driver';
export type { BuildFrame, FrameDriverOptions, FrameOutcome } from './runtime/frame-driver';

export { createFrameStatsStore, FRAME_HISTORY_SIZE } from './stores/frame-stats-store';
export type { FrameStats, FrameStatsStore } from './stores/frame-stats-store';
