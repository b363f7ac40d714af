/**
 * Frame timing: the simulation clock and the render/hold scheduler
 */

export * from './clock';
export { FrameScheduler, crossfadeWeight } from './frame-scheduler';
export type { FrameDecision, SchedulerSettings, SchedulerState } from './frame-scheduler';
