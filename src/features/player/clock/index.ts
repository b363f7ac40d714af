export { TimeSource } from './time-source';
export type { TimeSourceConfig, TimeState } from './time-source';
