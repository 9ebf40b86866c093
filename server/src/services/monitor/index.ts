export { MonitorLoop } from './MonitorLoop';
export type { MonitorLoopDeps, MonitorStores } from './MonitorLoop';
export { MonitorEventType } from './types';
export type { MonitorHaltedEvent, MonitorLoopOptions, TickSkippedEvent, TickSummary } from './types';
