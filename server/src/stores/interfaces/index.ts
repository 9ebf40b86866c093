export type { IServiceStateStore } from './IServiceStateStore';
export type { IStatusChangeEventStore } from './IStatusChangeEventStore';
