export { FileObservationSource } from './FileObservationSource';
export { colorToStatus } from './colorMapping';
export type { IObservationSource, ServiceObservation } from './types';
