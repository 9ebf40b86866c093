import { ServiceStatus } from '../tracking/types';

/**
 * One indicator read from the current frame: the label text next to it and
 * the status its colour maps to.
 */
export interface ServiceObservation {
  readonly rawLabel: string;
  readonly colorState: ServiceStatus;
  readonly observedAt: Date;
}

/**
 * Input port for the sampling pipeline (camera capture, colour masks, OCR).
 * `poll()` is called once per tick; an empty result means nothing was
 * detected, not that services are down. Throwing marks the tick as skipped.
 */
export interface IObservationSource {
  poll(): Promise<ServiceObservation[]>;
}
