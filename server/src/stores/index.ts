import { Database } from 'better-sqlite3';
import type { IServiceStateStore } from './interfaces/IServiceStateStore';
import type { IStatusChangeEventStore } from './interfaces/IStatusChangeEventStore';
import { ServiceStateStore } from './impl/ServiceStateStore';
import { StatusChangeEventStore } from './impl/StatusChangeEventStore';

/**
 * Central registry providing access to all stores of one database.
 */
export class StoreRegistry {
  public readonly serviceStates: IServiceStateStore;
  public readonly statusChangeEvents: IStatusChangeEventStore;

  private constructor(database: Database) {
    this.serviceStates = new ServiceStateStore(database);
    this.statusChangeEvents = new StatusChangeEventStore(database);
  }

  static create(database: Database): StoreRegistry {
    return new StoreRegistry(database);
  }
}

export type { IServiceStateStore, IStatusChangeEventStore } from './interfaces';
