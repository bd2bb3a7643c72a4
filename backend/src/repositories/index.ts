/**
 * Repository Index
 *
 * Central export point for all repositories.
 */

import type { DatabasePool } from '../config/database';
import { TripRepository } from './trip.repository';
import { TripOrderRepository } from './trip-order.repository';
import { TripExecutionRepository } from './trip-execution.repository';

export { BaseRepository, assertStatus, isUniqueViolation } from './base.repository';
export { TripRepository } from './trip.repository';
export { TripOrderRepository, type OrderStatusFields } from './trip-order.repository';
export { TripExecutionRepository } from './trip-execution.repository';

/**
 * Repository Container
 *
 * Holds all repository instances for a given database pool.
 */
export class RepositoryContainer {
  public readonly trips: TripRepository;
  public readonly orders: TripOrderRepository;
  public readonly executions: TripExecutionRepository;

  constructor(public readonly db: DatabasePool) {
    this.trips = new TripRepository(db);
    this.orders = new TripOrderRepository(db);
    this.executions = new TripExecutionRepository(db);
  }
}

export function createRepositories(db: DatabasePool): RepositoryContainer {
  return new RepositoryContainer(db);
}
