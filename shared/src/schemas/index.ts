export * from './trip.schema';
