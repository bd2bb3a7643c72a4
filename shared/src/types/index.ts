export * from './trip';
export * from './trip-order';
export * from './execution';
