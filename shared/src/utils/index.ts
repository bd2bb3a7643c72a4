export * from './status';
export * from './unit-id';
export * from './date';
