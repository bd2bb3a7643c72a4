/**
 * Trip execution domain shared by the API and the worker: record types,
 * status enumerations with their zod schemas, unit-id and date helpers.
 */

export * from './types/index';
export * from './schemas/index';
export * from './utils/index';
