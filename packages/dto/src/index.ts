/**
 * DTO package public surface.
 * Re-exports stable enums, reason codes and the chain/submission records. Only items exported here are public.
 */
export * from './enums';
export * from './reasons';
export * from './types';
