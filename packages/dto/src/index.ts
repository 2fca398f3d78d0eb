/**
 * Leasehold DTO package public surface.
 * Re-exports stable enums, wire types and reason codes.
 */
export * from './enums';
export * from './reasons';
export * from './types';
