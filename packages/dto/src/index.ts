/**
 * Surety DTO package public surface.
 * Re-exports stable enums and reason codes shared by the ledger server and the SDK.
 */
export * from './enums';
export * from './reasons';
