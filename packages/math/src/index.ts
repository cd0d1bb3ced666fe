/**
 * Surety Math public surface. Pure, side-effect free helpers.
 */
export * from './governance'
export * from './payout'
