/**
 * Math public surface. Pure, side-effect free helpers.
 * Export only stable functions via this barrel.
 */
export * from './capacity'
export * from './tip'
export * from './payer'
export * from './epoch'
export * from './amounts'
