/**
 * Orientation Module
 *
 * Float resolution and end-orientation rules.
 */

export * from './effectiveMotion'
export * from './orientationCalculator'
