/**
 * Geometry Module
 *
 * Compass rotation and reflection, hand paths, and the position map.
 */

export * from './compass'
export * from './positions'
