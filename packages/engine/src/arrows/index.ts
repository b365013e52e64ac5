/**
 * Arrows Module
 *
 * Arrow anchors and placement offsets.
 */

export * from './arrowLocationResolver'
export * from './directionalTuples'
