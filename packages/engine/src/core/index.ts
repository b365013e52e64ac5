/**
 * Beat Engine - Core
 */

export * from './beatEngine'
export * from './resources'
