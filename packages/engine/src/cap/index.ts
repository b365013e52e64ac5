/**
 * Beat Engine - CAP
 */

export * from './strategies'
export * from './capGenerator'
export * from './capVerifier'
