/**
 * Overrides Module
 *
 * Store addressing (turns tuple, orientation category), the persisted
 * override store and the interactive actions that write to it.
 */

export * from './keys'
export * from './overrideStore'
export * from './actions'
