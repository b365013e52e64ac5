/**
 * @beatgrid/engine
 *
 * Beat notation on an eight-point compass grid: two props, one per hand,
 * each beat a pair of motions.
 *
 * Philosophy:
 * - Calculators are pure functions over immutable beats
 * - The override store is the only shared mutable state, written through a queue
 * - Every external shape is a zod schema
 *
 * @example
 * ```ts
 * import { startBeatSystem } from '@beatgrid/engine'
 *
 * const { system, halt } = await startBeatSystem({
 *   config: { datasetPath: './letters.json', overrideStorePath: './overrides.json' },
 * })
 * const beat = system.beatEngine.updateMotion(current, 'blue', { turns: 1 })
 * await halt()
 * ```
 */

// ============================================================================
// Vocabulary
// ============================================================================

export * from './vocabulary'

// ============================================================================
// Geometry
// ============================================================================

export * from './geometry'

// ============================================================================
// Orientation
// ============================================================================

export * from './orientation'

// ============================================================================
// Overrides
// ============================================================================

export * from './overrides'

// ============================================================================
// Arrows
// ============================================================================

export * from './arrows'

// ============================================================================
// Letters
// ============================================================================

export * from './letters'

// ============================================================================
// CAP
// ============================================================================

export * from './cap'

// ============================================================================
// Core
// ============================================================================

export * from './core'
