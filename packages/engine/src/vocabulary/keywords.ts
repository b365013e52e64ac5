/**
 * Beat Keywords
 *
 * Single source of truth for every literal used by the beat engine.
 * Persisted sequences, the reference dataset and the override store file all
 * speak this vocabulary.
 *
 * Philosophy:
 * - No magic strings anywhere in the codebase
 * - Persisted values are the short lowercase forms (`n`, `cw`, `pro`)
 * - All consumers use these constants
 */

export const beatKeywords = {
  /**
   * The 8 compass points of the grid
   */
  locations: {
    north: 'n',
    northEast: 'ne',
    east: 'e',
    southEast: 'se',
    south: 's',
    southWest: 'sw',
    west: 'w',
    northWest: 'nw',
  },

  /**
   * Prop rotation direction
   */
  rotationDirections: {
    clockwise: 'cw',
    counterClockwise: 'ccw',
    none: 'no_rot',
  },

  /**
   * Prop orientation. `in`/`out` are radial, `clock`/`counter` nonradial.
   */
  orientations: {
    in: 'in',
    out: 'out',
    clock: 'clock',
    counter: 'counter',
  },

  motionTypes: {
    pro: 'pro',
    anti: 'anti',
    static: 'static',
    dash: 'dash',
    float: 'float',
  },

  /**
   * Direction the hand travels around the grid between start and end
   */
  handpaths: {
    clockwise: 'cw_handpath',
    counterClockwise: 'ccw_handpath',
    dash: 'dash',
    static: 'static',
  },

  /**
   * Diamond puts the hands on the cardinal points, box on the diagonals
   */
  gridModes: {
    diamond: 'diamond',
    box: 'box',
  },

  colors: {
    blue: 'blue',
    red: 'red',
  },

  timings: {
    split: 'split',
    together: 'tog',
    none: 'none',
  },

  directions: {
    same: 'same',
    opposite: 'opp',
    none: 'none',
  },

  /**
   * alpha: hands on opposite points, beta: same point, gamma: a quarter apart
   */
  positionFamilies: {
    alpha: 'alpha',
    beta: 'beta',
    gamma: 'gamma',
  },

  mirrorAxes: {
    vertical: 'vertical',
    horizontal: 'horizontal',
  },

  /**
   * CAP variants, in the order generation and verification enumerate them
   */
  capVariants: {
    strictRotated: 'strict_rotated',
    strictMirrored: 'strict_mirrored',
    strictSwapped: 'strict_swapped',
    mirroredSwapped: 'mirrored_swapped',
    rotatedSwapped: 'rotated_swapped',
  },

  /**
   * How much of the final sequence the source beats cover
   */
  capSlices: {
    halved: 'halved',
    quartered: 'quartered',
  },

  /**
   * Prop layer combination at the end of a beat, first level under the grid
   * mode in the override store
   */
  orientationCategories: {
    layer1: 'from_layer1',
    layer2: 'from_layer2',
    layer3Blue1Red2: 'from_layer3_blue1_red2',
    layer3Blue2Red1: 'from_layer3_blue2_red1',
  },

  letterTypes: {
    dualShift: 'Type1',
    shift: 'Type2',
    crossShift: 'Type3',
    dash: 'Type4',
    dualDash: 'Type5',
    static: 'Type6',
  },

  /**
   * Turns value marking a float motion
   */
  turns: {
    float: 'fl',
  },
} as const

/**
 * The alphabet, grouped by letter type
 */
export const letterValues = [
  'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J', 'K',
  'L', 'M', 'N', 'O', 'P', 'Q', 'R', 'S', 'T', 'U', 'V',
  'W', 'X', 'Y', 'Z', 'Σ', 'Δ', 'θ', 'Ω',
  'W-', 'X-', 'Y-', 'Z-', 'Σ-', 'Δ-', 'θ-', 'Ω-',
  'Φ', 'Ψ', 'Λ',
  'Φ-', 'Ψ-', 'Λ-',
  'α', 'β', 'Γ',
] as const

/**
 * Composite names for a (blue location, red location) pair
 */
export const positionKeyValues = [
  'alpha1', 'alpha2', 'alpha3', 'alpha4', 'alpha5', 'alpha6', 'alpha7', 'alpha8',
  'beta1', 'beta2', 'beta3', 'beta4', 'beta5', 'beta6', 'beta7', 'beta8',
  'gamma1', 'gamma2', 'gamma3', 'gamma4', 'gamma5', 'gamma6', 'gamma7', 'gamma8',
  'gamma9', 'gamma10', 'gamma11', 'gamma12', 'gamma13', 'gamma14', 'gamma15', 'gamma16',
] as const

// ============================================================================
// Type Exports (for TypeScript type checking)
// ============================================================================

type ValueOf<T> = T[keyof T]

export type Location = ValueOf<typeof beatKeywords.locations>
export type RotationDirection = ValueOf<typeof beatKeywords.rotationDirections>
export type Orientation = ValueOf<typeof beatKeywords.orientations>
export type MotionType = ValueOf<typeof beatKeywords.motionTypes>
export type Handpath = ValueOf<typeof beatKeywords.handpaths>
export type GridMode = ValueOf<typeof beatKeywords.gridModes>
export type Color = ValueOf<typeof beatKeywords.colors>
export type Timing = ValueOf<typeof beatKeywords.timings>
export type Direction = ValueOf<typeof beatKeywords.directions>
export type PositionFamily = ValueOf<typeof beatKeywords.positionFamilies>
export type MirrorAxis = ValueOf<typeof beatKeywords.mirrorAxes>
export type CapVariant = ValueOf<typeof beatKeywords.capVariants>
export type CapSlice = ValueOf<typeof beatKeywords.capSlices>
export type OrientationCategory = ValueOf<typeof beatKeywords.orientationCategories>
export type LetterType = ValueOf<typeof beatKeywords.letterTypes>
export type FloatTurns = typeof beatKeywords.turns.float
export type Letter = (typeof letterValues)[number]
export type PositionKey = (typeof positionKeyValues)[number]

/**
 * Motion types whose hand travels a quarter of the grid
 */
export type ShiftMotionType = typeof beatKeywords.motionTypes.pro | typeof beatKeywords.motionTypes.anti

/**
 * Motion type after a float has been resolved
 */
export type ConcreteMotionType = Exclude<MotionType, typeof beatKeywords.motionTypes.float>
