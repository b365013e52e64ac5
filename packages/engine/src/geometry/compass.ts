/**
 * Beat Engine - Compass Geometry
 *
 * Pure lookups over the 8-point compass: rotation, reflection, hand paths
 * and the per-grid-mode hand points.
 *
 * Responsibilities:
 * - Step a location around the compass (45°) or around a grid (one hand point)
 * - Reflect locations across the vertical or horizontal axis
 * - Derive the hand path between two locations
 *
 * Philosophy:
 * - Tables are built once and never mutated
 * - A lookup that misses throws InvalidLocation instead of guessing
 */

import { InvalidLocation, beatKeywords } from '../vocabulary'
import type {
  GridMode,
  Handpath,
  Location,
  MirrorAxis,
  RotationDirection,
} from '../vocabulary'

const { locations: loc, rotationDirections: rot, handpaths, gridModes, mirrorAxes } = beatKeywords

// ============================================================================
// Tables
// ============================================================================

/**
 * Compass points in clockwise order, starting north
 */
export const compassOrder: ReadonlyArray<Location> = [
  loc.north,
  loc.northEast,
  loc.east,
  loc.southEast,
  loc.south,
  loc.southWest,
  loc.west,
  loc.northWest,
]

const compassIndex: ReadonlyMap<string, number> = new Map(
  compassOrder.map((location, index) => [location, index]),
)

const handPoints: Readonly<Record<GridMode, ReadonlyArray<Location>>> = {
  [gridModes.diamond]: [loc.north, loc.east, loc.south, loc.west],
  [gridModes.box]: [loc.northEast, loc.southEast, loc.southWest, loc.northWest],
}

const mirrorTables: Readonly<Record<MirrorAxis, ReadonlyMap<Location, Location>>> = {
  [mirrorAxes.vertical]: new Map<Location, Location>([
    [loc.north, loc.north],
    [loc.south, loc.south],
    [loc.east, loc.west],
    [loc.west, loc.east],
    [loc.northEast, loc.northWest],
    [loc.northWest, loc.northEast],
    [loc.southEast, loc.southWest],
    [loc.southWest, loc.southEast],
  ]),
  [mirrorAxes.horizontal]: new Map<Location, Location>([
    [loc.east, loc.east],
    [loc.west, loc.west],
    [loc.north, loc.south],
    [loc.south, loc.north],
    [loc.northEast, loc.southEast],
    [loc.southEast, loc.northEast],
    [loc.northWest, loc.southWest],
    [loc.southWest, loc.northWest],
  ]),
}

// ============================================================================
// Validation
// ============================================================================

export function isLocation(value: unknown): value is Location {
  return typeof value === 'string' && compassIndex.has(value)
}

function indexOf(location: Location, context: string): number {
  const index = compassIndex.get(location)
  if (index === undefined) {
    throw new InvalidLocation(location, context)
  }
  return index
}

function atIndex(index: number): Location {
  return compassOrder[((index % 8) + 8) % 8]
}

// ============================================================================
// Rotation & Reflection
// ============================================================================

/**
 * Step one 45° position around the compass, whatever the grid mode.
 * `no_rot` returns the location unchanged. Use `rotateByHandpath` to step
 * between the hand points of one grid.
 */
export function rotate(location: Location, direction: RotationDirection): Location {
  const index = indexOf(location, 'rotate')
  switch (direction) {
    case rot.clockwise:
      return atIndex(index + 1)
    case rot.counterClockwise:
      return atIndex(index - 1)
    case rot.none:
      return location
  }
}

export function opposite(location: Location): Location {
  return atIndex(indexOf(location, 'opposite') + 4)
}

export function mirror(location: Location, axis: MirrorAxis): Location {
  const mirrored = mirrorTables[axis].get(location)
  if (mirrored === undefined) {
    throw new InvalidLocation(location, `mirror(${axis})`)
  }
  return mirrored
}

/**
 * Swap cw and ccw. Reflecting a motion reverses its rotation.
 */
export function reverseRotation(direction: RotationDirection): RotationDirection {
  switch (direction) {
    case rot.clockwise:
      return rot.counterClockwise
    case rot.counterClockwise:
      return rot.clockwise
    case rot.none:
      return rot.none
  }
}

// ============================================================================
// Grid Modes & Hand Paths
// ============================================================================

export function handPointsFor(gridMode: GridMode): ReadonlyArray<Location> {
  return handPoints[gridMode]
}

/**
 * Grid mode whose hand points include the location (cardinal → diamond)
 */
export function gridModeOf(location: Location): GridMode {
  return indexOf(location, 'gridModeOf') % 2 === 0 ? gridModes.diamond : gridModes.box
}

/**
 * Direction the hand travels from start to end.
 * Only quarter moves have a rotational hand path; 45° moves are not hand paths.
 */
export function handpathOf(start: Location, end: Location): Handpath {
  const delta = (indexOf(end, 'handpath') - indexOf(start, 'handpath') + 8) % 8
  switch (delta) {
    case 0:
      return handpaths.static
    case 2:
      return handpaths.clockwise
    case 4:
      return handpaths.dash
    case 6:
      return handpaths.counterClockwise
    default:
      throw new InvalidLocation(`${start}->${end}`, 'handpath')
  }
}

/**
 * Rotation direction implied by a hand path (none for dash and static)
 */
export function rotationOfHandpath(handpath: Handpath): RotationDirection {
  switch (handpath) {
    case handpaths.clockwise:
      return rot.clockwise
    case handpaths.counterClockwise:
      return rot.counterClockwise
    default:
      return rot.none
  }
}

/**
 * Move a hand point along a hand path: one grid step for rotational paths,
 * across the grid for dash, nowhere for static.
 */
export function rotateByHandpath(location: Location, handpath: Handpath, gridMode: GridMode): Location {
  if (!handPoints[gridMode].includes(location)) {
    throw new InvalidLocation(location, `${gridMode} hand point`)
  }

  switch (handpath) {
    case handpaths.clockwise:
      return rotate(rotate(location, rot.clockwise), rot.clockwise)
    case handpaths.counterClockwise:
      return rotate(rotate(location, rot.counterClockwise), rot.counterClockwise)
    case handpaths.dash:
      return opposite(location)
    case handpaths.static:
      return location
  }
}
