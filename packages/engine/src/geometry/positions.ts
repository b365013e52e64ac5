/**
 * Beat Engine - Position Map
 *
 * A position names where both hands are: blue location + red location.
 * alpha: opposite points, beta: same point, gamma: a quarter apart.
 */

import { InvalidLocation, beatKeywords } from '../vocabulary'
import type { Location, MirrorAxis, PositionFamily, PositionKey } from '../vocabulary'
import { mirror } from './compass'

const { locations: loc, positionFamilies } = beatKeywords

// [blue, red, position]
const positionEntries: ReadonlyArray<readonly [Location, Location, PositionKey]> = [
  [loc.south, loc.north, 'alpha1'],
  [loc.southWest, loc.northEast, 'alpha2'],
  [loc.west, loc.east, 'alpha3'],
  [loc.northWest, loc.southEast, 'alpha4'],
  [loc.north, loc.south, 'alpha5'],
  [loc.northEast, loc.southWest, 'alpha6'],
  [loc.east, loc.west, 'alpha7'],
  [loc.southEast, loc.northWest, 'alpha8'],

  [loc.north, loc.north, 'beta1'],
  [loc.northEast, loc.northEast, 'beta2'],
  [loc.east, loc.east, 'beta3'],
  [loc.southEast, loc.southEast, 'beta4'],
  [loc.south, loc.south, 'beta5'],
  [loc.southWest, loc.southWest, 'beta6'],
  [loc.west, loc.west, 'beta7'],
  [loc.northWest, loc.northWest, 'beta8'],

  // red a quarter clockwise of blue
  [loc.west, loc.north, 'gamma1'],
  [loc.northWest, loc.northEast, 'gamma2'],
  [loc.north, loc.east, 'gamma3'],
  [loc.northEast, loc.southEast, 'gamma4'],
  [loc.east, loc.south, 'gamma5'],
  [loc.southEast, loc.southWest, 'gamma6'],
  [loc.south, loc.west, 'gamma7'],
  [loc.southWest, loc.northWest, 'gamma8'],

  // red a quarter counter-clockwise of blue
  [loc.east, loc.north, 'gamma9'],
  [loc.southEast, loc.northEast, 'gamma10'],
  [loc.south, loc.east, 'gamma11'],
  [loc.southWest, loc.southEast, 'gamma12'],
  [loc.west, loc.south, 'gamma13'],
  [loc.northWest, loc.southWest, 'gamma14'],
  [loc.north, loc.west, 'gamma15'],
  [loc.northEast, loc.northWest, 'gamma16'],
]

const pairKey = (blue: Location, red: Location) => `${blue}|${red}`

const positionByPair: ReadonlyMap<string, PositionKey> = new Map(
  positionEntries.map(([blue, red, position]) => [pairKey(blue, red), position]),
)

const locationsByPosition: ReadonlyMap<PositionKey, { blue: Location; red: Location }> = new Map(
  positionEntries.map(([blue, red, position]) => [position, { blue, red }]),
)

/**
 * Composite position name for a (blue, red) location pair
 */
export function combine(blue: Location, red: Location): PositionKey {
  const position = positionByPair.get(pairKey(blue, red))
  if (position === undefined) {
    throw new InvalidLocation(`${blue}|${red}`, 'position map')
  }
  return position
}

export function positionLocations(position: PositionKey): { blue: Location; red: Location } {
  const locations = locationsByPosition.get(position)
  if (locations === undefined) {
    throw new InvalidLocation(position, 'position map')
  }
  return locations
}

/**
 * Family of a position, i.e. its name without the numeric suffix
 */
export function positionFamily(position: PositionKey): PositionFamily {
  if (position.startsWith(positionFamilies.alpha)) return positionFamilies.alpha
  if (position.startsWith(positionFamilies.beta)) return positionFamilies.beta
  return positionFamilies.gamma
}

export function mirrorPosition(position: PositionKey, axis: MirrorAxis): PositionKey {
  const { blue, red } = positionLocations(position)
  return combine(mirror(blue, axis), mirror(red, axis))
}
