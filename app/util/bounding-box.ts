export type BoundingBox = [number, number, number, number];

export type Ordinate = 'west' | 'south' | 'east' | 'north';

const ordinates: Ordinate[] = ['west', 'south', 'east', 'north'];

/**
 * Determine whether or not a box crosses the antimeridian
 *
 * @param box - a box in `[W,S,E,N]` format
 * @returns true if the box crosses the antimeridian, false otherwise
 */
export function crossesAntimeridian(box: BoundingBox): boolean {
  // true if W > E
  return box[0] > box[2];
}

/**
 * Returns true if the southern edge of the box lies north of its northern edge
 *
 * @param box - a box in `[W,S,E,N]` format
 */
export function hasInvertedLatitudes(box: BoundingBox): boolean {
  return box[1] > box[3];
}

/**
 * Lists the edges of a box that fall outside of [-180, 180] longitude or [-90, 90] latitude
 *
 * @param box - a box in `[W,S,E,N]` format
 * @returns the names of the out of range edges, in `[W,S,E,N]` order
 */
export function outOfRangeOrdinates(box: BoundingBox): Ordinate[] {
  return ordinates.filter((name, i) => {
    const limit = i % 2 === 0 ? 180 : 90;
    return !Number.isFinite(box[i]) || Math.abs(box[i]) > limit;
  });
}
