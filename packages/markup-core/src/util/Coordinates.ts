import type { Vec3 } from '../types/MarkupTypes';

// Flip between the two anatomical conventions (RAS <-> LPS): negate x and y.
export function swapCoordinateSystem(p: Readonly<Vec3>): Vec3 {
    return [-p[0], -p[1], p[2]];
}

export function swapCoordinateSystemAll(points: readonly Readonly<Vec3>[]): Vec3[] {
    return points.map(swapCoordinateSystem);
}
