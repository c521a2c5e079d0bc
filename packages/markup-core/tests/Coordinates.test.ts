import { describe, it, expect } from 'vitest';

import type { Vec3 } from '../src/types/MarkupTypes';
import { swapCoordinateSystem, swapCoordinateSystemAll } from '../src/util/Coordinates';

describe('swapCoordinateSystem', () => {
    it('negates x and y only', () => {
        expect(swapCoordinateSystem([1, 2, 3])).toEqual([-1, -2, 3]);
        expect(swapCoordinateSystem([-4.25, 0.5, -6])).toEqual([4.25, -0.5, -6]);
    });

    it('returns the original coordinates when applied twice', () => {
        const points: Vec3[] = [
            [0.1, 0.2, 0.3],
            [-123.456, 7.89e-5, 1e10],
            [Number.MAX_VALUE, -Number.MIN_VALUE, 42],
        ];
        expect(swapCoordinateSystemAll(swapCoordinateSystemAll(points))).toEqual(points);
    });

    it('does not modify its input', () => {
        const p: Vec3 = [1, 2, 3];
        swapCoordinateSystem(p);
        expect(p).toEqual([1, 2, 3]);
    });
});
