import path from 'path';
import * as THREE from 'three';
import type { Vec3 } from '@mrkjson/markup-core';
import { UNIT_CUBE_PATH } from '../DataFiles';
import { type Axes, loadMesh, saveMesh, StlMesh, transformMesh } from '../formats/StlMesh';

/**
 * A box written as an STL surface mesh, not as markups.
 *
 * Implement `origin` (the corner with the smallest coordinates along every axis)
 *   and `getAxis(index)` for the x, y, z edge vectors.  Edges need not be unit length
 *   or orthogonal.
 */
export abstract class BoxRepresentable {
    readonly kind = 'box';

    /** Set by the last `write`; the unit cube after transformation */
    mesh?: StlMesh;

    abstract get origin(): Readonly<Vec3>;

    abstract getAxis(index: number): Readonly<Vec3>;

    get axes(): Axes {
        return [this.getAxis(0), this.getAxis(1), this.getAxis(2)];
    }

    async write(filePath: string): Promise<boolean> {
        this.mesh = await loadMesh(UNIT_CUBE_PATH);
        return BoxRepresentable.saveGeometry(this.origin, this.axes, filePath, this.mesh);
    }

    static async writeFrom(origin: Readonly<Vec3>, axes: Axes, filePath: string): Promise<boolean> {
        return BoxRepresentable.saveGeometry(origin, axes, filePath, await loadMesh(UNIT_CUBE_PATH));
    }

    /**
     * Corner of a box given by its center: `center - A * [0.5, 0.5, 0.5]`, `A` having
     *   the axes as rows, so each coordinate steps back half the sum of its row.
     *
     * With `scale` every row is normalized first and weighted by `0.5 * scale`
     *   instead of 0.5.
     */
    static centerToOrigin(center: Readonly<Vec3>, axes: Axes, scale?: Readonly<Vec3>): Vec3 {
        const half = scale
            ? new THREE.Vector3(scale[0], scale[1], scale[2]).multiplyScalar(0.5)
            : new THREE.Vector3(0.5, 0.5, 0.5);
        const [x, y, z] = axes.map((a) => {
            const row = new THREE.Vector3(a[0], a[1], a[2]);
            if (scale) row.normalize();
            return row.dot(half);
        });
        return [center[0] - x, center[1] - y, center[2] - z];
    }

    private static saveGeometry(origin: Readonly<Vec3>, axes: Axes, filePath: string, mesh: StlMesh) {
        if (path.resolve(filePath) === path.resolve(UNIT_CUBE_PATH)) {
            throw new Error('Refusing to overwrite the unit cube reference mesh');
        }
        transformMesh(mesh, axes, origin);
        return saveMesh(mesh, filePath);
    }
}

/** A box given directly by its corner and edge vectors */
export class OrientedBox extends BoxRepresentable {
    private readonly corner: Vec3;
    private readonly edges: [Vec3, Vec3, Vec3];

    constructor(origin: Vec3, axes: [Vec3, Vec3, Vec3]) {
        super();
        this.corner = origin;
        this.edges = axes;
    }

    static fromCenter(center: Vec3, axes: [Vec3, Vec3, Vec3], scale?: Vec3): OrientedBox {
        const edges: [Vec3, Vec3, Vec3] = scale
            ? [scaledUnit(axes[0], scale[0]), scaledUnit(axes[1], scale[1]), scaledUnit(axes[2], scale[2])]
            : axes;
        return new OrientedBox(BoxRepresentable.centerToOrigin(center, axes, scale), edges);
    }

    get origin(): Vec3 {
        return this.corner;
    }

    getAxis(index: number): Vec3 {
        if (index < 0 || index > 2) {
            throw new RangeError(`Axis ${index} out of range`);
        }
        return this.edges[index];
    }
}

function scaledUnit(axis: Vec3, length: number): Vec3 {
    const v = new THREE.Vector3(axis[0], axis[1], axis[2]).normalize().multiplyScalar(length);
    return [v.x, v.y, v.z];
}
