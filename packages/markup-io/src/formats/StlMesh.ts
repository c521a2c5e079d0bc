import { promises as fsp } from 'fs';
import * as THREE from 'three';
import { STLExporter } from 'three/examples/jsm/exporters/STLExporter.js';
import { STLLoader } from 'three/examples/jsm/loaders/STLLoader.js';
import type { Vec3 } from '@mrkjson/markup-core';
import { writeFileReported } from '../util/FileUtil';
import { toUint8Array } from '../util/Utils';

export type Axes = readonly [Readonly<Vec3>, Readonly<Vec3>, Readonly<Vec3>];

//
// A triangle surface mesh, as read from / written to STL.
// Triangles are not indexed: every 3 vertices make a facet.
//
export class StlMesh {
    geometry: THREE.BufferGeometry;

    constructor(geometry: THREE.BufferGeometry) {
        this.geometry = geometry;
    }

    /** Flat xyz buffer, 3 floats per vertex */
    get vertices(): Float32Array {
        const attr = this.geometry.getAttribute('position');
        if (!(attr instanceof THREE.BufferAttribute) || !(attr.array instanceof Float32Array)) {
            throw new Error('Mesh has no float vertex positions');
        }
        return attr.array;
    }

    get vertexCount() {
        return this.vertices.length / 3;
    }

    /** Multiply every vertex, as a row vector, by the matrix whose rows are `axes` */
    transform(axes: Axes) {
        const [x, y, z] = axes.map((a) => new THREE.Vector3(a[0], a[1], a[2]));
        this.geometry.applyMatrix4(new THREE.Matrix4().makeBasis(x, y, z));
    }

    translate(offset: Readonly<Vec3>) {
        this.geometry.translate(offset[0], offset[1], offset[2]);
    }

    toBinary(): Uint8Array {
        const exporter = new STLExporter();
        return toUint8Array(exporter.parse(new THREE.Mesh(this.geometry), { binary: true }));
    }
}

export async function loadMesh(filePath: string): Promise<StlMesh> {
    const buf = await fsp.readFile(filePath);
    const data = new ArrayBuffer(buf.byteLength);
    new Uint8Array(data).set(buf);
    return new StlMesh(new STLLoader().parse(data));
}

export function transformMesh(mesh: StlMesh, axes: Axes, origin: Readonly<Vec3>) {
    mesh.transform(axes);
    mesh.translate(origin);
}

/** Write binary STL.  Failure is logged and reported as false. */
export function saveMesh(mesh: StlMesh, filePath: string): Promise<boolean> {
    return writeFileReported(filePath, mesh.toBinary());
}
