import {
    decodeMarkupFile,
    swapCoordinateSystemAll,
    TypeMismatchError,
    type DecodedMarkupFile,
    type Vec3,
} from '@mrkjson/markup-core';
import { readTextFile } from '../util/FileUtil';
import { PointSet } from '../representables/PointRepresentable';
import type { MarkupRepresentable } from '../representables/Representable';

export async function readMarkupFile(filePath: string): Promise<DecodedMarkupFile> {
    return decodeMarkupFile(await readTextFile(filePath));
}

function flatten(points: Vec3[], swapCoordinates: boolean): PointSet {
    return new PointSet(swapCoordinates ? swapCoordinateSystemAll(points) : points);
}

/**
 * All control points of a representable's current document, as a point set.
 * The document is taken as it is; it is not rebuilt first.
 */
export function convert(representable: MarkupRepresentable, swapCoordinates = false): PointSet {
    return flatten(representable.document.points(), swapCoordinates);
}

/**
 * Read a .mrk.json file of any supported kind into a point set.
 * Every control point of every markup is kept, whether or not its markup is complete.
 */
export async function convertFile(filePath: string, swapCoordinates = false): Promise<PointSet> {
    const { document } = await readMarkupFile(filePath);
    return flatten(document.points(), swapCoordinates);
}

/**
 * Points of several representables of one kind, in order.  Each one is rebuilt first.
 * A trailing `true` swaps the coordinate system of the result.
 */
export function concatenate(...representables: MarkupRepresentable[]): PointSet;
export function concatenate(...args: [...MarkupRepresentable[], boolean]): PointSet;
export function concatenate(...args: (MarkupRepresentable | boolean)[]): PointSet {
    const last = args[args.length - 1];
    const swapCoordinates = typeof last === 'boolean' && last;
    const representables = args.filter((a): a is MarkupRepresentable => typeof a !== 'boolean');
    if (representables.length === 0) {
        throw new TypeMismatchError('Nothing to concatenate');
    }
    const kind = representables[0].kind;
    const other = representables.find((r) => r.kind !== kind);
    if (other) {
        throw new TypeMismatchError(`Cannot concatenate ${other.kind} with ${kind} representables`);
    }

    const points: Vec3[] = [];
    for (const r of representables) {
        r.rebuildMarkups();
        points.push(...r.document.points());
    }
    return flatten(points, swapCoordinates);
}

export async function concatenateFiles(filePaths: readonly string[], swapCoordinates = false): Promise<PointSet> {
    const sets = await Promise.all(filePaths.map((f) => convertFile(f)));
    return concatenate(...sets, swapCoordinates);
}
