import { ControlPoint, Markup, MarkupDocument, swapCoordinateSystemAll, type Vec3 } from '@mrkjson/markup-core';
import {
    curveArrangementSchema,
    documentText,
    MarkupRepresentable,
    parseArrangements,
    printText,
    writeText,
    type PolylineArrangement,
} from './Representable';

/**
 * Geometry shown as one curve markup per point sequence.
 *
 * Implement `curveCount` and `getCurve(index)`; override `isClosed` for closed curves.
 */
export abstract class CurveRepresentable extends MarkupRepresentable {
    readonly kind = 'curve';

    abstract get curveCount(): number;

    abstract getCurve(index: number): readonly Readonly<Vec3>[];

    isClosed(_index: number): boolean {
        return false;
    }

    rebuildMarkups() {
        const markups: Markup[] = [];
        for (let i = 0; i < this.curveCount; ++i) {
            const curve = Markup.curve(this.isClosed(i));
            for (const p of this.getCurve(i)) {
                curve.add(p, i + 1);
            }
            markups.push(curve);
        }
        this.document.replaceMarkups(markups);
    }

    /** One curve markup per point sequence, or null if there are no curves */
    static buildFrom(curves: PolylineArrangement, closed = false): MarkupDocument | null {
        const checked = parseArrangements(curveArrangementSchema, curves, 'curve');
        if (!checked) return null;

        return new MarkupDocument(
            checked.map((points, i) =>
                Markup.curve(
                    closed,
                    points.map((p, j) => ControlPoint.make(j + 1, `OC_${i + 1}`, p[0], p[1], p[2])),
                ),
            ),
        );
    }

    static makeFrom(curves: PolylineArrangement, closed = false): string {
        return documentText(CurveRepresentable.buildFrom(curves, closed));
    }

    static printFrom(curves: PolylineArrangement, out: NodeJS.WritableStream = process.stdout, closed = false) {
        printText(CurveRepresentable.makeFrom(curves, closed), out);
    }

    static writeFrom(curves: PolylineArrangement, filePath: string, closed = false): Promise<boolean> {
        return writeText(CurveRepresentable.makeFrom(curves, closed), filePath);
    }
}

export class CurveSet extends CurveRepresentable {
    curves: Vec3[][];
    closed: boolean[];

    constructor(curves: Vec3[][] = [], closed: boolean[] = []) {
        super();
        this.curves = curves;
        this.closed = closed;
    }

    get curveCount() {
        return this.curves.length;
    }

    getCurve(index: number): Vec3[] {
        if (index < 0 || index >= this.curves.length) {
            throw new RangeError(`Curve ${index} out of range (${this.curves.length} curves)`);
        }
        return this.curves[index];
    }

    isClosed(index: number): boolean {
        return this.closed[index] ?? false;
    }

    swapCoordinateSystem() {
        this.curves = this.curves.map((c) => swapCoordinateSystemAll(c));
    }
}
