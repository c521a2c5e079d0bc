import { ControlPoint, Markup, MarkupDocument, swapCoordinateSystemAll, type Vec3 } from '@mrkjson/markup-core';
import {
    documentText,
    MarkupRepresentable,
    parseArrangements,
    pointArrangementSchema,
    printText,
    writeText,
    type PointArrangement,
} from './Representable';

/**
 * Geometry shown as a single point list (fiducial) markup.
 *
 * Implement `pointCount` and `getPoint(index)`.
 *
 * Example:
 *   PointRepresentable.printFrom([
 *       [1.0, 0.0, 0.0],
 *       [2.0, 0.0, 0.0],
 *   ]);
 */
export abstract class PointRepresentable extends MarkupRepresentable {
    readonly kind = 'point';

    abstract get pointCount(): number;

    /** Point at 0-based `index` */
    abstract getPoint(index: number): Readonly<Vec3>;

    rebuildMarkups() {
        const markup = Markup.point();
        for (let i = 0; i < this.pointCount; ++i) {
            markup.add(this.getPoint(i), i + 1);
        }
        this.document.replaceMarkups([markup]);
    }

    /** One point markup, or null if there are no points */
    static buildFrom(points: PointArrangement): MarkupDocument | null {
        const checked = parseArrangements(pointArrangementSchema, points, 'point');
        if (!checked) return null;

        return new MarkupDocument([
            Markup.point(checked.map((p, i) => ControlPoint.make(i + 1, `P_${i + 1}`, p[0], p[1], p[2]))),
        ]);
    }

    static makeFrom(points: PointArrangement): string {
        return documentText(PointRepresentable.buildFrom(points));
    }

    static printFrom(points: PointArrangement, out: NodeJS.WritableStream = process.stdout) {
        printText(PointRepresentable.makeFrom(points), out);
    }

    static writeFrom(points: PointArrangement, filePath: string): Promise<boolean> {
        return writeText(PointRepresentable.makeFrom(points), filePath);
    }
}

/** Points held in memory; what conversions produce */
export class PointSet extends PointRepresentable {
    points: Vec3[];

    constructor(points: Vec3[] = []) {
        super();
        this.points = points;
    }

    get pointCount() {
        return this.points.length;
    }

    getPoint(index: number): Vec3 {
        if (index < 0 || index >= this.points.length) {
            throw new RangeError(`Point ${index} out of range (${this.points.length} points)`);
        }
        return this.points[index];
    }

    swapCoordinateSystem() {
        this.points = swapCoordinateSystemAll(this.points);
    }
}
