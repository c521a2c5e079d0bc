import { ControlPoint, Markup, MarkupDocument, swapCoordinateSystem as swapPoint, type Vec3 } from '@mrkjson/markup-core';
import {
    documentText,
    lineArrangementSchema,
    MarkupRepresentable,
    parseArrangements,
    printText,
    writeText,
    type PolylineArrangement,
} from './Representable';

export type LineEnds = [Vec3, Vec3];

/**
 * Geometry shown as one line markup per line.
 *
 * Implement `lineCount` and `getLine(index)`, which returns the start and end point.
 *
 * Example:
 *   LineRepresentable.printFrom([
 *       [[1.0, 0.0, 0.0], [2.0, 0.0, 0.0]],
 *       [[3.0, 0.0, 0.0], [4.0, 0.0, 0.0]],
 *   ]);
 */
export abstract class LineRepresentable extends MarkupRepresentable {
    readonly kind = 'line';

    abstract get lineCount(): number;

    abstract getLine(index: number): readonly [Readonly<Vec3>, Readonly<Vec3>];

    rebuildMarkups() {
        const markups: Markup[] = [];
        for (let i = 0; i < this.lineCount; ++i) {
            const [start, end] = this.getLine(i);
            const line = Markup.line();
            line.add(start, i + 1);
            line.add(end, i + 1);
            markups.push(line);
        }
        this.document.replaceMarkups(markups);
    }

    /** One line markup per start/end pair, or null if there are no lines */
    static buildFrom(lines: PolylineArrangement): MarkupDocument | null {
        const checked = parseArrangements(lineArrangementSchema, lines, 'line');
        if (!checked) return null;

        return new MarkupDocument(
            checked.map(([start, end], i) =>
                Markup.line([
                    ControlPoint.make(1, `L_${i + 1}`, start[0], start[1], start[2]),
                    ControlPoint.make(2, `L_${i + 1}`, end[0], end[1], end[2]),
                ]),
            ),
        );
    }

    static makeFrom(lines: PolylineArrangement): string {
        return documentText(LineRepresentable.buildFrom(lines));
    }

    static printFrom(lines: PolylineArrangement, out: NodeJS.WritableStream = process.stdout) {
        printText(LineRepresentable.makeFrom(lines), out);
    }

    static writeFrom(lines: PolylineArrangement, filePath: string): Promise<boolean> {
        return writeText(LineRepresentable.makeFrom(lines), filePath);
    }
}

export class LineSet extends LineRepresentable {
    lines: LineEnds[];

    constructor(lines: LineEnds[] = []) {
        super();
        this.lines = lines;
    }

    get lineCount() {
        return this.lines.length;
    }

    getLine(index: number): LineEnds {
        if (index < 0 || index >= this.lines.length) {
            throw new RangeError(`Line ${index} out of range (${this.lines.length} lines)`);
        }
        return this.lines[index];
    }

    swapCoordinateSystem() {
        this.lines = this.lines.map(([start, end]): LineEnds => [swapPoint(start), swapPoint(end)]);
    }
}
