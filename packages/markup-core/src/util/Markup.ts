import type { MarkupJSON, MarkupKind, MarkupType, MarkupVariant, Vec3 } from '../types/MarkupTypes';
import { ControlPoint } from './ControlPoint';
import { Display } from './Display';
import { CapacityError } from './Errors';
import {
    CLOSED_CURVE_MARKUP_TYPE,
    CURVE_MARKUP_TYPE,
    DEFAULT_COORDINATE_SYSTEM,
    DEFAULT_COORDINATE_UNITS,
    DEFAULT_LABEL_FORMAT,
    LINE_MARKUP_TYPE,
    POINT_MARKUP_TYPE,
} from './Settings';

export const MARKUP_VARIANTS: { readonly [K in MarkupKind]: MarkupVariant } = {
    point: { kind: 'point', types: [POINT_MARKUP_TYPE], prefix: 'P' },
    line: { kind: 'line', types: [LINE_MARKUP_TYPE], capacity: 2, prefix: 'L' },
    curve: { kind: 'curve', types: [CURVE_MARKUP_TYPE, CLOSED_CURVE_MARKUP_TYPE], prefix: 'OC' },
};

// Order in which a file's content is matched against the kinds
export const MARKUP_KIND_ORDER: readonly MarkupKind[] = ['point', 'line', 'curve'];

export function markupKindOf(type: MarkupType): MarkupKind {
    switch (type) {
        case 'Fiducial':
            return 'point';
        case 'Line':
            return 'line';
        case 'Curve':
        case 'ClosedCurve':
            return 'curve';
    }
}

export function isMarkupType(t: string): t is MarkupType {
    return MARKUP_KIND_ORDER.some((k) => acceptsType(k, t));
}

export function acceptsType(kind: MarkupKind, t: string): t is MarkupType {
    return MARKUP_VARIANTS[kind].types.some((vt) => vt === t);
}

export class Markup implements Iterable<ControlPoint> {
    readonly type: MarkupType;
    controlPoints: ControlPoint[];
    display: Display = new Display();
    coordinateSystem: string = DEFAULT_COORDINATE_SYSTEM;
    coordinateUnits: string = DEFAULT_COORDINATE_UNITS;
    fixedNumberOfControlPoints: boolean = false;
    labelFormat: string = DEFAULT_LABEL_FORMAT;
    lastUsedControlPointNumber: number = 0;

    constructor(type: MarkupType, controlPoints: ControlPoint[] = []) {
        this.type = type;
        this.controlPoints = controlPoints;
    }

    static point(controlPoints?: ControlPoint[]) {
        return new Markup(POINT_MARKUP_TYPE, controlPoints);
    }

    static line(controlPoints?: ControlPoint[]) {
        return new Markup(LINE_MARKUP_TYPE, controlPoints);
    }

    static curve(closed = false, controlPoints?: ControlPoint[]) {
        return new Markup(closed ? CLOSED_CURVE_MARKUP_TYPE : CURVE_MARKUP_TYPE, controlPoints);
    }

    get kind(): MarkupKind {
        return markupKindOf(this.type);
    }

    get capacity(): number | undefined {
        return MARKUP_VARIANTS[this.kind].capacity;
    }

    get prefix(): string {
        return MARKUP_VARIANTS[this.kind].prefix;
    }

    get length() {
        return this.controlPoints.length;
    }

    at(index: number): ControlPoint | undefined {
        return this.controlPoints[index];
    }

    [Symbol.iterator](): Iterator<ControlPoint> {
        return this.controlPoints[Symbol.iterator]();
    }

    /**
     * Append a control point, numbered after the ones already present.
     * Its label is the kind's prefix, followed by `_<labelSuffix>` unless the suffix is empty or 0.
     */
    add(point: Readonly<Vec3>, labelSuffix?: string | number) {
        const capacity = this.capacity;
        if (capacity !== undefined && this.length >= capacity) {
            throw new CapacityError(`${this.type} markup holds at most ${capacity} control points`);
        }
        const suffix = labelSuffix ? `_${labelSuffix}` : '';
        this.controlPoints.push(ControlPoint.make(this.length + 1, `${this.prefix}${suffix}`, point[0], point[1], point[2]));
    }

    /**
     * Place control point number `id` (1-based).  One past the end appends.
     */
    set(id: number, point: Readonly<Vec3>) {
        const capacity = this.capacity;
        if (!Number.isInteger(id) || id < 1 || (capacity !== undefined && id > capacity) || id > this.length + 1) {
            throw new CapacityError(`Control point ${id} is out of range for ${this.type} markup of ${this.length}`);
        }
        if (id === this.length + 1) {
            this.add(point);
        } else {
            this.controlPoints[id - 1].setPosition(point[0], point[1], point[2]);
        }
        this.lastUsedControlPointNumber = id;
    }

    positions(): Vec3[] {
        return this.controlPoints.map((cp) => [...cp.position]);
    }

    toJSON(): MarkupJSON {
        return {
            type: this.type,
            controlPoints: this.controlPoints.map((cp) => cp.toJSON()),
            display: this.display,
            coordinateSystem: this.coordinateSystem,
            coordinateUnits: this.coordinateUnits,
            fixedNumberOfControlPoints: this.fixedNumberOfControlPoints,
            labelFormat: this.labelFormat,
            lastUsedControlPointNumber: this.lastUsedControlPointNumber,
        };
    }
}
