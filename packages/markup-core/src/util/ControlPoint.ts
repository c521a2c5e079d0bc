import type { ControlPointJSON, PositionStatus, Vec3, Vec9 } from '../types/MarkupTypes';
import { DEFAULT_ORIENTATION, DEFAULT_POSITION, STATUS_DEFINED, STATUS_UNDEFINED } from './Settings';

/**
 * A single labeled coordinate of a markup.
 *
 * The position can only change through `setPosition`, which is also what flips
 * `positionStatus` to "defined".  Once defined it stays defined.
 */
export class ControlPoint {
    id: number;
    label: string;
    description: string = '';
    associatedNodeID: string = '';
    selected: boolean = true;
    locked: boolean = false;
    visibility: boolean = true;

    private readonly pos: Vec3 = [...DEFAULT_POSITION];
    private readonly orient: Vec9 = [...DEFAULT_ORIENTATION];
    private status: PositionStatus = STATUS_UNDEFINED;

    constructor(id: number, label: string) {
        this.id = id;
        this.label = label;
    }

    static make(id: number, label: string, x: number, y: number, z: number): ControlPoint {
        const point = new ControlPoint(id, `${label}-${id}`);
        point.setPosition(x, y, z);
        return point;
    }

    get position(): Readonly<Vec3> {
        return this.pos;
    }

    get orientation(): Readonly<Vec9> {
        return this.orient;
    }

    get positionStatus(): PositionStatus {
        return this.status;
    }

    setPosition(x: number, y: number, z: number) {
        this.status = STATUS_DEFINED;
        this.pos[0] = x;
        this.pos[1] = y;
        this.pos[2] = z;
    }

    toJSON(): ControlPointJSON {
        return {
            id: this.id,
            label: this.label,
            description: this.description,
            associatedNodeID: this.associatedNodeID,
            position: [...this.pos],
            orientation: [...this.orient],
            selected: this.selected,
            locked: this.locked,
            visibility: this.visibility,
            positionStatus: this.status,
        };
    }
}
