import { describe, it, expect } from 'vitest';

import { ControlPoint } from '../src/util/ControlPoint';
import { DEFAULT_ORIENTATION } from '../src/util/Settings';

describe('ControlPoint', () => {
    it('starts with an undefined position at the origin', () => {
        const cp = new ControlPoint(1, 'F');
        expect(cp.positionStatus).toBe('undefined');
        expect(cp.position).toEqual([0, 0, 0]);
        expect(cp.orientation).toEqual([...DEFAULT_ORIENTATION]);
    });

    it('make labels as <label>-<id> and defines the position', () => {
        const cp = ControlPoint.make(3, 'L_2', 1.5, -2, 7);
        expect(cp.id).toBe(3);
        expect(cp.label).toBe('L_2-3');
        expect(cp.position).toEqual([1.5, -2, 7]);
        expect(cp.positionStatus).toBe('defined');
    });

    it('stays defined once a position has been set', () => {
        const cp = new ControlPoint(1, 'F');
        cp.setPosition(1, 2, 3);
        expect(cp.positionStatus).toBe('defined');
        cp.setPosition(0, 0, 0);
        expect(cp.positionStatus).toBe('defined');
        expect(cp.position).toEqual([0, 0, 0]);
    });

    it('does not share default vectors between points', () => {
        const a = new ControlPoint(1, 'a');
        const b = new ControlPoint(2, 'b');
        a.setPosition(4, 5, 6);
        expect(b.position).toEqual([0, 0, 0]);
    });

    it('serializes fields in schema order', () => {
        const json = ControlPoint.make(1, 'P_1', 1, 2, 3).toJSON();
        expect(Object.keys(json)).toEqual([
            'id',
            'label',
            'description',
            'associatedNodeID',
            'position',
            'orientation',
            'selected',
            'locked',
            'visibility',
            'positionStatus',
        ]);
        expect(json).toEqual({
            id: 1,
            label: 'P_1-1',
            description: '',
            associatedNodeID: '',
            position: [1, 2, 3],
            orientation: [-1, -0, -0, -0, -1, -0, 0, 0, 1],
            selected: true,
            locked: false,
            visibility: true,
            positionStatus: 'defined',
        });
    });

    it('hands out copies of its position when serialized', () => {
        const cp = ControlPoint.make(1, 'P', 1, 2, 3);
        const json = cp.toJSON();
        json.position[0] = 99;
        expect(cp.position).toEqual([1, 2, 3]);
    });
});
