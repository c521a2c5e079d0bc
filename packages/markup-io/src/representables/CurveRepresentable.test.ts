import { describe, it, expect } from 'vitest';
import { MalformedInputError, MarkupDocument } from '@mrkjson/markup-core';
import { CurveRepresentable, CurveSet } from './CurveRepresentable';

describe('CurveRepresentable', () => {
    it('makes one curve per point sequence, in order', () => {
        const set = new CurveSet([
            [
                [0, 0, 0],
                [1, 1, 0],
                [2, 0, 0],
            ],
            [[5, 5, 5]],
        ]);
        set.rebuildMarkups();
        expect(set.document.markups.map((m) => m.type)).toEqual(['Curve', 'Curve']);
        expect(set.document.markups.map((m) => m.controlPoints.map((cp) => cp.label))).toEqual([
            ['OC_1-1', 'OC_1-2', 'OC_1-3'],
            ['OC_2-1'],
        ]);
        expect(set.document.points()).toEqual([
            [0, 0, 0],
            [1, 1, 0],
            [2, 0, 0],
            [5, 5, 5],
        ]);
    });

    it('marks closed curves as ClosedCurve', () => {
        const set = new CurveSet(
            [
                [[0, 0, 0]],
                [[1, 1, 1]],
            ],
            [false, true],
        );
        set.rebuildMarkups();
        expect(set.document.markups.map((m) => m.type)).toEqual(['Curve', 'ClosedCurve']);
    });

    it('round-trips through its own encoding', () => {
        const set = new CurveSet(
            [
                [
                    [1, 2, 3],
                    [4, 5, 6],
                ],
            ],
            [true],
        );
        const back = MarkupDocument.parse(set.toJSONString(), 'curve');
        expect(back.markups.map((m) => m.type)).toEqual(['ClosedCurve']);
        expect(back.points()).toEqual(set.curves.flat());
    });

    it('swaps every point of every curve', () => {
        const set = new CurveSet([
            [
                [1, 1, 1],
                [2, -2, 2],
            ],
        ]);
        set.swapCoordinateSystem();
        expect(set.curves).toEqual([
            [
                [-1, -1, 1],
                [-2, 2, 2],
            ],
        ]);
    });
});

describe('CurveRepresentable.buildFrom', () => {
    it('returns null for no curves', () => {
        expect(CurveRepresentable.buildFrom([])).toBeNull();
        expect(CurveRepresentable.makeFrom([])).toBe('');
    });

    it('labels points with the curve number', () => {
        const doc = CurveRepresentable.buildFrom([
            [
                [0, 0, 0],
                [0, 1, 0],
            ],
            [
                [1, 0, 0],
                [1, 1, 0],
                [1, 2, 0],
            ],
        ]);
        expect(doc?.markups.map((m) => m.controlPoints.map((cp) => cp.label))).toEqual([
            ['OC_1-1', 'OC_1-2'],
            ['OC_2-1', 'OC_2-2', 'OC_2-3'],
        ]);
    });

    it('builds closed curves on request', () => {
        const text = CurveRepresentable.makeFrom([[[0, 0, 0]]], true);
        expect(JSON.parse(text).markups[0].type).toBe('ClosedCurve');
    });

    it('rejects sequences holding anything but 3-vectors', () => {
        expect(() => CurveRepresentable.buildFrom([[[0, 0]]])).toThrow(MalformedInputError);
        expect(() => CurveRepresentable.buildFrom(JSON.parse('[[[0, 0, 0]], [[1, 1, 1], "x"]]'))).toThrow(
            'Malformed curve at [1][1]',
        );
    });
});
