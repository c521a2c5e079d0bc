export type Vec3 = [number, number, number];

export type Vec9 = [number, number, number, number, number, number, number, number, number];

export type MarkupType = 'Fiducial' | 'Line' | 'Curve' | 'ClosedCurve';

export type MarkupKind = 'point' | 'line' | 'curve';

export type PositionStatus = 'defined' | 'undefined';

/**
 * What distinguishes one kind of markup from another
 */
export interface MarkupVariant {
    kind: MarkupKind;
    /** Type strings accepted on read; the first one is what a new markup of this kind carries */
    types: readonly MarkupType[];
    /** Maximum number of control points; unbounded when absent */
    capacity?: number;
    /** Prefix of auto-generated control point labels */
    prefix: string;
}

export interface ControlPointJSON {
    id: number;
    label: string;
    description: string;
    associatedNodeID: string;
    position: Vec3;
    orientation: Vec9;
    selected: boolean;
    locked: boolean;
    visibility: boolean;
    positionStatus: PositionStatus;
}

export interface DisplayJSON {
    visibility: boolean;
    opacity: number;
    color: Vec3;
    selectedColor: Vec3;
    activeColor: Vec3;
    propertiesLabelVisibility: boolean;
    pointLabelsVisibility: boolean;
    textScale: number;
    glyphType: string;
    glyphScale: number;
    sliceProjection: boolean;
    sliceProjectionUseFiducialColor: boolean;
    sliceProjectionOutlinedBehindSlicePlane: boolean;
    sliceProjectionColor: Vec3;
    sliceProjectionOpacity: number;
    lineThickness: number;
    lineColorFadingStart: number;
    lineColorFadingEnd: number;
    lineColorFadingSaturation: number;
    lineColorFadingHueOffset: number;
    handlesInteractive: boolean;
    translationHandleVisibility: boolean;
    rotationHandleVisibility: boolean;
    scaleHandleVisibility: boolean;
    interactionHandleScale: number;
    snapMode: string;
}

export interface MarkupJSON {
    type: MarkupType;
    controlPoints: ControlPointJSON[];
    display: DisplayJSON;
    coordinateSystem: string;
    coordinateUnits: string;
    fixedNumberOfControlPoints: boolean;
    labelFormat: string;
    lastUsedControlPointNumber: number;
}

export interface MarkupDocumentJSON {
    '@schema': string;
    markups: MarkupJSON[];
}
