import type { DisplayJSON, Vec3 } from '../types/MarkupTypes';
import {
    DEFAULT_COLOR,
    DEFAULT_GLYPH_TYPE,
    DEFAULT_PROJECTION_COLOR,
    DEFAULT_SCALE,
    DEFAULT_SELECTED_COLOR,
    DEFAULT_SLICE_OPACITY,
    DEFAULT_SNAP_MODE,
    DEFAULT_THICKNESS,
} from './Settings';

// Rendering attributes of one markup.  Field order is the serialized order.
export class Display implements DisplayJSON {
    visibility: boolean = true;
    opacity: number = 1.0;
    color: Vec3 = [...DEFAULT_COLOR];
    selectedColor: Vec3 = [...DEFAULT_SELECTED_COLOR];
    activeColor: Vec3 = [...DEFAULT_COLOR];
    propertiesLabelVisibility: boolean = true;
    pointLabelsVisibility: boolean = false;
    textScale: number = DEFAULT_SCALE;
    glyphType: string = DEFAULT_GLYPH_TYPE;
    glyphScale: number = DEFAULT_SCALE;
    sliceProjection: boolean = false;
    sliceProjectionUseFiducialColor: boolean = true;
    sliceProjectionOutlinedBehindSlicePlane: boolean = false;
    sliceProjectionColor: Vec3 = [...DEFAULT_PROJECTION_COLOR];
    sliceProjectionOpacity: number = DEFAULT_SLICE_OPACITY;
    lineThickness: number = DEFAULT_THICKNESS;
    lineColorFadingStart: number = 1.0;
    lineColorFadingEnd: number = 10.0;
    lineColorFadingSaturation: number = 1.0;
    lineColorFadingHueOffset: number = 0.0;
    handlesInteractive: boolean = false;
    translationHandleVisibility: boolean = true;
    rotationHandleVisibility: boolean = true;
    scaleHandleVisibility: boolean = true;
    interactionHandleScale: number = DEFAULT_SCALE;
    snapMode: string = DEFAULT_SNAP_MODE;
}
