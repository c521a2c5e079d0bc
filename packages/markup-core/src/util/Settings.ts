import type { MarkupType, PositionStatus, Vec3, Vec9 } from '../types/MarkupTypes';

// Values here are what the viewer writes into its own .mrk.json files.
// It compares against them, so keep them literal.

export const MARKUPS_SCHEMA_URL =
    'https://raw.githubusercontent.com/slicer/slicer/master/Modules/Loadable/Markups/Resources/Schema/markups-schema-v1.0.3.json#';

export const DEFAULT_POSITION: Readonly<Vec3> = [0.0, 0.0, 0.0];
export const DEFAULT_ORIENTATION: Readonly<Vec9> = [-1.0, -0.0, -0.0, -0.0, -1.0, -0.0, 0.0, 0.0, 1.0];
export const STATUS_DEFINED: PositionStatus = 'defined';
export const STATUS_UNDEFINED: PositionStatus = 'undefined';

export const DEFAULT_COLOR: Readonly<Vec3> = [0.4, 1.0, 1.0];
export const DEFAULT_SELECTED_COLOR: Readonly<Vec3> = [1.0, 0.5000076295109484, 0.5000076295109484];
export const DEFAULT_SCALE = 3.0;
export const DEFAULT_THICKNESS = 0.2;
export const DEFAULT_GLYPH_TYPE = 'Sphere3D';
export const DEFAULT_PROJECTION_COLOR: Readonly<Vec3> = [1.0, 1.0, 1.0];
export const DEFAULT_SLICE_OPACITY = 0.6;
export const DEFAULT_SNAP_MODE = 'toVisibleSurface';

export const POINT_MARKUP_TYPE: MarkupType = 'Fiducial';
export const LINE_MARKUP_TYPE: MarkupType = 'Line';
export const CURVE_MARKUP_TYPE: MarkupType = 'Curve';
export const CLOSED_CURVE_MARKUP_TYPE: MarkupType = 'ClosedCurve';

export const DEFAULT_COORDINATE_SYSTEM = 'LPS';
export const DEFAULT_COORDINATE_UNITS = 'mm';
export const DEFAULT_LABEL_FORMAT = '%N-%d';

export const JSON_INDENT = 2;
