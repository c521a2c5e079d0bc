export type {
    ControlPointJSON,
    DisplayJSON,
    MarkupDocumentJSON,
    MarkupJSON,
    MarkupKind,
    MarkupType,
    MarkupVariant,
    PositionStatus,
    Vec3,
    Vec9,
} from './types/MarkupTypes';

export * from './util/Settings';

export {
    MarkupError,
    UnrecognizedFormatError,
    UnrecognizedMarkupTypeError,
    TypeMismatchError,
    CapacityError,
    MalformedInputError,
} from './util/Errors';

export { ControlPoint } from './util/ControlPoint';

export { Display } from './util/Display';

export { Markup, MARKUP_VARIANTS, MARKUP_KIND_ORDER, acceptsType, isMarkupType, markupKindOf } from './util/Markup';

export {
    type MarkupsFile,
    type MarkupFileEntry,
    controlPointFileSchema,
    markupFileSchema,
    markupsFileSchema,
    vec3Schema,
} from './util/MarkupSchema';

export { MarkupDocument, parseMarkupsJson, validateMarkupsJson } from './util/MarkupDocument';

export { type DecodedMarkupFile, containsKind, decodeMarkupFile, detectMarkupKind } from './util/Detect';

export { swapCoordinateSystem, swapCoordinateSystemAll } from './util/Coordinates';
