export { readTextFile, writeFileReported } from './util/FileUtil';

export { UNIT_CUBE_PATH } from './DataFiles';

export { type Axes, StlMesh, loadMesh, saveMesh, transformMesh } from './formats/StlMesh';

export {
    type PointArrangement,
    type PolylineArrangement,
    MarkupRepresentable,
    curveArrangementSchema,
    lineArrangementSchema,
    pointArrangementSchema,
} from './representables/Representable';

export { PointRepresentable, PointSet } from './representables/PointRepresentable';

export { type LineEnds, LineRepresentable, LineSet } from './representables/LineRepresentable';

export { CurveRepresentable, CurveSet } from './representables/CurveRepresentable';

export { BoxRepresentable, OrientedBox } from './representables/BoxRepresentable';

export {
    concatenate,
    concatenateFiles,
    convert,
    convertFile,
    readMarkupFile,
} from './convert/Convert';
