// Public API
export type { Vec2, Vec3, BoundingBox } from './vec3.js';
export { boundsOf, cross, sub } from './vec3.js';

// Volumes
export type { Axis, Grid3, ScalarVolume, OccupancyVolume, VolumeDims } from './volume.js';
export { volumeDims, volumeSlice, sampleVolume, VolumeBuilder } from './volume.js';

// Case tables
export {
  CUBE_CORNERS, CUBE_EDGES, CUBE_EDGE_MASKS, CUBE_TRIANGLES,
  SQUARE_CORNERS, SQUARE_SEGMENTS, SQUARE_TRIANGLES,
} from './case-tables.js';

// Extractors
export type { VertexEmitter } from './marching-cube.js';
export { MarchingCube } from './marching-cube.js';
export type { SquareValues, SquareEmitter, Winding, ContourLoop } from './marching-squares.js';
export { MarchingSquare, extractContours } from './marching-squares.js';
export type { BoundaryPlane } from './isosurface.js';
export { Isosurface, boundaryPlanes } from './isosurface.js';
export { BoundaryFaces } from './boundary-faces.js';

// Mesh assembly
export type { PrimitiveKind, VoxelMesh, Triangle } from './mesh.js';
export { MeshAssembler, isosurfaceMesh, boundaryMesh, meshTriangles } from './mesh.js';

// Mesh export
export type { NormalMode, STLExportOptions } from './stl.js';
export { exportSTL, faceNormal, stlByteLength } from './stl.js';
export type { SavedMesh } from './stl-file.js';
export { saveSTL } from './stl-file.js';
export { MeshWriteError } from './errors.js';
