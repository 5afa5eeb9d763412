// Scalar capability
export type { Scalar } from './scalar.js';
export { numberScalar, bigintScalar, minScalar, maxScalar, negate } from './scalar.js';

// Vector capability
export type { VectorN, Dimension } from './vector.js';
export { checkIndex, ComponentIndexError, DimensionMismatchError } from './vector.js';

// Derived operations
export type { VectorNExtensions } from './extensions.js';
export { extend } from './extensions.js';

// Dimensional markers
export type { TwoDimensional, ThreeDimensional } from './dimensions.js';
export { twoDimensional, threeDimensional } from './dimensions.js';

// Bindings
export type { Tuple2, Tuple3, Tuple4 } from './bindings/tuple.js';
export { tuple2, tuple3, tuple4, tuple2D, tuple3D } from './bindings/tuple.js';
export {
  threeVector2, threeVector3, threeVector4,
  threeVector2D, threeVector3D,
} from './bindings/three.js';
export { glVec2, glVec3, glVec4, glVec2D, glVec3D } from './bindings/gl-matrix.js';

// Consumers
export { BoundingRect } from './bounding-rect.js';
export type { LineSide } from './predicates.js';
export { orient2d, sideOfLine, triangleNormal, isDegenerateTriangle } from './predicates.js';
