// =============================================================================
// Packed layout constraints
// =============================================================================
// Four bounded integers in one 64-bit word, with an adaptive width/height split.

// Main class & functional API
export { Constraints, make, unpack, fixed, fixedWidth, fixedHeight } from './constraints'

// Codec
export {
  encode,
  decode,
  asPackedConstraints,
  schemeOf,
  readMinWidth,
  readMaxWidth,
  readMinHeight,
  readMaxHeight,
  hasBoundedWidth,
  hasBoundedHeight
} from './codec'

// Scheme Selector
export { SCHEME_LAYOUT, bitsFor, magnitudeOf, selectScheme } from './scheme'
export type { TierBits } from './scheme'

// Constants
export { INFINITY, MAX_BOUND, DIMENSION_BITS, SCHEME } from './constants'

// Errors
export {
  CONSTRAINTS_ERR,
  ConstraintsError,
  InvalidBoundsError,
  MagnitudeOverflowError,
  SchemeUnsatisfiableError
} from './errors'
export type { ConstraintsErrorCode } from './errors'

// Types
export { intSize } from './types'
export type { PackedConstraints, SchemeTag, SchemeLayout, Bounds, IntSize } from './types'
