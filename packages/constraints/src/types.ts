import type { SCHEME } from './constants';
import { InvalidBoundsError } from './errors';

/**
 * Branded types for the packed representation.
 * Prevents raw bigints from being read as constraints by accident.
 */

/**
 * An unsigned 64-bit word holding four constraint fields.
 * MUST be created via encode() or asPackedConstraints().
 */
export type PackedConstraints = bigint & { readonly __brand: 'PackedConstraints' };

/** One of the four width/height bit allocations (bits 0-1 of the word). */
export type SchemeTag = (typeof SCHEME)[keyof typeof SCHEME];

/**
 * Field geometry for one scheme. Indexed by SchemeTag.
 */
export interface SchemeLayout {
    readonly tag: SchemeTag;
    readonly widthBits: number;
    readonly heightBits: number;
    readonly widthMask: bigint;
    readonly heightMask: bigint;
    readonly minHeightShift: bigint;
    readonly maxHeightShift: bigint;
}

/**
 * Decoded constraint fields. A max of INFINITY means unbounded.
 */
export interface Bounds {
    readonly minWidth: number;
    readonly maxWidth: number;
    readonly minHeight: number;
    readonly maxHeight: number;
}

/**
 * A candidate size. Either side may be negative (constrain() lifts it),
 * but both must be integers.
 */
export interface IntSize {
    readonly width: number;
    readonly height: number;
}

/**
 * @throws InvalidBoundsError if width or height is not an integer
 */
export function intSize(width: number, height: number): IntSize {
    if (!Number.isInteger(width) || !Number.isInteger(height)) {
        throw new InvalidBoundsError(`width(${width}) and height(${height}) must be integers`);
    }
    return Object.freeze({ width, height });
}
