import { INFINITY, MAX_WIDTH_SHIFT, MIN_WIDTH_SHIFT, SCHEME_MASK } from './constants';
import { InvalidBoundsError } from './errors';
import { SCHEME_LAYOUT, selectScheme } from './scheme';
import type { Bounds, PackedConstraints, SchemeLayout, SchemeTag } from './types';

/**
 * Codec: Bounds ↔ 64-bit word.
 *
 * Layout (LSB first):
 *   [0, 2)          scheme tag
 *   [2, 2+W)        minWidth
 *   [2+W, 33)       minHeight          (H = 31 - W)
 *   [33, 33+W)      maxWidth + 1       (0 = INFINITY)
 *   [33+W, 64)      maxHeight + 1      (0 = INFINITY)
 */

const WORD_LIMIT = 1n << 64n;

/**
 * Brands a raw bigint as a packed word.
 *
 * @throws RangeError if the value does not fit in an unsigned 64-bit integer
 */
export function asPackedConstraints(value: bigint): PackedConstraints {
    if (value < 0n || value >= WORD_LIMIT) {
        throw new RangeError(`Packed constraints must fit in an unsigned 64-bit word, got ${value}`);
    }
    return value as PackedConstraints;
}

// ============================================================================
// ENCODE
// ============================================================================

/**
 * Packs four fields into one word, choosing the scheme by magnitude.
 *
 * @throws InvalidBoundsError if a min is negative or a max is below its min
 * @throws MagnitudeOverflowError if a finite bound exceeds 262142
 * @throws SchemeUnsatisfiableError if width and height don't fit together
 *
 * @example
 * encode(100, 100, 50, 50)
 * // tag TALLEST: 3 | 100 << 2 | 50 << 15 | 101 << 33 | 51 << 46
 */
export function encode(
    minWidth: number,
    maxWidth: number,
    minHeight: number,
    maxHeight: number
): PackedConstraints {
    validateBounds(minWidth, maxWidth, minHeight, maxHeight);
    const layout = selectScheme(minWidth, maxWidth, minHeight, maxHeight);

    const maxWidthValue = maxWidth === INFINITY ? 0n : BigInt(maxWidth + 1);
    const maxHeightValue = maxHeight === INFINITY ? 0n : BigInt(maxHeight + 1);

    const word =
        BigInt(layout.tag) |
        (BigInt(minWidth) << MIN_WIDTH_SHIFT) |
        (maxWidthValue << MAX_WIDTH_SHIFT) |
        (BigInt(minHeight) << layout.minHeightShift) |
        (maxHeightValue << layout.maxHeightShift);

    return asPackedConstraints(word);
}

// ============================================================================
// FIELD READERS (no allocation)
// ============================================================================

function layoutOf(word: PackedConstraints): SchemeLayout {
    return SCHEME_LAYOUT[Number(word & SCHEME_MASK)];
}

export function schemeOf(word: PackedConstraints): SchemeTag {
    return layoutOf(word).tag;
}

export function readMinWidth(word: PackedConstraints): number {
    const layout = layoutOf(word);
    return Number((word >> MIN_WIDTH_SHIFT) & layout.widthMask);
}

export function readMaxWidth(word: PackedConstraints): number {
    const layout = layoutOf(word);
    const stored = Number((word >> MAX_WIDTH_SHIFT) & layout.widthMask);
    return stored === 0 ? INFINITY : stored - 1;
}

export function readMinHeight(word: PackedConstraints): number {
    const layout = layoutOf(word);
    return Number((word >> layout.minHeightShift) & layout.heightMask);
}

export function readMaxHeight(word: PackedConstraints): number {
    const layout = layoutOf(word);
    const stored = Number((word >> layout.maxHeightShift) & layout.heightMask);
    return stored === 0 ? INFINITY : stored - 1;
}

export function hasBoundedWidth(word: PackedConstraints): boolean {
    const layout = layoutOf(word);
    return ((word >> MAX_WIDTH_SHIFT) & layout.widthMask) !== 0n;
}

export function hasBoundedHeight(word: PackedConstraints): boolean {
    const layout = layoutOf(word);
    return ((word >> layout.maxHeightShift) & layout.heightMask) !== 0n;
}

// ============================================================================
// DECODE (allocates: use the readers above on hot paths)
// ============================================================================

/**
 * Unpacks every field of a word. Exact inverse of encode().
 */
export function decode(word: PackedConstraints): Bounds {
    return {
        minWidth: readMinWidth(word),
        maxWidth: readMaxWidth(word),
        minHeight: readMinHeight(word),
        maxHeight: readMaxHeight(word),
    };
}

// ============================================================================
// VALIDATION
// ============================================================================

function isMin(value: number): boolean {
    return Number.isInteger(value) && value >= 0;
}

function isMax(value: number, min: number): boolean {
    return value === INFINITY || (Number.isInteger(value) && value >= min);
}

/**
 * @throws InvalidBoundsError
 */
function validateBounds(minWidth: number, maxWidth: number, minHeight: number, maxHeight: number): void {
    if (!isMin(minWidth) || !isMin(minHeight)) {
        throw new InvalidBoundsError(
            `minWidth(${minWidth}) and minHeight(${minHeight}) must be integers >= 0`
        );
    }
    if (!isMax(maxWidth, minWidth)) {
        throw new InvalidBoundsError(`maxWidth(${maxWidth}) must be >= minWidth(${minWidth})`);
    }
    if (!isMax(maxHeight, minHeight)) {
        throw new InvalidBoundsError(`maxHeight(${maxHeight}) must be >= minHeight(${minHeight})`);
    }
}
