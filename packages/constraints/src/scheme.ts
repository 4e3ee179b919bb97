import {
    DIMENSION_BITS,
    INFINITY,
    SCHEME,
    TIER_13_BITS,
    TIER_13_MASK,
    TIER_15_BITS,
    TIER_15_MASK,
    TIER_16_BITS,
    TIER_16_MASK,
    TIER_18_BITS,
    TIER_18_MASK,
} from './constants';
import { MagnitudeOverflowError, SchemeUnsatisfiableError } from './errors';
import type { SchemeLayout, SchemeTag } from './types';

/**
 * Scheme Selector
 * Picks the width/height bit split for a set of bounds.
 */

export type TierBits =
    | typeof TIER_13_BITS
    | typeof TIER_15_BITS
    | typeof TIER_16_BITS
    | typeof TIER_18_BITS;

// ============================================================================
// LAYOUT TABLE (indexed by tag)
// ============================================================================
// minHeightShift = 2 + widthBits, maxHeightShift = minHeightShift + 31

export const SCHEME_LAYOUT: readonly [SchemeLayout, SchemeLayout, SchemeLayout, SchemeLayout] = [
    {
        tag: SCHEME.WIDE,
        widthBits: TIER_16_BITS,
        heightBits: TIER_15_BITS,
        widthMask: BigInt(TIER_16_MASK),
        heightMask: BigInt(TIER_15_MASK),
        minHeightShift: 18n,
        maxHeightShift: 49n,
    },
    {
        tag: SCHEME.WIDEST,
        widthBits: TIER_18_BITS,
        heightBits: TIER_13_BITS,
        widthMask: BigInt(TIER_18_MASK),
        heightMask: BigInt(TIER_13_MASK),
        minHeightShift: 20n,
        maxHeightShift: 51n,
    },
    {
        tag: SCHEME.TALL,
        widthBits: TIER_15_BITS,
        heightBits: TIER_16_BITS,
        widthMask: BigInt(TIER_15_MASK),
        heightMask: BigInt(TIER_16_MASK),
        minHeightShift: 17n,
        maxHeightShift: 48n,
    },
    {
        tag: SCHEME.TALLEST,
        widthBits: TIER_13_BITS,
        heightBits: TIER_18_BITS,
        widthMask: BigInt(TIER_13_MASK),
        heightMask: BigInt(TIER_18_MASK),
        minHeightShift: 15n,
        maxHeightShift: 46n,
    },
];

// Width's own tier decides which dimension gets the larger share.
const TAG_FOR_WIDTH_BITS: Readonly<Record<TierBits, SchemeTag>> = Object.freeze({
    [TIER_13_BITS]: SCHEME.TALLEST,
    [TIER_15_BITS]: SCHEME.TALL,
    [TIER_16_BITS]: SCHEME.WIDE,
    [TIER_18_BITS]: SCHEME.WIDEST,
});

/**
 * Smallest tier whose field can hold `magnitude + 1` (0 is reserved for INFINITY).
 *
 * @throws MagnitudeOverflowError when magnitude >= 2^18 - 1
 */
export function bitsFor(magnitude: number): TierBits {
    if (magnitude < TIER_13_MASK) return TIER_13_BITS;
    if (magnitude < TIER_15_MASK) return TIER_15_BITS;
    if (magnitude < TIER_16_MASK) return TIER_16_BITS;
    if (magnitude < TIER_18_MASK) return TIER_18_BITS;
    throw new MagnitudeOverflowError(magnitude);
}

/**
 * Largest finite value a dimension has to store. An unbounded max does not count.
 */
export function magnitudeOf(min: number, max: number): number {
    return max === INFINITY ? min : Math.max(min, max);
}

/**
 * Selects the scheme for the given bounds.
 * Width is sized first; height must then fit in what remains of the 31 bits.
 *
 * @example
 * selectScheme(0, 100, 0, 50).tag      // SCHEME.TALLEST (13/18)
 * selectScheme(0, 40000, 0, 20000).tag // SCHEME.WIDE (16/15)
 */
export function selectScheme(
    minWidth: number,
    maxWidth: number,
    minHeight: number,
    maxHeight: number
): SchemeLayout {
    const widthMagnitude = magnitudeOf(minWidth, maxWidth);
    const widthBits = bitsFor(widthMagnitude);

    const heightMagnitude = magnitudeOf(minHeight, maxHeight);
    const heightBits = bitsFor(heightMagnitude);

    const layout = SCHEME_LAYOUT[TAG_FOR_WIDTH_BITS[widthBits]];
    if (heightBits > DIMENSION_BITS - layout.widthBits) {
        throw new SchemeUnsatisfiableError(widthMagnitude, heightMagnitude);
    }
    return layout;
}
