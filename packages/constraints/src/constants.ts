/**
 * Packed Constraints: Bit Layout Constants
 * 4 fields in 1 word: 2-bit scheme tag + 31 bits of minimums + 31 bits of maximums.
 */

// ============================================================================
// SECTION 1: Sentinel & Range
// ============================================================================

/**
 * The value `maxWidth` / `maxHeight` take when a dimension has no upper bound.
 * Compares above every finite bound and is unchanged by translation.
 */
export const INFINITY = Number.POSITIVE_INFINITY;

/**
 * Largest finite bound any scheme can hold: 2^18 - 2.
 * (2^18 - 1 is the largest stored max, which holds `value + 1`.)
 */
export const MAX_BOUND = 0x3FFFE;

/** Bits shared by both dimensions (per min and per max half of the word). */
export const DIMENSION_BITS = 31;

// ============================================================================
// SECTION 2: Scheme Tags (bits 0-1)
// ============================================================================
export const SCHEME = {
    /** 16 bits width, 15 bits height */
    WIDE: 0,
    /** 18 bits width, 13 bits height */
    WIDEST: 1,
    /** 15 bits width, 16 bits height */
    TALL: 2,
    /** 13 bits width, 18 bits height */
    TALLEST: 3,
} as const;

export const SCHEME_MASK = 0x3n;

// ============================================================================
// SECTION 3: Tiers
// ============================================================================
export const TIER_13_BITS = 13;
export const TIER_15_BITS = 15;
export const TIER_16_BITS = 16;
export const TIER_18_BITS = 18;

export const TIER_13_MASK = 0x1FFF;   // 8K
export const TIER_15_MASK = 0x7FFF;   // 32K
export const TIER_16_MASK = 0xFFFF;   // 64K
export const TIER_18_MASK = 0x3FFFF;  // 256K

// ============================================================================
// SECTION 4: Field Shifts
// ============================================================================
// Width fields sit at fixed offsets. Height fields follow the width field of
// the same half, so their offsets depend on the scheme (see SCHEME_LAYOUT).
export const MIN_WIDTH_SHIFT = 2n;
export const MAX_WIDTH_SHIFT = 33n;
