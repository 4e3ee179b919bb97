import { INFINITY } from './constants';
import {
    asPackedConstraints,
    decode,
    encode,
    hasBoundedHeight,
    hasBoundedWidth,
    readMaxHeight,
    readMaxWidth,
    readMinHeight,
    readMinWidth,
} from './codec';
import { intSize } from './types';
import type { Bounds, IntSize, PackedConstraints } from './types';

/**
 * Immutable constraints for measuring a layout: a width range and a height range,
 * each max either a finite bound or INFINITY.
 *
 * A measured child picks a size with
 *   minWidth <= width <= maxWidth
 *   minHeight <= height <= maxHeight
 *
 * The four fields live in a single 64-bit word (see codec.ts). Every operation
 * that changes a field returns a NEW instance, possibly under another scheme.
 */
export class Constraints {
    /**
     * Passed as maxWidth / maxHeight for an unbounded dimension.
     */
    static readonly Infinity = INFINITY;

    private constructor(public readonly value: PackedConstraints) {}

    /**
     * @throws InvalidBoundsError if a min is negative or a max is below its min
     * @throws MagnitudeOverflowError if a finite bound exceeds 262142
     * @throws SchemeUnsatisfiableError if width and height don't fit together
     */
    static create(
        minWidth: number = 0,
        maxWidth: number = INFINITY,
        minHeight: number = 0,
        maxHeight: number = INFINITY
    ): Constraints {
        return new Constraints(encode(minWidth, maxWidth, minHeight, maxHeight));
    }

    /**
     * Rebuilds constraints from a raw word. The result is always in canonical form,
     * so it may carry a different word than the one passed in.
     */
    static fromPacked(value: bigint): Constraints {
        const bounds = decode(asPackedConstraints(value));
        return Constraints.create(bounds.minWidth, bounds.maxWidth, bounds.minHeight, bounds.maxHeight);
    }

    /** Exactly one size satisfies the result. */
    static fixed(width: number, height: number): Constraints {
        return Constraints.create(width, width, height, height);
    }

    /** Fixed width, any height. */
    static fixedWidth(width: number): Constraints {
        return Constraints.create(width, width, 0, INFINITY);
    }

    /** Fixed height, any width. */
    static fixedHeight(height: number): Constraints {
        return Constraints.create(0, INFINITY, height, height);
    }

    get minWidth(): number {
        return readMinWidth(this.value);
    }

    get maxWidth(): number {
        return readMaxWidth(this.value);
    }

    get minHeight(): number {
        return readMinHeight(this.value);
    }

    get maxHeight(): number {
        return readMaxHeight(this.value);
    }

    get hasBoundedWidth(): boolean {
        return hasBoundedWidth(this.value);
    }

    get hasBoundedHeight(): boolean {
        return hasBoundedHeight(this.value);
    }

    get hasFixedWidth(): boolean {
        return this.minWidth === this.maxWidth;
    }

    get hasFixedHeight(): boolean {
        return this.minHeight === this.maxHeight;
    }

    /**
     * Whether any layout respecting these constraints has zero area.
     */
    get isZero(): boolean {
        return this.maxWidth === 0 || this.maxHeight === 0;
    }

    toBounds(): Bounds {
        return decode(this.value);
    }

    /**
     * Replaces any subset of the fields. The result is validated like create().
     */
    copy(overrides: Partial<Bounds> = {}): Constraints {
        const bounds = decode(this.value);
        return Constraints.create(
            overrides.minWidth ?? bounds.minWidth,
            overrides.maxWidth ?? bounds.maxWidth,
            overrides.minHeight ?? bounds.minHeight,
            overrides.maxHeight ?? bounds.maxHeight
        );
    }

    /**
     * Coerces these constraints into `other`. The result always satisfies `other`.
     */
    enforce(other: Constraints): Constraints {
        const self = decode(this.value);
        const outer = decode(other.value);
        return Constraints.create(
            clamp(self.minWidth, outer.minWidth, outer.maxWidth),
            clamp(self.maxWidth, outer.minWidth, outer.maxWidth),
            clamp(self.minHeight, outer.minHeight, outer.maxHeight),
            clamp(self.maxHeight, outer.minHeight, outer.maxHeight)
        );
    }

    /**
     * The closest size to `size` that satisfies these constraints.
     */
    constrain(size: IntSize): IntSize {
        const bounds = decode(this.value);
        return intSize(
            clamp(size.width, bounds.minWidth, bounds.maxWidth),
            clamp(size.height, bounds.minHeight, bounds.maxHeight)
        );
    }

    satisfiedBy(size: IntSize): boolean {
        const bounds = decode(this.value);
        return (
            size.width >= bounds.minWidth &&
            size.width <= bounds.maxWidth &&
            size.height >= bounds.minHeight &&
            size.height <= bounds.maxHeight
        );
    }

    /**
     * Translates every bound, flooring at 0. INFINITY stays INFINITY.
     */
    offset(horizontal: number = 0, vertical: number = 0): Constraints {
        const bounds = decode(this.value);
        return Constraints.create(
            Math.max(0, bounds.minWidth + horizontal),
            Math.max(0, bounds.maxWidth + horizontal),
            Math.max(0, bounds.minHeight + vertical),
            Math.max(0, bounds.maxHeight + vertical)
        );
    }

    /**
     * Bitwise equality of the packed words. Encoding is canonical, so this is
     * also equality of the four fields.
     */
    equals(other: Constraints): boolean {
        return this.value === other.value;
    }

    /** The word folded to a signed 32-bit integer. */
    hashCode(): number {
        return Number(BigInt.asIntN(32, this.value ^ (this.value >> 32n)));
    }

    toString(): string {
        return (
            `Constraints(minWidth = ${this.minWidth}, maxWidth = ${this.maxWidth}, ` +
            `minHeight = ${this.minHeight}, maxHeight = ${this.maxHeight})`
        );
    }
}

// ============================================================================
// FUNCTIONAL ENTRY POINTS
// ============================================================================

export function make(
    minWidth: number = 0,
    maxWidth: number = INFINITY,
    minHeight: number = 0,
    maxHeight: number = INFINITY
): Constraints {
    return Constraints.create(minWidth, maxWidth, minHeight, maxHeight);
}

export function unpack(constraints: Constraints): Bounds {
    return constraints.toBounds();
}

export function fixed(width: number, height: number): Constraints {
    return Constraints.fixed(width, height);
}

export function fixedWidth(width: number): Constraints {
    return Constraints.fixedWidth(width);
}

export function fixedHeight(height: number): Constraints {
    return Constraints.fixedHeight(height);
}

// ============================================================================
// HELPERS
// ============================================================================

function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}
