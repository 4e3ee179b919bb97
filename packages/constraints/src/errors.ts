/**
 * Construction errors. All are thrown synchronously before any word is built.
 */

export const CONSTRAINTS_ERR = {
    /** A min is negative or not an integer, or a max is below its min */
    INVALID_BOUNDS: 'INVALID_BOUNDS',
    /** A finite bound does not fit the largest (18-bit) tier */
    MAGNITUDE_OVERFLOW: 'MAGNITUDE_OVERFLOW',
    /** Width and height together need more than 31 bits */
    SCHEME_UNSATISFIABLE: 'SCHEME_UNSATISFIABLE',
} as const;

export type ConstraintsErrorCode = (typeof CONSTRAINTS_ERR)[keyof typeof CONSTRAINTS_ERR];

/**
 * Base class for every error raised while building constraints.
 */
export class ConstraintsError extends Error {
    public readonly code: ConstraintsErrorCode;

    constructor(code: ConstraintsErrorCode, message: string) {
        super(message);
        this.name = 'ConstraintsError';
        this.code = code;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

export class InvalidBoundsError extends ConstraintsError {
    constructor(message: string) {
        super(CONSTRAINTS_ERR.INVALID_BOUNDS, message);
        this.name = 'InvalidBoundsError';
    }
}

export class MagnitudeOverflowError extends ConstraintsError {
    constructor(public readonly magnitude: number) {
        super(CONSTRAINTS_ERR.MAGNITUDE_OVERFLOW, `Can't represent a size of ${magnitude} in Constraints`);
        this.name = 'MagnitudeOverflowError';
    }
}

export class SchemeUnsatisfiableError extends ConstraintsError {
    constructor(
        public readonly widthMagnitude: number,
        public readonly heightMagnitude: number
    ) {
        super(
            CONSTRAINTS_ERR.SCHEME_UNSATISFIABLE,
            `Can't represent a width of ${widthMagnitude} and height of ${heightMagnitude} in Constraints`
        );
        this.name = 'SchemeUnsatisfiableError';
    }
}
