import { INFINITY, SCHEME } from '../constants';
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
    schemeOf,
} from '../codec';
import { InvalidBoundsError, SchemeUnsatisfiableError } from '../errors';

describe('Codec', () => {
    describe('encode()', () => {
        test('Fixed 100x50 → TALLEST layout', () => {
            const word = encode(100, 100, 50, 50);
            // tag | minW << 2 | minH << 15 | (maxW + 1) << 33 | (maxH + 1) << 46
            expect(word).toBe(3n | (100n << 2n) | (50n << 15n) | (101n << 33n) | (51n << 46n));
        });

        test('Fully unbounded is just the tag', () => {
            expect(encode(0, INFINITY, 0, INFINITY)).toBe(3n);
        });

        test('WIDE layout puts height at bit 18 and 49', () => {
            const word = encode(0, 40000, 0, 20000);
            expect(word).toBe((40001n << 33n) | (20001n << 49n));
        });

        test('WIDEST layout uses the top bit', () => {
            const word = encode(0, 200000, 0, 8190);
            expect(word >> 63n).toBe(1n);
            expect(schemeOf(word)).toBe(SCHEME.WIDEST);
        });

        test('Deterministic', () => {
            expect(encode(3, 400, 7, 9000)).toBe(encode(3, 400, 7, 9000));
        });

        test('[EDGE] Validates ordering before packing', () => {
            expect(() => encode(5, 3, 0, 0)).toThrow('maxWidth(3) must be >= minWidth(5)');
            expect(() => encode(0, 0, -1, 0)).toThrow(InvalidBoundsError);
        });

        test('[EDGE] Fractional bounds are InvalidBounds, not a BigInt RangeError', () => {
            expect(() => encode(0, 1.5, 0, 0)).toThrow(InvalidBoundsError);
            expect(() => encode(0, 10, 0, 2.5)).toThrow(InvalidBoundsError);
        });

        test('[EDGE] Refuses what the selector refuses', () => {
            expect(() => encode(0, 200000, 0, 200000)).toThrow(SchemeUnsatisfiableError);
        });
    });

    describe('decode()', () => {
        const cases: [number, number, number, number][] = [
            [0, 0, 0, 0],
            [100, 100, 50, 50],
            [0, INFINITY, 0, INFINITY],
            [10, INFINITY, 5, 8],
            [8190, 8190, 262142, 262142],
            [8191, 32766, 0, 65534],
            [0, 32767, 0, 32766],
            [70000, INFINITY, 0, 8190],
            [262142, 262142, 8190, 8190],
        ];

        test.each(cases)('(%p, %p, %p, %p) survives encode/decode', (minWidth, maxWidth, minHeight, maxHeight) => {
            expect(decode(encode(minWidth, maxWidth, minHeight, maxHeight))).toEqual({
                minWidth,
                maxWidth,
                minHeight,
                maxHeight,
            });
        });

        test('[EDGE] Total over arbitrary words', () => {
            const word = asPackedConstraints((1n << 64n) - 1n);
            // tag 3: 13-bit width, 18-bit height, every field saturated
            expect(decode(word)).toEqual({
                minWidth: 8191,
                maxWidth: 8190,
                minHeight: 262143,
                maxHeight: 262142,
            });
        });
    });

    describe('Field readers', () => {
        const word = encode(12, 340, 56, INFINITY);

        test('Read each field without decoding', () => {
            expect(readMinWidth(word)).toBe(12);
            expect(readMaxWidth(word)).toBe(340);
            expect(readMinHeight(word)).toBe(56);
            expect(readMaxHeight(word)).toBe(INFINITY);
        });

        test('Bounded flags follow the stored max', () => {
            expect(hasBoundedWidth(word)).toBe(true);
            expect(hasBoundedHeight(word)).toBe(false);
            expect(hasBoundedWidth(encode(0, INFINITY, 0, 0))).toBe(false);
            expect(hasBoundedHeight(encode(0, INFINITY, 0, 0))).toBe(true);
        });

        test('A max of 0 is still bounded', () => {
            const zero = encode(0, 0, 0, 0);
            expect(readMaxWidth(zero)).toBe(0);
            expect(hasBoundedWidth(zero)).toBe(true);
        });
    });

    describe('asPackedConstraints()', () => {
        test('Accepts the full unsigned range', () => {
            expect(asPackedConstraints(0n)).toBe(0n);
            expect(asPackedConstraints((1n << 64n) - 1n)).toBe((1n << 64n) - 1n);
        });

        test('[EDGE] Rejects negative and oversized words', () => {
            expect(() => asPackedConstraints(-1n)).toThrow(RangeError);
            expect(() => asPackedConstraints(1n << 64n)).toThrow(RangeError);
        });
    });
});
