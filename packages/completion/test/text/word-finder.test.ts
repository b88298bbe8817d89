import { describe, test, expect } from 'vitest';
import { stringBuffer } from '../../src/text/text-buffer.js';
import { identLenAtOffset, isIdentifierPart } from '../../src/text/word-finder.js';

describe('isIdentifierPart', () => {
    test.each([
        ['a', true],
        ['Z', true],
        ['7', true],
        ['_', true],
        ['$', true],
        ['ö', true],
        ['\u200D', true],
        ['\u0000', true],
        ['\u0085', true],
        ['\t', false],
        ['\u001C', false],
        ['.', false],
        ['(', false],
        [' ', false],
        ['\n', false],
    ])('%j → %s', (ch, expected) => {
        expect(isIdentifierPart(ch)).toBe(expected);
    });
});

describe('identLenAtOffset', () => {
    test('measures the rest of the identifier starting at the offset', () => {
        const buffer = stringBuffer('foo.map(1)');

        expect(identLenAtOffset(buffer, 4)).toBe(3);
        expect(identLenAtOffset(buffer, 5)).toBe(2);
    });

    test('is zero on a non-identifier character', () => {
        expect(identLenAtOffset(stringBuffer('foo.map(1)'), 3)).toBe(0);
    });

    test('is zero at the end of the buffer', () => {
        expect(identLenAtOffset(stringBuffer('foo'), 3)).toBe(0);
    });

    test('includes digits, underscores and dollar signs', () => {
        expect(identLenAtOffset(stringBuffer('a$b_1 x'), 0)).toBe(5);
    });

    test('runs through zero-width format characters', () => {
        expect(identLenAtOffset(stringBuffer('ab\u200Bcd)'), 0)).toBe(5);
    });

    test('stops at the end of the buffer', () => {
        expect(identLenAtOffset(stringBuffer('größe'), 1)).toBe(4);
    });
});
