import { describe, test, expect } from 'vitest';
import {
    describeParameters,
    formatSection,
    isCongruent,
} from '../../src/model/parameter-signature.js';

describe('parameter signatures', () => {
    test('congruent signatures have matching section shapes', () => {
        expect(isCongruent([['a', 'b'], ['c']], [['Int', 'Int'], ['String']])).toBe(true);
        expect(isCongruent([], [])).toBe(true);
    });

    test('differing section counts or lengths are not congruent', () => {
        expect(isCongruent([['a']], [['Int'], ['String']])).toBe(false);
        expect(isCongruent([['a', 'b']], [['Int']])).toBe(false);
    });

    test('describeParameters pairs names with types per section', () => {
        // Act
        const described = describeParameters([['a', 'b'], ['c']], [['Int', 'String'], ['Boolean']]);

        // Assert
        expect(described).toEqual([
            [{ name: 'a', type: 'Int' }, { name: 'b', type: 'String' }],
            [{ name: 'c', type: 'Boolean' }],
        ]);
    });

    test('describeParameters truncates to the shorter side', () => {
        // Act
        const described = describeParameters([['a', 'b'], ['c']], [['Int']]);

        // Assert
        expect(described).toEqual([[{ name: 'a', type: 'Int' }]]);
    });

    test('formatSection wraps comma separated entries in parentheses', () => {
        expect(formatSection(['a', 'b'])).toBe('(a, b)');
        expect(formatSection([])).toBe('()');
    });
});
