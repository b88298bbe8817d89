/**
 * Classification tags: member kinds, context types and the arity shape of
 * parameter signatures.
 */

import { describe, test, expect } from 'vitest';
import {
    ContextType,
    createCompletionContext,
    HasArgs,
    hasArgsFrom,
    MemberKind,
} from '../../src/model/member-kind.js';

describe('hasArgsFrom', () => {
    test.each([
        ['no sections', [], HasArgs.NoArgs],
        ['one empty section', [[]], HasArgs.EmptyArgs],
        ['one non-empty section', [['a']], HasArgs.NonEmptyArgs],
        ['two empty sections', [[], []], HasArgs.NonEmptyArgs],
        ['curried sections', [['a', 'b'], ['c']], HasArgs.NonEmptyArgs],
    ] as const)('%s', (_label, sections, expected) => {
        // Act & Assert
        expect(hasArgsFrom(sections)).toBe(expected);
    });
});

describe('createCompletionContext', () => {
    test('defaults to the Default context type', () => {
        // Act
        const context = createCompletionContext();

        // Assert
        expect(context.contextType).toBe(ContextType.Default);
    });

    test('returns a frozen value', () => {
        // Act
        const context = createCompletionContext(ContextType.Import);

        // Assert
        expect(context).toEqual({ contextType: 'Import' });
        expect(Object.isFrozen(context)).toBe(true);
    });
});

describe('tag sets', () => {
    test('member kinds are closed', () => {
        expect(Object.values(MemberKind)).toEqual([
            'Class', 'Trait', 'Type', 'Object', 'Package', 'PackageObject', 'Def', 'Val', 'Var',
        ]);
    });

    test('context types are closed', () => {
        expect(Object.values(ContextType)).toEqual(['Default', 'ApplyContext', 'New', 'Import']);
    });
});
