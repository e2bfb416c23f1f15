/**
 * Unit tests for description overrides
 */

import { describe, it, expect } from 'vitest';
import { attachOverrides, describeAs, itAs, whenAs, withAs, withoutAs } from '../../src/overrides.js';
import { InvalidOverrideError } from '../../src/errors.js';
import { DescriptionResolver } from '../../src/description/resolver.js';
import type { SpecNode } from '../../src/types.js';

const forest: SpecNode[] = [
    {
        identifier: 'DescribeCar',
        kind:       'suite',
        children:   [
            { identifier: 'test_has_engine', kind: 'example', outcome: 'passed' },
            {
                identifier: 'WithFullTank',
                kind:       'suite',
                children:   [{ identifier: 'test_drive', kind: 'example', outcome: 'passed' }],
            },
        ],
    },
    {
        identifier: 'DescribeBike',
        kind:       'suite',
        children:   [{ identifier: 'test_rolls', kind: 'example', outcome: 'passed' }],
    },
];

describe('override helpers', () => {
    it('should attach a trimmed description', () => {
        const node = describeAs('  The family car ')(forest[0]);

        expect(node.override).toBe('The family car');
        expect(node.identifier).toBe('DescribeCar');
    });

    it('should leave the original node untouched', () => {
        withAs('a spare wheel')(forest[1]);

        expect(forest[1].override).toBeUndefined();
    });

    it('should win over documentation when resolved', () => {
        const node = itAs('moves')({ identifier: 'test_x', kind: 'example', outcome: 'passed', documentation: 'Docs' });

        expect(new DescriptionResolver().resolve(node)).toBe('moves');
    });

    it('should reject a blank description', () => {
        expect(() => whenAs('   ')).toThrow(InvalidOverrideError);
        expect(() => withoutAs('')).toThrow('withoutAs() requires a non-empty description');
    });

    it('should reject a node of the wrong kind', () => {
        const example: SpecNode = { identifier: 'test_x', kind: 'example', outcome: 'passed' };

        expect(() => describeAs('a car')(example)).toThrow(
            'describeAs() applies to suite nodes, got example "test_x"'
        );
        expect(() => itAs('works')(forest[0])).toThrow(InvalidOverrideError);
    });
});

describe('attachOverrides', () => {
    it('should attach overrides by identifier path', () => {
        const result = attachOverrides(forest, {
            'DescribeCar > WithFullTank':              'with a full tank',
            'DescribeCar > WithFullTank > test_drive': 'drives far',
        });

        const car = result[0];
        const tank = car.children?.[1];
        expect(tank?.override).toBe('with a full tank');
        expect(tank?.children?.[0].override).toBe('drives far');
        expect(car.override).toBeUndefined();
    });

    it('should share untouched subtrees with the input', () => {
        const result = attachOverrides(forest, { DescribeCar: 'the car' });

        expect(result[0]).not.toBe(forest[0]);
        expect(result[0].children).toBe(forest[0].children);
        expect(result[1]).toBe(forest[1]);
    });

    it('should not mutate the input forest', () => {
        attachOverrides(forest, { 'DescribeBike > test_rolls': 'rolls downhill' });

        expect(forest[1].children?.[0].override).toBeUndefined();
    });

    it('should ignore blank and unknown entries', () => {
        const result = attachOverrides(forest, { DescribeCar: '  ', DescribeTrain: 'a train' });

        expect(result[0]).toBe(forest[0]);
        expect(result[1]).toBe(forest[1]);
    });
});
