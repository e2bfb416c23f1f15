/**
 * Identifier classifier
 * Detects the semantic prefix of a suite or example identifier
 */

import type { Classification, NodeKind, SuiteRole } from '../types.js';

interface SuitePrefixRule {
    prefix: string
    role:   Exclude<SuiteRole, 'unclassified'>
}

/**
 * Checked in order, first match wins
 */
export const SUITE_PREFIXES: readonly SuitePrefixRule[] = [
    { prefix: 'Describe', role: 'object' },
    { prefix: 'Test', role: 'object' },
    { prefix: 'With', role: 'with' },
    { prefix: 'Without', role: 'without' },
    { prefix: 'When', role: 'when' },
];

export const EXAMPLE_PREFIXES: readonly string[] = ['test_', 'it_'];

const WORD_START = /^[\p{Lu}\p{Nd}_]/u;

function classifySuite(identifier: string): Classification {
    for(const { prefix, role } of SUITE_PREFIXES) {
        if(!identifier.startsWith(prefix)) {
            continue;
        }

        const remainder = identifier.slice(prefix.length);
        // The prefix must be a whole word: "Testimonials" and "WithoutFuel" fail for "Test" and "With"
        if(!WORD_START.test(remainder)) {
            continue;
        }
        return { role, stripped: remainder };
    }

    return { role: 'unclassified', stripped: identifier };
}

function classifyExample(identifier: string): Classification {
    const prefix = EXAMPLE_PREFIXES.find(p => identifier.startsWith(p));
    return {
        role:     'example',
        stripped: prefix ? identifier.slice(prefix.length) : identifier,
    };
}

/**
 * Classify an identifier by its prefix
 *
 * @example
 * classify('WithFullTank', 'suite')       // { role: 'with', stripped: 'FullTank' }
 * classify('test_has_engine', 'example')  // { role: 'example', stripped: 'has_engine' }
 */
export function classify(identifier: string, kind: NodeKind): Classification {
    return kind === 'suite' ? classifySuite(identifier) : classifyExample(identifier);
}
