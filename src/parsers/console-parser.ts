/**
 * Console output parser for Bun test results
 * Rebuilds the describe hierarchy from Bun's "Outer > Inner > test" result lines
 */

import type { Outcome, SpecNode } from '../types.js';

export const NAME_SEPARATOR = ' > ';

interface Container {
    children:   SpecNode[]
    /**
     * Set while the most recent child is a suite, so following results can reuse it
     */
    lastSuite?: { identifier: string, container: Container }
}

interface TestLine {
    path:    string[]
    outcome: Outcome
}

const RESULT_PATTERNS: readonly { pattern: RegExp, outcome: Outcome }[] = [
    // ✓ test name [0.12ms]
    { pattern: /^(?:✓|\(pass\)) +(.+)$/, outcome: 'passed' },
    // ✗ test name [0.05ms], or (fail) in bail mode
    { pattern: /^(?:✗|\(fail\)) +(.+)$/, outcome: 'failed' },
    // ⏭ test name, (skip) and (todo)
    { pattern: /^(?:⏭|\(skip\)|\(todo\)) +(.+)$/, outcome: 'skipped' },
];

/**
 * Parse file path from line
 */
function parseFilePath(line: string): string | null {
    // Match file header: tests/example.test.ts: or src/foo.test.tsx:
    const fileMatch = /^([\w./-]+\.(?:test|spec)\.(?:ts|tsx|js|jsx|mts|mjs|cts|cjs)):$/.exec(line);
    return fileMatch ? fileMatch[1] : null;
}

/**
 * Parse individual test result line
 */
function parseTestLine(line: string): TestLine | null {
    for(const { pattern, outcome } of RESULT_PATTERNS) {
        const match = pattern.exec(line);
        if(match) {
            const fullName = match[1].replace(/\s*\[[0-9.]+m?s\]$/, '').trim();
            const path = fullName.split(NAME_SEPARATOR).map(segment => segment.trim());
            return { path, outcome };
        }
    }
    return null;
}

function addTest(root: Container, { path, outcome }: TestLine): void {
    const identifier = path[path.length - 1];
    let container = root;

    for(const segment of path.slice(0, -1)) {
        if(container.lastSuite?.identifier === segment) {
            container = container.lastSuite.container;
            continue;
        }

        const children: SpecNode[] = [];
        container.children.push({ identifier: segment, kind: 'suite', children });
        const next: Container = { children };
        container.lastSuite = { identifier: segment, container: next };
        container = next;
    }

    container.children.push({ identifier, kind: 'example', outcome });
    container.lastSuite = undefined;
}

/**
 * Parse Bun test console output into a forest of suites and examples
 *
 * Example Bun output:
 * ```
 * bun test v1.x.x
 *
 * tests/car.test.ts:
 * ✓ DescribeCar > test_has_engine [0.12ms]
 * ✗ DescribeCar > WithFullTank > test_drive_long_distance [0.05ms]
 *   error: Expected 1 to equal 2
 * ⏭ DescribeCar > it_pending
 *
 *  1 pass
 *  1 fail
 *  1 skip
 * ```
 */
export function parseBunTestOutput(stdout: string, stderr = ''): SpecNode[] {
    const root: Container = { children: [] };

    // Bun writes results to stderr, so both streams are scanned
    const output = stdout + '\n' + stderr;

    for(const rawLine of output.split('\n')) {
        const line = rawLine.trimEnd();

        if(parseFilePath(line)) {
            // Describe blocks never span files
            root.lastSuite = undefined;
            continue;
        }

        const testLine = parseTestLine(line);
        if(testLine) {
            addTest(root, testLine);
        }
    }

    return root.children;
}
