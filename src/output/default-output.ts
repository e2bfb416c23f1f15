/**
 * Plain line-per-test output, used when spec formatting is bypassed
 */

import { PATH_SEPARATOR } from '../overrides.js';
import type { Outcome, SpecNode, TestSummary } from '../types.js';

const OUTCOME_LABELS: Readonly<Record<Outcome, string>> = {
    passed:  'PASSED',
    failed:  'FAILED',
    skipped: 'SKIPPED',
};

/**
 * One line per example: "Outer > Inner > test_name ... PASSED"
 */
export function renderDefault(roots: readonly SpecNode[]): string[] {
    const lines: string[] = [];

    const visit = (node: SpecNode, path: readonly string[]): void => {
        const nodePath = [...path, node.identifier];
        if(node.kind === 'example') {
            const label = node.outcome ? OUTCOME_LABELS[node.outcome] : 'UNKNOWN';
            lines.push(`${nodePath.join(PATH_SEPARATOR)} ... ${label}`);
            return;
        }
        node.children?.forEach(child => visit(child, nodePath));
    };
    roots.forEach(root => visit(root, []));

    return lines;
}

export function formatSummary(summary: TestSummary): string {
    const noun = summary.total === 1 ? 'example' : 'examples';
    return `${summary.total} ${noun}: ${summary.passed} passed, ${summary.failed} failed, ${summary.skipped} skipped`;
}
