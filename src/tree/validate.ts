/**
 * Structural checks on a collected forest
 */

import { MalformedTreeError } from '../errors.js';
import type { SpecNode } from '../types.js';

const OUTCOMES = new Set(['passed', 'failed', 'skipped']);

function validateNode(node: SpecNode, parentPath: readonly string[]): void {
    const path = [...parentPath, node.identifier];
    const kind: string = node.kind;

    if(node.kind === 'suite') {
        if(node.outcome !== undefined) {
            throw new MalformedTreeError(path, 'suite carries an outcome');
        }
        for(const child of node.children ?? []) {
            validateNode(child, path);
        }
        return;
    }

    if(node.kind === 'example') {
        if(node.children !== undefined) {
            throw new MalformedTreeError(path, 'example carries children');
        }
        if(node.outcome === undefined || !OUTCOMES.has(node.outcome)) {
            throw new MalformedTreeError(path, `example has no valid outcome (${String(node.outcome)})`);
        }
        return;
    }

    throw new MalformedTreeError(path, `unknown node kind "${kind}"`);
}

/**
 * Throw MalformedTreeError on the first node breaking the suite/example contract
 */
export function validateForest(roots: readonly SpecNode[]): void {
    for(const root of roots) {
        validateNode(root, []);
    }
}
