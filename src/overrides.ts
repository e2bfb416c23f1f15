/**
 * Description overrides
 *
 * Helpers that attach an explicit description to a node before it reaches the
 * resolver. An override always wins over documentation and the derived name.
 */

import { InvalidOverrideError } from './errors.js';
import type { NodeKind, SpecNode } from './types.js';

export type OverrideHelper = (description: string) => (node: SpecNode) => SpecNode;

function applyOverride(node: SpecNode, description: string, helper: string, kind: NodeKind): SpecNode {
    if(node.kind !== kind) {
        throw new InvalidOverrideError(`${helper}() applies to ${kind} nodes, got ${node.kind} "${node.identifier}"`);
    }
    return { ...node, override: description };
}

function buildOverrideHelper(helper: string, kind: NodeKind): OverrideHelper {
    return (description) => {
        const cleaned = description.trim();
        if(!cleaned) {
            throw new InvalidOverrideError(`${helper}() requires a non-empty description`);
        }
        return node => applyOverride(node, cleaned, helper, kind);
    };
}

export const describeAs = buildOverrideHelper('describeAs', 'suite');
export const withAs = buildOverrideHelper('withAs', 'suite');
export const withoutAs = buildOverrideHelper('withoutAs', 'suite');
export const whenAs = buildOverrideHelper('whenAs', 'suite');
export const itAs = buildOverrideHelper('itAs', 'example');

export const PATH_SEPARATOR = ' > ';

/**
 * Copy a forest, attaching overrides keyed by identifier path ("Outer > Inner > it_works").
 * Subtrees without a matching key are shared with the input.
 */
export function attachOverrides(
    roots: readonly SpecNode[],
    overrides: Readonly<Record<string, string>>
): SpecNode[] {
    const entries = new Map(
        Object.entries(overrides)
            .map(([path, description]): [string, string] => [path, description.trim()])
            .filter(([, description]) => description.length > 0)
    );

    const visit = (node: SpecNode, parentPath: string): SpecNode => {
        const path = parentPath ? `${parentPath}${PATH_SEPARATOR}${node.identifier}` : node.identifier;
        const override = entries.get(path);

        const original = node.children;
        let children = original;
        if(original) {
            const mapped = original.map(child => visit(child, path));
            if(mapped.some((child, index) => child !== original[index])) {
                children = mapped;
            }
        }

        if(override === undefined && children === node.children) {
            return node;
        }
        return {
            ...node,
            ...(override !== undefined ? { override } : {}),
            ...(children !== undefined ? { children } : {}),
        };
    };

    return entries.size === 0 ? [...roots] : roots.map(root => visit(root, ''));
}
