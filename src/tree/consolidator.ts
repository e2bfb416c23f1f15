/**
 * Tree consolidator
 * Flattens a suite/example forest into render blocks without repeating headers
 */

import type { DescriptionResolver } from '../description/resolver.js';
import { MalformedTreeError } from '../errors.js';
import type { RenderBlock, RenderedExample, SpecNode } from '../types.js';
import { validateForest } from './validate.js';

export interface TreeConsolidatorOptions {
    /**
     * Emit header-only blocks for suites without children
     * @default false
     */
    includeEmptySuites?: boolean
}

function sharedPrefixLength(printed: readonly string[], chain: readonly string[]): number {
    const limit = Math.min(printed.length, chain.length);
    let shared = 0;
    while(shared < limit && printed[shared] === chain[shared]) {
        shared++;
    }
    return shared;
}

export class TreeConsolidator {
    private readonly includeEmptySuites: boolean;

    constructor(
        private readonly resolver: DescriptionResolver,
        options: TreeConsolidatorOptions = {}
    ) {
        this.includeEmptySuites = options.includeEmptySuites ?? false;
    }

    /**
     * Walk the forest depth-first and emit one block per example.
     * Each block only carries the ancestor headers that are not already printed.
     *
     * @throws MalformedTreeError when a suite has an outcome or an example has children
     */
    public consolidate(roots: readonly SpecNode[]): RenderBlock[] {
        validateForest(roots);

        const blocks: RenderBlock[] = [];
        // Headers currently printed for the active ancestor chain
        let printed: readonly string[] = [];

        const emit = (chain: readonly string[], example?: RenderedExample): void => {
            const depth = sharedPrefixLength(printed, chain);
            const headerPath = chain.slice(depth);
            if(!example && headerPath.length === 0) {
                return;
            }

            blocks.push(example ? { headerPath, depth, example } : { headerPath, depth });
            printed = chain;
        };

        const visit = (node: SpecNode, chain: readonly string[], path: readonly string[]): void => {
            const nodePath = [...path, node.identifier];
            if(node.kind === 'example') {
                if(node.outcome === undefined) {
                    throw new MalformedTreeError(nodePath, 'example has no valid outcome (undefined)');
                }
                emit(chain, {
                    phrase:  this.resolver.resolve(node),
                    outcome: node.outcome,
                });
                return;
            }

            const suiteChain = [...chain, this.resolver.resolve(node)];
            const children = node.children ?? [];
            if(children.length === 0) {
                if(this.includeEmptySuites) {
                    emit(suiteChain);
                }
                return;
            }

            for(const child of children) {
                visit(child, suiteChain, nodePath);
            }
        };

        for(const root of roots) {
            visit(root, [], []);
        }

        return blocks;
    }
}
