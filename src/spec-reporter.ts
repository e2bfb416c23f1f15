/**
 * Spec reporter
 * Runs the resolve → consolidate → render pipeline for one collected forest
 */

import { DescriptionResolver } from './description/resolver.js';
import { MalformedTreeError } from './errors.js';
import type { Logger } from './logging.js';
import type { SpecReporterOptions } from './options.js';
import { renderLines, type RenderedLine } from './output/renderer.js';
import { TreeConsolidator } from './tree/consolidator.js';
import type { SpecNode, TestSummary } from './types.js';

/**
 * Whether the spec output replaces the runner's default output.
 * Verbose runs keep the default line-per-test output.
 */
export function shouldFormat(enabled: boolean, verbose: boolean): boolean {
    return enabled && !verbose;
}

/**
 * Count example outcomes in a forest
 */
export function summarize(roots: readonly SpecNode[]): TestSummary {
    const summary: TestSummary = { passed: 0, failed: 0, skipped: 0, total: 0 };

    const visit = (node: SpecNode): void => {
        if(node.kind === 'example') {
            if(node.outcome) {
                summary[node.outcome]++;
                summary.total++;
            }
            return;
        }
        node.children?.forEach(visit);
    };
    roots.forEach(visit);

    return summary;
}

export class SpecReporter {
    private readonly enabled:            boolean;
    private readonly verbose:            boolean;
    private readonly fillerPhrases?:     readonly string[];
    private readonly includeEmptySuites: boolean;

    constructor(
        private readonly logger: Logger,
        options: SpecReporterOptions = {}
    ) {
        this.enabled = options.enabled ?? true;
        this.verbose = options.verbose ?? false;
        this.fillerPhrases = options.fillerPhrases;
        this.includeEmptySuites = options.includeEmptySuites ?? false;

        this.logger.debug('SpecReporter initialized with options: %o', {
            enabled:            this.enabled,
            verbose:            this.verbose,
            fillerPhrases:      this.fillerPhrases,
            includeEmptySuites: this.includeEmptySuites,
        });
    }

    public get active(): boolean {
        return shouldFormat(this.enabled, this.verbose);
    }

    /**
     * Render a forest as typed lines.
     * Returns undefined when formatting is off or the forest is malformed,
     * in which case the caller falls back to its default output.
     */
    public reportLines(roots: readonly SpecNode[]): RenderedLine[] | undefined {
        if(!this.active) {
            this.logger.debug('Spec formatting bypassed (enabled: %s, verbose: %s)', this.enabled, this.verbose);
            return undefined;
        }

        // Fresh resolver per run: phrases are never shared between forests
        const resolver = new DescriptionResolver({ fillerPhrases: this.fillerPhrases });
        const consolidator = new TreeConsolidator(resolver, { includeEmptySuites: this.includeEmptySuites });

        try {
            const blocks = consolidator.consolidate(roots);
            this.logger.debug('Consolidated %d root nodes into %d blocks', roots.length, blocks.length);
            return renderLines(blocks);
        } catch (error) {
            if(error instanceof MalformedTreeError) {
                this.logger.error('Cannot format test tree: %s', error.message);
                return undefined;
            }
            throw error;
        }
    }

    /**
     * Render a forest as plain text lines
     */
    public report(roots: readonly SpecNode[]): string[] | undefined {
        return this.reportLines(roots)?.map(line => line.text);
    }
}
