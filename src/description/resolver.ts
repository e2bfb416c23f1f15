/**
 * Description resolver
 * Picks the display phrase of a node: override, then documentation, then derived name
 */

import { EmptyPhraseError } from '../errors.js';
import type { SpecNode } from '../types.js';
import { classify } from './classifier.js';
import { formatPhrase, legibleFallback } from './phrase-formatter.js';

export const UNNAMED_PHRASE = '(unnamed)';

export const DEFAULT_FILLER_PHRASES: readonly string[] = ['with more details'];

export interface DescriptionResolverOptions {
    /**
     * Trailing "with ..." segments dropped from documentation lines
     * @default ['with more details']
     */
    fillerPhrases?: readonly string[]
}

function normalizeFiller(phrase: string): string {
    const normalized = phrase.trim().toLowerCase().replace(/\.+$/, '').trimEnd();
    return normalized.startsWith('with ') ? normalized : `with ${normalized}`;
}

/**
 * First line of a documentation block, trimmed
 */
export function firstDocumentationLine(documentation: string): string {
    const newline = documentation.search(/\r?\n/);
    const line = newline === -1 ? documentation : documentation.slice(0, newline);
    return line.trim();
}

export class DescriptionResolver {
    private readonly fillers:  ReadonlySet<string>;
    private readonly resolved = new WeakMap<SpecNode, string>();

    constructor(options: DescriptionResolverOptions = {}) {
        const phrases = options.fillerPhrases ?? DEFAULT_FILLER_PHRASES;
        this.fillers = new Set(phrases.map(normalizeFiller));
    }

    /**
     * Resolve the display phrase of a node. Never throws, never returns an empty string.
     */
    public resolve(node: SpecNode): string {
        const cached = this.resolved.get(node);
        if(cached !== undefined) {
            return cached;
        }

        const phrase = this.resolveUncached(node);
        this.resolved.set(node, phrase);
        return phrase;
    }

    private resolveUncached(node: SpecNode): string {
        if(node.override && node.override.trim()) {
            return node.override;
        }

        if(node.documentation) {
            const line = firstDocumentationLine(node.documentation);
            if(line) {
                return this.dropFiller(line);
            }
        }

        return this.derive(node);
    }

    /**
     * Drop a trailing "with ..." segment listed as filler
     */
    public dropFiller(line: string): string {
        if(this.fillers.size === 0) {
            return line;
        }

        let boundary = line.indexOf(' with ');
        while(boundary !== -1) {
            const tail = line.slice(boundary + 1).toLowerCase().replace(/\.+$/, '').trimEnd();
            if(this.fillers.has(tail)) {
                const head = line.slice(0, boundary).trimEnd();
                return head || line;
            }
            boundary = line.indexOf(' with ', boundary + 1);
        }
        return line;
    }

    private derive(node: SpecNode): string {
        const { role, stripped } = classify(node.identifier, node.kind);

        if(role !== 'unclassified') {
            try {
                return formatPhrase(stripped, role);
            } catch (error) {
                if(!(error instanceof EmptyPhraseError)) {
                    throw error;
                }
            }
        }

        return legibleFallback(node.identifier) || UNNAMED_PHRASE;
    }
}
