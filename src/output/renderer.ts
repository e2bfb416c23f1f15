/**
 * Renderer
 * Maps render blocks to indented text lines
 */

import type { Outcome, RenderBlock } from '../types.js';

export const STATUS_GLYPHS: Readonly<Record<Outcome, string>> = {
    passed:  '✓',
    failed:  '✗',
    skipped: '»',
};

export type RenderedLine =
    | { kind: 'header', text: string }
    | { kind: 'example', text: string, outcome: Outcome }
    | { kind: 'blank', text: '' };

function indent(level: number): string {
    return '  '.repeat(level);
}

/**
 * Render blocks into typed lines, so a writer can colour them by kind
 */
export function renderLines(blocks: readonly RenderBlock[]): RenderedLine[] {
    const lines: RenderedLine[] = [];

    for(const block of blocks) {
        // Separate groups, but never an example from its own headers
        if(block.headerPath.length > 0 && lines.length > 0) {
            lines.push({ kind: 'blank', text: '' });
        }

        block.headerPath.forEach((header, offset) => {
            lines.push({ kind: 'header', text: `${indent(block.depth + offset)}${header}` });
        });

        if(block.example) {
            const { phrase, outcome } = block.example;
            const level = block.depth + block.headerPath.length;
            lines.push({
                kind: 'example',
                text: `${indent(level)}${STATUS_GLYPHS[outcome]} ${phrase}`,
                outcome,
            });
        }
    }

    return lines;
}

/**
 * Render blocks into plain text lines
 */
export function render(blocks: readonly RenderBlock[]): string[] {
    return renderLines(blocks).map(line => line.text);
}
