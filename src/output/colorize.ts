/**
 * Terminal colouring for rendered lines
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { RenderedLine } from './renderer.js';

/**
 * Chalk instance honouring the colour switch; level 0 emits plain text
 */
export function createPainter(color: boolean): ChalkInstance {
    return color ? new Chalk() : new Chalk({ level: 0 });
}

export function colorizeLine(line: RenderedLine, paint: ChalkInstance): string {
    switch(line.kind) {
        case 'header':
            return paint.bold(line.text);
        case 'blank':
            return line.text;
        case 'example':
            if(line.outcome === 'passed') {
                return paint.green(line.text);
            }
            return line.outcome === 'failed' ? paint.red(line.text) : paint.yellow(line.text);
    }
}
