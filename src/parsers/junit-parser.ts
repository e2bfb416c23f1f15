/**
 * JUnit XML parser for Bun's JUnit reporter output
 *
 * Turns nested testsuite hierarchies into a forest of suites and examples.
 *
 * Example JUnit structure:
 * ```xml
 * <testsuites>
 *   <testsuite name="car.test.ts" file="car.test.ts">
 *     <testsuite name="DescribeCar" line="3">
 *       <testcase name="test_has_engine" file="car.test.ts" line="4" time="0.001" />
 *       <testsuite name="WithFullTank" line="8">
 *         <testcase name="test_drive_long_distance" file="car.test.ts" line="9" time="0.002">
 *           <failure type="AssertionError" />
 *         </testcase>
 *       </testsuite>
 *     </testsuite>
 *   </testsuite>
 * </testsuites>
 * ```
 */

import type { Outcome, SpecNode } from '../types.js';

const MAX_CODE_POINT = 0x10ffff;

/**
 * Decode a numeric character reference, keeping it as written when out of range
 */
function decodeCharacterReference(entity: string, decimal: string | undefined, hex: string | undefined): string {
  const code = decimal !== undefined ? parseInt(decimal, 10) : parseInt(hex ?? '', 16);
  if (!Number.isSafeInteger(code) || code > MAX_CODE_POINT) {
    return entity;
  }
  return String.fromCodePoint(code);
}

/**
 * Unescape XML entities
 */
function unescapeXml(str: string): string {
  return str
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&#(\d+);|&#x([0-9a-f]+);/gi, decodeCharacterReference)
    .replace(/&amp;/g, '&');
}

/**
 * Extract attribute value from an XML tag string
 */
function extractAttribute(tag: string, attrName: string): string | undefined {
  const pattern = new RegExp(`(?:^|\\s)${attrName}="([^"]*)"`, 'i');
  const match = tag.match(pattern);
  return match ? unescapeXml(match[1]) : undefined;
}

/**
 * Outcome from the elements nested in a testcase
 */
function outcomeOf(body: string): Outcome {
  if (/<(?:failure|error)\b/.test(body)) {
    return 'failed';
  }
  if (/<skipped\b/.test(body)) {
    return 'skipped';
  }
  return 'passed';
}

/**
 * Collect the body of a non-self-closing testcase, starting after its opening tag
 */
function collectTestcaseBody(rest: string, lines: string[], start: number): { body: string; end: number } {
  if (rest.includes('</testcase>')) {
    return { body: rest, end: start };
  }

  const bodyLines = [rest];
  for (let j = start + 1; j < lines.length; j++) {
    const nextLine = lines[j].trim();
    if (nextLine.includes('</testcase>')) {
      bodyLines.push(nextLine);
      return { body: bodyLines.join('\n'), end: j };
    }
    bodyLines.push(nextLine);
  }
  return { body: bodyLines.join('\n'), end: lines.length - 1 };
}

/**
 * Parse JUnit XML output from Bun's test runner
 *
 * File-level testsuites (whose name is the file) are transparent: their
 * describe blocks become root suites.
 *
 * @param xml - JUnit XML string from Bun's --reporter=junit
 * @returns Forest of suites and examples in document order
 */
export function parseJunitXml(xml: string): SpecNode[] {
  if (!xml || typeof xml !== 'string') {
    return [];
  }

  const roots: SpecNode[] = [];
  // Child lists of the open testsuites; transparent file suites reuse their parent's list
  const containerStack: SpecNode[][] = [];
  const currentContainer = (): SpecNode[] => containerStack[containerStack.length - 1] ?? roots;

  const lines = xml.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();

    // Self-closing testsuite - an empty describe block or an empty file
    const testsuiteSelfClosingMatch = line.match(/^<testsuite\s+([^>]*?)\s*\/>$/);
    if (testsuiteSelfClosingMatch) {
      const attrs = testsuiteSelfClosingMatch[1];
      const name = extractAttribute(attrs, 'name');
      const file = extractAttribute(attrs, 'file');
      if (name && (!file || name !== file)) {
        currentContainer().push({ identifier: name, kind: 'suite', children: [] });
      }
      continue;
    }

    // Opening testsuite tag - a describe block or a file
    const testsuiteOpenMatch = line.match(/^<testsuite\s+([^>]+)>$/);
    if (testsuiteOpenMatch) {
      const attrs = testsuiteOpenMatch[1];
      const name = extractAttribute(attrs, 'name');
      const file = extractAttribute(attrs, 'file');

      if (name && (!file || name !== file)) {
        const children: SpecNode[] = [];
        currentContainer().push({ identifier: name, kind: 'suite', children });
        containerStack.push(children);
      } else {
        containerStack.push(currentContainer());
      }
      continue;
    }

    if (line === '</testsuite>') {
      containerStack.pop();
      continue;
    }

    const testcaseMatch = line.match(/^<testcase\s+([^>]*?)\s*(\/?)>(.*)$/);
    if (testcaseMatch) {
      const [, attrs, selfClosing, rest] = testcaseMatch;
      const name = extractAttribute(attrs, 'name');
      if (!name) {
        continue;
      }

      let outcome: Outcome = 'passed';
      if (!selfClosing) {
        const { body, end } = collectTestcaseBody(rest, lines, i);
        outcome = outcomeOf(body);
        i = end;
      }

      currentContainer().push({ identifier: name, kind: 'example', outcome });
    }
  }

  return roots;
}
