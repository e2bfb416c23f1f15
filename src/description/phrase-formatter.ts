/**
 * Phrase formatter
 * Turns a stripped identifier into a natural-language phrase
 */

import { EmptyPhraseError } from '../errors.js';
import type { Role } from '../types.js';

/**
 * Function words kept lowercase inside a phrase
 */
export const COMMON_WORDS: ReadonlySet<string> = new Set([
    // articles
    'a', 'an', 'the',
    // conjunctions
    'and', 'but', 'or', 'nor', 'so', 'yet', 'if', 'than', 'then',
    // auxiliary verbs
    'is', 'are', 'was', 'were', 'be', 'been', 'being', 'am',
    'has', 'have', 'had', 'do', 'does', 'did',
    'can', 'could', 'shall', 'should', 'will', 'would', 'may', 'might', 'must',
    // prepositions
    'as', 'at', 'by', 'for', 'from', 'in', 'into', 'of', 'off', 'on', 'onto',
    'out', 'over', 'to', 'up', 'upon', 'via', 'with', 'without',
]);

const CONTEXT_KEYWORDS: Partial<Record<Role, string>> = {
    with:    'with',
    without: 'without',
    when:    'when',
};

const VOWELS = new Set(['a', 'e', 'i', 'o', 'u']);

/**
 * Split an identifier into words
 *
 * Underscores and whitespace separate words. Inside a word, a lowercase letter
 * followed by a capital starts a new word, and an acronym ends before its last
 * capital when that capital opens a lowercase run. Digits never split.
 *
 * @example
 * splitWords('HTTPSConnection')  // ['HTTPS', 'Connection']
 * splitWords('has_engine')       // ['has', 'engine']
 */
export function splitWords(text: string): string[] {
    return text
        .replace(/(\p{Ll})(\p{Lu})/gu, '$1 $2')
        .replace(/(\p{Lu})(\p{Lu}\p{Ll})/gu, '$1 $2')
        .split(/[\s_]+/)
        .filter(word => word.length > 0);
}

function isCommonWord(word: string): boolean {
    return COMMON_WORDS.has(word.toLowerCase());
}

/**
 * Lowercase common words that are neither first nor last in the rendered sequence.
 * `leadingWords` counts the keyword or article rendered before the words.
 */
function lowercaseCommonWords(words: string[], leadingWords: number): string[] {
    const lastIndex = words.length - 1;
    return words.map((word, index) => {
        const position = index + leadingWords;
        if(position === 0 || index === lastIndex) {
            return word;
        }
        return isCommonWord(word) ? word.toLowerCase() : word;
    });
}

/**
 * Choose the indefinite article for a phrase
 */
export function selectArticle(firstWord: string): 'a' | 'an' {
    return VOWELS.has(firstWord.charAt(0).toLowerCase()) ? 'an' : 'a';
}

/**
 * Format the word sequence of a phrase, without its article or keyword
 *
 * @throws EmptyPhraseError when the identifier contains no words
 *
 * @example
 * formatWords('APIController', 'object')     // 'API Controller'
 * formatWords('TheUserIsLoggedIn', 'when')   // 'the User is Logged In'
 */
export function formatWords(stripped: string, role: Role): string {
    const words = splitWords(stripped);
    if(words.length === 0) {
        throw new EmptyPhraseError(stripped);
    }

    const leadingWords = CONTEXT_KEYWORDS[role] ? 1 : 0;
    return lowercaseCommonWords(words, leadingWords).join(' ');
}

/**
 * Format a complete phrase: object phrases get an article,
 * context phrases their keyword
 *
 * @example
 * formatPhrase('Car', 'object')        // 'a Car'
 * formatPhrase('FullTank', 'with')     // 'with Full Tank'
 * formatPhrase('has_engine', 'example') // 'has engine'
 */
export function formatPhrase(stripped: string, role: Role): string {
    const words = formatWords(stripped, role);

    if(role === 'object') {
        return `${selectArticle(words)} ${words}`;
    }

    const keyword = CONTEXT_KEYWORDS[role];
    return keyword ? `${keyword} ${words}` : words;
}

/**
 * Last-resort rendering: split words only, no article and no lowercasing.
 * Returns an empty string when the identifier has no words.
 */
export function legibleFallback(identifier: string): string {
    return splitWords(identifier).join(' ');
}
