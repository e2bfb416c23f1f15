/**
 * Unit tests for the phrase formatter
 */

import { describe, it, expect } from 'vitest';
import {
    splitWords,
    formatWords,
    formatPhrase,
    legibleFallback,
    selectArticle
} from '../../src/description/phrase-formatter.js';
import { EmptyPhraseError } from '../../src/errors.js';

describe('splitWords', () => {
    it('should split on camel-case boundaries', () => {
        expect(splitWords('TheUserIsLoggedIn')).toEqual(['The', 'User', 'Is', 'Logged', 'In']);
    });

    it('should keep acronyms together', () => {
        expect(splitWords('APIController')).toEqual(['API', 'Controller']);
        expect(splitWords('HTTPSConnection')).toEqual(['HTTPS', 'Connection']);
        expect(splitWords('ParseURL')).toEqual(['Parse', 'URL']);
    });

    it('should not split on digits', () => {
        expect(splitWords('Version2Api')).toEqual(['Version2Api']);
        expect(splitWords('retries3times')).toEqual(['retries3times']);
    });

    it('should split on underscores and whitespace', () => {
        expect(splitWords('drive_long__distance')).toEqual(['drive', 'long', 'distance']);
        expect(splitWords('  starts  the engine ')).toEqual(['starts', 'the', 'engine']);
    });

    it('should return no words for separators only', () => {
        expect(splitWords('')).toEqual([]);
        expect(splitWords('__')).toEqual([]);
    });
});

describe('selectArticle', () => {
    it('should pick an before vowels, case-insensitively', () => {
        expect(selectArticle('Engine')).toBe('an');
        expect(selectArticle('umbrella')).toBe('an');
        expect(selectArticle('Car')).toBe('a');
    });
});

describe('formatWords', () => {
    it('should preserve acronyms', () => {
        expect(formatWords('APIController', 'object')).toBe('API Controller');
    });

    it('should lowercase common words after the keyword of a context', () => {
        expect(formatWords('TheUserIsLoggedIn', 'when')).toBe('the User is Logged In');
    });

    it('should never lowercase the first word of an object phrase', () => {
        expect(formatWords('TheBigOfficeOfTheMayor', 'object')).toBe('The Big Office of the Mayor');
    });

    it('should keep the last word as written', () => {
        expect(formatWords('LoggedIn', 'object')).toBe('Logged In');
    });

    it('should keep snake_case words lowercase', () => {
        expect(formatWords('drive_long_distance', 'example')).toBe('drive long distance');
    });

    it('should lowercase common words inside example phrases', () => {
        expect(formatWords('returns_The_Value_Of_X', 'example')).toBe('returns the Value of X');
    });

    it('should throw EmptyPhraseError when there are no words', () => {
        expect(() => formatWords('', 'object')).toThrow(EmptyPhraseError);
        expect(() => formatWords('___', 'example')).toThrow(EmptyPhraseError);
    });
});

describe('formatPhrase', () => {
    it('should prepend an article to object phrases', () => {
        expect(formatPhrase('Car', 'object')).toBe('a Car');
        expect(formatPhrase('APIController', 'object')).toBe('an API Controller');
        expect(formatPhrase('EngineStarter', 'object')).toBe('an Engine Starter');
    });

    it('should prepend the context keyword', () => {
        expect(formatPhrase('FullTank', 'with')).toBe('with Full Tank');
        expect(formatPhrase('AnEmptyTank', 'without')).toBe('without an Empty Tank');
        expect(formatPhrase('TheUserIsLoggedIn', 'when')).toBe('when the User is Logged In');
    });

    it('should return bare words for examples', () => {
        expect(formatPhrase('has_engine', 'example')).toBe('has engine');
    });
});

describe('legibleFallback', () => {
    it('should split words without article or lowercasing', () => {
        expect(legibleFallback('CarFeaturesOfTheYear')).toBe('Car Features Of The Year');
    });

    it('should return an empty string when there are no words', () => {
        expect(legibleFallback('')).toBe('');
    });
});
