/**
 * PatternMatcher - Classifies windows against WindowType wildcard patterns
 *
 * Pattern semantics:
 * - '*' matches any run of characters, including none
 * - every other character is literal
 * - matching is case-insensitive and covers the whole string
 * - an empty pattern or '*' matches anything
 *
 * Compiled expressions are memoized in a bounded cache owned by the matcher.
 */

import type {WindowType} from './types/window.js';
import {BoundedCache} from './utils/boundedCache.js';
import {createLogger, Logger} from './utils/debug.js';
import {errorMessage} from './utils/errors.js';

const REGEX_METACHARACTERS = /[.+?^${}()|[\]\\]/g;

export interface PatternMatcherOptions {
    cache?: BoundedCache<string, RegExp>;
    logger?: Logger;
}

/**
 * Translate a wildcard pattern into an anchored, case-insensitive expression
 */
export function globToRegExp(pattern: string): RegExp {
    const body = pattern
        .split('*')
        .map(part => part.replace(REGEX_METACHARACTERS, '\\$&'))
        .join('.*');
    // 's' lets '*' span newlines in multi-line titles
    return new RegExp(`^${body}$`, 'is');
}

/**
 * Check that a wildcard pattern compiles
 * @returns Error message if invalid, null if valid
 */
export function validatePattern(pattern: string): string | null {
    try {
        globToRegExp(pattern);
        return null;
    } catch (e) {
        return `Invalid pattern: ${errorMessage(e)}`;
    }
}

export class PatternMatcher {
    private _cache: BoundedCache<string, RegExp>;
    private _logger: Logger;

    constructor({cache, logger}: PatternMatcherOptions = {}) {
        this._cache = cache ?? new BoundedCache<string, RegExp>();
        this._logger = logger ?? createLogger('PatternMatcher');
    }

    /**
     * Check if a window matches a window type
     * Both the title and the class pattern must match
     */
    matches(type: WindowType, title: string, windowClass: string): boolean {
        if (!type.enabled) {
            return false;
        }

        return this.matchesPattern(title, type.titlePattern) &&
               this.matchesPattern(windowClass, type.classPattern);
    }

    /**
     * Check a single string against a wildcard pattern
     */
    matchesPattern(value: string, pattern: string): boolean {
        if (pattern === '' || pattern === '*') {
            return true;
        }

        const regex = this._compile(pattern);
        return regex !== null && regex.test(value);
    }

    /**
     * First enabled type matching the window, in list order
     */
    classify(windowTypes: readonly WindowType[], title: string, windowClass: string): WindowType | null {
        for (const type of windowTypes) {
            if (this.matches(type, title, windowClass)) {
                return type;
            }
        }
        return null;
    }

    get cacheSize(): number {
        return this._cache.size;
    }

    private _compile(pattern: string): RegExp | null {
        const cached = this._cache.get(pattern);
        if (cached) {
            return cached;
        }

        try {
            const regex = globToRegExp(pattern);
            this._cache.set(pattern, regex);
            return regex;
        } catch (e) {
            this._logger.error(`Invalid pattern '${pattern}': ${errorMessage(e)}`);
            return null;
        }
    }
}
