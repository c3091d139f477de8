/**
 * Window type helpers
 *
 * Built-in window types ship in config/default-window-types.json. Users add
 * their own from a picked window: windowTypeFromWindow() turns its title and
 * class into wildcard patterns, refineWindowType() narrows the title pattern
 * to what similar windows share.
 */

import {readFileSync} from 'node:fs';
import {fileURLToPath} from 'node:url';
import {randomUUID} from 'node:crypto';
import {z} from 'zod';
import {createLogger} from './utils/debug.js';
import {errorMessage} from './utils/errors.js';
import type {WindowInfo, WindowType} from './types/window.js';

const logger = createLogger('WindowTypes');

export const DEFAULT_WINDOW_TYPES_PATH = fileURLToPath(new URL('../config/default-window-types.json', import.meta.url));


export const WindowTypeSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    titlePattern: z.string(),
    classPattern: z.string(),
    enabled: z.boolean().default(true),
});

const DefaultWindowTypesFileSchema = z.object({
    version: z.number().int().default(0),
    windowTypes: z.array(z.unknown()),
});

/**
 * Parse a list of raw window type records, skipping invalid entries
 */
export function parseWindowTypes(records: readonly unknown[], source: string): WindowType[] {
    const windowTypes: WindowType[] = [];
    records.forEach((record, index) => {
        const result = WindowTypeSchema.safeParse(record);
        if (result.success) {
            windowTypes.push(result.data);
        } else {
            logger.warn(`Skipping invalid window type #${index} in ${source}: ${result.error.message}`);
        }
    });
    return windowTypes;
}

/**
 * Load the built-in window types
 * Returns an empty list when the file is missing or unreadable
 */
export function loadDefaultWindowTypes(path: string = DEFAULT_WINDOW_TYPES_PATH): WindowType[] {
    try {
        const data = DefaultWindowTypesFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
        const windowTypes = parseWindowTypes(data.windowTypes, path);
        logger.info(`Loaded ${windowTypes.length} default window types (version ${data.version})`);
        return windowTypes;
    } catch (error) {
        logger.error(`Error loading default window types from ${path}: ${errorMessage(error)}`);
        return [];
    }
}

/** Bundle id prefixes of known poker clients */
export const KNOWN_CLIENT_PREFIXES: readonly string[] = [
    'com.pokerstars', 'com.partypoker', 'com.888poker', 'com.ggpoker',
    'com.winamax', 'com.fulltilt', 'com.bodog', 'com.ignition',
    'app.pokerstars', 'app.partypoker', 'app.888poker',
];

/** Title words that mark a window as a likely poker table */
const POKER_TITLE_TOKENS: readonly string[] = [
    'poker', 'holdem', 'hold\'em', 'omaha', 'tournament',
    'texas', 'table', 'cash', 'sit & go', 'sit n go',
    'pokerstars', 'partypoker', '888poker', 'ggpoker', 'winamax',
];

// Preferred spelling of client names, checked in order
const CLIENT_DISPLAY_NAMES: ReadonlyArray<[string, string]> = [
    ['pokerstars', 'PokerStars'],
    ['partypoker', 'PartyPoker'],
    ['888poker', '888poker'],
    ['ggpoker', 'GGPoker'],
    ['winamax', 'Winamax'],
];

const TITLE_EXCERPT_LENGTH = 20;
const MIN_COMMON_WORD_LENGTH = 3;
const MAX_COMMON_WORDS = 2;

function isKnownClient(windowClass: string): boolean {
    const lower = windowClass.toLowerCase();
    return KNOWN_CLIENT_PREFIXES.some(prefix => lower.includes(prefix));
}

function capitalize(text: string): string {
    return text.split(' ').map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()).join(' ');
}

/**
 * Application name taken from a bundle-style window class
 * A trailing "app" or "client" segment defers to the segment before it.
 */
function appNameFromClass(windowClass: string): string {
    const segments = windowClass.split('.');
    if (segments.length < 2) {
        return 'Unknown';
    }

    const last = segments[segments.length - 1];
    if (last.toLowerCase() === 'app' || last.toLowerCase() === 'client') {
        return segments.length > 2 ? capitalize(segments[segments.length - 2]) : 'Unknown';
    }
    return capitalize(last);
}

/**
 * Table number or id mentioned in a title, if any
 */
function tableInfoFromTitle(title: string): string | null {
    const tableNumber = /table [0-9]+/i.exec(title);
    if (tableNumber) {
        return tableNumber[0];
    }
    const tableId = /#[0-9]+/.exec(title);
    if (tableId) {
        return tableId[0];
    }
    const longNumber = /[0-9]{4,}/.exec(title);
    return longNumber ? `Table ${longNumber[0]}` : null;
}

/**
 * Display name for a window type created from a picked window
 *
 * "<App> - <table info>" when the title names a table, "<App> Table" for a
 * known client, otherwise "<App> - <start of title>".
 */
export function generateWindowTypeName(info: Pick<WindowInfo, 'title' | 'windowClass'>): string {
    const known = isKnownClient(info.windowClass);
    let appName = appNameFromClass(info.windowClass);

    if (known) {
        const lowerClass = info.windowClass.toLowerCase();
        const display = CLIENT_DISPLAY_NAMES.find(([key]) => lowerClass.includes(key));
        if (display) {
            appName = display[1];
        }
    }

    const tableInfo = tableInfoFromTitle(info.title);
    if (tableInfo) {
        return `${appName} - ${tableInfo}`;
    }
    if (known) {
        return `${appName} Table`;
    }

    const excerpt = info.title.length > TITLE_EXCERPT_LENGTH
        ? `${info.title.slice(0, TITLE_EXCERPT_LENGTH - 3)}...`
        : info.title;
    return `${appName} - ${excerpt}`;
}

/**
 * Wildcard title pattern that also matches the other tables of a client
 *
 * Poker-like titles reduce to the game and/or "Table", then to the brand.
 * Anything else matches titles containing the whole original title.
 */
export function createTitlePattern(title: string): string {
    const lower = title.toLowerCase();

    if (POKER_TITLE_TOKENS.some(token => lower.includes(token))) {
        let gameType = '';
        if (lower.includes('hold\'em') || lower.includes('holdem')) {
            gameType = 'Hold\'em';
        } else if (lower.includes('omaha')) {
            gameType = 'Omaha';
        }
        const hasTable = lower.includes('table');

        if (gameType && hasTable) {
            return `*${gameType}*Table*`;
        }
        if (gameType) {
            return `*${gameType}*`;
        }
        if (hasTable) {
            return '*Table*';
        }

        if (lower.includes('pokerstars')) {
            return '*PokerStars*';
        }
        if (lower.includes('partypoker')) {
            return '*PartyPoker*';
        }
        if (lower.includes('888poker')) {
            return '*888poker*';
        }
    }

    return `*${title}*`;
}

/**
 * Class pattern for a picked window
 * Known clients match on their first two bundle segments, other bundle ids
 * exactly, plain application names anywhere in the class.
 */
export function createClassPattern(windowClass: string): string {
    if (!windowClass.includes('.')) {
        return `*${windowClass}*`;
    }

    if (isKnownClient(windowClass)) {
        const [vendor, product] = windowClass.split('.');
        return `${vendor}.${product}*`;
    }
    return windowClass;
}

function titleWords(title: string): string[] {
    return title
        .split(/\s+/)
        .map(word => word.replace(/^\p{P}+|\p{P}+$/gu, ''))
        .filter(word => word.length >= MIN_COMMON_WORD_LENGTH);
}

/**
 * Pattern built from the words all titles share
 *
 * Titles are compared in lower case; words shorter than three characters are
 * ignored. Up to two shared words are used, in the order they appear in the
 * first title. Without shared words the first title's pattern is used.
 */
export function findCommonTitlePattern(titles: readonly string[]): string {
    if (titles.length === 0) {
        return '*';
    }
    if (titles.length === 1) {
        return createTitlePattern(titles[0]);
    }

    const [first, ...rest] = titles.map(title => titleWords(title.toLowerCase()));
    const others = rest.map(words => new Set(words));
    const common = [...new Set(first)].filter(word => others.every(words => words.has(word)));

    if (common.length === 0) {
        return createTitlePattern(titles[0]);
    }
    return `*${common.slice(0, MAX_COMMON_WORDS).join('*')}*`;
}

/**
 * Window type recognizing the picked window and others of its kind
 */
export function windowTypeFromWindow(info: WindowInfo): WindowType {
    const windowType: WindowType = {
        id: randomUUID(),
        name: generateWindowTypeName(info),
        titlePattern: createTitlePattern(info.title),
        classPattern: createClassPattern(info.windowClass),
        enabled: true,
    };
    logger.info(`Created window type ${windowType.name} with pattern: ${windowType.titlePattern}`);
    return windowType;
}

/**
 * Narrow a window type's title pattern to what the picked window shares with
 * the other windows of the same class
 *
 * @param windows - Currently visible windows; the picked one may be among them
 * @returns A new window type; the title pattern is kept when no similar window exists
 */
export function refineWindowType(base: WindowType, picked: WindowInfo, windows: readonly WindowInfo[]): WindowType {
    const similar = windows.filter(window => window.windowClass === picked.windowClass && window.id !== picked.id);
    const titlePattern = similar.length > 0
        ? findCommonTitlePattern([picked.title, ...similar.map(window => window.title)])
        : base.titlePattern;

    logger.info(`Refined window type ${base.name} to pattern ${titlePattern} from ${similar.length} similar windows`);
    return {...base, id: randomUUID(), titlePattern};
}

/**
 * Duplicate a window type under a new id
 */
export function copyWindowType(windowType: WindowType): WindowType {
    return {...windowType, id: randomUUID(), name: `${windowType.name} (Copy)`};
}
