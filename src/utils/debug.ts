/**
 * Debug logging utility for TableGrid
 *
 * Provides conditional logging based on the debug-logging setting.
 * Errors and warnings are always logged. Info/debug logs require debug-logging enabled.
 *
 * Components create their own logger with createLogger('Component'), and
 * accept an injected Logger so tests can capture output without touching
 * the console.
 */

import type {Settings} from '../settings.js';

/**
 * Log levels
 */
export const LogLevel = {
    ERROR: 0,     // Always logged
    WARN: 1,      // Always logged
    INFO: 2,      // Conditional (requires debug-logging)
    DEBUG: 3,     // Conditional (requires debug-logging)
    MEMDEBUG: 4,  // Conditional (requires memory-debug)
} as const;

export type LogLevelType = typeof LogLevel[keyof typeof LogLevel];

/**
 * Destination for formatted log lines
 */
export interface LogSink {
    write(level: LogLevelType, line: string, args: unknown[]): void;
}

export const consoleSink: LogSink = {
    write(level, line, args) {
        if (level === LogLevel.ERROR) {
            console.error(line, ...args);
        } else if (level === LogLevel.WARN) {
            console.warn(line, ...args);
        } else {
            // eslint-disable-next-line no-console
            console.log(line, ...args);
        }
    },
};

// Cached settings reference and debug state
let _settings: Settings | null = null;
let _debugEnabled = false;
let _memDebugEnabled = false;
let _settingsChangedId: number | null = null;
let _memDebugChangedId: number | null = null;

function _onDebugLoggingChanged(): void {
    if (!_settings) return;
    _debugEnabled = _settings.get('debug-logging');
    console.error(`[TableGrid] Debug logging ${_debugEnabled ? 'enabled' : 'disabled'}`);
}

function _onMemoryDebugChanged(): void {
    if (!_settings) return;
    _memDebugEnabled = _settings.get('memory-debug');
    console.error(`[TableGrid] Memory debug logging ${_memDebugEnabled ? 'enabled' : 'disabled'}`);
}

/**
 * Follow the debug-logging and memory-debug settings
 * Called once on enable; calling again rebinds to the new settings object
 */
export function initDebugSettings(settings: Settings): void {
    destroyDebugSettings();

    _settings = settings;
    _debugEnabled = settings.get('debug-logging');
    _memDebugEnabled = settings.get('memory-debug');

    _settingsChangedId = settings.connect('changed::debug-logging', _onDebugLoggingChanged);
    _memDebugChangedId = settings.connect('changed::memory-debug', _onMemoryDebugChanged);
}

/**
 * Clean up settings connection (call on disable)
 */
export function destroyDebugSettings(): void {
    if (_settings && _settingsChangedId !== null) {
        _settings.disconnect(_settingsChangedId);
    }
    if (_settings && _memDebugChangedId !== null) {
        _settings.disconnect(_memDebugChangedId);
    }
    _settingsChangedId = null;
    _memDebugChangedId = null;
    _settings = null;
    _debugEnabled = false;
    _memDebugEnabled = false;
}

export function isDebugEnabled(): boolean {
    return _debugEnabled;
}

/**
 * Logger class with conditional output
 */
export class Logger {
    private _prefix: string;
    private _sink: LogSink;

    constructor(component = '', sink: LogSink = consoleSink) {
        this._prefix = component ? `[TableGrid:${component}]` : '[TableGrid]';
        this._sink = sink;
    }

    /**
     * Log error - always shown
     */
    error(message: string, ...args: unknown[]): void {
        this._sink.write(LogLevel.ERROR, `${this._prefix} ${message}`, args);
    }

    /**
     * Log warning - always shown
     */
    warn(message: string, ...args: unknown[]): void {
        this._sink.write(LogLevel.WARN, `${this._prefix} ${message}`, args);
    }

    /**
     * Log info - only when debug-logging enabled
     */
    info(message: string, ...args: unknown[]): void {
        if (_debugEnabled) {
            this._sink.write(LogLevel.INFO, `${this._prefix} ${message}`, args);
        }
    }

    /**
     * Log debug - only when debug-logging enabled
     */
    debug(message: string, ...args: unknown[]): void {
        if (_debugEnabled) {
            this._sink.write(LogLevel.DEBUG, `${this._prefix} [DEBUG] ${message}`, args);
        }
    }

    /**
     * Log memory debug - only when memory-debug enabled
     * Subscription lifecycle and cleanup logging
     */
    memdebug(message: string, ...args: unknown[]): void {
        if (_memDebugEnabled) {
            this._sink.write(LogLevel.MEMDEBUG, `${this._prefix} [MEMDEBUG] ${message}`, args);
        }
    }

    isDebugEnabled(): boolean {
        return _debugEnabled;
    }
}

/**
 * Create a logger for a specific component
 */
export function createLogger(component?: string, sink?: LogSink): Logger {
    return new Logger(component, sink);
}
