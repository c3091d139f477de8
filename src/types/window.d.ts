/**
 * Window type definitions
 */

import type {DisplayId, Rect} from './geometry.js';

/**
 * Classification rule for windows of interest
 * Patterns are case-insensitive globs where '*' matches any run of characters
 */
export interface WindowType {
    readonly id: string;
    readonly name: string;
    readonly titlePattern: string;
    readonly classPattern: string;
    readonly enabled: boolean;
}

/**
 * Detected and classified window snapshot
 *
 * Identity is the window id alone. Two detection passes produce fresh
 * records for the same window; compare them with sameWindow().
 */
export interface ManagedWindow {
    readonly id: number;
    readonly pid: number;
    readonly title: string;
    readonly windowClass: string;
    readonly frame: Rect;
    readonly displayId: DisplayId;
    readonly type: WindowType;
}

/**
 * Basic window information returned by a point pick
 */
export interface WindowInfo {
    readonly id: number;
    readonly pid: number;
    readonly title: string;
    readonly windowClass: string;
    readonly frame: Rect;
}
