/**
 * WindowDetector - Reads the on-screen window list and classifies it
 *
 * Detection is read-only with respect to the windowing system: it never
 * moves, raises or otherwise alters a window. Each call returns a fresh
 * snapshot; nothing from a previous call is reused.
 *
 * Filtering order for detect():
 * 1. malformed records (missing id, pid, title or bounds) are skipped
 * 2. zero-size windows are skipped
 * 3. fully transparent windows are skipped
 * 4. the owner process is resolved into a window class string
 * 5. enabled window types are tried in list order, first match wins
 * 6. duplicate window ids keep their first occurrence
 */

import {z} from 'zod';
import type {DisplayId, Point, Rect} from './types/geometry.js';
import type {ManagedWindow, WindowInfo, WindowType} from './types/window.js';
import type {DisplayProvider, OwnerIdentity, WindowEnvironment} from './types/platform.js';
import {PatternMatcher} from './patternMatcher.js';
import {createLogger, Logger} from './utils/debug.js';
import {PlatformError, PlatformErrorCode, errorMessage} from './utils/errors.js';
import {rectCenter, rectContains} from './utils/geometry.js';

/**
 * Owners never offered by the point picker (dock, menu bar, desktop, ...)
 */
export const SYSTEM_OWNER_PREFIXES: readonly string[] = [
    'com.apple.dock',
    'com.apple.WindowManager',
    'com.apple.systemuiserver',
    'com.apple.notificationcenterui',
    'com.apple.controlcenter',
    'com.apple.finder',
];

// Point picking ignores decorative slivers and near-invisible overlays
const PICK_MIN_SIZE = 10;
const PICK_MIN_ALPHA = 0.1;

const BoundsSchema = z.object({
    x: z.number().finite(),
    y: z.number().finite(),
    width: z.number().finite(),
    height: z.number().finite(),
});

const DetectableWindowSchema = z.object({
    id: z.number().int(),
    pid: z.number().int(),
    title: z.string(),
    bounds: BoundsSchema,
    alpha: z.number().optional(),
    owner: z.string().optional(),
});

const PickableWindowSchema = z.object({
    id: z.number().int(),
    pid: z.number().int(),
    title: z.string().optional(),
    bounds: BoundsSchema,
    layer: z.number().int(),
    alpha: z.number(),
    owner: z.string().optional(),
});

export interface WindowDetectorOptions {
    environment: WindowEnvironment;
    displays: DisplayProvider;
    matcher?: PatternMatcher;
    logger?: Logger;
}

export class WindowDetector {
    private _environment: WindowEnvironment;
    private _displays: DisplayProvider;
    private _matcher: PatternMatcher;
    private _logger: Logger;

    constructor({environment, displays, matcher, logger}: WindowDetectorOptions) {
        this._environment = environment;
        this._displays = displays;
        this._logger = logger ?? createLogger('WindowDetector');
        this._matcher = matcher ?? new PatternMatcher({logger: this._logger});
    }

    /**
     * Detect windows matching any of the enabled window types
     *
     * @param windowTypes - Types to test, in priority order
     * @returns Classified windows in on-screen enumeration order
     * @throws PlatformError with NO_DISPLAYS when the display list is empty
     */
    detect(windowTypes: readonly WindowType[]): ManagedWindow[] {
        const enabledTypes = windowTypes.filter(type => type.enabled);
        if (enabledTypes.length === 0) {
            this._logger.debug('No enabled window types, nothing to detect');
            return [];
        }

        if (this._displays.enumerateDisplays().length === 0) {
            throw new PlatformError(PlatformErrorCode.NO_DISPLAYS, 'No displays available for window detection');
        }

        const records = this._environment.enumerateWindows();
        const classCache = new Map<number, string>();
        const seenIds = new Set<number>();
        const detected: ManagedWindow[] = [];

        for (const record of records) {
            const parsed = DetectableWindowSchema.safeParse(record);
            if (!parsed.success) {
                this._logger.debug(`Skipping malformed window record: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
                continue;
            }

            const {id, pid, title, bounds, alpha = 1, owner} = parsed.data;

            if (bounds.width <= 0 || bounds.height <= 0) {
                continue;
            }

            if (alpha <= 0) {
                continue;
            }

            if (seenIds.has(id)) {
                continue;
            }

            let windowClass = classCache.get(pid);
            if (windowClass === undefined) {
                windowClass = this.resolveWindowClass(pid, owner);
                classCache.set(pid, windowClass);
            }

            const type = this._matcher.classify(enabledTypes, title, windowClass);
            if (!type) {
                continue;
            }

            const frame: Rect = {...bounds};
            seenIds.add(id);
            detected.push({
                id,
                pid,
                title,
                windowClass,
                frame,
                displayId: this.displayForFrame(frame),
                type,
            });

            this._logger.debug(`Detected window: ${title} [${type.name}]`);
        }

        return detected;
    }

    /**
     * Pick the topmost eligible window containing a screen point
     *
     * @param point - Screen position, usually the mouse cursor
     * @returns Window information, or null if nothing qualifies
     */
    pickAt(point: Point): WindowInfo | null {
        const records = this._environment.enumerateWindows();
        let best: {info: WindowInfo; layer: number} | null = null;

        for (const record of records) {
            const parsed = PickableWindowSchema.safeParse(record);
            if (!parsed.success) {
                continue;
            }

            const {id, pid, title = '', bounds, layer, alpha, owner} = parsed.data;

            if (bounds.width <= PICK_MIN_SIZE || bounds.height <= PICK_MIN_SIZE || alpha <= PICK_MIN_ALPHA) {
                continue;
            }

            if (!rectContains(bounds, point)) {
                continue;
            }

            const windowClass = this.resolveWindowClass(pid, owner);
            if (SYSTEM_OWNER_PREFIXES.some(prefix => windowClass.startsWith(prefix))) {
                continue;
            }

            // Lower layer is closer to the front; first seen wins ties
            if (best === null || layer < best.layer) {
                best = {
                    info: {id, pid, title, windowClass, frame: {...bounds}},
                    layer,
                };
            }
        }

        if (best) {
            this._logger.debug(`Picked window at (${point.x}, ${point.y}): ${best.info.title}, Class: ${best.info.windowClass}`);
            return best.info;
        }

        return null;
    }

    /**
     * Resolve the owning application of a process into a class string
     *
     * Preference order: bundle identifier, "app.<name>", "process.<executable>",
     * then "unknown".
     */
    resolveWindowClass(pid: number, ownerName?: string): string {
        let identity: OwnerIdentity | null = null;
        try {
            identity = this._environment.resolveOwnerIdentity(pid);
        } catch (e) {
            this._logger.warn(`Failed to resolve owner of PID ${pid}: ${errorMessage(e)}`);
        }

        if (identity?.bundleId) {
            return identity.bundleId;
        }

        const appName = identity?.appName || ownerName;
        if (appName) {
            return `app.${appName.toLowerCase().replace(/\s+/g, '')}`;
        }

        if (identity?.executablePath) {
            const executable = identity.executablePath.trim().split('/').pop();
            if (executable) {
                return `process.${executable.toLowerCase()}`;
            }
        }

        return 'unknown';
    }

    /**
     * Display containing the centre of a frame, or the main display
     */
    displayForFrame(frame: Rect): DisplayId {
        return this._displays.displayContaining(rectCenter(frame)) ?? this._displays.mainDisplay();
    }
}

/**
 * Window identity is the platform window id alone
 */
export function sameWindow(a: Pick<ManagedWindow, 'id'>, b: Pick<ManagedWindow, 'id'>): boolean {
    return a.id === b.id;
}
