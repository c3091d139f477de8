/**
 * Collaborator interfaces implemented by the platform bindings
 *
 * The core never talks to the operating system directly. Every read of the
 * window list, every move and every display query goes through these.
 */

import type {DisplayId, Point, Rect} from './geometry.js';
import type {Configuration} from './layout.js';
import type {WindowType} from './window.js';

/**
 * Raw on-screen window record
 * Fields are unknown until validated; bindings may hand back partial records.
 */
export interface RawWindowRecord {
    id?: unknown;
    pid?: unknown;
    title?: unknown;
    bounds?: unknown;
    layer?: unknown;
    alpha?: unknown;
    owner?: unknown;
}

/**
 * What the platform knows about the process owning a window
 */
export interface OwnerIdentity {
    bundleId?: string | null;
    appName?: string | null;
    executablePath?: string | null;
}

export interface WindowEnvironment {
    enumerateWindows(): RawWindowRecord[];
    resolveOwnerIdentity(pid: number): OwnerIdentity | null;
}

export interface WindowController {
    /** Resolves false (or throws) when the window could not be moved */
    moveResize(windowId: number, pid: number, frame: Rect): Promise<boolean>;
    activate(windowId: number, pid: number): Promise<boolean>;
}

export interface CursorProvider {
    /** Current pointer location in screen coordinates, null if unknown */
    cursorPosition(): Point | null;
}

export interface DisplayProvider {
    enumerateDisplays(): DisplayId[];
    displayBounds(displayId: DisplayId): Rect | null;
    mainDisplay(): DisplayId;
    displayContaining(point: Point): DisplayId | null;
}

/**
 * Durable store for window types and configurations
 * load returns null when nothing has been saved yet
 */
export interface ConfigStore {
    loadWindowTypes(): Promise<WindowType[] | null>;
    saveWindowTypes(windowTypes: readonly WindowType[]): Promise<void>;
    loadConfigurations(): Promise<Configuration[] | null>;
    saveConfigurations(configurations: readonly Configuration[]): Promise<void>;
    /** Stores that keep backups put them back; resolves false when none exist */
    restoreFromBackup?(): Promise<boolean>;
}

export type NotificationKind = 'info' | 'success' | 'warning' | 'error';

export interface Notifier {
    show(message: string, kind: NotificationKind, duration: number): void;
}
