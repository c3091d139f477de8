/**
 * WindowManager - Moves windows into layout slots
 *
 * Applies are serialized: a second applyLayout() waits for the first to
 * finish moving its windows. A window that cannot be moved is reported in
 * the result and the batch continues. A permission failure aborts the batch.
 */

import {assignWindowsToSlots, unplacedWindows} from './layoutAssignment.js';
import {createLogger, Logger} from './utils/debug.js';
import {errorMessage, isPlatformError, PlatformErrorCode} from './utils/errors.js';
import {NotifyCategory} from './utils/notificationService.js';
import type {NotificationService, NotifyCategoryType} from './utils/notificationService.js';
import type {Layout, Slot, SlotAssignment} from './types/layout.js';
import type {NotificationKind, WindowController} from './types/platform.js';
import type {ManagedWindow} from './types/window.js';

export interface MoveFailure {
    readonly window: ManagedWindow;
    readonly slot: Slot;
    readonly reason: string;
}

export interface ApplyLayoutResult {
    readonly assignments: readonly SlotAssignment[];
    readonly moved: readonly SlotAssignment[];
    readonly failed: readonly MoveFailure[];
    readonly unplaced: readonly ManagedWindow[];
}

export interface WindowManagerOptions {
    controller: WindowController;
    notifications?: NotificationService | null;
    logger?: Logger;
}

export class WindowManager {
    private _controller: WindowController;
    private _notifications: NotificationService | null;
    private _logger: Logger;
    private _queue: Promise<void>;

    constructor({controller, notifications = null, logger = createLogger('WindowManager')}: WindowManagerOptions) {
        this._controller = controller;
        this._notifications = notifications;
        this._logger = logger;
        this._queue = Promise.resolve();
    }

    /**
     * Assign windows to the layout's slots and move each one into place
     *
     * @throws LayoutError if the layout has no slots or an unknown strategy
     * @throws PlatformError PERMISSION_DENIED if the controller lacks access
     */
    applyLayout(layout: Layout, windows: readonly ManagedWindow[]): Promise<ApplyLayoutResult> {
        const run = this._queue.then(() => this._applyNow(layout, windows));
        // The caller sees failures through run; the queue only orders work
        this._queue = run.then(() => undefined, () => undefined);
        return run;
    }

    /**
     * Bring a window to the front
     * @returns True if the controller activated the window
     */
    async activateWindow(windowId: number, pid: number): Promise<boolean> {
        try {
            const activated = await this._controller.activate(windowId, pid);
            if (!activated) {
                this._logger.warn(`Failed to activate window ${windowId}`);
                this._notify(NotifyCategory.WINDOW_ACTIVATION, `Could not activate window ${windowId}`);
            }
            return activated;
        } catch (error) {
            this._logger.error(`Error activating window ${windowId}: ${errorMessage(error)}`);
            if (isPlatformError(error, PlatformErrorCode.PERMISSION_DENIED)) {
                this._notify(NotifyCategory.PERMISSIONS, 'Accessibility access is required to activate windows');
            } else {
                this._notify(NotifyCategory.WINDOW_ACTIVATION, `Could not activate window ${windowId}`);
            }
            return false;
        }
    }

    destroy(): void {
        this._notifications = null;
    }

    /**
     * @private
     */
    private async _applyNow(layout: Layout, windows: readonly ManagedWindow[]): Promise<ApplyLayoutResult> {
        const assignments = assignWindowsToSlots(layout, windows);
        const moved: SlotAssignment[] = [];
        const failed: MoveFailure[] = [];

        this._logger.info(`Applying layout '${layout.name}': ${assignments.length} of ${windows.length} windows assigned`);

        for (const assignment of assignments) {
            const {window, slot} = assignment;
            try {
                if (await this._controller.moveResize(window.id, window.pid, slot.frame)) {
                    moved.push(assignment);
                    this._logger.debug(`Moved window ${window.id} to slot ${slot.id}`);
                } else {
                    failed.push({window, slot, reason: 'Window could not be moved'});
                    this._logger.warn(`Window ${window.id} could not be moved to slot ${slot.id}`);
                }
            } catch (error) {
                if (isPlatformError(error, PlatformErrorCode.PERMISSION_DENIED)) {
                    this._logger.error(`Permission denied while applying '${layout.name}'`);
                    this._notify(NotifyCategory.PERMISSIONS, 'Accessibility access is required to arrange windows', 'error');
                    throw error;
                }
                failed.push({window, slot, reason: errorMessage(error)});
                this._logger.warn(`Error moving window ${window.id} to slot ${slot.id}: ${errorMessage(error)}`);
            }
        }

        const unplaced = unplacedWindows(windows, assignments);
        if (unplaced.length > 0) {
            this._logger.info(`${unplaced.length} windows left unplaced (not enough slots)`);
        }

        this._notify(
            NotifyCategory.LAYOUT_APPLIED,
            `Arranged ${moved.length} of ${windows.length} windows`,
            failed.length > 0 ? 'warning' : 'success',
        );

        return {assignments, moved, failed, unplaced};
    }

    private _notify(
        category: NotifyCategoryType,
        message: string,
        kind: NotificationKind = 'warning',
    ): void {
        this._notifications?.notify(category, message, {kind});
    }
}
