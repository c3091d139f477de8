/**
 * NotificationService - Centralized notification routing based on user settings
 *
 * Routes notifications to the appropriate display method (center, system, or disabled)
 * based on user preferences stored in Settings.
 *
 * Categories:
 * - layout-applied: Result of arranging windows into a layout
 * - window-activation: Hover activation failures
 * - configuration: Configuration activation and capture
 * - permissions: Missing accessibility access or displays
 */

import type {NotificationKind, Notifier} from '../types/platform.js';
import type {Settings} from '../settings.js';
import {createLogger} from './debug.js';

const logger = createLogger('NotificationService');

// Notification category constants
export const NotifyCategory = {
    LAYOUT_APPLIED: 'layout-applied',
    WINDOW_ACTIVATION: 'window-activation',
    CONFIGURATION: 'configuration',
    PERMISSIONS: 'permissions',
} as const;

export type NotifyCategoryType = typeof NotifyCategory[keyof typeof NotifyCategory];

/**
 * Options for notification display
 */
export interface NotifyOptions {
    /** Severity shown by the notifier, defaults to 'info' */
    kind?: NotificationKind;
    /** Override default duration (milliseconds) */
    duration?: number;
}

export class NotificationService {
    private _settings: Settings | null;
    private _centerNotifier: Notifier | null;
    private _systemNotifier: Notifier | null;

    /**
     * @param settings - Settings holding notification preferences
     * @param centerNotifier - Transient on-screen message display
     * @param systemNotifier - System notification center
     */
    constructor(settings: Settings, centerNotifier: Notifier | null, systemNotifier: Notifier | null) {
        this._settings = settings;
        this._centerNotifier = centerNotifier;
        this._systemNotifier = systemNotifier;
    }

    /**
     * Show a notification based on category settings
     *
     * @param category - Category from NotifyCategory
     * @param message - Message to display
     * @param options - Optional parameters
     */
    notify(category: NotifyCategoryType, message: string, options: NotifyOptions = {}): void {
        if (!this._settings || !this._settings.get('notifications-enabled')) {
            logger.debug(`Notifications disabled globally, skipping: ${message}`);
            return;
        }

        const style = this._settings.get(`notify-${category}` as const);
        const duration = options.duration ?? this._settings.get('notification-duration');
        const kind = options.kind ?? 'info';

        logger.debug(`Notify [${category}] style=${style}: ${message}`);

        if (style === 'disabled') {
            return;
        }

        const notifier = style === 'center' ? this._centerNotifier : this._systemNotifier;
        if (!notifier) {
            logger.warn(`No ${style} notifier available for: ${message}`);
            return;
        }

        notifier.show(message, kind, duration);
    }

    /**
     * Update references (used if notifiers are re-created)
     */
    updateReferences(centerNotifier: Notifier | null, systemNotifier: Notifier | null): void {
        this._centerNotifier = centerNotifier;
        this._systemNotifier = systemNotifier;
    }

    destroy(): void {
        this._settings = null;
        this._centerNotifier = null;
        this._systemNotifier = null;
    }
}
