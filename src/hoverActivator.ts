/**
 * Hover activation - bring a managed window to the front when the pointer
 * rests on it
 *
 * HoverActivator is the clock-free state machine: callers feed it the pointer
 * position and the current time. HoverActivationService drives it from a
 * poll timer while the `enable-hover-activation` setting is on.
 */

import {createLogger, Logger} from './utils/debug.js';
import {errorMessage} from './utils/errors.js';
import {SignalTracker} from './utils/signalTracker.js';
import type {Settings} from './settings.js';
import type {WindowManager} from './windowManager.js';
import type {Point} from './types/geometry.js';
import type {CursorProvider} from './types/platform.js';
import type {ManagedWindow, WindowInfo} from './types/window.js';

export const HOVER_POLL_INTERVAL_MS = 100;
export const ACTIVATION_COOLDOWN_MS = 500;

export interface WindowPicker {
    pickAt(point: Point): WindowInfo | null;
}

export interface ActivationRequest {
    readonly windowId: number;
    readonly pid: number;
}

export interface HoverActivatorOptions {
    picker: WindowPicker;
    managedWindows: () => readonly ManagedWindow[];
    hoverDelay: number;
    cooldown?: number;
}

export class HoverActivator {
    private _picker: WindowPicker;
    private _managedWindows: () => readonly ManagedWindow[];
    private _hoverDelay: number;
    private _cooldown: number;
    private _hoveredId: number | null;
    private _hoverStart: number | null;
    private _lastActivation: number | null;

    constructor({picker, managedWindows, hoverDelay, cooldown = ACTIVATION_COOLDOWN_MS}: HoverActivatorOptions) {
        this._picker = picker;
        this._managedWindows = managedWindows;
        this._hoverDelay = hoverDelay;
        this._cooldown = cooldown;
        this._hoveredId = null;
        this._hoverStart = null;
        this._lastActivation = null;
    }

    get hoverDelay(): number {
        return this._hoverDelay;
    }

    set hoverDelay(delay: number) {
        this._hoverDelay = delay;
    }

    get hoveredWindowId(): number | null {
        return this._hoveredId;
    }

    /**
     * Advance the state machine
     *
     * @param point - Pointer position, or null when unknown
     * @param now - Current time in milliseconds
     * @returns The window to activate, or null
     */
    update(point: Point | null, now: number): ActivationRequest | null {
        const info = point === null ? null : this._picker.pickAt(point);
        if (!info || !this._managedWindows().some(window => window.id === info.id)) {
            this.reset();
            return null;
        }

        if (this._hoveredId !== info.id || this._hoverStart === null) {
            this._hoveredId = info.id;
            this._hoverStart = now;
            return null;
        }

        if (now - this._hoverStart < this._hoverDelay) {
            return null;
        }

        // Keep tracking during cooldown so the window activates once it ends
        if (this._lastActivation !== null && now - this._lastActivation < this._cooldown) {
            return null;
        }

        this._lastActivation = now;
        this.reset();
        return {windowId: info.id, pid: info.pid};
    }

    /**
     * Forget the hovered window; the activation cooldown is kept
     */
    reset(): void {
        this._hoveredId = null;
        this._hoverStart = null;
    }
}

export interface HoverActivationServiceOptions {
    settings: Settings;
    cursor: CursorProvider;
    picker: WindowPicker;
    managedWindows: () => readonly ManagedWindow[];
    windowManager: WindowManager;
    logger?: Logger;
}

export class HoverActivationService {
    private _settings: Settings;
    private _cursor: CursorProvider;
    private _windowManager: WindowManager;
    private _activator: HoverActivator;
    private _logger: Logger;
    private _signalTracker: SignalTracker;
    private _timer: ReturnType<typeof setInterval> | null;
    private _enabled: boolean;

    constructor({settings, cursor, picker, managedWindows, windowManager, logger = createLogger('HoverActivation')}: HoverActivationServiceOptions) {
        this._settings = settings;
        this._cursor = cursor;
        this._windowManager = windowManager;
        this._logger = logger;
        this._signalTracker = new SignalTracker('HoverActivationService');
        this._timer = null;
        this._enabled = false;
        this._activator = new HoverActivator({
            picker,
            managedWindows,
            hoverDelay: settings.get('hover-delay'),
        });
    }

    get isPolling(): boolean {
        return this._timer !== null;
    }

    /**
     * Follow the hover settings; polls while hover activation is on
     */
    enable(): void {
        if (this._enabled) {
            return;
        }
        this._enabled = true;

        this._settings.connect('changed::enable-hover-activation', () => this._sync(), this._signalTracker);
        this._settings.connect('changed::hover-delay', () => {
            this._activator.hoverDelay = this._settings.get('hover-delay');
        }, this._signalTracker);

        this._sync();
    }

    disable(): void {
        this._enabled = false;
        this._signalTracker.disconnectAll();
        this._stopPolling();
    }

    /**
     * One poll step
     */
    poll(now: number = Date.now()): void {
        const request = this._activator.update(this._cursor.cursorPosition(), now);
        if (!request) {
            return;
        }

        this._logger.debug(`Activating hovered window ${request.windowId}`);
        this._windowManager.activateWindow(request.windowId, request.pid).catch(error => {
            this._logger.error(`Hover activation failed: ${errorMessage(error)}`);
        });
    }

    private _sync(): void {
        if (this._settings.get('enable-hover-activation')) {
            this._startPolling();
        } else {
            this._stopPolling();
        }
    }

    private _startPolling(): void {
        if (this._timer !== null) {
            return;
        }
        this._timer = setInterval(() => this.poll(), HOVER_POLL_INTERVAL_MS);
        this._logger.info('Hover activation started');
    }

    private _stopPolling(): void {
        if (this._timer === null) {
            return;
        }
        clearInterval(this._timer);
        this._timer = null;
        this._activator.reset();
        this._logger.info('Hover activation stopped');
    }
}
