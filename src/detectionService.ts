/**
 * DetectionService - Periodic window detection
 *
 * Runs the detector on an interval taken from the `detection-interval`
 * setting and publishes each pass as an immutable snapshot. Listeners get
 * 'windows-changed' when the snapshot differs from the previous one and
 * 'status-changed' on every status transition.
 */

import {createLogger, Logger} from './utils/debug.js';
import {errorMessage} from './utils/errors.js';
import {SignalEmitter} from './utils/signalEmitter.js';
import {SignalTracker} from './utils/signalTracker.js';
import type {Settings} from './settings.js';
import type {WindowDetector} from './windowDetector.js';
import type {ManagedWindow, WindowType} from './types/window.js';

export const DetectionStatus = {
    IDLE: 'idle',
    DETECTING: 'detecting',
    MONITORING: 'monitoring',
    ARRANGING: 'arranging',
    NO_WINDOWS: 'noWindows',
    ERROR: 'error',
} as const;

export type DetectionStatusType = typeof DetectionStatus[keyof typeof DetectionStatus];

export type DetectionSignals = {
    'windows-changed': [readonly ManagedWindow[]];
    'status-changed': [DetectionStatusType, string | null];
};

export interface DetectionServiceOptions {
    detector: WindowDetector;
    settings: Settings;
    logger?: Logger;
}

function sameSnapshot(a: readonly ManagedWindow[], b: readonly ManagedWindow[]): boolean {
    return a.length === b.length && a.every((window, i) => {
        const other = b[i];
        return other !== undefined
            && other.id === window.id
            && other.title === window.title
            && other.type.id === window.type.id
            && other.frame.x === window.frame.x
            && other.frame.y === window.frame.y
            && other.frame.width === window.frame.width
            && other.frame.height === window.frame.height;
    });
}

export class DetectionService extends SignalEmitter<DetectionSignals> {
    private _detector: WindowDetector;
    private _settings: Settings;
    private _logger: Logger;
    private _signalTracker: SignalTracker;
    private _timer: ReturnType<typeof setInterval> | null;
    private _windowTypes: readonly WindowType[];
    private _windows: readonly ManagedWindow[];
    private _status: DetectionStatusType;
    private _lastError: string | null;

    constructor({detector, settings, logger = createLogger('DetectionService')}: DetectionServiceOptions) {
        super();
        this._detector = detector;
        this._settings = settings;
        this._logger = logger;
        this._signalTracker = new SignalTracker('DetectionService');
        this._timer = null;
        this._windowTypes = [];
        this._windows = Object.freeze([]);
        this._status = DetectionStatus.IDLE;
        this._lastError = null;

        this._settings.connect('changed::detection-interval', () => this._onIntervalChanged(), this._signalTracker);
    }

    get windows(): readonly ManagedWindow[] {
        return this._windows;
    }

    get status(): DetectionStatusType {
        return this._status;
    }

    get lastError(): string | null {
        return this._lastError;
    }

    get isRunning(): boolean {
        return this._timer !== null;
    }

    /**
     * Start periodic detection for the given window types
     * @returns False if none of the types is enabled
     */
    start(windowTypes: readonly WindowType[]): boolean {
        this.stop();
        this._windowTypes = windowTypes.filter(windowType => windowType.enabled);

        if (this._windowTypes.length === 0) {
            this._logger.warn('No enabled window types, detection not started');
            this._setStatus(DetectionStatus.NO_WINDOWS);
            return false;
        }

        this._setStatus(DetectionStatus.DETECTING);
        this._startTimer();
        this.refresh();
        return true;
    }

    stop(): void {
        if (this._timer !== null) {
            clearInterval(this._timer);
            this._timer = null;
            this._logger.debug('Detection stopped');
        }
        this._setStatus(DetectionStatus.IDLE);
    }

    /**
     * Run one detection pass now
     * On failure the previous snapshot is kept and the status becomes 'error'
     */
    refresh(): readonly ManagedWindow[] {
        let detected: ManagedWindow[];
        try {
            detected = this._detector.detect(this._windowTypes);
        } catch (error) {
            this._lastError = errorMessage(error);
            this._logger.error(`Detection pass failed: ${this._lastError}`);
            this._setStatus(DetectionStatus.ERROR, this._lastError);
            return this._windows;
        }

        this._lastError = null;
        if (!sameSnapshot(this._windows, detected)) {
            this._windows = Object.freeze(detected);
            this._logger.debug(`Detected ${detected.length} windows`);
            this.emit('windows-changed', this._windows);
        }

        if (this._status !== DetectionStatus.ARRANGING) {
            this._setStatus(this._windows.length === 0 ? DetectionStatus.NO_WINDOWS : DetectionStatus.MONITORING);
        }
        return this._windows;
    }

    /**
     * Mark a layout apply in progress; endArranging() restores the monitoring status
     */
    beginArranging(): void {
        this._setStatus(DetectionStatus.ARRANGING);
    }

    endArranging(): void {
        if (this._status !== DetectionStatus.ARRANGING) {
            return;
        }
        if (this._timer === null) {
            this._setStatus(DetectionStatus.IDLE);
        } else {
            this._setStatus(this._windows.length === 0 ? DetectionStatus.NO_WINDOWS : DetectionStatus.MONITORING);
        }
    }

    destroy(): void {
        this.stop();
        this._signalTracker.disconnectAll();
        this._windows = Object.freeze([]);
    }

    private _startTimer(): void {
        const interval = this._settings.get('detection-interval');
        this._timer = setInterval(() => this.refresh(), interval);
        this._logger.debug(`Detection running every ${interval} ms`);
    }

    private _onIntervalChanged(): void {
        if (this._timer === null) {
            return;
        }
        clearInterval(this._timer);
        this._startTimer();
    }

    private _setStatus(status: DetectionStatusType, message: string | null = null): void {
        if (this._status === status && status !== DetectionStatus.ERROR) {
            return;
        }
        this._status = status;
        this.emit('status-changed', status, message);
    }
}
