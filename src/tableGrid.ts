/**
 * TableGrid - Table window arrangement
 *
 * Main entry point that coordinates all components:
 * - WindowDetector: Finds and classifies windows
 * - DetectionService: Keeps the managed window snapshot current
 * - WindowManager: Moves windows into layout slots
 * - ConfigurationManager: Stored layouts, window types and activation
 * - HoverActivationService: Focus follows a resting pointer
 * - NotificationService: User feedback
 */

import {createLogger, destroyDebugSettings, initDebugSettings} from './utils/debug.js';
import {errorMessage, isPlatformError, PlatformErrorCode} from './utils/errors.js';
import {NotificationService, NotifyCategory} from './utils/notificationService.js';
import {SignalTracker} from './utils/signalTracker.js';
import {ConfigurationManager} from './configurationManager.js';
import {DetectionService} from './detectionService.js';
import {HoverActivationService} from './hoverActivator.js';
import {WindowDetector} from './windowDetector.js';
import {WindowManager} from './windowManager.js';
import type {ApplyLayoutResult} from './windowManager.js';
import type {Settings} from './settings.js';
import type {Configuration} from './types/layout.js';
import type {
    ConfigStore,
    CursorProvider,
    DisplayProvider,
    Notifier,
    WindowController,
    WindowEnvironment,
} from './types/platform.js';
import type {ManagedWindow, WindowType} from './types/window.js';

const logger = createLogger('TableGrid');

export const AUTO_ACTIVATION_INTERVAL_MS = 5000;

export interface TableGridOptions {
    settings: Settings;
    environment: WindowEnvironment;
    controller: WindowController;
    displays: DisplayProvider;
    cursor: CursorProvider;
    store: ConfigStore;
    centerNotifier?: Notifier | null;
    systemNotifier?: Notifier | null;
    defaultWindowTypes?: () => WindowType[];
}

export class TableGrid {
    private _settings: Settings;
    private _store: ConfigStore;
    private _displays: DisplayProvider;
    private _notificationService: NotificationService;
    private _detector: WindowDetector;
    private _detectionService: DetectionService;
    private _windowManager: WindowManager;
    private _configurationManager: ConfigurationManager;
    private _hoverService: HoverActivationService;
    private _signalTracker: SignalTracker;
    private _autoActivationTimer: ReturnType<typeof setInterval> | null;
    private _enabled: boolean;

    constructor(options: TableGridOptions) {
        this._settings = options.settings;
        this._store = options.store;
        this._displays = options.displays;
        this._signalTracker = new SignalTracker('TableGrid');
        this._autoActivationTimer = null;
        this._enabled = false;

        this._notificationService = new NotificationService(
            this._settings,
            options.centerNotifier ?? null,
            options.systemNotifier ?? null,
        );
        this._detector = new WindowDetector({
            environment: options.environment,
            displays: options.displays,
        });
        this._detectionService = new DetectionService({detector: this._detector, settings: this._settings});
        this._windowManager = new WindowManager({
            controller: options.controller,
            notifications: this._notificationService,
        });
        this._configurationManager = new ConfigurationManager({
            store: options.store,
            defaultWindowTypes: options.defaultWindowTypes,
        });
        this._hoverService = new HoverActivationService({
            settings: this._settings,
            cursor: options.cursor,
            picker: this._detector,
            managedWindows: () => this._detectionService.windows,
            windowManager: this._windowManager,
        });
    }

    get configurations(): ConfigurationManager {
        return this._configurationManager;
    }

    get detection(): DetectionService {
        return this._detectionService;
    }

    get windowManager(): WindowManager {
        return this._windowManager;
    }

    get isEnabled(): boolean {
        return this._enabled;
    }

    /**
     * Load stored data and start background checks
     */
    async enable(): Promise<void> {
        if (this._enabled) {
            return;
        }
        logger.info('Enabling TableGrid...');

        initDebugSettings(this._settings);
        await this._configurationManager.load();

        this._configurationManager.connect('configuration-activated', configuration => {
            this._onConfigurationActivated(configuration);
        }, this._signalTracker);
        this._configurationManager.connect('configuration-deactivated', () => {
            this._detectionService.stop();
        }, this._signalTracker);

        this._autoActivationTimer = setInterval(() => this.checkAutoActivation(), AUTO_ACTIVATION_INTERVAL_MS);
        this._hoverService.enable();
        this._enabled = true;

        logger.info('TableGrid enabled');
    }

    /**
     * Stop timers and release every subscription
     */
    disable(): void {
        logger.info('Disabling TableGrid...');

        if (this._autoActivationTimer !== null) {
            clearInterval(this._autoActivationTimer);
            this._autoActivationTimer = null;
        }

        this._hoverService.disable();
        this._signalTracker.disconnectAll();
        this._configurationManager.deactivate();
        this._detectionService.stop();
        destroyDebugSettings();
        this._enabled = false;

        logger.info('TableGrid disabled');
    }

    destroy(): void {
        this.disable();
        this._detectionService.destroy();
        this._windowManager.destroy();
        this._configurationManager.destroy();
        this._notificationService.destroy();
    }

    /**
     * Activate a stored configuration and arrange its windows
     * @returns False if no configuration has that id
     */
    activateConfiguration(id: string): boolean {
        return this._configurationManager.activateConfiguration(id);
    }

    deactivateConfiguration(): void {
        this._configurationManager.deactivate();
    }

    /**
     * Arrange the current windows into the active configuration's layout
     * @returns null when no configuration is active
     */
    async arrangeActive(): Promise<ApplyLayoutResult | null> {
        const configuration = this._configurationManager.activeConfiguration;
        if (!configuration) {
            logger.warn('No active configuration to arrange');
            return null;
        }

        const windows = this._detectionService.refresh();
        this._detectionService.beginArranging();
        try {
            return await this._windowManager.applyLayout(configuration.layout, windows);
        } finally {
            this._detectionService.endArranging();
        }
    }

    /**
     * Activate the first configuration whose auto-activation condition holds
     * Nothing happens while a configuration is active
     */
    checkAutoActivation(): Configuration | null {
        if (this._configurationManager.activeConfiguration) {
            return null;
        }

        let windows: ManagedWindow[];
        try {
            windows = this._detector.detect(this._configurationManager.enabledWindowTypes);
        } catch (error) {
            logger.error(`Auto-activation check failed: ${errorMessage(error)}`);
            if (isPlatformError(error, PlatformErrorCode.NO_DISPLAYS)) {
                this._notificationService.notify(NotifyCategory.PERMISSIONS, 'No displays available', {kind: 'error'});
            }
            return null;
        }

        const configuration = this._configurationManager.evaluateAutoActivation(windows);
        if (configuration) {
            logger.info(`Auto-activating configuration: ${configuration.name}`);
            this._configurationManager.activateConfiguration(configuration.id);
        }
        return configuration;
    }

    /**
     * Capture the current arrangement of managed windows as a new configuration
     */
    async captureConfiguration(name: string): Promise<Configuration> {
        const windows = this._detector.detect(this._configurationManager.enabledWindowTypes);
        const configuration = await this._configurationManager.captureConfiguration(name, windows, this._displays);
        this._notificationService.notify(
            NotifyCategory.CONFIGURATION,
            `Captured '${name}' with ${configuration.layout.slots.length} slots`,
            {kind: 'success'},
        );
        return configuration;
    }

    /**
     * Restore stored data from the store's backups and reload it
     * @returns False if the store keeps no backups or none were found
     */
    async restoreFromBackup(): Promise<boolean> {
        if (!this._store.restoreFromBackup) {
            logger.warn('Configuration store does not keep backups');
            return false;
        }

        const restored = await this._store.restoreFromBackup();
        if (restored) {
            await this._configurationManager.load();
        }
        return restored;
    }

    private _onConfigurationActivated(configuration: Configuration): void {
        this._notificationService.notify(NotifyCategory.CONFIGURATION, `Activated '${configuration.name}'`);
        this._detectionService.start(this._configurationManager.enabledWindowTypes);

        this.arrangeActive().catch(error => {
            logger.error(`Failed to arrange '${configuration.name}': ${errorMessage(error)}`);
            if (!isPlatformError(error, PlatformErrorCode.PERMISSION_DENIED)) {
                this._notificationService.notify(
                    NotifyCategory.LAYOUT_APPLIED,
                    `Could not arrange '${configuration.name}': ${errorMessage(error)}`,
                    {kind: 'error'},
                );
            }
        });
    }
}
