/**
 * ConfigurationManager - Stored configurations, window types and the active
 * configuration
 *
 * Responsibilities:
 * - Loading and saving configurations and window types through a ConfigStore
 * - Falling back to the built-in window types on first run
 * - Tracking the active configuration
 * - Deciding which configuration should auto-activate for a window snapshot
 * - Turning the current window arrangement into a new configuration
 */

import {randomUUID} from 'node:crypto';
import {captureCurrentLayout, optimizeCapturedLayout} from './gridInference.js';
import {createLogger, Logger} from './utils/debug.js';
import {errorMessage, LayoutError, LayoutErrorCode} from './utils/errors.js';
import {SignalEmitter} from './utils/signalEmitter.js';
import {loadDefaultWindowTypes} from './windowTypes.js';
import type {AutoActivationCondition, Configuration} from './types/layout.js';
import type {ConfigStore, DisplayProvider} from './types/platform.js';
import type {ManagedWindow, WindowType} from './types/window.js';

export type ConfigurationSignals = {
    'configuration-activated': [Configuration];
    'configuration-deactivated': [];
    'configurations-changed': [readonly Configuration[]];
    'window-types-changed': [readonly WindowType[]];
};

export interface ConfigurationManagerOptions {
    store: ConfigStore;
    /** Source of the first-run window types, defaults to the bundled list */
    defaultWindowTypes?: () => WindowType[];
    logger?: Logger;
}

/**
 * Whether a window snapshot satisfies an auto-activation condition
 *
 * windowCount requires the exact number of windows. windowTypeCount requires
 * every listed type to have exactly its count; unlisted types are ignored.
 */
export function conditionHolds(condition: AutoActivationCondition, windows: readonly ManagedWindow[]): boolean {
    switch (condition.type) {
    case 'windowCount':
        return windows.length === condition.count;
    case 'windowTypeCount': {
        const counts = new Map<string, number>();
        for (const window of windows) {
            counts.set(window.type.id, (counts.get(window.type.id) ?? 0) + 1);
        }
        return Object.entries(condition.typeCounts).every(([typeId, required]) => (counts.get(typeId) ?? 0) === required);
    }
    }
}

export class ConfigurationManager extends SignalEmitter<ConfigurationSignals> {
    private _store: ConfigStore;
    private _defaultWindowTypes: () => WindowType[];
    private _logger: Logger;
    private _configurations: Configuration[];
    private _windowTypes: WindowType[];
    private _activeConfiguration: Configuration | null;

    constructor({store, defaultWindowTypes = () => loadDefaultWindowTypes(), logger = createLogger('ConfigurationManager')}: ConfigurationManagerOptions) {
        super();
        this._store = store;
        this._defaultWindowTypes = defaultWindowTypes;
        this._logger = logger;
        this._configurations = [];
        this._windowTypes = [];
        this._activeConfiguration = null;
    }

    get configurations(): readonly Configuration[] {
        return this._configurations;
    }

    get windowTypes(): readonly WindowType[] {
        return this._windowTypes;
    }

    get enabledWindowTypes(): WindowType[] {
        return this._windowTypes.filter(windowType => windowType.enabled);
    }

    get activeConfiguration(): Configuration | null {
        return this._activeConfiguration;
    }

    /**
     * Load window types and configurations from the store
     * The built-in window types are used (and saved) when none are stored
     */
    async load(): Promise<void> {
        const storedTypes = await this._store.loadWindowTypes();
        if (storedTypes === null) {
            this._windowTypes = this._defaultWindowTypes();
            this._logger.info(`No stored window types, using ${this._windowTypes.length} defaults`);
            await this._saveWindowTypes();
        } else {
            this._windowTypes = storedTypes;
        }

        this._configurations = (await this._store.loadConfigurations()) ?? [];

        if (this._activeConfiguration && !this.getConfiguration(this._activeConfiguration.id)) {
            this.deactivate();
        }

        this._logger.info(`Loaded ${this._configurations.length} configurations and ${this._windowTypes.length} window types`);
        this.emit('window-types-changed', this._windowTypes);
        this.emit('configurations-changed', this._configurations);
    }

    getConfiguration(id: string): Configuration | null {
        return this._configurations.find(configuration => configuration.id === id) ?? null;
    }

    getWindowType(id: string): WindowType | null {
        return this._windowTypes.find(windowType => windowType.id === id) ?? null;
    }

    /**
     * Add a configuration; a clashing id is replaced with a fresh one
     * @returns The configuration as stored
     */
    async addConfiguration(configuration: Configuration): Promise<Configuration> {
        const stored = this.getConfiguration(configuration.id) ? {...configuration, id: randomUUID()} : configuration;
        this._configurations = [...this._configurations, stored];
        await this._saveConfigurations();
        return stored;
    }

    /**
     * Replace the configuration with the same id
     * @returns False if no configuration has that id
     */
    async updateConfiguration(configuration: Configuration): Promise<boolean> {
        const index = this._configurations.findIndex(existing => existing.id === configuration.id);
        if (index === -1) {
            this._logger.warn(`Cannot update unknown configuration: ${configuration.id}`);
            return false;
        }

        this._configurations = this._configurations.map((existing, i) => i === index ? configuration : existing);
        if (this._activeConfiguration?.id === configuration.id) {
            this._activeConfiguration = configuration;
        }
        await this._saveConfigurations();
        return true;
    }

    async removeConfiguration(id: string): Promise<boolean> {
        if (!this.getConfiguration(id)) {
            return false;
        }

        this._configurations = this._configurations.filter(configuration => configuration.id !== id);
        if (this._activeConfiguration?.id === id) {
            this.deactivate();
        }
        await this._saveConfigurations();
        return true;
    }

    async addWindowType(windowType: WindowType): Promise<WindowType> {
        const stored = this.getWindowType(windowType.id) ? {...windowType, id: randomUUID()} : windowType;
        this._windowTypes = [...this._windowTypes, stored];
        await this._saveWindowTypes();
        return stored;
    }

    async updateWindowType(windowType: WindowType): Promise<boolean> {
        const index = this._windowTypes.findIndex(existing => existing.id === windowType.id);
        if (index === -1) {
            this._logger.warn(`Cannot update unknown window type: ${windowType.id}`);
            return false;
        }

        this._windowTypes = this._windowTypes.map((existing, i) => i === index ? windowType : existing);
        await this._saveWindowTypes();
        return true;
    }

    async removeWindowType(id: string): Promise<boolean> {
        if (!this.getWindowType(id)) {
            return false;
        }

        this._windowTypes = this._windowTypes.filter(windowType => windowType.id !== id);
        await this._saveWindowTypes();
        return true;
    }

    /**
     * Make a stored configuration the active one
     * @returns False if no configuration has that id
     */
    activateConfiguration(id: string): boolean {
        const configuration = this.getConfiguration(id);
        if (!configuration) {
            this._logger.error(`Configuration not found: ${id}`);
            return false;
        }

        this._activeConfiguration = configuration;
        this._logger.info(`Activated configuration '${configuration.name}'`);
        this.emit('configuration-activated', configuration);
        return true;
    }

    deactivate(): void {
        if (!this._activeConfiguration) {
            return;
        }

        this._logger.info(`Deactivated configuration '${this._activeConfiguration.name}'`);
        this._activeConfiguration = null;
        this.emit('configuration-deactivated');
    }

    /**
     * First configuration whose auto-activation condition holds
     * Always null while a configuration is active
     */
    evaluateAutoActivation(windows: readonly ManagedWindow[]): Configuration | null {
        if (this._activeConfiguration) {
            return null;
        }

        for (const configuration of this._configurations) {
            if (configuration.autoActivation && conditionHolds(configuration.autoActivation, windows)) {
                this._logger.debug(`Auto-activation condition met for '${configuration.name}'`);
                return configuration;
            }
        }
        return null;
    }

    /**
     * Capture the current window arrangement as a new stored configuration
     *
     * @throws LayoutError EMPTY_LAYOUT if there are no windows to capture
     */
    async captureConfiguration(name: string, windows: readonly ManagedWindow[], displays: DisplayProvider): Promise<Configuration> {
        if (windows.length === 0) {
            throw new LayoutError(LayoutErrorCode.EMPTY_LAYOUT, 'No windows to capture');
        }

        const layout = optimizeCapturedLayout(captureCurrentLayout(windows), displays);
        const configuration: Configuration = {
            id: randomUUID(),
            name,
            layout: {...layout, name},
            autoActivation: null,
        };

        this._logger.info(`Captured configuration '${name}' with ${layout.slots.length} slots`);
        return this.addConfiguration(configuration);
    }

    destroy(): void {
        this._activeConfiguration = null;
        this._configurations = [];
        this._windowTypes = [];
    }

    private async _saveConfigurations(): Promise<void> {
        try {
            await this._store.saveConfigurations(this._configurations);
        } catch (error) {
            this._logger.error(`Failed to save configurations: ${errorMessage(error)}`);
            throw error;
        }
        this.emit('configurations-changed', this._configurations);
    }

    private async _saveWindowTypes(): Promise<void> {
        try {
            await this._store.saveWindowTypes(this._windowTypes);
        } catch (error) {
            this._logger.error(`Failed to save window types: ${errorMessage(error)}`);
            throw error;
        }
        this.emit('window-types-changed', this._windowTypes);
    }
}
