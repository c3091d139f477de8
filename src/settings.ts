/**
 * Settings - Typed application preferences with change notification
 *
 * Every write is validated against the schema. Listeners subscribe to
 * `changed` or `changed::<key>`.
 *
 * Settings are loaded from and saved to a JSON file. A missing or invalid
 * file yields the defaults.
 */

import {readFile, writeFile, mkdir} from 'node:fs/promises';
import {dirname} from 'node:path';
import {z} from 'zod';
import {createLogger} from './utils/debug.js';
import {errorMessage} from './utils/errors.js';
import {SignalEmitter} from './utils/signalEmitter.js';

const logger = createLogger('Settings');

export const NotifyStyleSchema = z.enum(['center', 'system', 'disabled']);

export const SettingsSchema = z.object({
    'detection-interval': z.number().int().min(100).default(1000),
    'enable-hover-activation': z.boolean().default(false),
    'hover-delay': z.number().int().min(0).default(300),
    'debug-logging': z.boolean().default(false),
    'memory-debug': z.boolean().default(false),
    'notifications-enabled': z.boolean().default(true),
    'notification-duration': z.number().int().positive().default(2000),
    'notify-layout-applied': NotifyStyleSchema.default('center'),
    'notify-window-activation': NotifyStyleSchema.default('system'),
    'notify-configuration': NotifyStyleSchema.default('center'),
    'notify-permissions': NotifyStyleSchema.default('system'),
});

export type SettingsValues = z.infer<typeof SettingsSchema>;
export type SettingsKey = keyof SettingsValues;
export type SettingsSignals =
    & {changed: [SettingsKey]}
    & {[K in SettingsKey as `changed::${K}`]: [SettingsKey]};

export class Settings extends SignalEmitter<SettingsSignals> {
    private _values: SettingsValues;

    constructor(values: Partial<SettingsValues> = {}) {
        super();
        this._values = SettingsSchema.parse(values);
    }

    /**
     * Load settings from a JSON file
     * Unknown keys are dropped, invalid or missing files fall back to defaults
     */
    static async load(path: string): Promise<Settings> {
        let raw: string;
        try {
            raw = await readFile(path, 'utf-8');
        } catch {
            logger.info(`No settings file at ${path}, using defaults`);
            return new Settings();
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (e) {
            logger.warn(`Settings file ${path} is not valid JSON: ${errorMessage(e)}`);
            return new Settings();
        }

        const result = SettingsSchema.safeParse(data);
        if (!result.success) {
            logger.warn(`Settings file ${path} failed validation, using defaults: ${result.error.message}`);
            return new Settings();
        }

        logger.debug(`Loaded settings from ${path}`);
        return new Settings(result.data);
    }

    /**
     * Write the current values to a JSON file
     */
    async save(path: string): Promise<void> {
        await mkdir(dirname(path), {recursive: true});
        await writeFile(path, JSON.stringify(this._values, null, 2), 'utf-8');
        logger.debug(`Saved settings to ${path}`);
    }

    get<K extends SettingsKey>(key: K): SettingsValues[K] {
        return this._values[key];
    }

    /**
     * Update a single key
     * @throws ZodError if the value is invalid for the key
     */
    set<K extends SettingsKey>(key: K, value: SettingsValues[K]): void {
        if (this._values[key] === value) {
            return;
        }

        this._values = SettingsSchema.parse({...this._values, [key]: value});
        this._emitChanged(key);
    }

    /**
     * Snapshot of all values
     */
    getAll(): SettingsValues {
        return {...this._values};
    }

    private _emitChanged(key: SettingsKey): void {
        this.emit(`changed::${key}`, key);
        this.emit('changed', key);
    }
}
