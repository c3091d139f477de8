/**
 * Persistence codec and JSON file store
 *
 * Configurations and window types are stored as two JSON arrays. Slot frames
 * are flattened into x/y/width/height on the slot record. Every record is
 * validated on load; invalid records are skipped and logged so one bad entry
 * never discards the rest of the file.
 */

import {copyFile, mkdir, readFile, rename, writeFile} from 'node:fs/promises';
import {join} from 'node:path';
import {z} from 'zod';
import {createLogger} from './debug.js';
import {errorMessage} from './errors.js';
import {parseWindowTypes} from '../windowTypes.js';
import type {Configuration, Layout, Slot} from '../types/layout.js';
import type {ConfigStore} from '../types/platform.js';
import type {WindowType} from '../types/window.js';

const logger = createLogger('ConfigStore');

export const CONFIGURATIONS_FILE = 'configurations.json';
export const WINDOW_TYPES_FILE = 'windowTypes.json';
export const BACKUP_SUFFIX = '.bak';
export const CORRUPT_SUFFIX = '.corrupt';

const SlotRecordSchema = z.object({
    id: z.string().min(1),
    x: z.number().finite(),
    y: z.number().finite(),
    width: z.number().finite(),
    height: z.number().finite(),
    displayId: z.number().int(),
    priority: z.number().default(0),
});

const LayoutRecordSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    slots: z.array(SlotRecordSchema),
    matchingStrategy: z.enum(['sequential', 'byType']).default('sequential'),
});

const AutoActivationRecordSchema = z.discriminatedUnion('type', [
    z.object({type: z.literal('windowCount'), count: z.number().int().nonnegative()}),
    z.object({type: z.literal('windowTypeCount'), typeCounts: z.record(z.number().int().nonnegative())}),
]);

export const ConfigurationRecordSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    layout: LayoutRecordSchema,
    autoActivation: AutoActivationRecordSchema.nullable().default(null),
});

export type SlotRecord = z.infer<typeof SlotRecordSchema>;
export type LayoutRecord = z.infer<typeof LayoutRecordSchema>;
export type ConfigurationRecord = z.infer<typeof ConfigurationRecordSchema>;

function encodeSlot(slot: Slot): SlotRecord {
    return {
        id: slot.id,
        x: slot.frame.x,
        y: slot.frame.y,
        width: slot.frame.width,
        height: slot.frame.height,
        displayId: slot.displayId,
        priority: slot.priority,
    };
}

function decodeSlot(record: SlotRecord): Slot {
    return {
        id: record.id,
        frame: {x: record.x, y: record.y, width: record.width, height: record.height},
        displayId: record.displayId,
        priority: record.priority,
    };
}

export function encodeLayout(layout: Layout): LayoutRecord {
    return {
        id: layout.id,
        name: layout.name,
        slots: layout.slots.map(encodeSlot),
        matchingStrategy: layout.matchingStrategy,
    };
}

export function decodeLayout(record: LayoutRecord): Layout {
    return {
        id: record.id,
        name: record.name,
        slots: record.slots.map(decodeSlot),
        matchingStrategy: record.matchingStrategy,
    };
}

export function encodeConfiguration(configuration: Configuration): ConfigurationRecord {
    const condition = configuration.autoActivation;
    return {
        id: configuration.id,
        name: configuration.name,
        layout: encodeLayout(configuration.layout),
        autoActivation: condition === null ? null
            : condition.type === 'windowCount' ? {type: 'windowCount', count: condition.count}
                : {type: 'windowTypeCount', typeCounts: {...condition.typeCounts}},
    };
}

export function decodeConfiguration(record: ConfigurationRecord): Configuration {
    return {
        id: record.id,
        name: record.name,
        layout: decodeLayout(record.layout),
        autoActivation: record.autoActivation,
    };
}

/**
 * Validate and decode a list of raw configuration records
 * Invalid records are skipped
 */
export function decodeConfigurations(records: readonly unknown[], source: string): Configuration[] {
    const configurations: Configuration[] = [];
    records.forEach((record, index) => {
        const result = ConfigurationRecordSchema.safeParse(record);
        if (result.success) {
            configurations.push(decodeConfiguration(result.data));
        } else {
            logger.warn(`Skipping invalid configuration #${index} in ${source}: ${result.error.message}`);
        }
    });
    return configurations;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * ConfigStore backed by two JSON files in one directory
 *
 * The previous file is copied to `<name>.json.bak` before every save.
 */
export class JsonFileStore implements ConfigStore {
    private _directory: string;

    constructor(directory: string) {
        this._directory = directory;
    }

    get directory(): string {
        return this._directory;
    }

    async loadWindowTypes(): Promise<WindowType[] | null> {
        const records = await this._readArray(WINDOW_TYPES_FILE);
        if (records === null) {
            return null;
        }

        const windowTypes = parseWindowTypes(records, WINDOW_TYPES_FILE);
        logger.debug(`Loaded ${windowTypes.length} window types`);
        return windowTypes;
    }

    async saveWindowTypes(windowTypes: readonly WindowType[]): Promise<void> {
        await this._writeArray(WINDOW_TYPES_FILE, windowTypes.map(windowType => ({...windowType})));
        logger.debug(`Saved ${windowTypes.length} window types`);
    }

    async loadConfigurations(): Promise<Configuration[] | null> {
        const records = await this._readArray(CONFIGURATIONS_FILE);
        if (records === null) {
            return null;
        }

        const configurations = decodeConfigurations(records, CONFIGURATIONS_FILE);
        logger.debug(`Loaded ${configurations.length} configurations`);
        return configurations;
    }

    async saveConfigurations(configurations: readonly Configuration[]): Promise<void> {
        await this._writeArray(CONFIGURATIONS_FILE, configurations.map(encodeConfiguration));
        logger.debug(`Saved ${configurations.length} configurations`);
    }

    /**
     * Replace both files with their backups
     * @returns True if at least one file was restored
     */
    async restoreFromBackup(): Promise<boolean> {
        let restored = false;
        for (const name of [CONFIGURATIONS_FILE, WINDOW_TYPES_FILE]) {
            const path = join(this._directory, name);
            try {
                await copyFile(`${path}${BACKUP_SUFFIX}`, path);
                restored = true;
                logger.info(`Restored ${name} from backup`);
            } catch (error) {
                if (!isMissingFile(error)) {
                    throw error;
                }
                logger.debug(`No backup for ${name}`);
            }
        }
        return restored;
    }

    /**
     * Read a JSON array file
     * @private
     * @returns null when the file does not exist or is not a JSON array;
     * a file that is not a JSON array is renamed with CORRUPT_SUFFIX
     */
    private async _readArray(name: string): Promise<unknown[] | null> {
        const path = join(this._directory, name);
        let raw: string;
        try {
            raw = await readFile(path, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw error;
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (error) {
            logger.error(`${path} is not valid JSON: ${errorMessage(error)}`);
            await this._setAside(path);
            return null;
        }

        if (!Array.isArray(data)) {
            logger.error(`${path} does not contain a JSON array`);
            await this._setAside(path);
            return null;
        }
        return data;
    }

    /**
     * Move an unreadable file out of the way
     * The next save then starts fresh instead of copying it over the backup.
     * @private
     */
    private async _setAside(path: string): Promise<void> {
        await rename(path, `${path}${CORRUPT_SUFFIX}`);
        logger.warn(`Moved unreadable ${path} to ${path}${CORRUPT_SUFFIX}`);
    }

    /**
     * Back up the existing file, then write the new contents
     * @private
     */
    private async _writeArray(name: string, records: unknown[]): Promise<void> {
        const path = join(this._directory, name);
        await mkdir(this._directory, {recursive: true});
        try {
            await copyFile(path, `${path}${BACKUP_SUFFIX}`);
        } catch (error) {
            if (!isMissingFile(error)) {
                throw error;
            }
        }
        await writeFile(path, JSON.stringify(records, null, 2), 'utf-8');
    }
}
